/**
 * In-process engine implementing the binding's `EngineApi` over the JSON
 * models from `models.ts`.
 *
 * It behaves like the real engine where the binding can observe it: handles
 * must be released exactly once, borrowed tensor bytes are read only during
 * the call, failures are thrown with the engine's own wording, and every
 * option setter call is recorded so tests can assert what reached the engine.
 *
 * @example
 * ```ts
 * const engine = new ReferenceEngine({ files: { "/models/id.onnx": encodeModel(identityModel()) } });
 * const binding = createBinding(engine);
 * binding.initOrtOnce(LoggingLevel.WARNING, Tensor);
 * // ...
 * expect(engine.liveHandleCount).toBe(2); // env + default run options
 * ```
 */
import type {
  EngineApi,
  GpuBufferHandle,
  NativeHandle,
  NativeIoBinding,
  NativeMemoryInfo,
  NativePath,
  NativeRunOptions,
  NativeSession,
  NativeSessionOptions,
  NativeTensorTypeAndShape,
  NativeTypeInfo,
  NativeValue,
} from "@tensorbridge/core";
import {
  ElementType,
  ExecutionMode,
  GPU_BUFFER_MEMORY_NAME,
  GraphOptimizationLevel,
  LoggingLevel,
  OnnxType,
  elementSize,
  shapeSize,
} from "@tensorbridge/core";

import { decodeModel } from "./models.js";
import type { ReferenceModel, ReferenceNode, ReferenceValueInfo } from "./models.js";

export const CPU_MEMORY_NAME = "Cpu";

const SEVERITY_TAGS: Readonly<Record<LoggingLevel, string>> = {
  [LoggingLevel.VERBOSE]: "V",
  [LoggingLevel.INFO]: "I",
  [LoggingLevel.WARNING]: "W",
  [LoggingLevel.ERROR]: "E",
  [LoggingLevel.FATAL]: "F",
};

/** Receives one formatted log line. */
export type LogSink = (line: string) => void;

export interface ReferenceEngineOptions {
  /** Model files reachable by path. */
  readonly files?: Readonly<Record<string, Uint8Array>>;

  /** Execution providers this build claims to include. Defaults to none. */
  readonly buildFeatures?: readonly string[];

  /** Where log lines go. Defaults to console.error. */
  readonly log?: LogSink;
}

/** A setter call recorded on an options object. */
export interface RecordedCall {
  readonly method: string;
  readonly args: readonly unknown[];
}

/** Inputs and outputs the engine saw on one run. */
export interface RunRecord {
  readonly inputNames: readonly string[];
  readonly outputNames: readonly string[];
  readonly tag: string | undefined;
}

export class HandleTracker {
  private readonly live = new Set<ReferenceHandle>();

  track<T extends ReferenceHandle>(handle: T): T {
    this.live.add(handle);
    handle.attach(this);
    return handle;
  }

  untrack(handle: ReferenceHandle): void {
    this.live.delete(handle);
  }

  get size(): number {
    return this.live.size;
  }
}

export abstract class ReferenceHandle implements NativeHandle {
  protected abstract readonly handleType: string;
  private _released = false;
  private _tracker: HandleTracker | undefined;

  get released(): boolean {
    return this._released;
  }

  attach(tracker: HandleTracker): void {
    this._tracker = tracker;
  }

  release(): void {
    if (this._released) {
      throw new Error(`${this.handleType} released twice.`);
    }
    this._released = true;
    this._tracker?.untrack(this);
  }

  protected assertLive(): void {
    if (this._released) {
      throw new Error(`${this.handleType} used after release.`);
    }
  }
}

/** Device buffer stand-in. Host GPU tensors carry one of these. */
export class ReferenceGpuBuffer {
  readonly size: number;
  readonly mapState: "unmapped" | "pending" | "mapped" = "unmapped";

  constructor(readonly bytes: Uint8Array) {
    this.size = bytes.byteLength;
  }
}

export class ReferenceEnv extends ReferenceHandle {
  protected readonly handleType = "OrtEnv";

  constructor(
    readonly logLevel: LoggingLevel,
    readonly logId: string,
    private readonly sink: LogSink,
  ) {
    super();
  }

  log(severity: LoggingLevel, threshold: LoggingLevel, logId: string, message: string): void {
    if (severity >= threshold) {
      this.sink(`[${SEVERITY_TAGS[severity]}:${logId}] ${message}`);
    }
  }
}

export class ReferenceMemoryInfo extends ReferenceHandle implements NativeMemoryInfo {
  protected readonly handleType = "OrtMemoryInfo";

  constructor(
    readonly name: string,
    readonly deviceId: number,
  ) {
    super();
  }
}

export type Payload =
  | { readonly kind: "bytes"; readonly bytes: Uint8Array }
  | { readonly kind: "strings"; readonly strings: readonly string[] }
  | { readonly kind: "device"; readonly buffer: ReferenceGpuBuffer }
  | { readonly kind: "none" };

/** Tensor contents while a run is in progress. */
export interface Computed {
  readonly type: ElementType;
  readonly shape: readonly number[];
  readonly data:
    | { readonly kind: "bytes"; readonly bytes: Uint8Array }
    | { readonly kind: "strings"; readonly strings: readonly string[] };
}

export class ReferenceValue extends ReferenceHandle implements NativeValue {
  protected readonly handleType = "OrtValue";

  constructor(
    readonly onnxType: OnnxType,
    private readonly info: NativeTensorTypeAndShape,
    private readonly memoryInfo: ReferenceMemoryInfo,
    readonly payload: Payload,
  ) {
    super();
  }

  getTensorTypeAndShape(): NativeTensorTypeAndShape {
    this.assertLive();
    if (this.onnxType !== OnnxType.TENSOR) {
      throw new Error("the ort_value must contain a constructed tensor");
    }
    return this.info;
  }

  getMemoryInfo(): NativeMemoryInfo {
    this.assertLive();
    return this.memoryInfo;
  }

  getTensorData(): Uint8Array {
    this.assertLive();
    if (this.payload.kind !== "bytes") {
      throw new Error("Tensor data is not in CPU memory.");
    }
    return this.payload.bytes;
  }

  getStringData(): readonly string[] {
    this.assertLive();
    if (this.payload.kind !== "strings") {
      throw new Error("Tensor does not hold strings.");
    }
    return this.payload.strings;
  }

  getDeviceBuffer(): GpuBufferHandle {
    this.assertLive();
    if (this.payload.kind !== "device") {
      throw new Error("Tensor is not in a device buffer.");
    }
    return this.payload.buffer;
  }

  read(): Computed {
    this.assertLive();
    const { elementType: type, shape } = this.info;
    switch (this.payload.kind) {
      case "bytes":
        return { type, shape, data: { kind: "bytes", bytes: this.payload.bytes } };
      case "device":
        return { type, shape, data: { kind: "bytes", bytes: this.payload.buffer.bytes } };
      case "strings":
        return { type, shape, data: { kind: "strings", strings: this.payload.strings } };
      case "none":
        throw new Error("Non-tensor values cannot be fed as inputs.");
    }
  }
}

/** Effective session settings captured when a session is created. */
export interface SessionSettings {
  readonly logSeverityLevel: LoggingLevel | undefined;
  readonly logId: string | undefined;
  readonly profileFilePrefix: string | undefined;
  readonly freeDimensionOverrides: ReadonlyMap<string, number>;
}

export class ReferenceSessionOptions extends ReferenceHandle implements NativeSessionOptions {
  protected readonly handleType = "OrtSessionOptions";

  readonly calls: RecordedCall[] = [];
  graphOptimizationLevel = GraphOptimizationLevel.ENABLE_ALL;
  executionMode = ExecutionMode.SEQUENTIAL;
  logSeverityLevel: LoggingLevel | undefined;
  logId: string | undefined;
  profileFilePrefix: string | undefined;
  readonly freeDimensionOverrides = new Map<string, number>();
  readonly providers: Array<{ name: string; options: Readonly<Record<string, string>> }> = [];
  readonly configEntries = new Map<string, string>();

  private record(method: string, ...args: unknown[]): void {
    this.assertLive();
    this.calls.push({ method, args });
  }

  setGraphOptimizationLevel(level: GraphOptimizationLevel): void {
    this.record("setGraphOptimizationLevel", level);
    this.graphOptimizationLevel = level;
  }

  setExecutionMode(mode: ExecutionMode): void {
    this.record("setExecutionMode", mode);
    this.executionMode = mode;
  }

  setIntraOpNumThreads(count: number): void {
    this.record("setIntraOpNumThreads", count);
  }

  setInterOpNumThreads(count: number): void {
    this.record("setInterOpNumThreads", count);
  }

  setLogSeverityLevel(level: LoggingLevel): void {
    this.record("setLogSeverityLevel", level);
    this.logSeverityLevel = level;
  }

  setLogVerbosityLevel(level: number): void {
    this.record("setLogVerbosityLevel", level);
  }

  setLogId(logId: string): void {
    this.record("setLogId", logId);
    this.logId = logId;
  }

  setOptimizedModelFilePath(path: string): void {
    this.record("setOptimizedModelFilePath", path);
  }

  enableProfiling(profileFilePrefix: string): void {
    this.record("enableProfiling", profileFilePrefix);
    this.profileFilePrefix = profileFilePrefix;
  }

  disableProfiling(): void {
    this.record("disableProfiling");
    this.profileFilePrefix = undefined;
  }

  enableCpuMemArena(): void {
    this.record("enableCpuMemArena");
  }

  disableCpuMemArena(): void {
    this.record("disableCpuMemArena");
  }

  enableMemPattern(): void {
    this.record("enableMemPattern");
  }

  disableMemPattern(): void {
    this.record("disableMemPattern");
  }

  addFreeDimensionOverrideByName(name: string, value: number): void {
    this.record("addFreeDimensionOverrideByName", name, value);
    this.freeDimensionOverrides.set(name, value);
  }

  addFreeDimensionOverride(denotation: string, value: number): void {
    this.record("addFreeDimensionOverride", denotation, value);
  }

  appendExecutionProvider(name: string, options: Readonly<Record<string, string>>): void {
    this.record("appendExecutionProvider", name, options);
    this.providers.push({ name, options });
  }

  addExternalInitializersFromFilesInMemory(
    paths: readonly string[],
    buffers: readonly Uint8Array[],
  ): void {
    this.record("addExternalInitializersFromFilesInMemory", [...paths], [...buffers]);
  }

  addConfigEntry(key: string, value: string): void {
    this.record("addConfigEntry", key, value);
    this.configEntries.set(key, value);
  }

  settings(): SessionSettings {
    return {
      logSeverityLevel: this.logSeverityLevel,
      logId: this.logId,
      profileFilePrefix: this.profileFilePrefix,
      freeDimensionOverrides: new Map(this.freeDimensionOverrides),
    };
  }
}

export class ReferenceRunOptions extends ReferenceHandle implements NativeRunOptions {
  protected readonly handleType = "OrtRunOptions";

  readonly calls: RecordedCall[] = [];
  logSeverityLevel: LoggingLevel | undefined;
  tag: string | undefined;
  terminate = false;
  readonly configEntries = new Map<string, string>();

  private record(method: string, ...args: unknown[]): void {
    this.assertLive();
    this.calls.push({ method, args });
  }

  setLogSeverityLevel(level: LoggingLevel): void {
    this.record("setLogSeverityLevel", level);
    this.logSeverityLevel = level;
  }

  setLogVerbosityLevel(level: number): void {
    this.record("setLogVerbosityLevel", level);
  }

  setRunTag(tag: string): void {
    this.record("setRunTag", tag);
    this.tag = tag;
  }

  setTerminate(): void {
    this.record("setTerminate");
    this.terminate = true;
  }

  unsetTerminate(): void {
    this.record("unsetTerminate");
    this.terminate = false;
  }

  addConfigEntry(key: string, value: string): void {
    this.record("addConfigEntry", key, value);
    this.configEntries.set(key, value);
  }
}

export class ReferenceIoBinding extends ReferenceHandle implements NativeIoBinding {
  protected readonly handleType = "OrtIoBinding";

  private readonly _inputs = new Map<string, ReferenceValue>();
  private readonly _outputs: Array<{ name: string; memoryInfo: NativeMemoryInfo }> = [];
  private _results: ReferenceValue[] = [];

  constructor(readonly session: ReferenceSession) {
    super();
  }

  get boundInputs(): ReadonlyMap<string, ReferenceValue> {
    return this._inputs;
  }

  get boundOutputs(): ReadonlyArray<{ name: string; memoryInfo: NativeMemoryInfo }> {
    return this._outputs;
  }

  bindInput(name: string, value: NativeValue): void {
    this.assertLive();
    if (!(value instanceof ReferenceValue)) {
      throw new Error(`Unknown value bound to input ${name}.`);
    }
    this._inputs.set(name, value);
  }

  bindOutput(name: string, memoryInfo: NativeMemoryInfo): void {
    this.assertLive();
    this._outputs.push({ name, memoryInfo });
  }

  clearBoundInputs(): void {
    this.assertLive();
    this._inputs.clear();
  }

  clearBoundOutputs(): void {
    this.assertLive();
    this._outputs.length = 0;
  }

  getOutputValues(): NativeValue[] {
    this.assertLive();
    const results = this._results;
    this._results = [];
    return results;
  }

  setResults(results: ReferenceValue[]): void {
    for (const pending of this._results) pending.release();
    this._results = results;
  }

  override release(): void {
    for (const pending of this._results) pending.release();
    this._results = [];
    super.release();
  }
}

function toFloats(bytes: Uint8Array): Float32Array {
  return new Float32Array(bytes.slice().buffer);
}

function copyComputed(value: Computed): Computed {
  return value.data.kind === "bytes"
    ? { ...value, data: { kind: "bytes", bytes: value.data.bytes.slice() } }
    : { ...value, data: { kind: "strings", strings: [...value.data.strings] } };
}

export class ReferenceSession extends ReferenceHandle implements NativeSession {
  protected readonly handleType = "OrtSession";

  readonly runs: RunRecord[] = [];

  constructor(
    readonly id: number,
    private readonly engine: ReferenceEngine,
    private readonly env: ReferenceEnv,
    readonly model: ReferenceModel,
    readonly settings: SessionSettings,
  ) {
    super();
  }

  getInputCount(): number {
    this.assertLive();
    return this.model.inputs.length;
  }

  getOutputCount(): number {
    this.assertLive();
    return this.model.outputs.length;
  }

  getInputName(index: number): string {
    return this.declaredInput(index).name;
  }

  getOutputName(index: number): string {
    return this.declaredOutput(index).name;
  }

  getInputTypeInfo(index: number): NativeTypeInfo {
    return this.typeInfo(this.declaredInput(index));
  }

  getOutputTypeInfo(index: number): NativeTypeInfo {
    return this.typeInfo(this.declaredOutput(index));
  }

  run(
    runOptions: NativeRunOptions,
    inputNames: readonly string[],
    inputValues: readonly NativeValue[],
    outputNames: readonly string[],
  ): NativeValue[] {
    const inputs = inputNames.map((name, i) => {
      const value = inputValues[i];
      if (!(value instanceof ReferenceValue)) {
        throw new Error(`Unknown value passed for input ${name}.`);
      }
      return [name, value] as const;
    });
    const computed = this.execute(runOptions, inputs, outputNames);
    return outputNames.map((name) => this.materialize(name, computed, CPU_MEMORY_NAME));
  }

  runWithBinding(runOptions: NativeRunOptions, binding: NativeIoBinding): void {
    if (!(binding instanceof ReferenceIoBinding) || binding.session !== this) {
      throw new Error("I/O binding belongs to another session.");
    }
    const outputs = binding.boundOutputs;
    const computed = this.execute(
      runOptions,
      [...binding.boundInputs.entries()],
      outputs.map((output) => output.name),
    );
    binding.setResults(
      outputs.map((output) => this.materialize(output.name, computed, output.memoryInfo.name)),
    );
  }

  endProfiling(): string {
    this.assertLive();
    const prefix = this.settings.profileFilePrefix;
    return prefix === undefined ? "" : `${prefix}${this.id}.json`;
  }

  private declaredInput(index: number): ReferenceValueInfo {
    this.assertLive();
    const info = this.model.inputs[index];
    if (info === undefined) throw new Error(`Invalid input index: ${index}`);
    return info;
  }

  private declaredOutput(index: number): ReferenceValueInfo {
    this.assertLive();
    const info = this.model.outputs[index];
    if (info === undefined) throw new Error(`Invalid output index: ${index}`);
    return info;
  }

  private typeInfo(info: ReferenceValueInfo): NativeTypeInfo {
    if (info.kind === "sequence") {
      return { onnxType: OnnxType.SEQUENCE };
    }
    const declared = info.shape ?? [];
    const symbolic = info.symbolicDimensions ?? declared.map(() => "");
    const shape = declared.map((dim, i) => {
      const override = this.settings.freeDimensionOverrides.get(symbolic[i] ?? "");
      return dim < 0 && override !== undefined ? override : dim;
    });
    return {
      onnxType: OnnxType.TENSOR,
      tensor: { elementType: info.type ?? ElementType.FLOAT, shape, symbolicDimensions: symbolic },
    };
  }

  private log(severity: LoggingLevel, message: string, threshold?: LoggingLevel): void {
    this.env.log(
      severity,
      threshold ?? this.settings.logSeverityLevel ?? this.env.logLevel,
      this.settings.logId ?? this.env.logId,
      message,
    );
  }

  private execute(
    runOptions: NativeRunOptions,
    inputs: ReadonlyArray<readonly [string, ReferenceValue]>,
    outputNames: readonly string[],
  ): Map<string, Computed> {
    this.assertLive();
    if (!(runOptions instanceof ReferenceRunOptions)) {
      throw new Error("Unknown run options object.");
    }
    if (runOptions.terminate) {
      throw new Error("Exiting due to terminate flag being set to true.");
    }

    const values = new Map<string, Computed>();
    for (const [name, value] of inputs) {
      const declared = this.model.inputs.find((input) => input.name === name);
      if (declared === undefined) {
        throw new Error(`Invalid input name: ${name}`);
      }
      const computed = value.read();
      const expected = declared.type ?? ElementType.FLOAT;
      if (computed.type !== expected) {
        throw new Error(
          `Unexpected input data type. Actual: (${ElementType[computed.type]}) , expected: (${ElementType[expected]})`,
        );
      }
      const shape = declared.shape;
      if (
        shape !== undefined &&
        (shape.length !== computed.shape.length ||
          shape.some((dim, i) => dim >= 0 && dim !== computed.shape[i]))
      ) {
        throw new Error(`Got invalid dimensions for input: ${name}`);
      }
      values.set(name, computed);
    }
    for (const input of this.model.inputs) {
      if (!input.optional && !values.has(input.name)) {
        throw new Error(`Missing Input: ${input.name}`);
      }
    }
    for (const name of outputNames) {
      if (!this.model.outputs.some((output) => output.name === name)) {
        throw new Error(`Invalid output name: ${name}`);
      }
    }

    for (const node of this.model.nodes) {
      this.runNode(node, values);
    }

    this.runs.push({ inputNames: inputs.map(([name]) => name), outputNames: [...outputNames], tag: runOptions.tag });
    this.log(
      LoggingLevel.VERBOSE,
      `Run${runOptions.tag ? ` '${runOptions.tag}'` : ""} produced ${outputNames.length} output(s).`,
      runOptions.logSeverityLevel,
    );
    return values;
  }

  private runNode(node: ReferenceNode, values: Map<string, Computed>): void {
    const [first, second] = node.inputs.map((name) => values.get(name));
    const output = node.outputs[0];
    if (first === undefined) {
      throw new Error(`${node.op} node is missing its input '${node.inputs[0]}'.`);
    }
    switch (node.op) {
      case "Identity":
        values.set(output, copyComputed(first));
        return;
      case "Neg": {
        if (first.type !== ElementType.FLOAT || first.data.kind !== "bytes") {
          throw new Error("Neg: only float tensors are supported.");
        }
        const result = toFloats(first.data.bytes).map((v) => -v);
        values.set(output, { ...first, data: { kind: "bytes", bytes: new Uint8Array(result.buffer) } });
        return;
      }
      case "Add": {
        if (first.type !== ElementType.FLOAT || first.data.kind !== "bytes") {
          throw new Error("Add: only float tensors are supported.");
        }
        if (second === undefined) {
          values.set(output, copyComputed(first));
          return;
        }
        if (second.data.kind !== "bytes" || second.data.bytes.byteLength !== first.data.bytes.byteLength) {
          throw new Error("Add: input shapes do not match.");
        }
        const a = toFloats(first.data.bytes);
        const b = toFloats(second.data.bytes);
        const result = a.map((v, i) => v + b[i]);
        values.set(output, { ...first, data: { kind: "bytes", bytes: new Uint8Array(result.buffer) } });
        return;
      }
    }
  }

  private materialize(
    name: string,
    values: ReadonlyMap<string, Computed>,
    memoryName: string,
  ): ReferenceValue {
    const declared = this.model.outputs.find((output) => output.name === name);
    const memoryInfo = new ReferenceMemoryInfo(memoryName, 0);
    if (declared?.kind === "sequence") {
      return this.engine.adopt(
        new ReferenceValue(
          OnnxType.SEQUENCE,
          { elementType: ElementType.UNDEFINED, shape: [], symbolicDimensions: [] },
          memoryInfo,
          { kind: "none" },
        ),
      );
    }
    const computed = values.get(name);
    if (computed === undefined) {
      throw new Error(`Output '${name}' was not produced.`);
    }
    const info: NativeTensorTypeAndShape = {
      elementType: computed.type,
      shape: [...computed.shape],
      symbolicDimensions: computed.shape.map(() => ""),
    };
    let payload: Payload;
    if (computed.data.kind === "strings") {
      if (memoryName === GPU_BUFFER_MEMORY_NAME) {
        throw new Error("String tensors cannot be placed in a device buffer.");
      }
      payload = { kind: "strings", strings: [...computed.data.strings] };
    } else if (memoryName === GPU_BUFFER_MEMORY_NAME) {
      payload = { kind: "device", buffer: new ReferenceGpuBuffer(computed.data.bytes.slice()) };
    } else {
      payload = { kind: "bytes", bytes: computed.data.bytes.slice() };
    }
    return this.engine.adopt(new ReferenceValue(OnnxType.TENSOR, info, memoryInfo, payload));
  }
}

export class ReferenceEngine implements EngineApi {
  readonly buildFeatures: ReadonlySet<string>;

  readonly envs: ReferenceEnv[] = [];
  readonly sessions: ReferenceSession[] = [];
  readonly sessionOptions: ReferenceSessionOptions[] = [];
  readonly runOptions: ReferenceRunOptions[] = [];
  readonly ioBindings: ReferenceIoBinding[] = [];

  private readonly files = new Map<string, Uint8Array>();
  private readonly tracker = new HandleTracker();
  private readonly sink: LogSink;
  private nextSessionId = 1;

  constructor(options: ReferenceEngineOptions = {}) {
    this.buildFeatures = new Set(options.buildFeatures ?? []);
    this.sink = options.log ?? ((line) => console.error(line));
    for (const [path, bytes] of Object.entries(options.files ?? {})) {
      this.files.set(path, bytes);
    }
  }

  /** Number of handles handed out and not yet released. */
  get liveHandleCount(): number {
    return this.tracker.size;
  }

  addModelFile(path: string, bytes: Uint8Array): void {
    this.files.set(path, bytes);
  }

  /** Start tracking a handle created on the engine's behalf. */
  adopt<T extends ReferenceHandle>(handle: T): T {
    return this.tracker.track(handle);
  }

  createEnv(logLevel: LoggingLevel, logId: string): ReferenceEnv {
    const env = this.adopt(new ReferenceEnv(logLevel, logId, this.sink));
    this.envs.push(env);
    return env;
  }

  createSessionOptions(): ReferenceSessionOptions {
    const options = this.adopt(new ReferenceSessionOptions());
    this.sessionOptions.push(options);
    return options;
  }

  createRunOptions(): ReferenceRunOptions {
    const options = this.adopt(new ReferenceRunOptions());
    this.runOptions.push(options);
    return options;
  }

  createSessionFromPath(
    env: NativeHandle,
    path: NativePath,
    options: NativeSessionOptions,
  ): ReferenceSession {
    const decoded =
      path.encoding === "utf-16"
        ? String.fromCharCode(...path.units)
        : new TextDecoder().decode(path.bytes);
    const bytes = this.files.get(decoded);
    if (bytes === undefined) {
      throw new Error(`Load model from ${decoded} failed:Load model ${decoded} failed. File doesn't exist`);
    }
    return this.createSession(env, bytes, options, decoded);
  }

  createSessionFromBuffer(
    env: NativeHandle,
    model: Uint8Array,
    options: NativeSessionOptions,
  ): ReferenceSession {
    return this.createSession(env, model, options, "buffer");
  }

  createIoBinding(session: NativeSession): ReferenceIoBinding {
    if (!(session instanceof ReferenceSession) || session.released) {
      throw new Error("Cannot bind a session this engine did not create.");
    }
    const binding = this.adopt(new ReferenceIoBinding(session));
    this.ioBindings.push(binding);
    return binding;
  }

  createCpuMemoryInfo(): ReferenceMemoryInfo {
    return this.adopt(new ReferenceMemoryInfo(CPU_MEMORY_NAME, 0));
  }

  createMemoryInfo(name: string, deviceId: number): ReferenceMemoryInfo {
    return this.adopt(new ReferenceMemoryInfo(name, deviceId));
  }

  createTensor(
    memoryInfo: NativeMemoryInfo,
    data: Uint8Array,
    shape: readonly number[],
    elementType: ElementType,
  ): ReferenceValue {
    const expected = shapeSize(shape) * elementSize(elementType);
    if (data.byteLength !== expected) {
      throw new Error(`shape and data size mismatch: ${data.byteLength} vs ${expected}`);
    }
    return this.adopt(
      new ReferenceValue(
        OnnxType.TENSOR,
        { elementType, shape: [...shape], symbolicDimensions: shape.map(() => "") },
        new ReferenceMemoryInfo(memoryInfo.name, 0),
        { kind: "bytes", bytes: data },
      ),
    );
  }

  createDeviceTensor(
    memoryInfo: NativeMemoryInfo,
    buffer: GpuBufferHandle,
    byteLength: number,
    shape: readonly number[],
    elementType: ElementType,
  ): ReferenceValue {
    if (!(buffer instanceof ReferenceGpuBuffer)) {
      throw new Error("Unsupported device buffer.");
    }
    if (buffer.size < byteLength) {
      throw new Error(`Device buffer holds ${buffer.size} bytes, tensor needs ${byteLength}.`);
    }
    return this.adopt(
      new ReferenceValue(
        OnnxType.TENSOR,
        { elementType, shape: [...shape], symbolicDimensions: shape.map(() => "") },
        new ReferenceMemoryInfo(memoryInfo.name, 0),
        { kind: "device", buffer },
      ),
    );
  }

  createStringTensor(shape: readonly number[], values: readonly string[]): ReferenceValue {
    return this.adopt(
      new ReferenceValue(
        OnnxType.TENSOR,
        { elementType: ElementType.STRING, shape: [...shape], symbolicDimensions: shape.map(() => "") },
        new ReferenceMemoryInfo(CPU_MEMORY_NAME, 0),
        { kind: "strings", strings: [...values] },
      ),
    );
  }

  private createSession(
    env: NativeHandle,
    bytes: Uint8Array,
    options: NativeSessionOptions,
    source: string,
  ): ReferenceSession {
    if (!(env instanceof ReferenceEnv) || env.released) {
      throw new Error("Invalid environment.");
    }
    if (!(options instanceof ReferenceSessionOptions)) {
      throw new Error("Unknown session options object.");
    }
    const model = decodeModel(bytes);
    if (model === undefined) {
      throw new Error("Failed to load model because protobuf parsing failed.");
    }

    const settings = options.settings();
    const threshold = settings.logSeverityLevel ?? env.logLevel;
    const logId = settings.logId ?? env.logId;
    for (const provider of options.providers) {
      if (!this.buildFeatures.has(provider.name)) {
        env.log(
          LoggingLevel.WARNING,
          threshold,
          logId,
          `Execution provider '${provider.name}' is not available in this build. Falling back to cpu.`,
        );
      }
    }

    const session = this.adopt(new ReferenceSession(this.nextSessionId++, this, env, model, settings));
    this.sessions.push(session);
    env.log(LoggingLevel.INFO, threshold, logId, `Session ${session.id} created from ${source}.`);
    return session;
  }
}
