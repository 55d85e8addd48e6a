import type { Tensor } from "onnxruntime-common";

import type { DataLocation } from "./data-location.js";
import { GPU_BUFFER_MEMORY_NAME } from "./data-location.js";
import type { ElementType } from "./element-type.js";
import type {
  EngineApi,
  NativeEnv,
  NativePath,
  NativeSession,
  NativeTypeInfo,
  NativeValue,
} from "./engine.js";
import { OnnxType } from "./engine.js";
import { InvalidArgumentError, SessionStateError, rethrowAtBoundary } from "./errors.js";
import { HandleScope } from "./handle-scope.js";
import type { InstanceState } from "./instance-state.js";
import { hostToNative, nativeToHost } from "./marshal.js";
import { isRecord } from "./options/common.js";
import { parsePreferredOutputLocations } from "./options/preferred-output-locations.js";
import { parseRunOptions } from "./options/run-options.js";
import { parseSessionOptions } from "./options/session-options.js";
import type { Runner } from "./runner.js";
import { DirectRunner, IoBindingRunner } from "./runner.js";

export enum SessionStatus {
  FRESH = "FRESH",
  LOADED = "LOADED",
  DISPOSED = "DISPOSED",
}

/** Metadata of one model input or output. */
export type ValueMetadata =
  | {
      readonly name: string;
      readonly isTensor: false;
    }
  | {
      readonly name: string;
      readonly isTensor: true;
      /** Element type code. */
      readonly type: ElementType;
      /** Parallel to `shape`; empty string for unnamed dimensions. */
      readonly symbolicDimensions: string[];
      /** -1 for dimensions not known until run time. */
      readonly shape: number[];
    };

/** Where a model comes from. */
export type ModelSource =
  | { readonly kind: "path"; readonly path: string }
  | { readonly kind: "buffer"; readonly bytes: Uint8Array };

export type FeedRecord = Readonly<Record<string, Tensor>>;

/**
 * Outputs to compute. A null or undefined entry asks the engine to allocate
 * the output; a tensor entry is accepted but currently allocated the same way.
 */
export type FetchRecord = Readonly<Record<string, Tensor | null | undefined>>;

export type RunResult = Record<string, Tensor>;

/** What a session needs from the binding that created it. */
export interface SessionContext {
  readonly instance: InstanceState;
  readonly platform: NodeJS.Platform;
}

interface LoadedModel {
  readonly session: NativeSession;
  readonly inputNames: readonly string[];
  readonly outputNames: readonly string[];
  readonly inputTypes: readonly NativeTypeInfo[];
  readonly outputTypes: readonly NativeTypeInfo[];
  readonly preferredOutputLocations: readonly DataLocation[];
  readonly runner: Runner;
}

type SessionSlot =
  | { readonly status: SessionStatus.FRESH }
  | { readonly status: SessionStatus.LOADED; readonly model: LoadedModel }
  | { readonly status: SessionStatus.DISPOSED };

/** Encode a model path the way the engine expects it on `platform`. */
export function encodeModelPath(path: string, platform: NodeJS.Platform): NativePath {
  if (platform === "win32") {
    const units = new Uint16Array(path.length);
    for (let i = 0; i < path.length; i++) {
      units[i] = path.charCodeAt(i);
    }
    return { encoding: "utf-16", units };
  }
  return { encoding: "utf-8", bytes: new TextEncoder().encode(path) };
}

function parseLoadArgs(args: readonly unknown[]): { source: ModelSource; options: object } {
  const [first, second, third, fourth] = args;

  if (args.length === 2 && typeof first === "string" && isRecord(second)) {
    return { source: { kind: "path", path: first }, options: second };
  }

  if (
    args.length === 4 &&
    first instanceof ArrayBuffer &&
    typeof second === "number" &&
    typeof third === "number" &&
    isRecord(fourth)
  ) {
    if (
      !Number.isSafeInteger(second) ||
      !Number.isSafeInteger(third) ||
      second < 0 ||
      third < 0 ||
      second + third > first.byteLength
    ) {
      throw new InvalidArgumentError(
        "Invalid argument: byteOffset and byteLength must describe a range inside the buffer.",
      );
    }
    return { source: { kind: "buffer", bytes: new Uint8Array(first, second, third) }, options: fourth };
  }

  throw new InvalidArgumentError(
    "Invalid argument: args has to be either (modelPath, options) or (buffer, byteOffset, byteLength, options).",
  );
}

function toMetadata(name: string, typeInfo: NativeTypeInfo): ValueMetadata {
  if (typeInfo.onnxType === OnnxType.TENSOR && typeInfo.tensor) {
    return {
      name,
      isTensor: true,
      type: typeInfo.tensor.elementType,
      symbolicDimensions: [...typeInfo.tensor.symbolicDimensions],
      shape: [...typeInfo.tensor.shape],
    };
  }
  return { name, isTensor: false };
}

/**
 * A loaded model and its execution context.
 *
 * Lifecycle: FRESH → (loadModel) → LOADED → (dispose) → DISPOSED. Each
 * transition happens once and only on success; a failed `loadModel` leaves
 * the session FRESH. Every method runs to completion synchronously, so host
 * buffers borrowed by `run` cannot change underneath the engine.
 *
 * Errors raised by the binding itself are `SessionStateError`,
 * `InvalidArgumentError` or `MarshalError`; anything the engine throws is
 * re-raised as `EngineError` with the engine's message.
 */
export class InferenceSession {
  private _slot: SessionSlot = { status: SessionStatus.FRESH };

  constructor(private readonly context: SessionContext) {}

  get status(): SessionStatus {
    return this._slot.status;
  }

  /**
   * Load a model from a file path or from a byte range of a buffer. The
   * buffer only needs to stay untouched until this call returns.
   */
  loadModel(modelPath: string, options: object): void;
  loadModel(buffer: ArrayBuffer, byteOffset: number, byteLength: number, options: object): void;
  loadModel(...args: unknown[]): void {
    if (this._slot.status === SessionStatus.DISPOSED) {
      throw new SessionStateError("Session already disposed.");
    }
    if (this._slot.status === SessionStatus.LOADED) {
      throw new SessionStateError("Model already loaded. Cannot load model multiple times.");
    }
    if (args.length === 0) {
      throw new InvalidArgumentError("Expect argument: model file path or buffer.");
    }

    const { source, options } = parseLoadArgs(args);
    const { instance } = this.context;
    const api = instance.engineApi();
    const env = instance.engineEnv();

    let model: LoadedModel;
    try {
      model = this.createModel(api, env, source, options);
    } catch (err) {
      rethrowAtBoundary(err);
    }
    this._slot = { status: SessionStatus.LOADED, model };
  }

  get inputNames(): string[] {
    return [...this.requireLoaded().inputNames];
  }

  get outputNames(): string[] {
    return [...this.requireLoaded().outputNames];
  }

  get inputMetadata(): ValueMetadata[] {
    return this.getMetadata("input");
  }

  get outputMetadata(): ValueMetadata[] {
    return this.getMetadata("output");
  }

  /** Fresh metadata records for the model's inputs or outputs, in declaration order. */
  getMetadata(which: "input" | "output"): ValueMetadata[] {
    const model = this.requireLoaded();
    const names = which === "input" ? model.inputNames : model.outputNames;
    const types = which === "input" ? model.inputTypes : model.outputTypes;
    return types.map((typeInfo, i) => toMetadata(names[i], typeInfo));
  }

  /**
   * Run the model.
   *
   * Only inputs that are own properties of `feed` are passed to the engine
   * and only outputs that are own properties of `fetch` are computed. Both are visited in the model's
   * declaration order. Without `runOptions` the binding's shared defaults are
   * used.
   */
  run(feed: FeedRecord, fetch: FetchRecord, runOptions?: object): RunResult {
    const model = this.requireLoaded();
    if (feed === undefined || fetch === undefined) {
      throw new InvalidArgumentError("Expect argument: inputs(feed) and outputs(fetch).");
    }
    if (!isRecord(feed) || !isRecord(fetch)) {
      throw new InvalidArgumentError("Expect inputs(feed) and outputs(fetch) to be objects.");
    }
    if (runOptions !== undefined && !isRecord(runOptions)) {
      throw new InvalidArgumentError("'runOptions' must be an object.");
    }

    const { instance } = this.context;
    const api = instance.engineApi();
    const tensorCtor = instance.tensorCtor();
    const defaultRunOptions = instance.defaultRunOptions();

    const scope = new HandleScope();
    const created: Tensor[] = [];
    try {
      const cpuMemoryInfo = scope.adopt(api.createCpuMemoryInfo());
      const gpuMemoryInfo = scope.adopt(api.createMemoryInfo(GPU_BUFFER_MEMORY_NAME, 0));

      const inputNames: string[] = [];
      const inputValues: NativeValue[] = [];
      for (const name of model.inputNames) {
        if (Object.hasOwn(feed, name)) {
          inputNames.push(name);
          inputValues.push(scope.adopt(hostToNative(api, feed[name], cpuMemoryInfo, gpuMemoryInfo)));
        }
      }

      const outputNames: string[] = [];
      const outputIndices: number[] = [];
      model.outputNames.forEach((name, i) => {
        if (Object.hasOwn(fetch, name)) {
          outputNames.push(name);
          outputIndices.push(i);
        }
      });

      let nativeRunOptions = defaultRunOptions;
      if (runOptions !== undefined) {
        nativeRunOptions = scope.adopt(api.createRunOptions());
        parseRunOptions(runOptions, nativeRunOptions);
      }

      const outputs = model.runner.run({
        runOptions: nativeRunOptions,
        inputNames,
        inputValues,
        outputNames,
        outputIndices,
        cpuMemoryInfo,
        gpuMemoryInfo,
      });
      for (const output of outputs) scope.adopt(output);

      const result: RunResult = {};
      outputs.forEach((output, i) => {
        const tensor = nativeToHost(output, tensorCtor);
        scope.disown(output);
        created.push(tensor);
        result[outputNames[i]] = tensor;
      });
      return result;
    } catch (err) {
      for (const tensor of created) tensor.dispose();
      rethrowAtBoundary(err);
    } finally {
      scope.release();
    }
  }

  /** Release the I/O binding, then the native session. Fails if called twice. */
  dispose(): void {
    const model = this.requireLoaded();
    this._slot = { status: SessionStatus.DISPOSED };
    try {
      try {
        model.runner.release();
      } finally {
        model.session.release();
      }
    } catch (err) {
      rethrowAtBoundary(err);
    }
  }

  /** Stop profiling and return the name of the profile file the engine wrote. */
  endProfiling(): string {
    const model = this.requireLoaded();
    try {
      return model.session.endProfiling();
    } catch (err) {
      rethrowAtBoundary(err);
    }
  }

  private requireLoaded(): LoadedModel {
    switch (this._slot.status) {
      case SessionStatus.FRESH:
        throw new SessionStateError("Session is not initialized.");
      case SessionStatus.DISPOSED:
        throw new SessionStateError("Session already disposed.");
      case SessionStatus.LOADED:
        return this._slot.model;
    }
  }

  private createModel(
    api: EngineApi,
    env: NativeEnv,
    source: ModelSource,
    options: object,
  ): LoadedModel {
    const scope = new HandleScope();
    try {
      const sessionOptions = scope.adopt(api.createSessionOptions());
      parseSessionOptions(options, sessionOptions);

      const session = scope.adopt(
        source.kind === "path"
          ? api.createSessionFromPath(
              env,
              encodeModelPath(source.path, this.context.platform),
              sessionOptions,
            )
          : api.createSessionFromBuffer(env, source.bytes, sessionOptions),
      );

      const inputNames: string[] = [];
      const inputTypes: NativeTypeInfo[] = [];
      for (let i = 0; i < session.getInputCount(); i++) {
        inputNames.push(session.getInputName(i));
        inputTypes.push(session.getInputTypeInfo(i));
      }
      const outputNames: string[] = [];
      const outputTypes: NativeTypeInfo[] = [];
      for (let i = 0; i < session.getOutputCount(); i++) {
        outputNames.push(session.getOutputName(i));
        outputTypes.push(session.getOutputTypeInfo(i));
      }

      const preferredOutputLocations = parsePreferredOutputLocations(options, outputNames);
      let runner: Runner;
      if (preferredOutputLocations.length > 0) {
        const binding = scope.adopt(api.createIoBinding(session));
        runner = new IoBindingRunner(session, binding, preferredOutputLocations, outputNames.length);
        scope.disown(binding);
      } else {
        runner = new DirectRunner(session);
      }

      scope.disown(session);
      return {
        session,
        inputNames,
        outputNames,
        inputTypes,
        outputTypes,
        preferredOutputLocations,
        runner,
      };
    } finally {
      scope.release();
    }
  }
}
