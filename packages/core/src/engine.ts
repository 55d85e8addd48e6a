import type { Tensor } from "onnxruntime-common";

import type { ElementType } from "./element-type.js";

/**
 * Typed contract of the native inference engine as seen by the binding.
 *
 * The shape follows the engine's C API: every object is an owned handle with
 * an explicit `release()`, every call is synchronous, and failures are thrown.
 * The binding never assumes more than what is declared here.
 */

/** Engine value kinds. */
export enum OnnxType {
  UNKNOWN = 0,
  TENSOR = 1,
  SEQUENCE = 2,
  MAP = 3,
  OPAQUE = 4,
  SPARSE_TENSOR = 5,
  OPTIONAL = 6,
}

/** Log severities understood by the engine, most verbose first. */
export enum LoggingLevel {
  VERBOSE = 0,
  INFO = 1,
  WARNING = 2,
  ERROR = 3,
  FATAL = 4,
}

export enum GraphOptimizationLevel {
  DISABLE_ALL = 0,
  ENABLE_BASIC = 1,
  ENABLE_EXTENDED = 2,
  ENABLE_LAYOUT = 3,
  ENABLE_ALL = 99,
}

export enum ExecutionMode {
  SEQUENTIAL = 0,
  PARALLEL = 1,
}

/** Opaque device buffer handle, as carried by host GPU tensors. */
export type GpuBufferHandle = Tensor.GpuBufferType;

/** Anything the engine allocates and the binding must give back. */
export interface NativeHandle {
  release(): void;
}

export type NativeEnv = NativeHandle;

export interface NativeMemoryInfo extends NativeHandle {
  readonly name: string;
}

export interface NativeTensorTypeAndShape {
  readonly elementType: ElementType;
  /** Concrete dimensions; -1 where the dimension is not known. */
  readonly shape: readonly number[];
  /** Parallel to `shape`; empty string where the dimension has no name. */
  readonly symbolicDimensions: readonly string[];
}

export interface NativeTypeInfo {
  readonly onnxType: OnnxType;
  /** Present iff `onnxType` is TENSOR. */
  readonly tensor?: NativeTensorTypeAndShape;
}

export interface NativeValue extends NativeHandle {
  readonly onnxType: OnnxType;
  getTensorTypeAndShape(): NativeTensorTypeAndShape;
  getMemoryInfo(): NativeMemoryInfo;
  /** Raw bytes of a CPU numeric tensor. */
  getTensorData(): Uint8Array;
  /** Elements of a string tensor. */
  getStringData(): readonly string[];
  /** Backing buffer of a device tensor. */
  getDeviceBuffer(): GpuBufferHandle;
}

export interface NativeSessionOptions extends NativeHandle {
  setGraphOptimizationLevel(level: GraphOptimizationLevel): void;
  setExecutionMode(mode: ExecutionMode): void;
  setIntraOpNumThreads(count: number): void;
  setInterOpNumThreads(count: number): void;
  setLogSeverityLevel(level: LoggingLevel): void;
  setLogVerbosityLevel(level: number): void;
  setLogId(logId: string): void;
  setOptimizedModelFilePath(path: string): void;
  enableProfiling(profileFilePrefix: string): void;
  disableProfiling(): void;
  enableCpuMemArena(): void;
  disableCpuMemArena(): void;
  enableMemPattern(): void;
  disableMemPattern(): void;
  addFreeDimensionOverrideByName(name: string, value: number): void;
  addFreeDimensionOverride(denotation: string, value: number): void;
  appendExecutionProvider(name: string, options: Readonly<Record<string, string>>): void;
  addExternalInitializersFromFilesInMemory(
    paths: readonly string[],
    buffers: readonly Uint8Array[],
  ): void;
  addConfigEntry(key: string, value: string): void;
}

export interface NativeRunOptions extends NativeHandle {
  setLogSeverityLevel(level: LoggingLevel): void;
  setLogVerbosityLevel(level: number): void;
  setRunTag(tag: string): void;
  setTerminate(): void;
  unsetTerminate(): void;
  addConfigEntry(key: string, value: string): void;
}

/** Model path in the platform's native encoding. */
export type NativePath =
  | { readonly encoding: "utf-16"; readonly units: Uint16Array }
  | { readonly encoding: "utf-8"; readonly bytes: Uint8Array };

export interface NativeIoBinding extends NativeHandle {
  bindInput(name: string, value: NativeValue): void;
  bindOutput(name: string, memoryInfo: NativeMemoryInfo): void;
  clearBoundInputs(): void;
  clearBoundOutputs(): void;
  /** Values of the bound outputs, in binding order. Ownership passes to the caller. */
  getOutputValues(): NativeValue[];
}

export interface NativeSession extends NativeHandle {
  getInputCount(): number;
  getOutputCount(): number;
  getInputName(index: number): string;
  getOutputName(index: number): string;
  getInputTypeInfo(index: number): NativeTypeInfo;
  getOutputTypeInfo(index: number): NativeTypeInfo;
  /**
   * Run with parallel name/value arrays. Returns one engine-allocated value per
   * output name; ownership passes to the caller.
   */
  run(
    runOptions: NativeRunOptions,
    inputNames: readonly string[],
    inputValues: readonly NativeValue[],
    outputNames: readonly string[],
  ): NativeValue[];
  runWithBinding(runOptions: NativeRunOptions, binding: NativeIoBinding): void;
  endProfiling(): string;
}

export interface EngineApi {
  /** Execution providers compiled into this engine build, e.g. "cuda". */
  readonly buildFeatures: ReadonlySet<string>;

  createEnv(logLevel: LoggingLevel, logId: string): NativeEnv;
  createSessionOptions(): NativeSessionOptions;
  createRunOptions(): NativeRunOptions;
  createSessionFromPath(
    env: NativeEnv,
    path: NativePath,
    options: NativeSessionOptions,
  ): NativeSession;
  /** The engine may read `model` only until this call returns. */
  createSessionFromBuffer(
    env: NativeEnv,
    model: Uint8Array,
    options: NativeSessionOptions,
  ): NativeSession;
  createIoBinding(session: NativeSession): NativeIoBinding;
  createCpuMemoryInfo(): NativeMemoryInfo;
  createMemoryInfo(name: string, deviceId: number): NativeMemoryInfo;
  /** Wraps `data` without copying; the value is valid only while `data` is. */
  createTensor(
    memoryInfo: NativeMemoryInfo,
    data: Uint8Array,
    shape: readonly number[],
    elementType: ElementType,
  ): NativeValue;
  createDeviceTensor(
    memoryInfo: NativeMemoryInfo,
    buffer: GpuBufferHandle,
    byteLength: number,
    shape: readonly number[],
    elementType: ElementType,
  ): NativeValue;
  /** Copies `values` into engine-allocated storage. */
  createStringTensor(shape: readonly number[], values: readonly string[]): NativeValue;
}
