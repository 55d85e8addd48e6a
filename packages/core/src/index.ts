// @tensorbridge/core
// Session lifecycle and tensor marshalling between host code and a native inference engine.

export { createBinding, DEFAULT_LOG_ID } from "./binding.js";
export type { Binding, BindingConfig } from "./binding.js";

export { listSupportedBackends } from "./backends.js";
export type { SupportedBackend } from "./backends.js";

export { InferenceSession, SessionStatus, encodeModelPath } from "./session.js";
export type {
  FeedRecord,
  FetchRecord,
  ModelSource,
  RunResult,
  SessionContext,
  ValueMetadata,
} from "./session.js";

export { InstanceState } from "./instance-state.js";
export { HandleScope } from "./handle-scope.js";
export { DirectRunner, IoBindingRunner } from "./runner.js";
export type { RunRequest, Runner } from "./runner.js";
export { hostToNative, nativeToHost } from "./marshal.js";

export {
  parseSessionOptions,
  parseRunOptions,
  parsePreferredOutputLocations,
  KNOWN_EXECUTION_PROVIDERS,
  DEFAULT_PROFILE_FILE_PREFIX,
} from "./options/index.js";

export {
  ElementType,
  elementSize,
  elementTypeFromName,
  elementTypeName,
  shapeSize,
  typedArrayFor,
} from "./element-type.js";
export type { NumericTypedArray } from "./element-type.js";

export {
  DATA_LOCATION_CPU,
  DATA_LOCATION_GPU_BUFFER,
  GPU_BUFFER_MEMORY_NAME,
  parseDataLocation,
} from "./data-location.js";
export type { DataLocation } from "./data-location.js";

export {
  OnnxType,
  LoggingLevel,
  GraphOptimizationLevel,
  ExecutionMode,
} from "./engine.js";
export type {
  EngineApi,
  GpuBufferHandle,
  NativeEnv,
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
} from "./engine.js";

export {
  SessionStateError,
  InvalidArgumentError,
  MarshalError,
  BindingError,
  EngineError,
  isBindingError,
  rethrowAtBoundary,
} from "./errors.js";
