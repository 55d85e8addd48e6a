export {
  ReferenceEngine,
  ReferenceEnv,
  ReferenceGpuBuffer,
  ReferenceHandle,
  ReferenceIoBinding,
  ReferenceMemoryInfo,
  ReferenceRunOptions,
  ReferenceSession,
  ReferenceSessionOptions,
  ReferenceValue,
  HandleTracker,
  CPU_MEMORY_NAME,
} from "./reference-engine.js";
export type {
  Computed,
  LogSink,
  Payload,
  RecordedCall,
  ReferenceEngineOptions,
  RunRecord,
  SessionSettings,
} from "./reference-engine.js";
export {
  encodeModel,
  decodeModel,
  identityModel,
  twoOutputModel,
  optionalInputModel,
  typedIdentityModel,
  sequenceOutputModel,
  createFloatTensor,
} from "./models.js";
export type { ReferenceModel, ReferenceNode, ReferenceOp, ReferenceValueInfo } from "./models.js";
export {
  createTestBinding,
  createLoadedSession,
  loadFromBuffer,
  tensorValues,
} from "./factories.js";
export type { TestBinding, TestBindingOptions } from "./factories.js";
