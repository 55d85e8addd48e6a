// @tensorbridge/inference
// Async host facade over a tensorbridge binding, using onnxruntime-common tensors.

export { OnnxSession, toLoggingLevel } from "./session.js";

export type { OnnxSessionConfig, OnnxFeeds, OnnxOutputs, LogLevelName } from "./types.js";

export {
  InferenceError,
  ModelLoadError,
  InputValidationError,
} from "./errors.js";
export type { InferenceErrorOptions } from "./errors.js";
