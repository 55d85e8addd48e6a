import type { InferenceSession, Tensor } from "onnxruntime-common";

/**
 * Configuration for creating an OnnxSession.
 */
export interface OnnxSessionConfig {
  /**
   * Options handed to the engine when the model is loaded, in the
   * `onnxruntime-common` shape. Defaults to none.
   */
  readonly sessionOptions?: InferenceSession.SessionOptions;

  /**
   * Engine log severity used if this is the first session of its binding.
   * Defaults to `env.logLevel` from onnxruntime-common, then "warning".
   */
  readonly logLevel?: LogLevelName;
}

export type LogLevelName = "verbose" | "info" | "warning" | "error" | "fatal";

/** Input tensors by input name. */
export type OnnxFeeds = Readonly<Record<string, Tensor>>;

/** Output tensors by output name. */
export type OnnxOutputs = Record<string, Tensor>;
