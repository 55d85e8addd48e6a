export interface InferenceErrorOptions extends ErrorOptions {
  /** File path of the model, or a description of the buffer it came from. */
  readonly modelSource?: string;
}

/**
 * Base error for all inference-related failures.
 */
export class InferenceError extends Error {
  readonly modelSource: string | undefined;

  constructor(message: string, options: InferenceErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "InferenceError";
    this.modelSource = options.modelSource;
  }
}

/**
 * Thrown when the binding or the engine refuses a model.
 */
export class ModelLoadError extends InferenceError {
  declare readonly modelSource: string;

  constructor(modelSource: string, cause?: unknown) {
    super(`Failed to load ONNX model from: ${modelSource}`, {
      modelSource,
      cause: cause instanceof Error ? cause : undefined,
    });
    this.name = "ModelLoadError";
  }
}

/**
 * Thrown when feeds or fetches name values the model does not declare.
 */
export class InputValidationError extends InferenceError {
  constructor(
    readonly side: "input" | "output",
    readonly unknownNames: readonly string[],
    declaredNames: readonly string[],
    modelSource: string,
  ) {
    super(
      `Unknown ${side} name(s): ${unknownNames.join(", ")}. ` +
        `Model ${side}s: ${declaredNames.join(", ")}.`,
      { modelSource },
    );
    this.name = "InputValidationError";
  }
}
