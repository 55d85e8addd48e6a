/**
 * Thrown when a session method is called in a state that does not allow it
 * (use before load, use after dispose, second load).
 */
export class SessionStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SessionStateError";
  }
}

/**
 * Thrown for programmatic misuse at the binding surface: wrong arity, wrong
 * value kinds, unrecognized or ill-typed options.
 */
export class InvalidArgumentError extends TypeError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

/**
 * Thrown when a tensor cannot be converted between host and native form.
 */
export class MarshalError extends TypeError {
  constructor(message: string) {
    super(message);
    this.name = "MarshalError";
  }
}

/**
 * Thrown when the engine's results break an invariant the binding relies on.
 */
export class BindingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BindingError";
  }
}

/**
 * Wraps anything thrown by the engine. The message is the engine's, verbatim.
 */
export class EngineError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "EngineError";
  }
}

/** True for errors raised by the binding itself rather than the engine. */
export function isBindingError(
  err: unknown,
): err is SessionStateError | InvalidArgumentError | MarshalError | BindingError | EngineError {
  return (
    err instanceof SessionStateError ||
    err instanceof BindingError ||
    err instanceof InvalidArgumentError ||
    err instanceof MarshalError ||
    err instanceof EngineError
  );
}

/**
 * Re-raise an error at the session boundary. Binding errors pass through
 * unchanged; anything else came from the engine and is wrapped.
 */
export function rethrowAtBoundary(err: unknown): never {
  if (isBindingError(err)) {
    throw err;
  }
  if (err instanceof Error) {
    throw new EngineError(err.message, { cause: err });
  }
  throw new EngineError(String(err));
}
