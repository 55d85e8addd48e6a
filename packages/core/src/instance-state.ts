import type { TensorConstructor } from "onnxruntime-common";

import type { EngineApi, NativeEnv, NativeRunOptions } from "./engine.js";
import { LoggingLevel } from "./engine.js";
import { InvalidArgumentError } from "./errors.js";

interface InitializedState {
  readonly env: NativeEnv;
  readonly defaultRunOptions: NativeRunOptions;
  readonly tensorCtor: TensorConstructor;
  readonly logLevel: LoggingLevel;
}

/**
 * Engine-wide state shared by every session of one binding: the engine
 * environment, the default run options and the host tensor constructor.
 *
 * Initialization happens once. Later `initEngine` calls are no-ops even when
 * they pass a different log level or constructor: the first call wins.
 * Host code runs on a single thread per binding instance, so the one-shot
 * flag needs no further synchronization.
 */
export class InstanceState {
  private _state: InitializedState | undefined;
  private _released = false;

  constructor(
    private readonly api: EngineApi | null,
    private readonly logId: string,
  ) {}

  /** Whether `initEngine` has completed. */
  get initialized(): boolean {
    return this._state !== undefined;
  }

  /** The engine API. Fails if the engine library could not be bound. */
  engineApi(): EngineApi {
    if (this.api === null) {
      throw new Error(
        "Failed to initialize the inference engine API. This binding may have been built " +
          "against a newer engine than the library it is running with.",
      );
    }
    return this.api;
  }

  initEngine(logLevel: number, tensorCtor: TensorConstructor): void {
    if (this._state !== undefined) return;
    if (this._released) {
      throw new Error("Engine has been shut down.");
    }
    const api = this.engineApi();
    if (!Number.isInteger(logLevel) || logLevel < LoggingLevel.VERBOSE || logLevel > LoggingLevel.FATAL) {
      throw new InvalidArgumentError(
        `Invalid argument: logLevel must be an integer in [${LoggingLevel.VERBOSE}, ${LoggingLevel.FATAL}], got ${String(logLevel)}.`,
      );
    }
    if (typeof tensorCtor !== "function") {
      throw new InvalidArgumentError("Invalid argument: tensorConstructor must be a function.");
    }

    const env = api.createEnv(logLevel, this.logId);
    let defaultRunOptions: NativeRunOptions;
    try {
      defaultRunOptions = api.createRunOptions();
    } catch (err) {
      env.release();
      throw err;
    }
    this._state = { env, defaultRunOptions, tensorCtor, logLevel };
  }

  engineEnv(): NativeEnv {
    return this.require().env;
  }

  defaultRunOptions(): NativeRunOptions {
    return this.require().defaultRunOptions;
  }

  tensorCtor(): TensorConstructor {
    return this.require().tensorCtor;
  }

  logLevel(): LoggingLevel {
    return this.require().logLevel;
  }

  /**
   * Release the engine environment. Sessions must be disposed first; the
   * state cannot be initialized again afterwards.
   */
  release(): void {
    const state = this._state;
    this._state = undefined;
    this._released = true;
    if (state) {
      state.defaultRunOptions.release();
      state.env.release();
    }
  }

  private require(): InitializedState {
    if (this._released) {
      throw new Error("Engine has been shut down.");
    }
    if (this._state === undefined) {
      throw new Error("Engine is not initialized. Call initOrtOnce() first.");
    }
    return this._state;
  }
}
