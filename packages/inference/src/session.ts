import { Tensor, env } from "onnxruntime-common";
import type { InferenceSession as OrtInferenceSession } from "onnxruntime-common";

import { LoggingLevel } from "@tensorbridge/core";
import type { Binding, FetchRecord, InferenceSession, ValueMetadata } from "@tensorbridge/core";

import { InferenceError, InputValidationError, ModelLoadError } from "./errors.js";
import type { LogLevelName, OnnxFeeds, OnnxOutputs, OnnxSessionConfig } from "./types.js";

const LOG_LEVELS: Readonly<Record<LogLevelName, LoggingLevel>> = {
  verbose: LoggingLevel.VERBOSE,
  info: LoggingLevel.INFO,
  warning: LoggingLevel.WARNING,
  error: LoggingLevel.ERROR,
  fatal: LoggingLevel.FATAL,
};

/** Engine log severity for a host log level name. */
export function toLoggingLevel(name: LogLevelName | undefined): LoggingLevel {
  if (name === undefined) return LoggingLevel.WARNING;
  const level = Object.hasOwn(LOG_LEVELS, name) ? LOG_LEVELS[name] : undefined;
  if (level === undefined) {
    throw new Error(`Unsupported log level: ${String(name)}`);
  }
  return level;
}

function describeModel(model: string | Uint8Array): string {
  return typeof model === "string" ? model : `buffer (${model.byteLength} bytes)`;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Async wrapper around a binding session that handles engine initialization,
 * lifecycle, and error wrapping.
 *
 * This is the only module that touches the `onnxruntime-common` environment.
 */
export class OnnxSession {
  private constructor(
    private readonly session: InferenceSession,
    readonly modelSource: string,
  ) {}

  /**
   * Initialize the binding's engine if needed and load `model`, given as a
   * file path or the model bytes.
   */
  static async create(
    binding: Binding,
    model: string | Uint8Array,
    config: OnnxSessionConfig = {},
  ): Promise<OnnxSession> {
    const modelSource = describeModel(model);
    const sessionOptions: OrtInferenceSession.SessionOptions = config.sessionOptions ?? {};

    let session: InferenceSession;
    try {
      binding.initOrtOnce(toLoggingLevel(config.logLevel ?? env.logLevel), Tensor);
      session = new binding.InferenceSession();
      if (typeof model === "string") {
        session.loadModel(model, sessionOptions);
      } else if (model.buffer instanceof ArrayBuffer) {
        session.loadModel(model.buffer, model.byteOffset, model.byteLength, sessionOptions);
      } else {
        const copy = new ArrayBuffer(model.byteLength);
        new Uint8Array(copy).set(model);
        session.loadModel(copy, 0, model.byteLength, sessionOptions);
      }
    } catch (err: unknown) {
      throw new ModelLoadError(modelSource, err);
    }

    return new OnnxSession(session, modelSource);
  }

  get inputNames(): string[] {
    return this.session.inputNames;
  }

  get outputNames(): string[] {
    return this.session.outputNames;
  }

  get inputMetadata(): ValueMetadata[] {
    return this.session.inputMetadata;
  }

  get outputMetadata(): ValueMetadata[] {
    return this.session.outputMetadata;
  }

  /**
   * Run inference with named feeds. Computes the outputs named in `fetches`,
   * or every output when it is omitted.
   *
   * Returned tensors are owned by the caller. Device tensors hold engine
   * memory until `dispose()` is called on them.
   */
  async run(
    feeds: OnnxFeeds,
    fetches?: readonly string[],
    runOptions?: OrtInferenceSession.RunOptions,
  ): Promise<OnnxOutputs> {
    try {
      const fetchRecord = this.buildFetchRecord(feeds, fetches);
      return this.session.run(feeds, fetchRecord, runOptions);
    } catch (err: unknown) {
      if (err instanceof InputValidationError) throw err;
      throw new InferenceError(
        `Inference failed on model ${this.modelSource}: ${errorMessage(err)}`,
        { modelSource: this.modelSource, cause: err },
      );
    }
  }

  private buildFetchRecord(feeds: OnnxFeeds, fetches: readonly string[] | undefined): FetchRecord {
    const inputNames = this.session.inputNames;
    const outputNames = this.session.outputNames;

    const unknownInputs = Object.keys(feeds).filter((name) => !inputNames.includes(name));
    if (unknownInputs.length > 0) {
      throw new InputValidationError("input", unknownInputs, inputNames, this.modelSource);
    }

    const requested = fetches ?? outputNames;
    const unknownOutputs = requested.filter((name) => !outputNames.includes(name));
    if (unknownOutputs.length > 0) {
      throw new InputValidationError("output", unknownOutputs, outputNames, this.modelSource);
    }
    return Object.fromEntries(requested.map((name): [string, null] => [name, null]));
  }

  /** Stop profiling and return the profile file name, or "" if profiling was off. */
  endProfiling(): string {
    try {
      return this.session.endProfiling();
    } catch (err: unknown) {
      throw new InferenceError(
        `Failed to end profiling on model ${this.modelSource}: ${errorMessage(err)}`,
        { modelSource: this.modelSource, cause: err },
      );
    }
  }

  async dispose(): Promise<void> {
    this.session.dispose();
  }
}

