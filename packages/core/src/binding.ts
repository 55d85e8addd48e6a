import type { TensorConstructor } from "onnxruntime-common";

import type { SupportedBackend } from "./backends.js";
import { listSupportedBackends } from "./backends.js";
import type { EngineApi } from "./engine.js";
import { InstanceState } from "./instance-state.js";
import { InferenceSession } from "./session.js";
import type { SessionContext } from "./session.js";

export const DEFAULT_LOG_ID = "tensorbridge";

/**
 * Configuration for a binding instance.
 */
export interface BindingConfig {
  /** Log id the engine environment reports under. Defaults to "tensorbridge". */
  readonly logId?: string;

  /**
   * Platform whose path encoding is used for model files. Defaults to
   * `process.platform`.
   */
  readonly platform?: NodeJS.Platform;
}

/** The surface a binding exposes to host code. */
export interface Binding {
  /**
   * Initialize the engine once. Later calls are ignored, whatever their
   * arguments.
   */
  initOrtOnce(logLevel: number, tensorConstructor: TensorConstructor): void;

  listSupportedBackends(): SupportedBackend[];

  /** Session class bound to this binding's engine state. */
  readonly InferenceSession: new () => InferenceSession;

  /** Release the engine environment. Dispose every session first. */
  shutdown(): void;
}

/**
 * Assemble the host-facing binding around an engine API.
 *
 * Each binding owns one engine state, shared by all sessions it creates. A
 * null `api` stands for an engine library that could not be bound; the
 * binding is still created, and `initOrtOnce` reports the failure.
 *
 * ```ts
 * const binding = createBinding(engineApi);
 * binding.initOrtOnce(2, Tensor);
 * const session = new binding.InferenceSession();
 * session.loadModel("/models/model.onnx", {});
 * ```
 */
export function createBinding(api: EngineApi | null, config: BindingConfig = {}): Binding {
  const instance = new InstanceState(api, config.logId ?? DEFAULT_LOG_ID);
  const context: SessionContext = {
    instance,
    platform: config.platform ?? process.platform,
  };

  class BoundInferenceSession extends InferenceSession {
    constructor() {
      super(context);
    }
  }

  return {
    initOrtOnce: (logLevel, tensorConstructor) => instance.initEngine(logLevel, tensorConstructor),
    listSupportedBackends: () => listSupportedBackends(api?.buildFeatures ?? new Set<string>()),
    InferenceSession: BoundInferenceSession,
    shutdown: () => instance.release(),
  };
}
