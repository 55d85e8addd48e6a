/**
 * Factory functions for wiring a binding to the reference engine in tests.
 *
 * Each factory starts from working defaults. Override any field by passing
 * a partial object.
 */
import { Tensor } from "onnxruntime-common";

import { LoggingLevel, createBinding } from "@tensorbridge/core";
import type { Binding, BindingConfig, InferenceSession } from "@tensorbridge/core";

import { encodeModel } from "./models.js";
import type { ReferenceModel } from "./models.js";
import { ReferenceEngine } from "./reference-engine.js";
import type { ReferenceEngineOptions } from "./reference-engine.js";

export interface TestBinding {
  readonly engine: ReferenceEngine;
  readonly binding: Binding;
}

export interface TestBindingOptions {
  readonly engine?: ReferenceEngineOptions;
  readonly config?: BindingConfig;
  /** Log level passed to initOrtOnce. Defaults to WARNING. Null skips init. */
  readonly logLevel?: LoggingLevel | null;
}

/**
 * Create a reference engine and a binding around it, initialized unless
 * `logLevel` is null. Engine log lines are dropped unless a sink is given.
 *
 * @example
 * ```ts
 * const { engine, binding } = createTestBinding();
 * const session = new binding.InferenceSession();
 * ```
 */
export function createTestBinding(overrides: TestBindingOptions = {}): TestBinding {
  const engine = new ReferenceEngine({ log: () => {}, ...overrides.engine });
  const binding = createBinding(engine, overrides.config);
  const logLevel = overrides.logLevel === undefined ? LoggingLevel.WARNING : overrides.logLevel;
  if (logLevel !== null) {
    binding.initOrtOnce(logLevel, Tensor);
  }
  return { engine, binding };
}

/**
 * Load `model` into `session` through the buffer form, placing the model
 * bytes at an offset inside a larger buffer.
 */
export function loadFromBuffer(
  session: InferenceSession,
  model: ReferenceModel,
  options: object = {},
): void {
  const bytes = encodeModel(model);
  const padding = 8;
  const buffer = new ArrayBuffer(bytes.byteLength + padding * 2);
  new Uint8Array(buffer).set(bytes, padding);
  session.loadModel(buffer, padding, bytes.byteLength, options);
}

/** A fresh session of `binding` with `model` already loaded. */
export function createLoadedSession(
  binding: Binding,
  model: ReferenceModel,
  options: object = {},
): InferenceSession {
  const session = new binding.InferenceSession();
  loadFromBuffer(session, model, options);
  return session;
}

/** Float values of a CPU tensor, as a plain array. */
export function tensorValues(tensor: Tensor): number[] {
  const data = tensor.data;
  if (!(data instanceof Float32Array)) {
    throw new Error(`Expected float32 data, got ${tensor.type}.`);
  }
  return Array.from(data);
}
