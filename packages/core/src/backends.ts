/** An execution backend this build of the engine can use. */
export interface SupportedBackend {
  readonly name: string;
  /** Whether the backend ships inside the engine library itself. */
  readonly bundled: boolean;
}

/**
 * Optional backends in listing order. Vendor GPU stacks (cuda, tensorrt) are
 * not bundled: their runtime libraries must be installed separately.
 */
const OPTIONAL_BACKENDS: readonly SupportedBackend[] = [
  { name: "dml", bundled: true },
  { name: "webgpu", bundled: true },
  { name: "cuda", bundled: false },
  { name: "tensorrt", bundled: false },
  { name: "coreml", bundled: true },
  { name: "qnn", bundled: true },
];

/**
 * List the backends available with the given engine build features. The CPU
 * backend is always first.
 */
export function listSupportedBackends(buildFeatures: ReadonlySet<string>): SupportedBackend[] {
  return [
    { name: "cpu", bundled: true },
    ...OPTIONAL_BACKENDS.filter((backend) => buildFeatures.has(backend.name)).map((backend) => ({
      ...backend,
    })),
  ];
}
