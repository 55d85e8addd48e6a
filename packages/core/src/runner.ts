import type { DataLocation } from "./data-location.js";
import { DATA_LOCATION_GPU_BUFFER } from "./data-location.js";
import type {
  NativeIoBinding,
  NativeMemoryInfo,
  NativeRunOptions,
  NativeSession,
  NativeValue,
} from "./engine.js";
import { BindingError } from "./errors.js";

/** One prepared call into the engine. */
export interface RunRequest {
  readonly runOptions: NativeRunOptions;
  readonly inputNames: readonly string[];
  readonly inputValues: readonly NativeValue[];
  readonly outputNames: readonly string[];
  /** Declaration index of each entry of `outputNames`. */
  readonly outputIndices: readonly number[];
  readonly cpuMemoryInfo: NativeMemoryInfo;
  readonly gpuMemoryInfo: NativeMemoryInfo;
}

/**
 * Executes a prepared request. The variant is chosen once, when the model is
 * loaded, from the session's preferred output locations.
 */
export interface Runner {
  /** Returns one value per requested output, owned by the caller. */
  run(request: RunRequest): NativeValue[];
  release(): void;
}

/** Passes names and values straight to the engine; outputs land on the CPU. */
export class DirectRunner implements Runner {
  constructor(private readonly session: NativeSession) {}

  run(request: RunRequest): NativeValue[] {
    return this.session.run(
      request.runOptions,
      request.inputNames,
      request.inputValues,
      request.outputNames,
    );
  }

  release(): void {}
}

/**
 * Routes outputs through an I/O binding so each one is allocated where the
 * session prefers it: host memory or a device buffer.
 */
export class IoBindingRunner implements Runner {
  constructor(
    private readonly session: NativeSession,
    private readonly binding: NativeIoBinding,
    private readonly locations: readonly DataLocation[],
    private readonly outputCount: number,
  ) {}

  run(request: RunRequest): NativeValue[] {
    if (this.locations.length !== this.outputCount) {
      throw new BindingError("Preferred output locations must have the same size as output names.");
    }

    this.binding.clearBoundInputs();
    this.binding.clearBoundOutputs();
    request.inputNames.forEach((name, i) => {
      this.binding.bindInput(name, request.inputValues[i]);
    });
    // TODO: bind pre-allocated output tensors passed in the fetch record.
    request.outputNames.forEach((name, i) => {
      const location = this.locations[request.outputIndices[i]];
      this.binding.bindOutput(
        name,
        location === DATA_LOCATION_GPU_BUFFER ? request.gpuMemoryInfo : request.cpuMemoryInfo,
      );
    });

    this.session.runWithBinding(request.runOptions, this.binding);

    const outputs = this.binding.getOutputValues();
    if (outputs.length !== request.outputNames.length) {
      for (const output of outputs) output.release();
      throw new BindingError("Output count mismatch.");
    }
    return outputs;
  }

  release(): void {
    this.binding.release();
  }
}
