import type { NativeSessionOptions } from "../engine.js";
import { ExecutionMode, GraphOptimizationLevel, LoggingLevel } from "../engine.js";
import { InvalidArgumentError } from "../errors.js";
import {
  expectBoolean,
  expectInteger,
  expectIntegerInRange,
  expectNonNegativeInteger,
  expectString,
  flattenConfigEntries,
  isRecord,
  readOption,
} from "./common.js";

const GRAPH_OPTIMIZATION_LEVELS: Readonly<Record<string, GraphOptimizationLevel>> = {
  disabled: GraphOptimizationLevel.DISABLE_ALL,
  basic: GraphOptimizationLevel.ENABLE_BASIC,
  extended: GraphOptimizationLevel.ENABLE_EXTENDED,
  layout: GraphOptimizationLevel.ENABLE_LAYOUT,
  all: GraphOptimizationLevel.ENABLE_ALL,
};

const EXECUTION_MODES: Readonly<Record<string, ExecutionMode>> = {
  sequential: ExecutionMode.SEQUENTIAL,
  parallel: ExecutionMode.PARALLEL,
};

/** Providers the binding knows how to configure. "cpu" is always present. */
export const KNOWN_EXECUTION_PROVIDERS: ReadonlySet<string> = new Set([
  "cpu",
  "dml",
  "webgpu",
  "cuda",
  "tensorrt",
  "coreml",
  "qnn",
]);

export const DEFAULT_PROFILE_FILE_PREFIX = "onnxruntime_profile_";

/**
 * Apply a host session-options record to native session options.
 *
 * Unknown keys are ignored. Every recognized key maps to one native setter.
 * Free-dimension overrides are applied before execution providers are
 * appended, since providers may inspect shapes when they are registered.
 */
export function parseSessionOptions(record: object, options: NativeSessionOptions): void {
  const level = readOption(record, "graphOptimizationLevel");
  if (level !== undefined) {
    const name = expectString(level, "sessionOptions.graphOptimizationLevel");
    const value = Object.hasOwn(GRAPH_OPTIMIZATION_LEVELS, name)
      ? GRAPH_OPTIMIZATION_LEVELS[name]
      : undefined;
    if (value === undefined) {
      throw new InvalidArgumentError(
        `Invalid argument: sessionOptions.graphOptimizationLevel is not supported: ${name}.`,
      );
    }
    options.setGraphOptimizationLevel(value);
  }

  const mode = readOption(record, "executionMode");
  if (mode !== undefined) {
    const name = expectString(mode, "sessionOptions.executionMode");
    const value = Object.hasOwn(EXECUTION_MODES, name) ? EXECUTION_MODES[name] : undefined;
    if (value === undefined) {
      throw new InvalidArgumentError(
        `Invalid argument: sessionOptions.executionMode is not supported: ${name}.`,
      );
    }
    options.setExecutionMode(value);
  }

  const intraOp = readOption(record, "intraOpNumThreads");
  if (intraOp !== undefined) {
    options.setIntraOpNumThreads(
      expectNonNegativeInteger(intraOp, "sessionOptions.intraOpNumThreads"),
    );
  }

  const interOp = readOption(record, "interOpNumThreads");
  if (interOp !== undefined) {
    options.setInterOpNumThreads(
      expectNonNegativeInteger(interOp, "sessionOptions.interOpNumThreads"),
    );
  }

  const severity = readOption(record, "logSeverityLevel");
  if (severity !== undefined) {
    options.setLogSeverityLevel(
      expectIntegerInRange(
        severity,
        "sessionOptions.logSeverityLevel",
        LoggingLevel.VERBOSE,
        LoggingLevel.FATAL,
      ),
    );
  }

  const verbosity = readOption(record, "logVerbosityLevel");
  if (verbosity !== undefined) {
    options.setLogVerbosityLevel(expectInteger(verbosity, "sessionOptions.logVerbosityLevel"));
  }

  const logId = readOption(record, "logId");
  if (logId !== undefined) {
    options.setLogId(expectString(logId, "sessionOptions.logId"));
  }

  const optimizedPath = readOption(record, "optimizedModelFilePath");
  if (optimizedPath !== undefined) {
    options.setOptimizedModelFilePath(
      expectString(optimizedPath, "sessionOptions.optimizedModelFilePath"),
    );
  }

  const profiling = readOption(record, "enableProfiling");
  if (profiling !== undefined) {
    if (expectBoolean(profiling, "sessionOptions.enableProfiling")) {
      const prefix = readOption(record, "profileFilePrefix");
      options.enableProfiling(
        prefix === undefined
          ? DEFAULT_PROFILE_FILE_PREFIX
          : expectString(prefix, "sessionOptions.profileFilePrefix"),
      );
    } else {
      options.disableProfiling();
    }
  }

  const memArena = readOption(record, "enableCpuMemArena");
  if (memArena !== undefined) {
    if (expectBoolean(memArena, "sessionOptions.enableCpuMemArena")) {
      options.enableCpuMemArena();
    } else {
      options.disableCpuMemArena();
    }
  }

  const memPattern = readOption(record, "enableMemPattern");
  if (memPattern !== undefined) {
    if (expectBoolean(memPattern, "sessionOptions.enableMemPattern")) {
      options.enableMemPattern();
    } else {
      options.disableMemPattern();
    }
  }

  const byName = readOption(record, "freeDimensionOverrides");
  if (byName !== undefined) {
    for (const [name, value] of readDimensionOverrides(byName, "sessionOptions.freeDimensionOverrides")) {
      options.addFreeDimensionOverrideByName(name, value);
    }
  }

  const byDenotation = readOption(record, "freeDimensionOverridesByDenotation");
  if (byDenotation !== undefined) {
    for (const [denotation, value] of readDimensionOverrides(
      byDenotation,
      "sessionOptions.freeDimensionOverridesByDenotation",
    )) {
      options.addFreeDimensionOverride(denotation, value);
    }
  }

  const providers = readOption(record, "executionProviders");
  if (providers !== undefined) {
    parseExecutionProviders(providers, options);
  }

  const externalData = readOption(record, "externalData");
  if (externalData !== undefined) {
    parseExternalData(externalData, options);
  }

  const extra = readOption(record, "extra");
  if (extra !== undefined) {
    for (const [key, value] of flattenConfigEntries(extra, "sessionOptions.extra")) {
      options.addConfigEntry(key, value);
    }
  }
}

function readDimensionOverrides(
  value: unknown,
  what: string,
): Array<readonly [string, number]> {
  if (!isRecord(value)) {
    throw new InvalidArgumentError(`Invalid argument: ${what} must be an object.`);
  }
  return Object.entries(value).map(
    ([name, dim]) => [name, expectNonNegativeInteger(dim, `${what}.${name}`)] as const,
  );
}

function parseExecutionProviders(value: unknown, options: NativeSessionOptions): void {
  if (!Array.isArray(value)) {
    throw new InvalidArgumentError(
      "Invalid argument: sessionOptions.executionProviders must be an array.",
    );
  }
  value.forEach((entry: unknown, i) => {
    const what = `sessionOptions.executionProviders[${i}]`;
    let name: string;
    const providerOptions: Record<string, string> = {};
    if (typeof entry === "string") {
      name = entry;
    } else if (isRecord(entry)) {
      name = expectString(readOption(entry, "name"), `${what}.name`);
      for (const [key, optionValue] of Object.entries(entry)) {
        if (key === "name") continue;
        if (
          typeof optionValue !== "string" &&
          typeof optionValue !== "number" &&
          typeof optionValue !== "boolean"
        ) {
          throw new InvalidArgumentError(
            `Invalid argument: ${what}.${key} must be a string, number or boolean value.`,
          );
        }
        providerOptions[key] = String(optionValue);
      }
    } else {
      throw new InvalidArgumentError(
        `Invalid argument: ${what} must be either a string or an object.`,
      );
    }

    if (!KNOWN_EXECUTION_PROVIDERS.has(name)) {
      throw new InvalidArgumentError(`Invalid argument: ${what} is unsupported: '${name}'.`);
    }
    if (name !== "cpu") {
      options.appendExecutionProvider(name, providerOptions);
    }
  });
}

function parseExternalData(value: unknown, options: NativeSessionOptions): void {
  if (!Array.isArray(value)) {
    throw new InvalidArgumentError("Invalid argument: sessionOptions.externalData must be an array.");
  }
  const paths: string[] = [];
  const buffers: Uint8Array[] = [];
  value.forEach((entry: unknown, i) => {
    const what = `sessionOptions.externalData[${i}]`;
    if (!isRecord(entry)) {
      throw new InvalidArgumentError(`Invalid argument: ${what} must be an object.`);
    }
    paths.push(expectString(readOption(entry, "path"), `${what}.path`));
    const data = readOption(entry, "data");
    if (data instanceof Uint8Array) {
      buffers.push(data);
    } else if (data instanceof ArrayBuffer) {
      buffers.push(new Uint8Array(data));
    } else {
      throw new InvalidArgumentError(
        `Invalid argument: ${what}.data must be a Uint8Array or an ArrayBuffer.`,
      );
    }
  });
  if (paths.length > 0) {
    options.addExternalInitializersFromFilesInMemory(paths, buffers);
  }
}
