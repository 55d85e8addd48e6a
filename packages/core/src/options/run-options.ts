import type { NativeRunOptions } from "../engine.js";
import { LoggingLevel } from "../engine.js";
import {
  expectBoolean,
  expectInteger,
  expectIntegerInRange,
  expectString,
  flattenConfigEntries,
  readOption,
} from "./common.js";

/**
 * Apply a host run-options record to native run options. Unknown keys are
 * ignored.
 */
export function parseRunOptions(record: object, options: NativeRunOptions): void {
  const severity = readOption(record, "logSeverityLevel");
  if (severity !== undefined) {
    options.setLogSeverityLevel(
      expectIntegerInRange(
        severity,
        "runOptions.logSeverityLevel",
        LoggingLevel.VERBOSE,
        LoggingLevel.FATAL,
      ),
    );
  }

  const verbosity = readOption(record, "logVerbosityLevel");
  if (verbosity !== undefined) {
    options.setLogVerbosityLevel(expectInteger(verbosity, "runOptions.logVerbosityLevel"));
  }

  const terminate = readOption(record, "terminate");
  if (terminate !== undefined) {
    if (expectBoolean(terminate, "runOptions.terminate")) {
      options.setTerminate();
    } else {
      options.unsetTerminate();
    }
  }

  const tag = readOption(record, "tag");
  if (tag !== undefined) {
    options.setRunTag(expectString(tag, "runOptions.tag"));
  }

  const extra = readOption(record, "extra");
  if (extra !== undefined) {
    for (const [key, value] of flattenConfigEntries(extra, "runOptions.extra")) {
      options.addConfigEntry(key, value);
    }
  }
}
