import type { DataLocation } from "../data-location.js";
import { DATA_LOCATION_CPU, parseDataLocation } from "../data-location.js";
import { InvalidArgumentError } from "../errors.js";
import { isRecord, readOption } from "./common.js";

/**
 * Read `preferredOutputLocation` from a session-options record.
 *
 * Returns one location per output, in declaration order, or an empty array
 * when the option is absent. An empty result selects the direct run path;
 * any table, even an all-cpu one, selects the I/O-binding path.
 */
export function parsePreferredOutputLocations(
  record: object,
  outputNames: readonly string[],
): DataLocation[] {
  const value = readOption(record, "preferredOutputLocation");
  if (value === undefined || value === null) {
    return [];
  }

  if (typeof value === "string") {
    const location = parseDataLocation(value);
    if (location === undefined) {
      throw new InvalidArgumentError(
        "Invalid argument: preferredOutputLocation must be an object or a valid string.",
      );
    }
    return outputNames.map(() => location);
  }

  if (!isRecord(value)) {
    throw new InvalidArgumentError(
      "Invalid argument: preferredOutputLocation must be an object or a valid string.",
    );
  }

  const locations: DataLocation[] = outputNames.map(() => DATA_LOCATION_CPU);
  for (const [name, locationValue] of Object.entries(value)) {
    const index = outputNames.indexOf(name);
    if (index < 0) {
      throw new InvalidArgumentError(`Invalid argument: "${name}" is not a valid output name.`);
    }
    const location =
      typeof locationValue === "string" ? parseDataLocation(locationValue) : undefined;
    if (location === undefined) {
      throw new InvalidArgumentError(
        `Invalid argument: preferredOutputLocation["${name}"] must be a valid string.`,
      );
    }
    locations[index] = location;
  }

  return locations;
}
