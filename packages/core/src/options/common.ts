import { InvalidArgumentError } from "../errors.js";

/** Read `key` from a host record, including inherited properties. */
export function readOption(record: object, key: string): unknown {
  return key in record ? Reflect.get(record, key) : undefined;
}

export function isRecord(value: unknown): value is object {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function expectString(value: unknown, what: string): string {
  if (typeof value !== "string") {
    throw new InvalidArgumentError(`Invalid argument: ${what} must be a string.`);
  }
  return value;
}

export function expectBoolean(value: unknown, what: string): boolean {
  if (typeof value !== "boolean") {
    throw new InvalidArgumentError(`Invalid argument: ${what} must be a boolean value.`);
  }
  return value;
}

export function expectInteger(value: unknown, what: string): number {
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new InvalidArgumentError(`Invalid argument: ${what} must be an integer.`);
  }
  return value;
}

export function expectNonNegativeInteger(value: unknown, what: string): number {
  const n = expectInteger(value, what);
  if (n < 0) {
    throw new InvalidArgumentError(`Invalid argument: ${what} must be a non-negative integer.`);
  }
  return n;
}

export function expectIntegerInRange(
  value: unknown,
  what: string,
  min: number,
  max: number,
): number {
  const n = expectInteger(value, what);
  if (n < min || n > max) {
    throw new InvalidArgumentError(
      `Invalid argument: ${what} must be an integer in [${min}, ${max}], got ${n}.`,
    );
  }
  return n;
}

/**
 * Flatten a nested `extra` record into dotted config keys:
 * `{ session: { use_ort_model_bytes_directly: "1" } }` becomes
 * `session.use_ort_model_bytes_directly = "1"`.
 */
export function flattenConfigEntries(
  value: unknown,
  what: string,
): Array<readonly [string, string]> {
  if (!isRecord(value)) {
    throw new InvalidArgumentError(`Invalid argument: ${what} must be an object.`);
  }
  const entries: Array<readonly [string, string]> = [];
  const visit = (node: object, prefix: string, path: string): void => {
    for (const [key, child] of Object.entries(node)) {
      const fullKey = prefix ? `${prefix}.${key}` : key;
      const childPath = `${path}.${key}`;
      if (isRecord(child)) {
        visit(child, fullKey, childPath);
      } else if (
        typeof child === "string" ||
        typeof child === "number" ||
        typeof child === "boolean"
      ) {
        entries.push([fullKey, String(child)]);
      } else {
        throw new InvalidArgumentError(
          `Invalid argument: ${childPath} must be a string, number or boolean value.`,
        );
      }
    }
  };
  visit(value, "", what);
  return entries;
}
