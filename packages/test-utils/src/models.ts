/**
 * Tiny model format understood by the reference engine, plus factories for
 * the models and tensors tests use.
 *
 * A model is JSON: declared inputs and outputs, and a list of nodes run in
 * order. It exists only so tests can exercise the binding end to end.
 */
import { Tensor } from "onnxruntime-common";

import { ElementType } from "@tensorbridge/core";

export type ReferenceOp = "Identity" | "Neg" | "Add";

export interface ReferenceValueInfo {
  readonly name: string;
  /** Defaults to "tensor". */
  readonly kind?: "tensor" | "sequence";
  /** Element type of a tensor value. Defaults to FLOAT. */
  readonly type?: ElementType;
  /** -1 for dimensions not fixed by the model. */
  readonly shape?: readonly number[];
  /** Parallel to `shape`; "" for unnamed dimensions. */
  readonly symbolicDimensions?: readonly string[];
  /** Inputs only: the model runs without it. */
  readonly optional?: boolean;
}

export interface ReferenceNode {
  readonly op: ReferenceOp;
  readonly inputs: readonly string[];
  readonly outputs: readonly string[];
}

export interface ReferenceModel {
  readonly inputs: readonly ReferenceValueInfo[];
  readonly outputs: readonly ReferenceValueInfo[];
  readonly nodes: readonly ReferenceNode[];
}

export function encodeModel(model: ReferenceModel): Uint8Array {
  return new TextEncoder().encode(JSON.stringify(model));
}

function isObject(value: unknown): value is object {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function field(record: object, key: string): unknown {
  return key in record ? Reflect.get(record, key) : undefined;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v: unknown) => typeof v === "string");
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((v: unknown) => typeof v === "number");
}

function isOp(value: unknown): value is ReferenceOp {
  return value === "Identity" || value === "Neg" || value === "Add";
}

function isElementType(value: unknown): value is ElementType {
  return typeof value === "number" && value in ElementType;
}

function decodeValueInfo(value: unknown): ReferenceValueInfo | undefined {
  if (!isObject(value)) return undefined;
  const name = field(value, "name");
  if (typeof name !== "string") return undefined;
  let info: ReferenceValueInfo = { name };

  const kind = field(value, "kind");
  if (kind === "tensor" || kind === "sequence") {
    info = { ...info, kind };
  } else if (kind !== undefined) {
    return undefined;
  }

  const type = field(value, "type");
  if (isElementType(type)) {
    info = { ...info, type };
  } else if (type !== undefined) {
    return undefined;
  }

  const shape = field(value, "shape");
  if (isNumberArray(shape)) {
    info = { ...info, shape };
  } else if (shape !== undefined) {
    return undefined;
  }

  const symbolicDimensions = field(value, "symbolicDimensions");
  if (isStringArray(symbolicDimensions)) {
    info = { ...info, symbolicDimensions };
  } else if (symbolicDimensions !== undefined) {
    return undefined;
  }

  const optional = field(value, "optional");
  if (typeof optional === "boolean") {
    info = { ...info, optional };
  } else if (optional !== undefined) {
    return undefined;
  }
  return info;
}

function decodeNode(value: unknown): ReferenceNode | undefined {
  if (!isObject(value)) return undefined;
  const op = field(value, "op");
  const inputs = field(value, "inputs");
  const outputs = field(value, "outputs");
  if (!isOp(op)) return undefined;
  if (!isStringArray(inputs) || !isStringArray(outputs)) return undefined;
  return { op, inputs, outputs };
}

function decodeList<T>(value: unknown, decode: (item: unknown) => T | undefined): T[] | undefined {
  if (!Array.isArray(value)) return undefined;
  const items: T[] = [];
  for (const item of value) {
    const decoded = decode(item);
    if (decoded === undefined) return undefined;
    items.push(decoded);
  }
  return items;
}

/** Parse model bytes; returns undefined for anything malformed. */
export function decodeModel(bytes: Uint8Array): ReferenceModel | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(new TextDecoder().decode(bytes));
  } catch {
    return undefined;
  }
  if (!isObject(parsed)) return undefined;
  const inputs = decodeList(field(parsed, "inputs"), decodeValueInfo);
  const outputs = decodeList(field(parsed, "outputs"), decodeValueInfo);
  const nodes = decodeList(field(parsed, "nodes"), decodeNode);
  if (!inputs || !outputs || !nodes) return undefined;
  return { inputs, outputs, nodes };
}

/** One float input `x` of shape [2], one output `y = x`. */
export function identityModel(): ReferenceModel {
  return {
    inputs: [{ name: "x", type: ElementType.FLOAT, shape: [2], symbolicDimensions: [""] }],
    outputs: [{ name: "y", type: ElementType.FLOAT, shape: [2], symbolicDimensions: [""] }],
    nodes: [{ op: "Identity", inputs: ["x"], outputs: ["y"] }],
  };
}

/** Input `x` with a symbolic batch dimension; outputs `y1 = x` and `y2 = -x`. */
export function twoOutputModel(): ReferenceModel {
  return {
    inputs: [
      { name: "x", type: ElementType.FLOAT, shape: [-1, 2], symbolicDimensions: ["batch", ""] },
    ],
    outputs: [
      { name: "y1", type: ElementType.FLOAT, shape: [-1, 2], symbolicDimensions: ["batch", ""] },
      { name: "y2", type: ElementType.FLOAT, shape: [-1, 2], symbolicDimensions: ["batch", ""] },
    ],
    nodes: [
      { op: "Identity", inputs: ["x"], outputs: ["y1"] },
      { op: "Neg", inputs: ["x"], outputs: ["y2"] },
    ],
  };
}

/** `sum = a + b` where `b` may be left out, plus a passthrough of `a`. */
export function optionalInputModel(): ReferenceModel {
  return {
    inputs: [
      { name: "a", type: ElementType.FLOAT, shape: [3], symbolicDimensions: [""] },
      { name: "b", type: ElementType.FLOAT, shape: [3], symbolicDimensions: [""], optional: true },
    ],
    outputs: [
      { name: "sum", type: ElementType.FLOAT, shape: [3], symbolicDimensions: [""] },
      { name: "copy", type: ElementType.FLOAT, shape: [3], symbolicDimensions: [""] },
    ],
    nodes: [
      { op: "Add", inputs: ["a", "b"], outputs: ["sum"] },
      { op: "Identity", inputs: ["a"], outputs: ["copy"] },
    ],
  };
}

/** Identity over a tensor of the given element type, any shape. */
export function typedIdentityModel(type: ElementType): ReferenceModel {
  return {
    inputs: [{ name: "in", type, shape: [-1], symbolicDimensions: ["n"] }],
    outputs: [{ name: "out", type, shape: [-1], symbolicDimensions: ["n"] }],
    nodes: [{ op: "Identity", inputs: ["in"], outputs: ["out"] }],
  };
}

/** A model whose only output is a sequence, which the host cannot receive. */
export function sequenceOutputModel(): ReferenceModel {
  return {
    inputs: [{ name: "x", type: ElementType.FLOAT, shape: [2], symbolicDimensions: [""] }],
    outputs: [{ name: "items", kind: "sequence" }],
    nodes: [{ op: "Identity", inputs: ["x"], outputs: ["items"] }],
  };
}

export function createFloatTensor(values: readonly number[], dims?: readonly number[]): Tensor {
  return new Tensor("float32", Float32Array.from(values), dims ?? [values.length]);
}
