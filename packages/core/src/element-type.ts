import type { Tensor } from "onnxruntime-common";

/**
 * Tensor element type codes, matching the engine's element-type enumeration.
 * Values cross the boundary as these integers (see `ValueMetadata.type`).
 */
export enum ElementType {
  UNDEFINED = 0,
  FLOAT = 1,
  UINT8 = 2,
  INT8 = 3,
  UINT16 = 4,
  INT16 = 5,
  INT32 = 6,
  INT64 = 7,
  STRING = 8,
  BOOL = 9,
  FLOAT16 = 10,
  DOUBLE = 11,
  UINT32 = 12,
  UINT64 = 13,
  COMPLEX64 = 14,
  COMPLEX128 = 15,
  BFLOAT16 = 16,
}

type TypedArrayConstructor =
  | Float32ArrayConstructor
  | Float64ArrayConstructor
  | Int8ArrayConstructor
  | Uint8ArrayConstructor
  | Int16ArrayConstructor
  | Uint16ArrayConstructor
  | Int32ArrayConstructor
  | Uint32ArrayConstructor
  | BigInt64ArrayConstructor
  | BigUint64ArrayConstructor;

export type NumericTypedArray =
  | Float32Array
  | Float64Array
  | Int8Array
  | Uint8Array
  | Int16Array
  | Uint16Array
  | Int32Array
  | Uint32Array
  | BigInt64Array
  | BigUint64Array;

interface ElementTypeEntry {
  readonly code: ElementType;
  readonly name: Tensor.Type;
  readonly size: number;
  readonly array?: TypedArrayConstructor;
}

// bool is one byte per element; float16 travels as raw uint16 bits.
const ELEMENT_TYPES: readonly ElementTypeEntry[] = [
  { code: ElementType.FLOAT, name: "float32", size: 4, array: Float32Array },
  { code: ElementType.UINT8, name: "uint8", size: 1, array: Uint8Array },
  { code: ElementType.INT8, name: "int8", size: 1, array: Int8Array },
  { code: ElementType.UINT16, name: "uint16", size: 2, array: Uint16Array },
  { code: ElementType.INT16, name: "int16", size: 2, array: Int16Array },
  { code: ElementType.INT32, name: "int32", size: 4, array: Int32Array },
  { code: ElementType.INT64, name: "int64", size: 8, array: BigInt64Array },
  { code: ElementType.STRING, name: "string", size: 0 },
  { code: ElementType.BOOL, name: "bool", size: 1, array: Uint8Array },
  { code: ElementType.FLOAT16, name: "float16", size: 2, array: Uint16Array },
  { code: ElementType.DOUBLE, name: "float64", size: 8, array: Float64Array },
  { code: ElementType.UINT32, name: "uint32", size: 4, array: Uint32Array },
  { code: ElementType.UINT64, name: "uint64", size: 8, array: BigUint64Array },
];

const BY_CODE = new Map<ElementType, ElementTypeEntry>(
  ELEMENT_TYPES.map((entry) => [entry.code, entry]),
);
const BY_NAME = new Map<string, ElementTypeEntry>(
  ELEMENT_TYPES.map((entry) => [entry.name, entry]),
);

/** Host type string for an element code, or undefined if the host cannot represent it. */
export function elementTypeName(code: ElementType): Tensor.Type | undefined {
  return BY_CODE.get(code)?.name;
}

/** Element code for a host type string, or undefined if unsupported. */
export function elementTypeFromName(name: string): ElementType | undefined {
  return BY_NAME.get(name)?.code;
}

/** Size in bytes of one element. Strings have no fixed size and report 0. */
export function elementSize(code: ElementType): number {
  return BY_CODE.get(code)?.size ?? 0;
}

/** Typed array class that holds elements of the given type on the host. */
export function typedArrayFor(code: ElementType): TypedArrayConstructor | undefined {
  return BY_CODE.get(code)?.array;
}

/**
 * Number of elements described by a shape. An empty shape is a scalar (1).
 */
export function shapeSize(dims: readonly number[]): number {
  return dims.reduce((acc, d) => acc * d, 1);
}
