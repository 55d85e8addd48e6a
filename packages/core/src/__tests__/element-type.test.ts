import { describe, it, expect } from "vitest";
import {
  ElementType,
  elementSize,
  elementTypeFromName,
  elementTypeName,
  parseDataLocation,
  shapeSize,
  typedArrayFor,
} from "../../src/index.js";

const HOST_TYPES: Array<[ElementType, string, number]> = [
  [ElementType.FLOAT, "float32", 4],
  [ElementType.UINT8, "uint8", 1],
  [ElementType.INT8, "int8", 1],
  [ElementType.UINT16, "uint16", 2],
  [ElementType.INT16, "int16", 2],
  [ElementType.INT32, "int32", 4],
  [ElementType.INT64, "int64", 8],
  [ElementType.BOOL, "bool", 1],
  [ElementType.FLOAT16, "float16", 2],
  [ElementType.DOUBLE, "float64", 8],
  [ElementType.UINT32, "uint32", 4],
  [ElementType.UINT64, "uint64", 8],
];

describe("element types", () => {
  it.each(HOST_TYPES)("maps code %i to %s with %i-byte elements", (code, name, size) => {
    expect(elementTypeName(code)).toBe(name);
    expect(elementTypeFromName(name)).toBe(code);
    expect(elementSize(code)).toBe(size);
  });

  it("maps string tensors without a fixed element size", () => {
    expect(elementTypeName(ElementType.STRING)).toBe("string");
    expect(elementSize(ElementType.STRING)).toBe(0);
    expect(typedArrayFor(ElementType.STRING)).toBeUndefined();
  });

  it("has no host name for bfloat16 or complex types", () => {
    expect(elementTypeName(ElementType.BFLOAT16)).toBeUndefined();
    expect(elementTypeName(ElementType.COMPLEX64)).toBeUndefined();
    expect(elementTypeName(ElementType.COMPLEX128)).toBeUndefined();
    expect(elementTypeName(ElementType.UNDEFINED)).toBeUndefined();
  });

  it("rejects unknown host type strings", () => {
    expect(elementTypeFromName("float8")).toBeUndefined();
    expect(elementTypeFromName("")).toBeUndefined();
  });

  it("stores bool as bytes and float16 as raw uint16 bits", () => {
    expect(typedArrayFor(ElementType.BOOL)).toBe(Uint8Array);
    expect(typedArrayFor(ElementType.FLOAT16)).toBe(Uint16Array);
    expect(typedArrayFor(ElementType.INT64)).toBe(BigInt64Array);
    expect(typedArrayFor(ElementType.UINT64)).toBe(BigUint64Array);
  });
});

describe("shapeSize", () => {
  it("treats an empty shape as a scalar", () => {
    expect(shapeSize([])).toBe(1);
  });

  it("multiplies dimensions", () => {
    expect(shapeSize([2, 3, 4])).toBe(24);
  });

  it("is zero when any dimension is zero", () => {
    expect(shapeSize([3, 0, 2])).toBe(0);
  });
});

describe("parseDataLocation", () => {
  it("accepts cpu and gpu-buffer", () => {
    expect(parseDataLocation("cpu")).toBe("cpu");
    expect(parseDataLocation("gpu-buffer")).toBe("gpu-buffer");
  });

  it("rejects other locations", () => {
    expect(parseDataLocation("texture")).toBeUndefined();
    expect(parseDataLocation("cpu-pinned")).toBeUndefined();
    expect(parseDataLocation("GPU-BUFFER")).toBeUndefined();
  });
});
