import { describe, it, expect, beforeEach } from "vitest";
import { Tensor } from "onnxruntime-common";
import { ReferenceEngine, ReferenceGpuBuffer, ReferenceValue } from "@tensorbridge/test-utils";
import type { ReferenceMemoryInfo } from "@tensorbridge/test-utils";
import {
  ElementType,
  GPU_BUFFER_MEMORY_NAME,
  MarshalError,
  OnnxType,
  hostToNative,
  nativeToHost,
} from "../../src/index.js";

function bytesOf(view: ArrayBufferView): Uint8Array {
  return new Uint8Array(view.buffer, view.byteOffset, view.byteLength).slice();
}

let engine: ReferenceEngine;
let cpu: ReferenceMemoryInfo;
let gpu: ReferenceMemoryInfo;

beforeEach(() => {
  engine = new ReferenceEngine({ log: () => {} });
  cpu = engine.createCpuMemoryInfo();
  gpu = engine.createMemoryInfo(GPU_BUFFER_MEMORY_NAME, 0);
});

// ---------------------------------------------------------------------------
// hostToNative
// ---------------------------------------------------------------------------

describe("hostToNative", () => {
  it("borrows the data of a float32 tensor without copying", () => {
    const data = new Float32Array([1, 2, 3, 4, 5, 6]);
    const value = hostToNative(engine, new Tensor("float32", data, [2, 3]), cpu, gpu);

    expect(value.onnxType).toBe(OnnxType.TENSOR);
    expect(value.getTensorTypeAndShape().elementType).toBe(ElementType.FLOAT);
    expect(value.getTensorTypeAndShape().shape).toEqual([2, 3]);
    expect(value.getTensorData().buffer).toBe(data.buffer);
    expect(value.getTensorData().byteLength).toBe(24);
  });

  it("respects the byte offset of a typed array view", () => {
    const backing = new Int32Array([9, 8, 7, 6]);
    const view = backing.subarray(1, 3);
    const value = hostToNative(engine, { type: "int32", dims: [2], data: view }, cpu, gpu);

    const bytes = value.getTensorData();
    expect(bytes.byteOffset).toBe(4);
    expect(Array.from(new Int32Array(bytes.slice().buffer))).toEqual([8, 7]);
  });

  it("accepts scalars", () => {
    const value = hostToNative(engine, new Tensor("int64", new BigInt64Array([5n]), []), cpu, gpu);
    expect(value.getTensorTypeAndShape().shape).toEqual([]);
    expect(value.getTensorData().byteLength).toBe(8);
  });

  it("copies string tensors into the engine", () => {
    const data = ["alpha", "beta"];
    const value = hostToNative(engine, new Tensor("string", data, [2]), cpu, gpu);

    data[0] = "changed";
    expect(value.getTensorTypeAndShape().elementType).toBe(ElementType.STRING);
    expect(value.getStringData()).toEqual(["alpha", "beta"]);
  });

  it("passes device buffers through for gpu-buffer tensors", () => {
    const buffer = new ReferenceGpuBuffer(new Uint8Array(16));
    const tensor = Tensor.fromGpuBuffer(buffer, { dataType: "float32", dims: [2, 2] });
    const value = hostToNative(engine, tensor, cpu, gpu);

    expect(value.getMemoryInfo().name).toBe(GPU_BUFFER_MEMORY_NAME);
    expect(value.getDeviceBuffer()).toBe(buffer);
    expect(value.getTensorTypeAndShape().shape).toEqual([2, 2]);
  });

  const invalid: Array<[unknown, string]> = [
    [null, "Tensor must be an object."],
    [[1, 2], "Tensor must be an object."],
    [{ type: "bfloat16", dims: [1], data: new Uint16Array(1) }, "Tensor.type is not supported: bfloat16."],
    [{ type: 1, dims: [1] }, "Tensor.type is not supported: 1."],
    [{ type: "float32", dims: "2", data: new Float32Array(2) }, "Tensor.dims must be an array."],
    [
      { type: "float32", dims: [2, -1], data: new Float32Array(2) },
      "Tensor.dims[1] must be a non-negative integer, got -1.",
    ],
    [
      { type: "float32", dims: [2], data: new Float32Array(2), location: "texture" },
      "Tensor.location is not supported: texture.",
    ],
    [
      { type: "float32", dims: [2], data: new Int32Array(2) },
      "Tensor.data must be a Float32Array for 'float32' tensors.",
    ],
    [
      { type: "float32", dims: [3], data: new Float32Array(2) },
      "Tensor.data has 8 bytes but dims [3] of type 'float32' require 12.",
    ],
    [
      { type: "string", dims: [3], data: ["a"] },
      "Tensor.data has 1 elements but dims [3] require 3.",
    ],
    [
      { type: "string", dims: [2], data: ["a", 2] },
      "Tensor.data must be an array of strings for 'string' tensors.",
    ],
    [
      { type: "string", dims: [1], location: "gpu-buffer" },
      "String tensors cannot live in a GPU buffer.",
    ],
    [
      { type: "float32", dims: [2], location: "gpu-buffer" },
      "Tensor.gpuBuffer must be a GPU buffer for 'gpu-buffer' tensors.",
    ],
  ];

  it.each(invalid)("rejects %j", (value, message) => {
    const act = () => hostToNative(engine, value, cpu, gpu);
    expect(act).toThrow(MarshalError);
    expect(act).toThrow(message);
  });

  it("creates no native value when conversion fails", () => {
    const before = engine.liveHandleCount;
    expect(() => hostToNative(engine, { type: "float32", dims: [1] }, cpu, gpu)).toThrow(
      MarshalError,
    );
    expect(engine.liveHandleCount).toBe(before);
  });
});

// ---------------------------------------------------------------------------
// nativeToHost
// ---------------------------------------------------------------------------

describe("nativeToHost", () => {
  it("copies CPU data into a host tensor and releases the value", () => {
    const value = engine.createTensor(cpu, bytesOf(new Float32Array([1.5, -2])), [2], ElementType.FLOAT);
    const tensor = nativeToHost(value, Tensor);

    expect(tensor.type).toBe("float32");
    expect(tensor.dims).toEqual([2]);
    expect([...tensor.data]).toEqual([1.5, -2]);
    expect(value.released).toBe(true);
  });

  it("reads values stored at an unaligned offset", () => {
    const raw = new Uint8Array(9);
    raw.set(bytesOf(new Float64Array([0.25])), 1);
    const value = engine.createTensor(cpu, raw.subarray(1), [1], ElementType.DOUBLE);
    const tensor = nativeToHost(value, Tensor);

    expect(tensor.type).toBe("float64");
    expect([...tensor.data]).toEqual([0.25]);
  });

  const conversions: Array<[ElementType, string, ArrayBufferView, unknown[]]> = [
    [ElementType.INT64, "int64", new BigInt64Array([-3n, 4n]), [-3n, 4n]],
    [ElementType.UINT64, "uint64", new BigUint64Array([7n, 8n]), [7n, 8n]],
    [ElementType.BOOL, "bool", new Uint8Array([1, 0]), [1, 0]],
    [ElementType.FLOAT16, "float16", new Uint16Array([0x3c00, 0xc000]), [0x3c00, 0xc000]],
    [ElementType.INT8, "int8", new Int8Array([-1, 2]), [-1, 2]],
  ];

  it.each(conversions)("converts element type %i to %s", (code, name, data, expected) => {
    const value = engine.createTensor(cpu, bytesOf(data), [2], code);
    const tensor = nativeToHost(value, Tensor);

    expect(tensor.type).toBe(name);
    expect([...tensor.data]).toEqual(expected);
  });

  it("copies the data out of engine storage", () => {
    const bytes = bytesOf(new Float32Array([1, 2]));
    const value = engine.createTensor(cpu, bytes, [2], ElementType.FLOAT);
    const tensor = nativeToHost(value, Tensor);

    expect(tensor.data).not.toBe(bytes);
    expect(ArrayBuffer.isView(tensor.data) && tensor.data.buffer).not.toBe(bytes.buffer);
    bytes.fill(0);
    expect([...tensor.data]).toEqual([1, 2]);
  });

  it("converts string tensors", () => {
    const value = engine.createStringTensor([1, 2], ["x", "y"]);
    const tensor = nativeToHost(value, Tensor);

    expect(tensor.type).toBe("string");
    expect(tensor.dims).toEqual([1, 2]);
    expect(tensor.data).toEqual(["x", "y"]);
    expect(value.released).toBe(true);
  });

  it("hands device values to the tensor and releases them on dispose", () => {
    const buffer = new ReferenceGpuBuffer(new Uint8Array(8));
    const value = engine.createDeviceTensor(gpu, buffer, 8, [2], ElementType.FLOAT);
    const tensor = nativeToHost(value, Tensor);

    expect(tensor.location).toBe("gpu-buffer");
    expect(tensor.gpuBuffer).toBe(buffer);
    expect(tensor.dims).toEqual([2]);
    expect(value.released).toBe(false);

    tensor.dispose();
    expect(value.released).toBe(true);
  });

  it("rejects device values of types a GPU buffer tensor cannot hold", () => {
    const value = engine.createDeviceTensor(
      gpu,
      new ReferenceGpuBuffer(new Uint8Array(2)),
      2,
      [2],
      ElementType.INT8,
    );
    expect(() => nativeToHost(value, Tensor)).toThrow(
      "Unsupported data type for a GPU buffer tensor: int8.",
    );
    expect(value.released).toBe(false);
  });

  it("rejects non-tensor values and leaves them with the caller", () => {
    const value = new ReferenceValue(
      OnnxType.SEQUENCE,
      { elementType: ElementType.UNDEFINED, shape: [], symbolicDimensions: [] },
      cpu,
      { kind: "none" },
    );
    expect(() => nativeToHost(value, Tensor)).toThrow("Non tensor type is temporarily not supported.");
    expect(value.released).toBe(false);
  });

  it("rejects element types without a host representation", () => {
    const value = engine.createTensor(cpu, new Uint8Array(0), [0], ElementType.BFLOAT16);
    expect(() => nativeToHost(value, Tensor)).toThrow("Unsupported data type: 16.");
    expect(value.released).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// Round trip
// ---------------------------------------------------------------------------

describe("hostToNative then nativeToHost", () => {
  const tensors: Array<[string, () => Tensor, unknown[]]> = [
    ["float32", () => new Tensor("float32", new Float32Array([1.5, -2]), [2]), [1.5, -2]],
    ["float64", () => new Tensor("float64", new Float64Array([0.1, -1e300]), [2]), [0.1, -1e300]],
    ["int8", () => new Tensor("int8", new Int8Array([-128, 127]), [2]), [-128, 127]],
    ["uint8", () => new Tensor("uint8", new Uint8Array([0, 255]), [2]), [0, 255]],
    ["int16", () => new Tensor("int16", new Int16Array([-32768, 32767]), [2]), [-32768, 32767]],
    ["uint16", () => new Tensor("uint16", new Uint16Array([0, 65535]), [2]), [0, 65535]],
    [
      "int32",
      () => new Tensor("int32", new Int32Array([-2147483648, 2147483647]), [2]),
      [-2147483648, 2147483647],
    ],
    ["uint32", () => new Tensor("uint32", new Uint32Array([0, 4000000000]), [2]), [0, 4000000000]],
    [
      "int64",
      () => new Tensor("int64", new BigInt64Array([-(2n ** 60n), 2n ** 60n]), [2]),
      [-(2n ** 60n), 2n ** 60n],
    ],
    [
      "uint64",
      () => new Tensor("uint64", new BigUint64Array([0n, 2n ** 63n]), [2]),
      [0n, 2n ** 63n],
    ],
    ["bool", () => new Tensor("bool", new Uint8Array([1, 0]), [2]), [1, 0]],
    [
      "float16",
      () => new Tensor("float16", new Uint16Array([0x3c00, 0xc000]), [2]),
      [0x3c00, 0xc000],
    ],
  ];

  it.each(tensors)("keeps %s type, dims and values", (type, create, expected) => {
    const value = hostToNative(engine, create(), cpu, gpu);
    const tensor = nativeToHost(value, Tensor);

    expect(tensor.type).toBe(type);
    expect(tensor.dims).toEqual([2]);
    expect([...tensor.data]).toEqual(expected);
  });
});
