import type { Tensor, TensorConstructor } from "onnxruntime-common";

import type { DataLocation } from "./data-location.js";
import {
  DATA_LOCATION_CPU,
  DATA_LOCATION_GPU_BUFFER,
  GPU_BUFFER_MEMORY_NAME,
} from "./data-location.js";
import {
  ElementType,
  elementSize,
  elementTypeFromName,
  elementTypeName,
  shapeSize,
  typedArrayFor,
} from "./element-type.js";
import type { NumericTypedArray } from "./element-type.js";
import type { EngineApi, GpuBufferHandle, NativeMemoryInfo, NativeValue } from "./engine.js";
import { OnnxType } from "./engine.js";
import { MarshalError } from "./errors.js";
import { isRecord, readOption } from "./options/common.js";

const GPU_BUFFER_DATA_TYPES: ReadonlySet<string> = new Set([
  "float32",
  "float16",
  "int32",
  "int64",
  "uint32",
  "uint8",
  "bool",
]);

function isGpuBufferDataType(type: Tensor.Type): type is Tensor.GpuBufferDataTypes {
  return GPU_BUFFER_DATA_TYPES.has(type);
}

function isGpuBuffer(value: unknown): value is GpuBufferHandle {
  return isRecord(value) && typeof readOption(value, "size") === "number";
}

function readDims(tensor: object): number[] {
  const dims = readOption(tensor, "dims");
  if (!Array.isArray(dims)) {
    throw new MarshalError("Tensor.dims must be an array.");
  }
  return dims.map((d: unknown, i) => {
    if (typeof d !== "number" || !Number.isSafeInteger(d) || d < 0) {
      throw new MarshalError(`Tensor.dims[${i}] must be a non-negative integer, got ${String(d)}.`);
    }
    return d;
  });
}

function readLocation(tensor: object): DataLocation {
  const location = readOption(tensor, "location");
  if (location === undefined || location === DATA_LOCATION_CPU) {
    return DATA_LOCATION_CPU;
  }
  if (location === DATA_LOCATION_GPU_BUFFER) {
    return DATA_LOCATION_GPU_BUFFER;
  }
  throw new MarshalError(`Tensor.location is not supported: ${String(location)}.`);
}

/**
 * Convert a host tensor to a native value.
 *
 * Numeric CPU tensors are not copied: the native value borrows the host's
 * buffer, so the host must not touch the tensor data until the call that
 * consumes the value returns. String tensors are copied into the engine.
 * Device tensors pass their buffer handle through unchecked.
 */
export function hostToNative(
  api: EngineApi,
  value: unknown,
  cpuMemoryInfo: NativeMemoryInfo,
  gpuMemoryInfo: NativeMemoryInfo,
): NativeValue {
  if (!isRecord(value)) {
    throw new MarshalError("Tensor must be an object.");
  }

  const typeName = readOption(value, "type");
  const elementType = typeof typeName === "string" ? elementTypeFromName(typeName) : undefined;
  if (elementType === undefined) {
    throw new MarshalError(`Tensor.type is not supported: ${String(typeName)}.`);
  }
  const dims = readDims(value);
  const location = readLocation(value);
  const size = shapeSize(dims);

  if (location === DATA_LOCATION_GPU_BUFFER) {
    if (elementType === ElementType.STRING) {
      throw new MarshalError("String tensors cannot live in a GPU buffer.");
    }
    const buffer = readOption(value, "gpuBuffer");
    if (!isGpuBuffer(buffer)) {
      throw new MarshalError("Tensor.gpuBuffer must be a GPU buffer for 'gpu-buffer' tensors.");
    }
    return api.createDeviceTensor(
      gpuMemoryInfo,
      buffer,
      size * elementSize(elementType),
      dims,
      elementType,
    );
  }

  const data = readOption(value, "data");
  if (elementType === ElementType.STRING) {
    if (!Array.isArray(data) || !data.every((s: unknown) => typeof s === "string")) {
      throw new MarshalError("Tensor.data must be an array of strings for 'string' tensors.");
    }
    if (data.length !== size) {
      throw new MarshalError(
        `Tensor.data has ${data.length} elements but dims [${dims.join(", ")}] require ${size}.`,
      );
    }
    return api.createStringTensor(dims, data);
  }

  const arrayType = typedArrayFor(elementType);
  if (arrayType === undefined || !(data instanceof arrayType)) {
    throw new MarshalError(
      `Tensor.data must be a ${arrayType?.name ?? "typed array"} for '${String(typeName)}' tensors.`,
    );
  }
  const expected = size * elementSize(elementType);
  if (data.byteLength !== expected) {
    throw new MarshalError(
      `Tensor.data has ${data.byteLength} bytes but dims [${dims.join(", ")}] of type ` +
        `'${String(typeName)}' require ${expected}.`,
    );
  }
  const bytes = new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
  return api.createTensor(cpuMemoryInfo, bytes, dims, elementType);
}

function viewAs(elementType: ElementType, bytes: Uint8Array): NumericTypedArray {
  // Copied: the engine frees its storage when the value is released.
  const { buffer, byteOffset, byteLength } = bytes.slice();
  const length = byteLength / elementSize(elementType);
  switch (elementType) {
    case ElementType.FLOAT:
      return new Float32Array(buffer, byteOffset, length);
    case ElementType.DOUBLE:
      return new Float64Array(buffer, byteOffset, length);
    case ElementType.INT8:
      return new Int8Array(buffer, byteOffset, length);
    case ElementType.UINT8:
    case ElementType.BOOL:
      return new Uint8Array(buffer, byteOffset, length);
    case ElementType.INT16:
      return new Int16Array(buffer, byteOffset, length);
    case ElementType.UINT16:
    case ElementType.FLOAT16:
      return new Uint16Array(buffer, byteOffset, length);
    case ElementType.INT32:
      return new Int32Array(buffer, byteOffset, length);
    case ElementType.UINT32:
      return new Uint32Array(buffer, byteOffset, length);
    case ElementType.INT64:
      return new BigInt64Array(buffer, byteOffset, length);
    case ElementType.UINT64:
      return new BigUint64Array(buffer, byteOffset, length);
    default:
      throw new MarshalError(`Unsupported data type: ${elementType}.`);
  }
}

/**
 * Convert a native value into a host tensor, taking ownership of it.
 *
 * On success the native value belongs to the returned tensor: CPU values are
 * released once their data has been handed over, device values are released
 * when the host tensor is disposed. On failure the caller still owns it.
 */
export function nativeToHost(value: NativeValue, tensorCtor: TensorConstructor): Tensor {
  if (value.onnxType !== OnnxType.TENSOR) {
    throw new MarshalError("Non tensor type is temporarily not supported.");
  }

  const info = value.getTensorTypeAndShape();
  const typeName = elementTypeName(info.elementType);
  if (typeName === undefined) {
    throw new MarshalError(`Unsupported data type: ${info.elementType}.`);
  }
  const dims = [...info.shape];

  if (value.getMemoryInfo().name === GPU_BUFFER_MEMORY_NAME) {
    if (!isGpuBufferDataType(typeName)) {
      throw new MarshalError(`Unsupported data type for a GPU buffer tensor: ${typeName}.`);
    }
    return tensorCtor.fromGpuBuffer(value.getDeviceBuffer(), {
      dataType: typeName,
      dims,
      dispose: () => value.release(),
    });
  }

  let tensor: Tensor;
  if (info.elementType === ElementType.STRING) {
    tensor = new tensorCtor("string", [...value.getStringData()], dims);
  } else {
    tensor = new tensorCtor(typeName, viewAs(info.elementType, value.getTensorData()), dims);
  }
  value.release();
  return tensor;
}
