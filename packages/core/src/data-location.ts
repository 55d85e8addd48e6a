/**
 * Where a tensor's data lives. The string values are the wire form used in
 * `preferredOutputLocation` records and on host tensors (`tensor.location`).
 */
export type DataLocation = "cpu" | "gpu-buffer";

export const DATA_LOCATION_CPU = "cpu";
export const DATA_LOCATION_GPU_BUFFER = "gpu-buffer";

/** Memory-info name the engine uses for device buffer allocations. */
export const GPU_BUFFER_MEMORY_NAME = "WebGPU_Buffer";

/** Decode a location string; returns undefined for anything unrecognized. */
export function parseDataLocation(value: string): DataLocation | undefined {
  switch (value) {
    case DATA_LOCATION_CPU:
    case DATA_LOCATION_GPU_BUFFER:
      return value;
    default:
      return undefined;
  }
}
