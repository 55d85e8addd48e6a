import type { NativeHandle } from "./engine.js";

/**
 * Collects native handles acquired during one call and releases them, most
 * recent first, when the call ends. Handles whose ownership moves elsewhere
 * are taken back out with `disown`.
 *
 * ```ts
 * const scope = new HandleScope();
 * try {
 *   const info = scope.adopt(api.createCpuMemoryInfo());
 *   // ...
 * } finally {
 *   scope.release();
 * }
 * ```
 */
export class HandleScope {
  private readonly handles: NativeHandle[] = [];

  adopt<T extends NativeHandle>(handle: T): T {
    this.handles.push(handle);
    return handle;
  }

  disown(handle: NativeHandle): void {
    const idx = this.handles.lastIndexOf(handle);
    if (idx >= 0) this.handles.splice(idx, 1);
  }

  release(): void {
    while (this.handles.length > 0) {
      this.handles.pop()?.release();
    }
  }
}
