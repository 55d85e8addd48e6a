import { describe, it, expect } from "vitest";

describe("@tensorbridge/core", () => {
  it("package is importable", async () => {
    const mod = await import("../../src/index.js");
    expect(mod.createBinding).toBeTypeOf("function");
    expect(mod.DEFAULT_LOG_ID).toBe("tensorbridge");
  });
});
