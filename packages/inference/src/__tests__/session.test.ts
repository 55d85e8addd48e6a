import { describe, it, expect, beforeEach } from "vitest";
import { EngineError, LoggingLevel, SessionStateError } from "@tensorbridge/core";
import type { Binding } from "@tensorbridge/core";
import {
  createFloatTensor,
  createTestBinding,
  encodeModel,
  identityModel,
  tensorValues,
  twoOutputModel,
} from "@tensorbridge/test-utils";
import type { ReferenceEngine } from "@tensorbridge/test-utils";
import {
  InferenceError,
  InputValidationError,
  ModelLoadError,
  OnnxSession,
  toLoggingLevel,
} from "../../src/index.js";
import type { LogLevelName } from "../../src/index.js";

const IDENTITY_PATH = "/models/identity.onnx";

let engine: ReferenceEngine;
let binding: Binding;

beforeEach(() => {
  ({ engine, binding } = createTestBinding({
    engine: { files: { [IDENTITY_PATH]: encodeModel(identityModel()) } },
    logLevel: null,
  }));
});

// ---------------------------------------------------------------------------
// create
// ---------------------------------------------------------------------------

describe("OnnxSession.create", () => {
  it("initializes the engine and loads from a path", async () => {
    const session = await OnnxSession.create(binding, IDENTITY_PATH, { logLevel: "error" });

    expect(engine.envs).toHaveLength(1);
    expect(engine.envs[0]?.logLevel).toBe(LoggingLevel.ERROR);
    expect(session.modelSource).toBe(IDENTITY_PATH);
    expect(session.inputNames).toEqual(["x"]);
    expect(session.outputNames).toEqual(["y"]);
  });

  it("loads from a view into a larger buffer", async () => {
    const bytes = encodeModel(twoOutputModel());
    const padded = new Uint8Array(bytes.byteLength + 16);
    padded.set(bytes, 8);

    const session = await OnnxSession.create(binding, padded.subarray(8, 8 + bytes.byteLength));
    expect(session.modelSource).toBe(`buffer (${bytes.byteLength} bytes)`);
    expect(session.inputMetadata).toEqual([
      { name: "x", isTensor: true, type: 1, symbolicDimensions: ["batch", ""], shape: [-1, 2] },
    ]);
  });

  it("forwards session options", async () => {
    const session = await OnnxSession.create(binding, IDENTITY_PATH, {
      sessionOptions: { enableProfiling: true, profileFilePrefix: "run_" },
    });
    expect(session.endProfiling()).toBe("run_1.json");
  });

  it("keeps the first log level when the binding is shared", async () => {
    await OnnxSession.create(binding, IDENTITY_PATH, { logLevel: "info" });
    await OnnxSession.create(binding, IDENTITY_PATH, { logLevel: "fatal" });

    expect(engine.envs).toHaveLength(1);
    expect(engine.envs[0]?.logLevel).toBe(LoggingLevel.INFO);
    expect(engine.sessions).toHaveLength(2);
  });

  it("wraps a missing file in ModelLoadError", async () => {
    const err = await OnnxSession.create(binding, "/models/missing.onnx").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ModelLoadError);
    expect(err instanceof ModelLoadError && err.message).toBe(
      "Failed to load ONNX model from: /models/missing.onnx",
    );
    expect(err instanceof ModelLoadError && err.modelSource).toBe("/models/missing.onnx");
    expect(err instanceof ModelLoadError && err.cause).toBeInstanceOf(EngineError);
  });

  it("describes a rejected buffer by its size", async () => {
    await expect(
      OnnxSession.create(binding, new TextEncoder().encode("garbage")),
    ).rejects.toThrow("Failed to load ONNX model from: buffer (7 bytes)");
  });

  it("wraps bad session options", async () => {
    await expect(
      OnnxSession.create(binding, IDENTITY_PATH, { sessionOptions: { intraOpNumThreads: -1 } }),
    ).rejects.toThrow(ModelLoadError);
    expect(engine.sessions).toHaveLength(0);
  });
});

// ---------------------------------------------------------------------------
// run
// ---------------------------------------------------------------------------

describe("OnnxSession.run", () => {
  let session: OnnxSession;

  beforeEach(async () => {
    engine.addModelFile("/models/two.onnx", encodeModel(twoOutputModel()));
    session = await OnnxSession.create(binding, "/models/two.onnx");
  });

  it("fetches every output by default", async () => {
    const outputs = await session.run({ x: createFloatTensor([1, 2], [1, 2]) });

    expect(Object.keys(outputs)).toEqual(["y1", "y2"]);
    expect(tensorValues(outputs.y1)).toEqual([1, 2]);
    expect(tensorValues(outputs.y2)).toEqual([-1, -2]);
  });

  it("fetches only the named outputs", async () => {
    const outputs = await session.run({ x: createFloatTensor([3, 4], [1, 2]) }, ["y2"]);

    expect(Object.keys(outputs)).toEqual(["y2"]);
    expect(engine.sessions[0]?.runs[0]?.outputNames).toEqual(["y2"]);
  });

  it("passes run options to the engine", async () => {
    await session.run({ x: createFloatTensor([1, 2], [1, 2]) }, undefined, { tag: "batch-7" });
    expect(engine.sessions[0]?.runs[0]?.tag).toBe("batch-7");
  });

  it("rejects unknown input names", async () => {
    const err = await session
      .run({ x: createFloatTensor([1, 2], [1, 2]), z: createFloatTensor([0]) })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(InputValidationError);
    expect(err instanceof InputValidationError && err.message).toBe(
      "Unknown input name(s): z. Model inputs: x.",
    );
    expect(err instanceof InputValidationError && err.side).toBe("input");
    expect(err instanceof InputValidationError && err.unknownNames).toEqual(["z"]);
    expect(err instanceof InputValidationError && err.modelSource).toBe("/models/two.onnx");
    expect(engine.sessions[0]?.runs).toHaveLength(0);
  });

  it("rejects unknown output names", async () => {
    const result = session.run({ x: createFloatTensor([1, 2], [1, 2]) }, ["y1", "w"]);
    await expect(result).rejects.toBeInstanceOf(InputValidationError);
    await expect(result).rejects.toThrow("Unknown output name(s): w. Model outputs: y1, y2.");
  });

  it("wraps engine failures with the model source", async () => {
    const err = await session.run({}).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(InferenceError);
    expect(err).not.toBeInstanceOf(InputValidationError);
    expect(err instanceof InferenceError && err.message).toBe(
      "Inference failed on model /models/two.onnx: Missing Input: x",
    );
    expect(err instanceof InferenceError && err.cause).toBeInstanceOf(EngineError);
  });

  it("wraps use after dispose", async () => {
    await session.dispose();

    const err = await session.run({ x: createFloatTensor([1, 2], [1, 2]) }).catch((e: unknown) => e);
    expect(err instanceof InferenceError && err.message).toBe(
      "Inference failed on model /models/two.onnx: Session already disposed.",
    );
    expect(err instanceof InferenceError && err.cause).toBeInstanceOf(SessionStateError);
    expect(() => session.endProfiling()).toThrow(
      "Failed to end profiling on model /models/two.onnx: Session already disposed.",
    );
  });
});

// ---------------------------------------------------------------------------
// dispose
// ---------------------------------------------------------------------------

describe("OnnxSession.dispose", () => {
  it("releases the native session", async () => {
    const session = await OnnxSession.create(binding, IDENTITY_PATH);
    await session.dispose();

    expect(engine.sessions[0]?.released).toBe(true);
    expect(engine.liveHandleCount).toBe(2);
  });

  it("rejects a second dispose", async () => {
    const session = await OnnxSession.create(binding, IDENTITY_PATH);
    await session.dispose();
    await expect(session.dispose()).rejects.toThrow("Session already disposed.");
  });
});

describe("toLoggingLevel", () => {
  const levels: Array<[LogLevelName, LoggingLevel]> = [
    ["verbose", LoggingLevel.VERBOSE],
    ["info", LoggingLevel.INFO],
    ["warning", LoggingLevel.WARNING],
    ["error", LoggingLevel.ERROR],
    ["fatal", LoggingLevel.FATAL],
  ];

  it.each(levels)("maps %s", (name, level) => {
    expect(toLoggingLevel(name)).toBe(level);
  });

  it("defaults to warning", () => {
    expect(toLoggingLevel(undefined)).toBe(LoggingLevel.WARNING);
  });

  it("rejects unknown names", () => {
    expect(() => Reflect.apply(toLoggingLevel, undefined, ["debug"])).toThrow(
      "Unsupported log level: debug",
    );
  });
});
