import { describe, it, expect } from "vitest";
import { ElementType } from "@tensorbridge/core";
import {
  createFloatTensor,
  decodeModel,
  encodeModel,
  identityModel,
  sequenceOutputModel,
  typedIdentityModel,
} from "../index.js";

function bytesOf(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

describe("model encoding", () => {
  it("decodes what it encodes", () => {
    expect(decodeModel(encodeModel(identityModel()))).toEqual(identityModel());
    expect(decodeModel(encodeModel(sequenceOutputModel()))).toEqual(sequenceOutputModel());
  });

  it("keeps the element type of typed models", () => {
    const model = decodeModel(encodeModel(typedIdentityModel(ElementType.INT64)));
    expect(model?.inputs[0]?.type).toBe(ElementType.INT64);
    expect(model?.inputs[0]?.symbolicDimensions).toEqual(["n"]);
  });

  it.each([
    ["not json", "{"],
    ["a non-object", "[1, 2]"],
    ["missing nodes", '{"inputs": [], "outputs": []}'],
    ["an unknown op", '{"inputs": [], "outputs": [], "nodes": [{"op": "Conv", "inputs": [], "outputs": []}]}'],
    ["an unknown value kind", '{"inputs": [{"name": "x", "kind": "map"}], "outputs": [], "nodes": []}'],
    ["an unknown element type", '{"inputs": [{"name": "x", "type": 999}], "outputs": [], "nodes": []}'],
    ["a nameless value", '{"inputs": [{"type": 1}], "outputs": [], "nodes": []}'],
  ])("rejects %s", (_label, text) => {
    expect(decodeModel(bytesOf(text))).toBeUndefined();
  });
});

describe("createFloatTensor", () => {
  it("defaults to a vector shape", () => {
    const tensor = createFloatTensor([1, 2, 3]);
    expect(tensor.type).toBe("float32");
    expect(tensor.dims).toEqual([3]);
  });

  it("takes explicit dims", () => {
    expect(createFloatTensor([1, 2, 3, 4], [2, 2]).dims).toEqual([2, 2]);
  });
});
