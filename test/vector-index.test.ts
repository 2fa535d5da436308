import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { DimensionMismatchError } from "../src/errors";
import { decodeVector, encodeVector } from "../src/persistence";
import type { ChunkPayload } from "../src/types";
import { JsonVectorIndex, cosine } from "../src/vector-index";
import { makeTempDir, removeDir } from "./helpers";

const ident = { provider: "fake/test", dimension: 3 };

function payload(promptId: string, chunkIndex = 0): ChunkPayload {
  return { promptId, chunkIndex, start: 0, end: 1, category: "general", text: `${promptId}#${chunkIndex}` };
}

const vec = (...xs: number[]) => Float32Array.from(xs);

describe("cosine", () => {
  it("scores identical directions 1 and orthogonal 0", () => {
    expect(cosine(vec(1, 0, 0), vec(2, 0, 0))).toBeCloseTo(1, 6);
    expect(cosine(vec(1, 0, 0), vec(0, 1, 0))).toBe(0);
  });
});

describe("vector encoding", () => {
  it("round-trips float32 values", () => {
    const v = vec(0.5, -1.25, 3);
    expect(decodeVector(encodeVector(v))).toEqual(v);
  });

  it("rejects a truncated payload", () => {
    expect(decodeVector(Buffer.from([1, 2, 3]).toString("base64"))).toBeNull();
  });
});

describe("JsonVectorIndex", () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    file = path.join(dir, "vectors.json");
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("queries by descending similarity with ties by id", async () => {
    const index = await JsonVectorIndex.open(file);
    index.upsert("b", vec(1, 0, 0), payload("p2"), ident);
    index.upsert("a", vec(1, 0, 0), payload("p1"), ident);
    index.upsert("c", vec(0, 1, 0), payload("p3"), ident);
    expect(index.query(vec(1, 0, 0), 2).map((m) => m.id)).toEqual(["a", "b"]);
    expect(index.query(vec(0, 1, 0), 1, (p) => p.promptId !== "p3").map((m) => m.id)).toEqual(["a"]);
  });

  it("upserts idempotently", async () => {
    const index = await JsonVectorIndex.open(file);
    index.upsert("a", vec(1, 0, 0), payload("p1"), ident);
    index.upsert("a", vec(0, 1, 0), payload("p1"), ident);
    expect(index.size()).toBe(1);
    expect(index.get("a")?.vector).toEqual(vec(0, 1, 0));
  });

  it("adopts and forgets the collection identity", async () => {
    const index = await JsonVectorIndex.open(file);
    expect(index.identity()).toBeNull();
    index.upsert("a", vec(1, 0, 0), payload("p1"), ident);
    expect(index.identity()).toEqual(ident);
    index.delete("a");
    expect(index.identity()).toBeNull();
  });

  it("refuses vectors of another dimension or provider", async () => {
    const index = await JsonVectorIndex.open(file);
    index.upsert("a", vec(1, 0, 0), payload("p1"), ident);
    expect(() => index.upsert("b", vec(1, 0), payload("p2"), { provider: "fake/test", dimension: 2 })).toThrow(
      DimensionMismatchError,
    );
    expect(() => index.assertCompatible({ provider: "other/model", dimension: 3 })).toThrow(DimensionMismatchError);
    expect(() => index.upsert("b", vec(1, 0), payload("p2"), ident)).toThrow(DimensionMismatchError);
  });

  it("groups chunk ids by prompt", async () => {
    const index = await JsonVectorIndex.open(file);
    index.upsert("p1:1", vec(1, 0, 0), payload("p1", 1), ident);
    index.upsert("p1:0", vec(1, 0, 0), payload("p1", 0), ident);
    index.upsert("p2:0", vec(1, 0, 0), payload("p2", 0), ident);
    expect(index.idsForPrompt("p1")).toEqual(["p1:0", "p1:1"]);
    expect([...index.promptIds()].sort()).toEqual(["p1", "p2"]);
  });

  it("persists and reloads", async () => {
    const index = await JsonVectorIndex.open(file);
    index.upsert("a", vec(0.25, 0.5, 1), payload("p1"), ident);
    await index.flush();

    const reloaded = await JsonVectorIndex.open(file);
    expect(reloaded.identity()).toEqual(ident);
    expect(reloaded.get("a")).toEqual({ id: "a", vector: vec(0.25, 0.5, 1), payload: payload("p1") });
  });

  it("loads an unreadable file as empty", async () => {
    await fs.writeFile(file, "garbage");
    const index = await JsonVectorIndex.open(file);
    expect(index.size()).toBe(0);
    expect(index.identity()).toBeNull();
  });

  it("resets to a new identity", async () => {
    const index = await JsonVectorIndex.open(file);
    index.upsert("a", vec(1, 0, 0), payload("p1"), ident);
    const next = { provider: "fake/other", dimension: 2 };
    index.reset(next, [{ id: "z", vector: vec(0, 1), payload: payload("p9") }]);
    expect(index.identity()).toEqual(next);
    expect(index.size()).toBe(1);
    index.reset(null);
    expect(index.size()).toBe(0);
  });
});
