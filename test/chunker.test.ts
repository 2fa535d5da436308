import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { chunkText, joinChunks } from "../src/chunker";
import { ValidationError } from "../src/errors";

describe("chunkText", () => {
  it("splits into overlapping windows", () => {
    const chunks = [...chunkText("abcdefghij", { size: 4, overlap: 1 }, "p1")];
    expect(chunks).toEqual([
      { promptId: "p1", index: 0, text: "abcd", start: 0, end: 4 },
      { promptId: "p1", index: 1, text: "defg", start: 3, end: 7 },
      { promptId: "p1", index: 2, text: "ghij", start: 6, end: 10 },
    ]);
  });

  it("allows zero overlap", () => {
    const texts = [...chunkText("abcdef", { size: 2, overlap: 0 })].map((c) => c.text);
    expect(texts).toEqual(["ab", "cd", "ef"]);
  });

  it("keeps a short final window", () => {
    const chunks = [...chunkText("abcdefg", { size: 4, overlap: 2 })];
    expect(chunks.map((c) => [c.start, c.end])).toEqual([
      [0, 4],
      [2, 6],
      [4, 7],
    ]);
  });

  it("yields one chunk for text no longer than the size", () => {
    expect([...chunkText("abc", { size: 3, overlap: 1 })]).toEqual([
      { promptId: "", index: 0, text: "abc", start: 0, end: 3 },
    ]);
  });

  it("yields one empty chunk for empty text", () => {
    expect([...chunkText("", { size: 10, overlap: 2 })]).toEqual([
      { promptId: "", index: 0, text: "", start: 0, end: 0 },
    ]);
  });

  it("is restartable", () => {
    const chunks = chunkText("hello world, hello chunks", { size: 8, overlap: 3 });
    expect([...chunks]).toEqual([...chunks]);
  });

  it.each([
    { size: 0, overlap: 0 },
    { size: 1.5, overlap: 0 },
    { size: 5, overlap: 5 },
    { size: 5, overlap: 7 },
    { size: 5, overlap: -1 },
  ])("rejects size=$size overlap=$overlap", (options) => {
    expect(() => chunkText("text", options)).toThrow(ValidationError);
  });

  const options = fc
    .integer({ min: 1, max: 40 })
    .chain((size) => fc.record({ size: fc.constant(size), overlap: fc.integer({ min: 0, max: size - 1 }) }));

  it("reconstructs the text when joined", () => {
    fc.assert(
      fc.property(fc.string({ maxLength: 300 }), options, (text, opts) => {
        expect(joinChunks(chunkText(text, opts))).toBe(text);
      }),
    );
  });

  it("covers the text with bounded, evenly spaced windows", () => {
    fc.assert(
      fc.property(fc.string({ maxLength: 300 }), options, (text, opts) => {
        const chunks = [...chunkText(text, opts)];
        expect(chunks[0].start).toBe(0);
        expect(chunks[chunks.length - 1].end).toBe(text.length);
        chunks.forEach((c, i) => {
          expect(c.index).toBe(i);
          expect(c.start).toBe(i * (opts.size - opts.overlap));
          expect(c.text.length).toBeLessThanOrEqual(opts.size);
          expect(c.text).toBe(text.slice(c.start, c.end));
        });
      }),
    );
  });
});
