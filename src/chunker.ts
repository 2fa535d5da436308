import type { Chunk } from "./types";
import { ValidationError } from "./errors";

export interface ChunkOptions {
  /** Maximum characters per chunk. */
  size: number;
  /** Characters shared by neighbouring chunks. Must be < size. */
  overlap: number;
}

/**
 * @throws {ValidationError} Unless `size` is a positive integer and `overlap`
 * an integer in [0, size).
 */
export function assertChunkOptions({ size, overlap }: ChunkOptions): void {
  if (!Number.isInteger(size) || size < 1) {
    throw new ValidationError(`Chunk size must be a positive integer (got ${size})`);
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= size) {
    throw new ValidationError(`Chunk overlap must be an integer in [0, ${size}) (got ${overlap})`);
  }
}

function* generateChunks(text: string, size: number, overlap: number, promptId: string) {
  const step = size - overlap;
  let index = 0;
  for (let start = 0; ; start += step) {
    const end = Math.min(start + size, text.length);
    yield { promptId, index: index++, text: text.slice(start, end), start, end } satisfies Chunk;
    if (end >= text.length) return;
  }
}

/**
 * Split text into fixed-size overlapping windows. Chunk `i` starts at
 * `i * (size - overlap)`; the last chunk is the first one that reaches the
 * end of the text, so text no longer than `size` (even empty text) gives a
 * single chunk equal to the whole text.
 *
 * The result is lazy and restartable: every iteration walks the text again.
 */
export function chunkText(text: string, options: ChunkOptions, promptId = ""): Iterable<Chunk> {
  assertChunkOptions(options);
  const { size, overlap } = options;
  return {
    [Symbol.iterator]: () => generateChunks(text, size, overlap, promptId),
  };
}

/** Join chunks back into the original text, dropping each chunk's overlap with its predecessor. */
export function joinChunks(chunks: Iterable<Chunk>): string {
  let out = "";
  let covered = 0;
  for (const c of chunks) {
    out += c.text.slice(covered - c.start);
    covered = c.end;
  }
  return out;
}
