import fs from "node:fs/promises";
import path from "node:path";
import { randomUUID } from "node:crypto";
import { StorageError, hasErrorCode } from "./errors";

/**
 * Low-level file helpers shared by the catalog, the vector store and the
 * prompt files.
 *
 * Writes go to a sibling temporary file that is renamed over the target, so a
 * reader (or a crash) never observes a half-written file.
 */

/**
 * Atomically replace `file` with `content`, creating parent directories.
 * @throws {StorageError} On any filesystem failure (the temp file is removed).
 */
export async function writeFileAtomic(file: string, content: string): Promise<void> {
  const tmp = `${file}.${randomUUID()}.tmp`;
  try {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(tmp, content, "utf8");
    await fs.rename(tmp, file);
  } catch (e) {
    await fs.rm(tmp, { force: true }).catch((rmErr: unknown) => {
      console.error(`[MCP] Could not remove temp file ${tmp}:`, rmErr);
    });
    throw new StorageError(file, "Failed to write file", { cause: e });
  }
}

/**
 * Read a UTF-8 file.
 * @returns The content, or `null` when the file does not exist.
 * @throws {StorageError} On any other filesystem failure.
 */
export async function readFileIfExists(file: string): Promise<string | null> {
  try {
    return await fs.readFile(file, "utf8");
  } catch (e) {
    if (hasErrorCode(e, "ENOENT")) return null;
    throw new StorageError(file, "Failed to read file", { cause: e });
  }
}

/** Remove a file; a file that is already gone is not an error. */
export async function removeFile(file: string): Promise<void> {
  try {
    await fs.rm(file);
  } catch (e) {
    if (hasErrorCode(e, "ENOENT")) return;
    throw new StorageError(file, "Failed to remove file", { cause: e });
  }
}

/** Serialize a float vector as base64 of its little-endian float32 bytes. */
export function encodeVector(v: Float32Array): string {
  return Buffer.from(v.buffer, v.byteOffset, v.byteLength).toString("base64");
}

/**
 * Inverse of {@link encodeVector}.
 * @returns `null` if the payload is not a whole number of float32 values.
 */
export function decodeVector(encoded: string): Float32Array | null {
  const buf = Buffer.from(encoded, "base64");
  if (buf.byteLength % 4 !== 0) return null;
  // copy: the Buffer may be a view into a shared pool with arbitrary alignment
  const out = new Float32Array(buf.byteLength / 4);
  new Uint8Array(out.buffer).set(buf);
  return out;
}
