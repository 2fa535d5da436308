import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { ProviderUnavailableError } from "../src/errors";
import { providerIdentity, type EmbeddingProvider } from "../src/embeddings/provider";
import { PromptLibrary, type LibraryOptions, type LibrarySettings } from "../src/library";
import { StatusManager } from "../src/status";

/** FNV-1a, 32 bit. */
function hash(word: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < word.length; i++) {
    h ^= word.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

/**
 * Deterministic in-process embedding provider: a normalized bag of hashed
 * words. Texts sharing words get a positive similarity; disjoint texts
 * (barring hash collisions) score zero.
 */
export class FakeProvider implements EmbeddingProvider {
  public readonly kind = "fake";
  public readonly model: string;
  public readonly dimension: number;
  public readonly identity: string;
  /** Number of embed() calls so far. */
  public calls = 0;
  /** Texts received, per call. */
  public readonly batches: string[][] = [];
  /** The next `failures` calls throw ProviderUnavailableError. */
  public failures = 0;

  public constructor(opts: { model?: string; dimension?: number } = {}) {
    this.model = opts.model ?? "bag-of-words";
    this.dimension = opts.dimension ?? 256;
    this.identity = providerIdentity(this.kind, this.model);
  }

  public async init(): Promise<void> {}

  public async embed(texts: readonly string[]): Promise<Float32Array[]> {
    this.calls++;
    this.batches.push([...texts]);
    if (this.failures > 0) {
      this.failures--;
      throw new ProviderUnavailableError("fake backend is down");
    }
    return texts.map((t) => this.vectorFor(t));
  }

  public vectorFor(text: string): Float32Array {
    const v = new Float32Array(this.dimension);
    for (const word of text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? []) {
      v[hash(word) % this.dimension] += 1;
    }
    let norm = 0;
    for (const x of v) norm += x * x;
    if (norm === 0) {
      v[0] = 1;
      return v;
    }
    const scale = 1 / Math.sqrt(norm);
    for (let i = 0; i < v.length; i++) v[i] *= scale;
    return v;
  }
}

export async function makeTempDir(prefix = "prompt-library-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export function testSettings(dir: string, overrides: Partial<LibrarySettings> = {}): LibrarySettings {
  return {
    PROMPTS_DIR: path.join(dir, "prompts"),
    VECTOR_DB_DIR: path.join(dir, "prompts", ".vectordb"),
    CHUNK_SIZE: 200,
    CHUNK_OVERLAP: 40,
    MAX_PROMPT_CHARS: 2000,
    SEARCH_FANOUT: 3,
    EMBED_TIMEOUT_MS: 1000,
    EMBED_RETRIES: 2,
    EMBED_RETRY_BASE_MS: 0,
    VERBOSE: false,
    ...overrides,
  };
}

export async function openLibrary(
  dir: string,
  provider: EmbeddingProvider = new FakeProvider(),
  opts: LibraryOptions & { settings?: Partial<LibrarySettings> } = {},
): Promise<PromptLibrary> {
  const { settings, ...rest } = opts;
  return PromptLibrary.open(testSettings(dir, settings), provider, {
    status: new StatusManager({ version: "test" }),
    ...rest,
  });
}

export async function exists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}
