import { z } from "zod";
import { CATEGORIES, type ChunkPayload } from "./types";
import { DimensionMismatchError, StorageError } from "./errors";
import { decodeVector, encodeVector, readFileIfExists, writeFileAtomic } from "./persistence";

/** Provider identity and dimension every vector of a collection was produced under. */
export interface CollectionIdentity {
  provider: string;
  dimension: number;
}

export interface VectorRecord {
  id: string;
  vector: Float32Array;
  payload: ChunkPayload;
}

export interface VectorMatch {
  id: string;
  score: number;
  payload: ChunkPayload;
}

/**
 * Similarity-searchable store of chunk vectors. Writes are serialized by the
 * caller (the library's single writer queue); reads may run at any time.
 */
export interface VectorIndex {
  /** Identity of the stored vectors, or `null` while the index is empty. */
  identity(): CollectionIdentity | null;
  size(): number;
  /**
   * Throws unless vectors produced under `identity` may be mixed into (and
   * queried against) this collection. An empty collection accepts anything.
   * @throws {DimensionMismatchError}
   */
  assertCompatible(identity: CollectionIdentity): void;
  /** Insert or replace. Re-upserting an id never duplicates it. */
  upsert(id: string, vector: Float32Array, payload: ChunkPayload, identity: CollectionIdentity): void;
  delete(id: string): void;
  get(id: string): VectorRecord | undefined;
  /** Chunk ids stored for a prompt, in chunk order. */
  idsForPrompt(promptId: string): string[];
  /** Distinct prompt ids with at least one vector. */
  promptIds(): Set<string>;
  /** Top-k records by descending cosine similarity (ties by id). */
  query(vector: Float32Array, k: number, filter?: (p: ChunkPayload) => boolean): VectorMatch[];
  /** Drop everything and adopt `identity` (used by rebuilds). */
  reset(identity: CollectionIdentity | null, records?: Iterable<VectorRecord>): void;
  /** Persist the current state. */
  flush(): Promise<void>;
}

/**
 * Cosine similarity. Vectors of different length are a caller bug here:
 * dimensions are checked before anything reaches the index.
 */
export function cosine(a: Float32Array, b: Float32Array): number {
  let dot = 0,
    na = 0,
    nb = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i],
      y = b[i];
    dot += x * y;
    na += x * x;
    nb += y * y;
  }
  return dot / (Math.sqrt(na) * Math.sqrt(nb) + 1e-10);
}

const storedRecordSchema = z.object({
  id: z.string(),
  promptId: z.string(),
  chunkIndex: z.number().int().nonnegative(),
  start: z.number().int().nonnegative(),
  end: z.number().int().nonnegative(),
  category: z.enum(CATEGORIES),
  text: z.string(),
  emb: z.string(),
});

const storeSchema = z.object({
  version: z.literal(1),
  meta: z.object({
    provider: z.string().nullable(),
    dimension: z.number().int().positive().nullable(),
    savedAt: z.string(),
    embEncoding: z.literal("f32-base64"),
  }),
  records: z.array(storedRecordSchema),
});

/**
 * In-process vector index persisted to a single JSON file. Vectors are kept
 * as Float32Array in memory and stored base64-encoded on disk. Query is a
 * linear scan, which is plenty for a corpus of a few thousand chunks.
 */
export class JsonVectorIndex implements VectorIndex {
  private readonly file: string;
  private readonly records = new Map<string, VectorRecord>();
  private ident: CollectionIdentity | null = null;

  private constructor(file: string) {
    this.file = file;
  }

  /**
   * Load the index stored at `file` (missing file: empty index). An unreadable
   * or malformed file also loads as empty; the library's consistency check
   * then reports the drift and a rebuild restores it.
   */
  public static async open(file: string): Promise<JsonVectorIndex> {
    const index = new JsonVectorIndex(file);
    const raw = await readFileIfExists(file);
    if (raw === null) return index;
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (e) {
      console.error(`[MCP] Vector store at ${file} is not valid JSON; starting empty:`, e);
      return index;
    }
    const parsed = storeSchema.safeParse(json);
    if (!parsed.success) {
      console.error(`[MCP] Vector store at ${file} has an unexpected shape; starting empty.`);
      return index;
    }
    const { meta, records } = parsed.data;
    if (meta.provider === null || meta.dimension === null) return index;
    const identity = { provider: meta.provider, dimension: meta.dimension };
    for (const r of records) {
      const vector = decodeVector(r.emb);
      if (!vector || vector.length !== identity.dimension) {
        console.error(`[MCP] Dropping stored vector ${r.id} with a bad encoding.`);
        continue;
      }
      const { id, emb: _emb, ...payload } = r;
      index.records.set(id, { id, vector, payload });
    }
    if (index.records.size > 0) index.ident = identity;
    return index;
  }

  public identity(): CollectionIdentity | null {
    return this.ident;
  }

  public size(): number {
    return this.records.size;
  }

  public assertCompatible(identity: CollectionIdentity): void {
    const current = this.ident;
    if (!current) return;
    if (current.dimension !== identity.dimension) {
      throw new DimensionMismatchError(
        `Provider ${identity.provider} produces ${identity.dimension}-d vectors but the index holds ${current.dimension}-d vectors from ${current.provider}. Rebuild the index to switch providers.`,
        current.dimension,
        identity.dimension,
      );
    }
    if (current.provider !== identity.provider) {
      throw new DimensionMismatchError(
        `Index was built with ${current.provider}; refusing to mix in vectors from ${identity.provider}. Rebuild the index to switch providers.`,
        current.dimension,
        identity.dimension,
      );
    }
  }

  public upsert(
    id: string,
    vector: Float32Array,
    payload: ChunkPayload,
    identity: CollectionIdentity,
  ): void {
    this.assertCompatible(identity);
    if (vector.length !== identity.dimension) {
      throw new DimensionMismatchError(
        `Vector ${id} has ${vector.length} dimensions, expected ${identity.dimension}`,
        identity.dimension,
        vector.length,
      );
    }
    this.records.set(id, { id, vector, payload });
    this.ident ??= { ...identity };
  }

  public delete(id: string): void {
    this.records.delete(id);
    if (this.records.size === 0) this.ident = null;
  }

  public get(id: string): VectorRecord | undefined {
    return this.records.get(id);
  }

  public idsForPrompt(promptId: string): string[] {
    const out: VectorRecord[] = [];
    for (const r of this.records.values()) if (r.payload.promptId === promptId) out.push(r);
    return out.sort((a, b) => a.payload.chunkIndex - b.payload.chunkIndex).map((r) => r.id);
  }

  public promptIds(): Set<string> {
    const out = new Set<string>();
    for (const r of this.records.values()) out.add(r.payload.promptId);
    return out;
  }

  public query(
    vector: Float32Array,
    k: number,
    filter?: (p: ChunkPayload) => boolean,
  ): VectorMatch[] {
    const scored: VectorMatch[] = [];
    for (const r of this.records.values()) {
      if (filter && !filter(r.payload)) continue;
      scored.push({ id: r.id, score: cosine(r.vector, vector), payload: r.payload });
    }
    scored.sort((a, b) => b.score - a.score || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    return scored.slice(0, Math.max(0, k));
  }

  public reset(identity: CollectionIdentity | null, records: Iterable<VectorRecord> = []): void {
    this.records.clear();
    this.ident = null;
    for (const r of records) {
      if (!identity) throw new StorageError(this.file, "Cannot load vectors without an identity");
      this.upsert(r.id, r.vector, r.payload, identity);
    }
  }

  public async flush(): Promise<void> {
    const out = {
      version: 1,
      meta: {
        provider: this.ident?.provider ?? null,
        dimension: this.ident?.dimension ?? null,
        savedAt: new Date().toISOString(),
        embEncoding: "f32-base64",
      },
      records: [...this.records.values()].map((r) => ({
        id: r.id,
        ...r.payload,
        emb: encodeVector(r.vector),
      })),
    };
    await writeFileAtomic(this.file, JSON.stringify(out));
  }
}
