import fs from "node:fs/promises";
import path from "node:path";
import PQueue from "p-queue";
import type { Config } from "./config";
import {
  CATEGORIES,
  isCategory,
  type Category,
  type CatalogEntry,
  type Chunk,
  type PromptDocument,
} from "./types";
import { Catalog, type CatalogDocument } from "./catalog";
import { chunkText, assertChunkOptions } from "./chunker";
import { DEFAULT_RULES, DEFAULT_VOCABULARY, classify, extractTags, normalizeTags } from "./classifier";
import type { RuleTable, TagVocabulary } from "./classifier";
import { assertEmbeddings, type EmbeddingProvider } from "./embeddings/provider";
import { ConsistencyError, PromptNotFoundError, StorageError, ValidationError } from "./errors";
import { IngestionRun, type StageEvent, type StageListener, type UnitKind } from "./ingestion-run";
import { PromptStore } from "./prompt-store";
import { withRetry } from "./retry";
import {
  extractSections,
  generateTitle,
  parseSession,
  promptId,
  sessionSource,
  type SessionFormat,
} from "./session-parser";
import { statusManager, type StatusManager } from "./status";
import {
  JsonVectorIndex,
  type CollectionIdentity,
  type VectorIndex,
  type VectorRecord,
} from "./vector-index";

/** The parts of {@link Config} the library reads. */
export type LibrarySettings = Pick<
  Config,
  | "PROMPTS_DIR"
  | "VECTOR_DB_DIR"
  | "CHUNK_SIZE"
  | "CHUNK_OVERLAP"
  | "MAX_PROMPT_CHARS"
  | "SEARCH_FANOUT"
  | "EMBED_TIMEOUT_MS"
  | "EMBED_RETRIES"
  | "EMBED_RETRY_BASE_MS"
  | "VERBOSE"
>;

export interface LibraryOptions {
  /** Observe every stage transition of every unit. */
  onStage?: StageListener;
  /** Status holder to refresh after commits (defaults to the process-wide one). */
  status?: StatusManager;
  rules?: RuleTable;
  vocabulary?: TagVocabulary;
}

export interface IngestOptions {
  /** Session source identifier; derived from the transcript when omitted. */
  source?: string;
  format?: SessionFormat;
  signal?: AbortSignal;
}

export interface CreateOptions {
  /** Explicit category; classified from the text when omitted. */
  category?: string;
  title?: string;
  /** Extra tags, merged with the ones found in the text. */
  tags?: readonly string[];
  /** Source recorded with the prompt (default "manual"). */
  source?: string;
  signal?: AbortSignal;
}

export interface UpdateOptions {
  text?: string;
  category?: string;
  title?: string;
  /** Replaces the tag set. */
  tags?: readonly string[];
  signal?: AbortSignal;
}

export interface SearchOptions {
  /** Number of prompts to return, 1..50 (default 5). */
  k?: number;
  category?: string;
}

export interface ListFilter {
  category?: string;
  tag?: string;
  session?: string;
}

export interface SearchHit {
  id: string;
  /** Cosine similarity of the prompt's best matching chunk. */
  score: number;
  entry: CatalogEntry;
  /** Text of the best matching chunk. */
  snippet: string;
}

export interface StoredPrompt {
  id: string;
  entry: CatalogEntry;
  document: PromptDocument;
}

export interface RebuildReport {
  prompts: number;
  chunks: number;
  /** Prompt files found on disk without a catalog entry, now indexed. */
  adopted: number;
  /** Catalog entries whose prompt file was missing or unreadable. */
  dropped: number;
  provider: string;
}

export interface ConsistencyReport {
  ok: boolean;
  missingVectors: string[];
  orphanVectors: string[];
}

export interface LibraryStats {
  count: number;
  categories: Record<Category, number>;
  chunks: number;
  tags: number;
  sessions: number;
  provider: string;
  dimension: number;
  index: {
    provider: string | null;
    dimension: number | null;
    /** False when the active provider cannot query the stored vectors. */
    compatible: boolean;
  };
}

export const MAX_K = 50;
const DEFAULT_K = 5;
const MANUAL_SOURCE = "manual";

/** Vector id of a prompt's chunk. */
export function chunkId(id: string, index: number): string {
  return `${id}:${index}`;
}

interface PersistedPrompt {
  doc: PromptDocument;
  filePath: string;
}

interface PreparedPrompt extends PersistedPrompt {
  chunks: Chunk[];
}

interface IndexedPrompt {
  id: string;
  entry: CatalogEntry;
  records: VectorRecord[];
}

/**
 * The indexing coordinator. Owns the prompt files, the catalog and the vector
 * index, and keeps them in step: a catalog entry exists iff its prompt has at
 * least one vector.
 *
 * Every mutation runs as one {@link IngestionRun} on a single-writer queue;
 * a failing or cancelled run rolls back what it applied. Reads never wait
 * for the queue and only return prompts present in the catalog.
 */
export class PromptLibrary {
  private readonly settings: LibrarySettings;
  private readonly provider: EmbeddingProvider;
  private readonly catalog: Catalog;
  private readonly vectors: VectorIndex;
  private readonly store: PromptStore;
  private readonly status: StatusManager;
  private readonly rules: RuleTable;
  private readonly vocabulary: TagVocabulary;
  private readonly onStage?: StageListener;
  private readonly queue = new PQueue({ concurrency: 1 });

  private constructor(
    settings: LibrarySettings,
    provider: EmbeddingProvider,
    stores: { catalog: Catalog; vectors: VectorIndex; store: PromptStore },
    opts: LibraryOptions,
  ) {
    this.settings = settings;
    this.provider = provider;
    this.catalog = stores.catalog;
    this.vectors = stores.vectors;
    this.store = stores.store;
    this.status = opts.status ?? statusManager;
    this.rules = opts.rules ?? DEFAULT_RULES;
    this.vocabulary = opts.vocabulary ?? DEFAULT_VOCABULARY;
    this.onStage = opts.onStage;
  }

  /**
   * Open (or create) the library under the configured directories. The
   * provider should already be initialized.
   * @throws {StorageError} If the catalog exists but cannot be read.
   * @throws {ValidationError} On invalid chunk settings.
   */
  public static async open(
    settings: LibrarySettings,
    provider: EmbeddingProvider,
    opts: LibraryOptions = {},
  ): Promise<PromptLibrary> {
    assertChunkOptions({ size: settings.CHUNK_SIZE, overlap: settings.CHUNK_OVERLAP });
    await fs.mkdir(settings.PROMPTS_DIR, { recursive: true });
    await fs.mkdir(settings.VECTOR_DB_DIR, { recursive: true });
    const catalog = await Catalog.open(path.join(settings.PROMPTS_DIR, "index.json"));
    const vectors = await JsonVectorIndex.open(path.join(settings.VECTOR_DB_DIR, "vectors.json"));
    const store = new PromptStore(settings.PROMPTS_DIR);
    const library = new PromptLibrary(settings, provider, { catalog, vectors, store }, opts);
    library.status.setPromptsDir(store.getRoot());
    library.status.setProvider(provider.identity);
    library.status.recordCommit(catalog.size(), vectors.size());
    return library;
  }

  /** Wait for queued writes to finish. */
  public async close(): Promise<void> {
    await this.queue.onIdle();
  }

  // ---------------------------------------------------------------- writes

  /**
   * Ingest a session transcript. Spans already indexed for this source are
   * left alone, new spans are added, and prompts previously ingested from
   * the same source whose span is gone are removed, all in one unit.
   *
   * @returns Prompt ids in span order (empty for a transcript without spans).
   */
  public async ingestSession(text: string, opts: IngestOptions = {}): Promise<string[]> {
    const source = sessionSource(text, opts.source);
    return this.exclusive("ingest", source, opts.signal, async (run) => {
      const parsed = parseSession(text, {
        format: opts.format,
        maxPromptChars: this.settings.MAX_PROMPT_CHARS,
        rules: this.rules,
        vocabulary: this.vocabulary,
      });
      if (parsed.skipped > 0) {
        console.error(
          `[MCP] Session ${source}: skipped ${parsed.skipped} prompt(s) longer than ${this.settings.MAX_PROMPT_CHARS} chars.`,
        );
      }
      run.advance("PARSED");
      const ids = parsed.drafts.map((d) => promptId(source, d.text));
      run.advance("CLASSIFIED");
      if (ids.length === 0) return ids;

      const wanted = new Set(ids);
      const stale = this.catalog
        .list({ session: source })
        .filter(({ id, entry }) => entry.origin === "session" && !wanted.has(id))
        .map(({ id }) => id);
      const createdAt = new Date().toISOString();
      const fresh: PromptDocument[] = [];
      parsed.drafts.forEach((draft, i) => {
        const id = ids[i];
        if (this.catalog.has(id)) return;
        fresh.push({
          id,
          title: draft.title,
          category: draft.category,
          tags: draft.tags,
          createdAt,
          session: source,
          origin: "session",
          sections: draft.sections,
          text: draft.text,
        });
      });
      if (fresh.length === 0 && stale.length === 0) return ids;
      this.vectors.assertCompatible(this.collectionIdentity());

      const staleFiles = stale.flatMap((id) => this.catalog.get(id)?.filePath ?? []);
      const persisted: PersistedPrompt[] = [];
      for (const doc of fresh) persisted.push(await this.persistDocument(run, doc));
      run.advance("PERSISTED");
      await this.indexPrepared(run, persisted, stale, opts.signal);
      for (const file of staleFiles) await this.removeDocument(run, file);
      if (this.settings.VERBOSE) {
        console.error(
          `[MCP][verbose] Session ${source}: ${fresh.length} added, ${stale.length} removed, ${ids.length - fresh.length} unchanged.`,
        );
      }
      return ids;
    });
  }

  /**
   * Add a single prompt. Text already stored under the same source returns
   * the existing id unchanged.
   * @throws {ValidationError} On empty or oversized text or an unknown category.
   */
  public async createPrompt(text: string, opts: CreateOptions = {}): Promise<string> {
    const source = opts.source?.trim() || MANUAL_SOURCE;
    const body = text.trim();
    const id = promptId(source, body);
    return this.exclusive("create", id, opts.signal, async (run) => {
      this.assertText(body);
      run.advance("PARSED");
      const category = opts.category === undefined ? classify(body, this.rules) : this.toCategory(opts.category);
      run.advance("CLASSIFIED");
      if (this.catalog.has(id)) return id;
      this.vectors.assertCompatible(this.collectionIdentity());

      const doc: PromptDocument = {
        id,
        title: opts.title?.trim() || generateTitle(body),
        category,
        tags: normalizeTags([...extractTags(body, this.vocabulary), ...(opts.tags ?? [])]),
        createdAt: new Date().toISOString(),
        session: source,
        origin: "manual",
        sections: extractSections(body),
        text: body,
      };
      const prepared = await this.persistDocument(run, doc);
      run.advance("PERSISTED");
      await this.indexPrepared(run, [prepared], [], opts.signal);
      return id;
    });
  }

  /**
   * Change a prompt's text or metadata. The id stays the same; the vectors
   * are replaced and a category change moves the file.
   * @throws {PromptNotFoundError} For an unknown id.
   */
  public async updatePrompt(id: string, opts: UpdateOptions): Promise<void> {
    await this.exclusive("update", id, opts.signal, async (run) => {
      const entry = this.requireEntry(id);
      const current = await this.store.read(entry.filePath);
      if (!current) throw new StorageError(entry.filePath, "Prompt file is missing; rebuild the index");
      const text = opts.text === undefined ? current.text : opts.text.trim();
      this.assertText(text);
      run.advance("PARSED");
      const category = opts.category === undefined ? current.category : this.toCategory(opts.category);
      run.advance("CLASSIFIED");
      this.vectors.assertCompatible(this.collectionIdentity());

      const textChanged = text !== current.text;
      let tags = current.tags;
      if (opts.tags !== undefined) tags = normalizeTags(opts.tags);
      else if (textChanged) tags = extractTags(text, this.vocabulary);
      const doc: PromptDocument = {
        ...current,
        title: opts.title?.trim() || current.title,
        category,
        tags,
        sections: textChanged ? extractSections(text) : current.sections,
        text,
      };
      const prepared = await this.persistDocument(run, doc);
      if (prepared.filePath !== entry.filePath) await this.removeDocument(run, entry.filePath);
      run.advance("PERSISTED");
      await this.indexPrepared(run, [prepared], [], opts.signal);
    });
  }

  /**
   * Remove a prompt's catalog entry, vectors and file.
   * @throws {PromptNotFoundError} For an unknown id.
   */
  public async deletePrompt(id: string, signal?: AbortSignal): Promise<void> {
    await this.exclusive("delete", id, signal, async (run) => {
      const entry = this.requireEntry(id);
      await this.commit(run, [], [id]);
      run.advance("INDEXED");
      await this.removeDocument(run, entry.filePath);
    });
  }

  /**
   * Re-chunk and re-embed every prompt from its file under the active
   * provider. Orphan prompt files are adopted; entries whose file is gone
   * are dropped. The new index is built in full before it replaces the old.
   */
  public async rebuildIndex(signal?: AbortSignal): Promise<RebuildReport> {
    return this.exclusive("rebuild", "index", signal, async (run) => {
      const docs: Array<{ doc: PromptDocument; filePath: string; entry?: CatalogEntry }> = [];
      const claimed = new Set<string>();
      let dropped = 0;
      for (const { id, entry } of this.catalog.list()) {
        const doc = await this.readForRebuild(entry.filePath);
        if (!doc || doc.id !== id) {
          console.error(`[MCP] Rebuild: dropping ${id}; its prompt file ${entry.filePath} is missing or unreadable.`);
          dropped++;
          continue;
        }
        docs.push({ doc, filePath: entry.filePath, entry });
        claimed.add(entry.filePath);
      }
      const known = new Set(docs.map((d) => d.doc.id));
      let adopted = 0;
      for (const file of await this.store.list()) {
        if (claimed.has(file)) continue;
        const doc = await this.readForRebuild(file);
        if (!doc || known.has(doc.id)) continue;
        docs.push({ doc, filePath: file });
        known.add(doc.id);
        adopted++;
      }
      run.advance("PARSED");

      // Catalog metadata wins over the file header for prompts already catalogued.
      const prepared = docs.map(({ doc, filePath, entry }) => {
        const merged: PromptDocument = entry
          ? {
              ...doc,
              category: entry.category,
              title: entry.title,
              tags: entry.tags,
              session: entry.session,
              origin: entry.origin,
              createdAt: entry.createdAt,
            }
          : doc;
        return { doc: merged, filePath, chunks: this.chunksFor(merged) };
      });
      run.advance("CHUNKED");
      const indexed = await this.embedPrepared(prepared, signal);
      run.advance("EMBEDDED");

      const identity = indexed.length > 0 ? this.collectionIdentity() : null;
      const previous = {
        identity: this.vectors.identity(),
        entries: this.catalog.list().map(({ id, entry }): [string, CatalogEntry] => [id, entry]),
        records: this.allRecords(),
      };
      run.onRollback("restore previous index", async () => {
        this.catalog.replaceAll(previous.entries);
        this.vectors.reset(previous.identity, previous.records);
        await this.persistStores();
      });
      this.vectors.reset(identity, indexed.flatMap((p) => p.records));
      this.catalog.replaceAll(indexed.map((p): [string, CatalogEntry] => [p.id, p.entry]));
      await this.persistStores();
      run.advance("INDEXED");
      return {
        prompts: this.catalog.size(),
        chunks: this.vectors.size(),
        adopted,
        dropped,
        provider: this.provider.identity,
      };
    });
  }

  // ----------------------------------------------------------------- reads

  /**
   * Semantic search: embed the query, take the best chunk per prompt and
   * return up to `k` prompts by that chunk's score.
   * @throws {DimensionMismatchError} If the index was built under another provider.
   */
  public async search(query: string, opts: SearchOptions = {}): Promise<SearchHit[]> {
    const q = query.trim();
    if (!q) throw new ValidationError("Query must not be empty");
    const k = this.assertK(opts.k ?? DEFAULT_K);
    const category = opts.category === undefined ? undefined : this.toCategory(opts.category);
    this.vectors.assertCompatible(this.collectionIdentity());
    if (this.catalog.size() === 0) return [];
    const [vector] = await this.embed([q]);
    return this.rank(vector, k, category);
  }

  /**
   * Prompts closest to `id`, using the mean of its stored chunk vectors as
   * the query (no provider call). The prompt itself is never returned.
   */
  public async findSimilar(id: string, k: number = DEFAULT_K): Promise<SearchHit[]> {
    this.requireEntry(id);
    this.assertK(k);
    this.vectors.assertCompatible(this.collectionIdentity());
    const records = this.vectors.idsForPrompt(id).flatMap((vid) => this.vectors.get(vid) ?? []);
    if (records.length === 0) throw new ConsistencyError([id], []);
    const centroid = new Float32Array(this.provider.dimension);
    for (const r of records) for (let i = 0; i < centroid.length; i++) centroid[i] += r.vector[i] / records.length;
    return this.rank(centroid, k, undefined, id);
  }

  /**
   * @throws {PromptNotFoundError} For an unknown id.
   * @throws {StorageError} If the prompt file is missing or malformed.
   */
  public async getPrompt(id: string): Promise<StoredPrompt> {
    const entry = this.requireEntry(id);
    const document = await this.store.read(entry.filePath);
    if (!document) throw new StorageError(entry.filePath, "Prompt file is missing; rebuild the index");
    return { id, entry, document };
  }

  public listPrompts(filter: ListFilter = {}): Array<{ id: string; entry: CatalogEntry }> {
    return this.catalog.list({
      category: filter.category === undefined ? undefined : this.toCategory(filter.category),
      tag: filter.tag?.trim().toLowerCase() || undefined,
      session: filter.session,
    });
  }

  /** Compare catalog and vector index. */
  public checkConsistency(): ConsistencyReport {
    const indexed = this.vectors.promptIds();
    const catalogued = new Set(this.catalog.ids());
    const missingVectors = [...catalogued].filter((id) => !indexed.has(id));
    const orphanVectors = [...indexed].filter((id) => !catalogued.has(id)).sort();
    return { ok: missingVectors.length === 0 && orphanVectors.length === 0, missingVectors, orphanVectors };
  }

  /** @throws {ConsistencyError} If catalog and vector index disagree. */
  public verifyConsistency(): void {
    const report = this.checkConsistency();
    if (!report.ok) throw new ConsistencyError(report.missingVectors, report.orphanVectors);
  }

  public getStats(): LibraryStats {
    const categories: Record<Category, number> = {
      refactoring: 0,
      testing: 0,
      debugging: 0,
      implementation: 0,
      documentation: 0,
      "code-review": 0,
      general: 0,
    };
    const tags = new Set<string>();
    const sessions = new Set<string>();
    for (const { entry } of this.catalog.list()) {
      categories[entry.category]++;
      for (const t of entry.tags) tags.add(t);
      sessions.add(entry.session);
    }
    const stored = this.vectors.identity();
    const compatible =
      !stored ||
      (stored.provider === this.provider.identity && stored.dimension === this.provider.dimension);
    return {
      count: this.catalog.size(),
      categories,
      chunks: this.vectors.size(),
      tags: tags.size,
      sessions: sessions.size,
      provider: this.provider.identity,
      dimension: this.provider.dimension,
      index: { provider: stored?.provider ?? null, dimension: stored?.dimension ?? null, compatible },
    };
  }

  /** The catalog document, including the derived tag and session maps. */
  public catalogSnapshot(): CatalogDocument {
    return this.catalog.toJSON();
  }

  // -------------------------------------------------------------- internals

  /** Run `body` as one unit on the writer queue, rolling back on failure. */
  private async exclusive<T>(
    kind: UnitKind,
    subject: string,
    signal: AbortSignal | undefined,
    body: (run: IngestionRun) => Promise<T>,
  ): Promise<T> {
    return this.queue.add(
      async () => {
        const run = new IngestionRun(kind, subject, { listener: (e) => this.emitStage(e), signal });
        try {
          const result = await body(run);
          run.advance("DONE");
          this.status.recordCommit(this.catalog.size(), this.vectors.size());
          return result;
        } catch (err) {
          const stage = run.stage;
          await run.rollback(err);
          console.error(
            `[MCP] ${kind} ${subject} failed at ${stage}; rolled back:`,
            err instanceof Error ? err.message : err,
          );
          throw err;
        }
      },
      { throwOnTimeout: true },
    );
  }

  private emitStage(event: StageEvent): void {
    if (this.settings.VERBOSE) {
      console.error(`[MCP][verbose] ${event.unit} ${event.subject}: ${event.stage}`);
    }
    this.onStage?.(event);
  }

  private collectionIdentity(): CollectionIdentity {
    return { provider: this.provider.identity, dimension: this.provider.dimension };
  }

  private assertText(text: string): void {
    if (!text) throw new ValidationError("Prompt text must not be empty");
    if (text.length > this.settings.MAX_PROMPT_CHARS) {
      throw new ValidationError(
        `Prompt text has ${text.length} characters; the limit is ${this.settings.MAX_PROMPT_CHARS}`,
      );
    }
  }

  private assertK(k: number): number {
    if (!Number.isInteger(k) || k < 1 || k > MAX_K) {
      throw new ValidationError(`k must be an integer between 1 and ${MAX_K} (got ${k})`);
    }
    return k;
  }

  private toCategory(value: string): Category {
    if (!isCategory(value)) {
      throw new ValidationError(`Unknown category '${value}' (expected one of ${CATEGORIES.join(", ")})`);
    }
    return value;
  }

  private requireEntry(id: string): CatalogEntry {
    const entry = this.catalog.get(id);
    if (!entry) throw new PromptNotFoundError(id);
    return entry;
  }

  private chunksFor(doc: PromptDocument): Chunk[] {
    return [
      ...chunkText(doc.text, { size: this.settings.CHUNK_SIZE, overlap: this.settings.CHUNK_OVERLAP }, doc.id),
    ];
  }

  /** One provider call for all texts, under timeout and retry. */
  private async embed(texts: string[], signal?: AbortSignal): Promise<Float32Array[]> {
    if (texts.length === 0) return [];
    const vectors = await withRetry(() => this.provider.embed(texts), {
      retries: this.settings.EMBED_RETRIES,
      baseDelayMs: this.settings.EMBED_RETRY_BASE_MS,
      timeoutMs: this.settings.EMBED_TIMEOUT_MS,
      label: `Embedding with ${this.provider.identity}`,
      signal,
    });
    assertEmbeddings(this.provider, vectors, texts.length);
    return vectors;
  }

  private async embedPrepared(prepared: PreparedPrompt[], signal?: AbortSignal): Promise<IndexedPrompt[]> {
    const vectors = await this.embed(
      prepared.flatMap((p) => p.chunks.map((c) => c.text)),
      signal,
    );
    const indexedAt = new Date().toISOString();
    let offset = 0;
    return prepared.map(({ doc, filePath, chunks }) => {
      const records = chunks.map((c, i) => ({
        id: chunkId(doc.id, c.index),
        vector: vectors[offset + i],
        payload: {
          promptId: doc.id,
          chunkIndex: c.index,
          start: c.start,
          end: c.end,
          category: doc.category,
          text: c.text,
        },
      }));
      offset += chunks.length;
      const entry: CatalogEntry = {
        category: doc.category,
        title: doc.title,
        tags: doc.tags,
        filePath,
        chunkCount: chunks.length,
        session: doc.session,
        origin: doc.origin,
        createdAt: doc.createdAt,
        indexedAt,
      };
      return { id: doc.id, entry, records };
    });
  }

  /** CHUNKED → EMBEDDED → INDEXED for documents already written to disk. */
  private async indexPrepared(
    run: IngestionRun,
    persisted: PersistedPrompt[],
    remove: readonly string[],
    signal?: AbortSignal,
  ): Promise<void> {
    const chunked = persisted.map((p) => ({ ...p, chunks: this.chunksFor(p.doc) }));
    run.advance("CHUNKED");
    const indexed = await this.embedPrepared(chunked, signal);
    run.advance("EMBEDDED");
    await this.commit(run, indexed, remove);
    run.advance("INDEXED");
  }

  /**
   * Apply catalog and vector changes, then persist both. Inserts land in the
   * vector index before the catalog; removals leave the catalog first.
   */
  private async commit(run: IngestionRun, put: IndexedPrompt[], remove: readonly string[]): Promise<void> {
    const identity = this.collectionIdentity();
    const before = this.vectors.identity();
    const touched = [...new Set([...put.map((p) => p.id), ...remove])];
    const snapshot = touched.map((id) => ({ id, entry: this.catalog.get(id), records: this.recordsFor(id) }));
    run.onRollback("persist restored catalog and vectors", () => this.persistStores());
    run.onRollback("restore catalog and vectors", () => {
      for (const { id, entry, records } of snapshot) {
        for (const vid of this.vectors.idsForPrompt(id)) this.vectors.delete(vid);
        if (before) for (const r of records) this.vectors.upsert(r.id, r.vector, r.payload, before);
        if (entry) this.catalog.put(id, entry);
        else this.catalog.remove(id);
      }
    });

    for (const p of put) {
      const keep = new Set(p.records.map((r) => r.id));
      for (const r of p.records) this.vectors.upsert(r.id, r.vector, r.payload, identity);
      for (const vid of this.vectors.idsForPrompt(p.id)) if (!keep.has(vid)) this.vectors.delete(vid);
      this.catalog.put(p.id, p.entry);
    }
    for (const id of remove) {
      this.catalog.remove(id);
      for (const vid of this.vectors.idsForPrompt(id)) this.vectors.delete(vid);
    }
    await this.persistStores();
  }

  private async persistStores(): Promise<void> {
    await this.vectors.flush();
    await this.catalog.save();
  }

  /** Write a prompt file, registering how to restore what was there before. */
  private async persistDocument(run: IngestionRun, doc: PromptDocument): Promise<PersistedPrompt> {
    const filePath = this.store.relativePath(doc.category, doc.id);
    const previous = await this.store.readRaw(filePath);
    run.onRollback(`restore ${filePath}`, () =>
      previous === null ? this.store.remove(filePath) : this.store.writeRaw(filePath, previous),
    );
    await this.store.write(filePath, doc);
    return { doc, filePath };
  }

  private async removeDocument(run: IngestionRun, filePath: string): Promise<void> {
    const previous = await this.store.readRaw(filePath);
    if (previous === null) return;
    run.onRollback(`restore ${filePath}`, () => this.store.writeRaw(filePath, previous));
    await this.store.remove(filePath);
  }

  private async readForRebuild(filePath: string): Promise<PromptDocument | null> {
    try {
      return await this.store.read(filePath);
    } catch (err) {
      if (!(err instanceof StorageError)) throw err;
      console.error(`[MCP] Rebuild: skipping ${filePath}: ${err.message}`);
      return null;
    }
  }

  private recordsFor(id: string): VectorRecord[] {
    return this.vectors.idsForPrompt(id).flatMap((vid) => this.vectors.get(vid) ?? []);
  }

  private allRecords(): VectorRecord[] {
    return [...this.vectors.promptIds()].flatMap((id) => this.recordsFor(id));
  }

  private rank(vector: Float32Array, k: number, category?: Category, exclude?: string): SearchHit[] {
    const matches = this.vectors.query(
      vector,
      k * this.settings.SEARCH_FANOUT,
      (p) => (category === undefined || p.category === category) && p.promptId !== exclude,
    );
    const hits: SearchHit[] = [];
    const seen = new Set<string>();
    for (const m of matches) {
      const id = m.payload.promptId;
      if (seen.has(id)) continue;
      seen.add(id);
      const entry = this.catalog.get(id);
      if (!entry) continue;
      hits.push({ id, score: m.score, entry, snippet: m.payload.text });
      if (hits.length === k) break;
    }
    return hits;
  }
}
