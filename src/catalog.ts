import { z } from "zod";
import { CATEGORIES, PROMPT_ORIGINS, type Category, type CatalogEntry } from "./types";
import { StorageError } from "./errors";
import { readFileIfExists, writeFileAtomic } from "./persistence";

/**
 * The metadata catalog (`index.json`): the source of truth for what is
 * indexed. One entry per prompt plus derived `tags → ids` and
 * `sessions → ids` maps, kept for people browsing the file and for listing.
 */

const entrySchema = z.object({
  category: z.enum(CATEGORIES),
  title: z.string(),
  tags: z.array(z.string()),
  filePath: z.string().min(1),
  chunkCount: z.number().int().positive(),
  session: z.string(),
  origin: z.enum(PROMPT_ORIGINS),
  createdAt: z.string(),
  indexedAt: z.string(),
});

const catalogSchema = z.object({
  version: z.literal(1),
  updatedAt: z.string(),
  prompts: z.record(z.string(), entrySchema),
  tags: z.record(z.string(), z.array(z.string())).optional(),
  sessions: z.record(z.string(), z.array(z.string())).optional(),
});

export interface CatalogDocument {
  version: 1;
  updatedAt: string;
  prompts: Record<string, CatalogEntry>;
  tags: Record<string, string[]>;
  sessions: Record<string, string[]>;
}

export interface CatalogFilter {
  category?: Category;
  tag?: string;
  session?: string;
}

function sortedRecord<T>(m: Map<string, T>): Record<string, T> {
  const out: Record<string, T> = {};
  for (const k of [...m.keys()].sort()) {
    const v = m.get(k);
    if (v !== undefined) out[k] = v;
  }
  return out;
}

export class Catalog {
  private readonly file: string;
  private readonly entries = new Map<string, CatalogEntry>();

  private constructor(file: string) {
    this.file = file;
  }

  /**
   * Load the catalog at `file`; a missing file is an empty catalog.
   * @throws {StorageError} If the file exists but is not a valid catalog. The
   * catalog is the source of truth, so it is never silently discarded.
   */
  public static async open(file: string): Promise<Catalog> {
    const catalog = new Catalog(file);
    const raw = await readFileIfExists(file);
    if (raw === null) return catalog;
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (e) {
      throw new StorageError(file, "Catalog is not valid JSON", { cause: e });
    }
    const parsed = catalogSchema.safeParse(json);
    if (!parsed.success) {
      throw new StorageError(file, `Catalog is malformed: ${parsed.error.issues[0]?.message}`);
    }
    for (const [id, entry] of Object.entries(parsed.data.prompts)) catalog.entries.set(id, entry);
    return catalog;
  }

  public size(): number {
    return this.entries.size;
  }

  public has(id: string): boolean {
    return this.entries.has(id);
  }

  public get(id: string): CatalogEntry | undefined {
    return this.entries.get(id);
  }

  public ids(): string[] {
    return [...this.entries.keys()].sort();
  }

  /** Entries matching every given filter, sorted by id. */
  public list(filter: CatalogFilter = {}): Array<{ id: string; entry: CatalogEntry }> {
    const out: Array<{ id: string; entry: CatalogEntry }> = [];
    for (const id of this.ids()) {
      const entry = this.entries.get(id);
      if (!entry) continue;
      if (filter.category && entry.category !== filter.category) continue;
      if (filter.tag && !entry.tags.includes(filter.tag)) continue;
      if (filter.session !== undefined && entry.session !== filter.session) continue;
      out.push({ id, entry });
    }
    return out;
  }

  /** Ids of prompts ingested from a session. */
  public put(id: string, entry: CatalogEntry): void {
    this.entries.set(id, entry);
  }

  /** @returns The removed entry, if there was one. */
  public remove(id: string): CatalogEntry | undefined {
    const entry = this.entries.get(id);
    this.entries.delete(id);
    return entry;
  }

  /** Replace every entry at once (rebuilds). */
  public replaceAll(entries: Iterable<[string, CatalogEntry]>): void {
    this.entries.clear();
    for (const [id, entry] of entries) this.entries.set(id, entry);
  }

  public toJSON(): CatalogDocument {
    const tags = new Map<string, string[]>();
    const sessions = new Map<string, string[]>();
    const prompts = new Map<string, CatalogEntry>();
    for (const id of this.ids()) {
      const entry = this.entries.get(id);
      if (!entry) continue;
      prompts.set(id, entry);
      for (const t of entry.tags) tags.set(t, [...(tags.get(t) ?? []), id]);
      sessions.set(entry.session, [...(sessions.get(entry.session) ?? []), id]);
    }
    return {
      version: 1,
      updatedAt: new Date().toISOString(),
      prompts: sortedRecord(prompts),
      tags: sortedRecord(tags),
      sessions: sortedRecord(sessions),
    };
  }

  public async save(): Promise<void> {
    await writeFileAtomic(this.file, JSON.stringify(this.toJSON(), null, 2) + "\n");
  }
}
