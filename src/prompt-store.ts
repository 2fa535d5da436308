import path from "node:path";
import fg from "fast-glob";
import { z } from "zod";
import { CATEGORIES, PROMPT_ORIGINS, type Category, type PromptDocument } from "./types";
import { StorageError } from "./errors";
import { readFileIfExists, removeFile, writeFileAtomic } from "./persistence";

/**
 * Prompt files: the durable, human-readable projection of each prompt.
 *
 * Layout: `<root>/<category>/<id>.md`. A file is a `---` delimited header,
 * one `key: <JSON value>` per line (valid YAML front matter), followed by the
 * prompt body exactly as stored:
 *
 *   ---
 *   id: "3f2a9c0d1b7e4a55"
 *   title: "Write table-driven tests"
 *   category: "testing"
 *   tags: ["jest","test"]
 *   date: "2026-01-05T10:00:00.000Z"
 *   session: "manual"
 *   origin: "manual"
 *   ---
 *   Write table-driven tests for ...
 */

const headerSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  category: z.enum(CATEGORIES),
  tags: z.array(z.string()),
  date: z.string(),
  session: z.string(),
  // Files written by hand carry no origin; they are never removed by a re-ingest.
  origin: z.enum(PROMPT_ORIGINS).default("manual"),
  role: z.string().optional(),
  context: z.string().optional(),
  objective: z.string().optional(),
});

const FENCE = "---\n";
const CLOSING = "\n---\n";
/** Header block; line endings inside it may be CRLF when the file was edited by hand. */
const HEADER = /^---\r?\n([\s\S]*?)\r?\n---\r?\n/;

export function formatPromptFile(doc: PromptDocument): string {
  const header: Array<[string, unknown]> = [
    ["id", doc.id],
    ["title", doc.title],
    ["category", doc.category],
    ["tags", doc.tags],
    ["date", doc.createdAt],
    ["session", doc.session],
    ["origin", doc.origin],
    ["role", doc.sections.role],
    ["context", doc.sections.context],
    ["objective", doc.sections.objective],
  ];
  const lines = header
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => `${k}: ${JSON.stringify(v)}`);
  return `${FENCE}${lines.join("\n")}${CLOSING}${doc.text}`;
}

/**
 * Parse a prompt file.
 * @returns `null` when the content is not a well-formed prompt file.
 */
export function parsePromptFile(raw: string): PromptDocument | null {
  const match = HEADER.exec(raw);
  if (!match) return null;
  const fields: Record<string, unknown> = {};
  for (const line of match[1].split(/\r?\n/)) {
    if (!line.trim()) continue;
    const sep = line.indexOf(":");
    if (sep < 0) return null;
    try {
      fields[line.slice(0, sep).trim()] = JSON.parse(line.slice(sep + 1));
    } catch {
      return null; // not one of ours
    }
  }
  const header = headerSchema.safeParse(fields);
  if (!header.success) return null;
  const { id, title, category, tags, date, session, origin, role, context, objective } = header.data;
  const sections: PromptDocument["sections"] = {};
  if (role !== undefined) sections.role = role;
  if (context !== undefined) sections.context = context;
  if (objective !== undefined) sections.objective = objective;
  return {
    id,
    title,
    category,
    tags,
    createdAt: date,
    session,
    origin,
    sections,
    text: raw.slice(match[0].length),
  };
}

export class PromptStore {
  private readonly root: string;

  public constructor(root: string) {
    this.root = path.resolve(root);
  }

  public getRoot(): string {
    return this.root;
  }

  /** Relative path (forward slashes) of a prompt's file. */
  public relativePath(category: Category, id: string): string {
    return `${category}/${id}.md`;
  }

  /**
   * Resolve a relative path, refusing anything that escapes the prompts
   * directory (catalog paths are data and are not trusted).
   */
  public resolve(relPath: string): string {
    const abs = path.resolve(this.root, relPath);
    if (!abs.startsWith(this.root + path.sep)) {
      throw new StorageError(relPath, "Path outside prompts directory");
    }
    return abs;
  }

  public async write(relPath: string, doc: PromptDocument): Promise<void> {
    await writeFileAtomic(this.resolve(relPath), formatPromptFile(doc));
  }

  /**
   * @returns The parsed document, or `null` if the file does not exist.
   * @throws {StorageError} If it exists but cannot be read or parsed.
   */
  public async read(relPath: string): Promise<PromptDocument | null> {
    const raw = await this.readRaw(relPath);
    if (raw === null) return null;
    const doc = parsePromptFile(raw);
    if (!doc) throw new StorageError(relPath, "Malformed prompt file");
    return doc;
  }

  /** Raw file content (for rollback snapshots), or `null` if missing. */
  public async readRaw(relPath: string): Promise<string | null> {
    return readFileIfExists(this.resolve(relPath));
  }

  public async writeRaw(relPath: string, content: string): Promise<void> {
    await writeFileAtomic(this.resolve(relPath), content);
  }

  public async remove(relPath: string): Promise<void> {
    await removeFile(this.resolve(relPath));
  }

  /** All prompt files under the root (relative, sorted), skipping dot folders and READMEs. */
  public async list(): Promise<string[]> {
    const files = await fg("*/*.md", { cwd: this.root, dot: false, onlyFiles: true });
    return files.filter((f) => path.posix.basename(f).toLowerCase() !== "readme.md").sort();
  }
}
