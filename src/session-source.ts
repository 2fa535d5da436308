import { createHash } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import { z } from "zod";
import { StorageError, hasErrorCode } from "./errors";
import { readFileIfExists, writeFileAtomic } from "./persistence";
import { parseSessionHeader } from "./session-parser";
import type { PromptLibrary } from "./library";

/**
 * Session files waiting to be ingested. A file counts as processed once its
 * current content has been ingested; editing it makes it pending again and
 * the re-ingest updates the library by prompt id.
 */

export interface SessionFile {
  /** Path relative to the sessions directory. */
  name: string;
  absPath: string;
  text: string;
  /** SHA-256 of the content. */
  digest: string;
}

export interface PendingReport {
  files: number;
  prompts: number;
  failed: Array<{ file: string; error: string }>;
}

const stateSchema = z.object({
  version: z.literal(1),
  processed: z.record(z.string(), z.string()),
});

function digestOf(text: string): string {
  return createHash("sha256").update(text).digest("hex");
}

export class SessionSource {
  private readonly dir: string;
  private readonly pattern: string;
  private readonly stateFile: string;
  private readonly processed: Map<string, string>;

  private constructor(dir: string, pattern: string, stateFile: string, processed: Map<string, string>) {
    this.dir = dir;
    this.pattern = pattern;
    this.stateFile = stateFile;
    this.processed = processed;
  }

  /**
   * @param dir        Directory holding exported session transcripts.
   * @param pattern    fast-glob pattern relative to `dir`.
   * @param stateFile  Where processed digests are remembered.
   */
  public static async open(dir: string, pattern: string, stateFile: string): Promise<SessionSource> {
    const raw = await readFileIfExists(stateFile);
    const processed = new Map<string, string>();
    if (raw !== null) {
      let json: unknown;
      try {
        json = JSON.parse(raw);
      } catch (e) {
        throw new StorageError(stateFile, "Session state is not valid JSON", { cause: e });
      }
      const parsed = stateSchema.safeParse(json);
      if (!parsed.success) throw new StorageError(stateFile, "Session state is malformed");
      for (const [name, digest] of Object.entries(parsed.data.processed)) processed.set(name, digest);
    }
    return new SessionSource(path.resolve(dir), pattern, stateFile, processed);
  }

  /** Session files that are new or changed since they were last processed, by name. */
  public async pending(): Promise<SessionFile[]> {
    let names: string[];
    try {
      names = await fg(this.pattern, { cwd: this.dir, onlyFiles: true, dot: false });
    } catch (e) {
      if (hasErrorCode(e, "ENOENT")) return [];
      throw new StorageError(this.dir, "Cannot list session files", { cause: e });
    }
    const out: SessionFile[] = [];
    for (const name of names.sort()) {
      const file = await this.read(path.join(this.dir, name));
      if (this.processed.get(name) === file.digest) continue;
      out.push({ ...file, name });
    }
    return out;
  }

  /** Read a session transcript from any path. */
  public async read(file: string): Promise<SessionFile> {
    const absPath = path.resolve(this.dir, file);
    let text: string;
    try {
      text = await fs.readFile(absPath, "utf8");
    } catch (e) {
      throw new StorageError(absPath, "Cannot read session file", { cause: e });
    }
    return { name: path.relative(this.dir, absPath), absPath, text, digest: digestOf(text) };
  }

  public async markProcessed(file: SessionFile): Promise<void> {
    this.processed.set(file.name, file.digest);
    const processed: Record<string, string> = {};
    for (const name of [...this.processed.keys()].sort()) processed[name] = this.processed.get(name) ?? "";
    await writeFileAtomic(this.stateFile, JSON.stringify({ version: 1, processed }, null, 2) + "\n");
  }
}

/**
 * Source identifier used when ingesting a session file: the transcript's
 * `Session ID`, or else its path without extension, relative to the sessions
 * directory (absolute for files outside it). Stable across edits, so an
 * edited transcript updates the prompts it produced before.
 */
export function fileSource(file: SessionFile): string {
  const sessionId = parseSessionHeader(file.text).sessionId;
  if (sessionId) return sessionId;
  const outside = file.name === ".." || file.name.startsWith(`..${path.sep}`) || path.isAbsolute(file.name);
  const ref = outside ? file.absPath : file.name;
  return ref.slice(0, ref.length - path.extname(ref).length).split(path.sep).join("/");
}

/**
 * Ingest every pending session file. A file that fails is reported and left
 * pending; the others still go through.
 */
export async function ingestPending(library: PromptLibrary, sessions: SessionSource): Promise<PendingReport> {
  const report: PendingReport = { files: 0, prompts: 0, failed: [] };
  for (const file of await sessions.pending()) {
    try {
      const ids = await library.ingestSession(file.text, { source: fileSource(file) });
      await sessions.markProcessed(file);
      report.files++;
      report.prompts += ids.length;
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      console.error(`[MCP] Failed to ingest session ${file.name}: ${message}`);
      report.failed.push({ file: file.name, error: message });
    }
  }
  return report;
}
