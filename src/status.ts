import { APP_VERSION } from "./config";

/**
 * Library counters, refreshed after every committed write.
 */
export interface LibraryCounters {
  /** Prompts in the catalog. */
  prompts: number;
  /** Chunk vectors in the index. */
  chunks: number;
  /** ISO timestamp of the last committed write, or null before the first. */
  lastCommitAt: string | null;
}

/**
 * Mutable in-memory snapshot of server lifecycle + library state.
 * Exposed read-only to external callers via `statusManager.getStatus()`.
 *
 * ready = true once the library is open, its consistency checked (and
 * repaired if needed) and pending sessions ingested.
 */
export interface ServerStatus {
  /** Package / server version (kept in sync with package.json). */
  version: string;
  /** Directory holding prompt files and the catalog. */
  promptsDir: string;
  /** Identity of the active embedding provider (may be empty pre-init). */
  provider: string;
  /** Active transport in use: 'stdio' | 'http' | 'unknown'. */
  transport: string;
  ready: boolean;
  /** ISO timestamp when the process (or StatusManager) started. */
  startedAt: string;
  library: LibraryCounters;
}

/**
 * Class wrapper around mutable server status state. Avoids ad-hoc mutation and
 * centralizes any future validation or side-effects.
 */
export class StatusManager {
  private readonly data: ServerStatus;

  public constructor(initial?: Partial<ServerStatus>) {
    this.data = {
      version: initial?.version ?? APP_VERSION,
      promptsDir: initial?.promptsDir ?? "",
      provider: initial?.provider ?? "",
      transport: initial?.transport ?? "unknown",
      ready: initial?.ready ?? false,
      startedAt: initial?.startedAt ?? new Date().toISOString(),
      library: initial?.library ?? { prompts: 0, chunks: 0, lastCommitAt: null },
    };
  }

  /** Record the concrete transport selected at runtime. */
  public markTransport(t: string) {
    this.data.transport = t;
  }

  public setPromptsDir(dir: string) {
    this.data.promptsDir = dir;
  }

  public setProvider(identity: string) {
    this.data.provider = identity;
  }

  /** Refresh counters after a committed write. */
  public recordCommit(prompts: number, chunks: number) {
    this.data.library = { prompts, chunks, lastCommitAt: new Date().toISOString() };
  }

  public markReady() {
    this.data.ready = true;
  }

  /** Access a live reference to current status (treat as read-only). */
  public getStatus(): Readonly<ServerStatus> {
    return this.data;
  }

  public toJSON() {
    return this.data;
  }
}

// Singleton instance used across modules (library, transports, health checks).
export const statusManager = new StatusManager();
