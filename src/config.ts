import dotenv from "dotenv";
import fsSync from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
// Import version directly from package.json (requires tsconfig "resolveJsonModule": true)
import pkg from "../package.json" with { type: "json" };
import type { ProviderSettings } from "./embeddings/provider";
import { ValidationError } from "./errors";

/** Application version sourced from package.json. */
export const APP_VERSION: string = pkg.version;

export type TransportMode = "stdio" | "http";

/**
 * Immutable runtime configuration, built once at start-up and passed to the
 * library explicitly.
 */
export interface Config {
  readonly PROMPTS_DIR: string;
  readonly SESSIONS_DIR: string;
  readonly SESSION_GLOB: string;
  readonly VECTOR_DB_DIR: string;
  readonly PROVIDER: Readonly<ProviderSettings>;
  readonly CHUNK_SIZE: number;
  readonly CHUNK_OVERLAP: number;
  readonly MAX_PROMPT_CHARS: number;
  readonly SEARCH_FANOUT: number;
  readonly EMBED_TIMEOUT_MS: number;
  readonly EMBED_RETRIES: number;
  readonly EMBED_RETRY_BASE_MS: number;
  readonly INGEST_ON_START: boolean;
  readonly VERBOSE: boolean;
  readonly MCP_TRANSPORT: TransportMode;
  readonly MCP_PORT: number;
  readonly HOST: string;
  /** Explicit host[:port] allow-list for HTTP mode; undefined means local-only defaults. */
  readonly ALLOWED_HOSTS: readonly string[] | undefined;
  readonly ENABLE_DNS_REBINDING_PROTECTION: boolean;
}

type Env = Readonly<Record<string, string | undefined>>;

/** Tolerant truthy parsing (supports several common forms). */
function readFlag(raw: string | undefined, fallback: boolean): boolean {
  const v = (raw ?? "").trim().toLowerCase();
  if (!v) return fallback;
  return v === "1" || v === "true" || v === "yes" || v === "on";
}

/** Integer in [min, max]; anything unparsable falls back, out-of-range values are clamped. */
function readInt(raw: string | undefined, fallback: number, min: number, max: number): number {
  const s = raw?.trim();
  if (!s) return fallback;
  const n = Number(s);
  if (!Number.isFinite(n)) return fallback;
  return Math.min(max, Math.max(min, Math.floor(n)));
}

function readList(raw: string | undefined): string[] | undefined {
  const items = raw
    ?.split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  return items?.length ? items : undefined;
}

function resolvePath(raw: string | undefined, fallback: string, base: string): string {
  const v = raw?.trim();
  return v ? path.resolve(base, v) : fallback;
}

function readProvider(env: Env): ProviderSettings {
  const kind = (env.EMBEDDING_PROVIDER ?? "transformers").trim().toLowerCase();
  const timeoutMs = readInt(env.EMBED_TIMEOUT_MS, 30_000, 100, 600_000);
  if (["transformers", "sentence-transformer", "local", "default"].includes(kind)) {
    return {
      kind: "transformers",
      model: env.EMBEDDING_MODEL?.trim() || "Xenova/all-MiniLM-L6-v2",
      dimension: readInt(env.EMBEDDING_DIMENSION, 384, 1, 65_536),
      cacheDir: env.TRANSFORMERS_CACHE?.trim() || undefined,
    };
  }
  if (["lmstudio", "lm-studio", "lm_studio"].includes(kind)) {
    return {
      kind: "lmstudio",
      url: env.LMSTUDIO_URL?.trim() || "http://localhost:1234",
      model: env.LMSTUDIO_MODEL?.trim() || "nomic-embed-text",
      dimension: readInt(env.LMSTUDIO_DIMENSION, 768, 1, 65_536),
      batchSize: readInt(env.LMSTUDIO_BATCH_SIZE, 10, 1, 2048),
      timeoutMs,
    };
  }
  throw new ValidationError(
    `Unknown EMBEDDING_PROVIDER '${kind}' (expected 'transformers' or 'lmstudio')`,
  );
}

/**
 * Build a {@link Config} from an environment map. Pure: no dotenv loading and
 * no filesystem access, so tests can pass their own map.
 *
 * @param env  Variables to read (defaults to process.env).
 * @param cwd  Base for relative paths.
 * @throws {ValidationError} On an unknown provider or transport.
 */
export function parseConfig(env: Env = process.env, cwd: string = process.cwd()): Config {
  const PROMPTS_DIR = resolvePath(env.PROMPTS_DIR, path.resolve(cwd, "prompts"), cwd);
  const SESSIONS_DIR = resolvePath(env.SESSIONS_DIR, path.resolve(cwd, "sessions"), cwd);
  const VECTOR_DB_DIR = resolvePath(env.VECTOR_DB_DIR, path.join(PROMPTS_DIR, ".vectordb"), cwd);

  // Chunk size trades recall (too large) against precision (too small).
  const CHUNK_SIZE = readInt(env.CHUNK_SIZE, 500, 1, 8000);
  let CHUNK_OVERLAP = readInt(env.CHUNK_OVERLAP, 100, 0, 4000);
  if (CHUNK_OVERLAP >= CHUNK_SIZE) {
    const fallback = Math.max(0, Math.floor(CHUNK_SIZE * 0.15));
    console.error(
      `[MCP] CHUNK_OVERLAP (=${CHUNK_OVERLAP}) >= CHUNK_SIZE (=${CHUNK_SIZE}). Using fallback overlap ${fallback}.`,
    );
    CHUNK_OVERLAP = fallback;
  }

  const transport = (env.MCP_TRANSPORT ?? "").trim().toLowerCase();
  let MCP_TRANSPORT: TransportMode;
  if (transport === "" || transport === "stdio") MCP_TRANSPORT = "stdio";
  else if (transport === "http" || transport === "streamable-http") MCP_TRANSPORT = "http";
  else throw new ValidationError(`Unknown MCP_TRANSPORT '${transport}' (expected 'stdio' or 'http')`);

  const PROVIDER = Object.freeze(readProvider(env));
  const ALLOWED_HOSTS = readList(env.ALLOWED_HOSTS);

  return Object.freeze({
    PROMPTS_DIR,
    SESSIONS_DIR,
    SESSION_GLOB: env.SESSION_GLOB?.trim() || "copilot-session-*.md",
    VECTOR_DB_DIR,
    PROVIDER,
    CHUNK_SIZE,
    CHUNK_OVERLAP,
    MAX_PROMPT_CHARS: readInt(env.MAX_PROMPT_CHARS, 20_000, 1, 1_000_000),
    SEARCH_FANOUT: readInt(env.SEARCH_FANOUT, 3, 1, 20),
    EMBED_TIMEOUT_MS: readInt(env.EMBED_TIMEOUT_MS, 30_000, 100, 600_000),
    EMBED_RETRIES: readInt(env.EMBED_RETRIES, 3, 0, 10),
    EMBED_RETRY_BASE_MS: readInt(env.EMBED_RETRY_BASE_MS, 250, 0, 60_000),
    INGEST_ON_START: readFlag(env.INGEST_ON_START, true),
    VERBOSE: readFlag(env.VERBOSE, false),
    MCP_TRANSPORT,
    MCP_PORT: readInt(env.MCP_PORT, 3000, 1, 65_535),
    HOST: env.HOST?.trim() || "127.0.0.1",
    ALLOWED_HOSTS: ALLOWED_HOSTS ? Object.freeze(ALLOWED_HOSTS) : undefined,
    ENABLE_DNS_REBINDING_PROTECTION: readFlag(env.ENABLE_DNS_REBINDING_PROTECTION, true),
  });
}

/**
 * Load `.env` and parse the process environment. When running from the
 * project checkout the project-root `.env` wins over one in the working
 * directory.
 */
export function getConfig(): Config {
  const rootEnv = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../.env");
  if (fsSync.existsSync(rootEnv)) dotenv.config({ path: rootEnv });
  else dotenv.config();
  return parseConfig(process.env);
}
