/**
 * Application entry point.
 *
 * 1. Load configuration (.env + environment) into an immutable Config.
 * 2. Initialize the embedding provider eagerly so the first tool call is fast
 *    and a mis-configured backend fails at start-up.
 * 3. Open the library (catalog, vector index, prompt files).
 * 4. Check catalog/vector consistency; rebuild on drift.
 * 5. Ingest pending session files (INGEST_ON_START).
 * 6. Serve MCP over stdio (default) or streamable HTTP (MCP_TRANSPORT=http),
 *    where GET /health reports readiness.
 *
 * See .env.example for every variable.
 */
import path from "node:path";
import { getConfig } from "./config";
import { createEmbeddingProvider } from "./embeddings";
import { PromptLibrary } from "./library";
import { createServerFactory } from "./server";
import { SessionSource, ingestPending } from "./session-source";
import { statusManager } from "./status";
import { startHttpTransport } from "./transport/http";
import { startStdioTransport } from "./transport/stdio";

const config = getConfig();

const provider = createEmbeddingProvider(config.PROVIDER);
await provider.init();
console.error(`[MCP] Embedding provider ready: ${provider.identity} (${provider.dimension}-d)`);

const library = await PromptLibrary.open(config, provider);
const sessions = await SessionSource.open(
  config.SESSIONS_DIR,
  config.SESSION_GLOB,
  path.join(config.PROMPTS_DIR, ".sessions.json"),
);

// A provider switch also shows up here: the stats report the stored index as
// incompatible, and only a rebuild can migrate it.
const drift = library.checkConsistency();
const { index } = library.getStats();
if (!drift.ok || !index.compatible) {
  console.error(
    `[MCP] Index needs a rebuild (missing vectors: ${drift.missingVectors.length}, orphan vectors: ${drift.orphanVectors.length}, compatible: ${index.compatible}).`,
  );
  const report = await library.rebuildIndex();
  console.error(
    `[MCP] Rebuilt index: ${report.prompts} prompts, ${report.chunks} chunks (adopted ${report.adopted}, dropped ${report.dropped}).`,
  );
}

if (config.INGEST_ON_START) {
  const report = await ingestPending(library, sessions);
  if (report.files > 0 || report.failed.length > 0) {
    console.error(
      `[MCP] Ingested ${report.files} session file(s), ${report.prompts} prompt(s); ${report.failed.length} failed.`,
    );
  }
}

statusManager.markReady();
const createServer = createServerFactory({ library, sessions });

if (config.MCP_TRANSPORT === "http") {
  statusManager.markTransport("http");
  await startHttpTransport(createServer, config);
} else {
  statusManager.markTransport("stdio");
  await startStdioTransport(createServer);
}
