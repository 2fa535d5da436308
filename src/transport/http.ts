/**
 * Streamable HTTP transport.
 *
 * Session model:
 *  - A client begins by sending a JSON-RPC `initialize` request to POST /mcp
 *    WITHOUT an `mcp-session-id` header.
 *  - A new transport + MCP Server pair is created; the SDK generates the session
 *    id and returns it in the response headers.
 *  - Every later request of that session carries the same `mcp-session-id`.
 *  - When the transport closes, the session is evicted from the in-memory map.
 *
 * Endpoints:
 *  - POST /mcp    : JSON-RPC requests (initial + subsequent).
 *  - GET  /mcp    : streaming channel of an existing session.
 *  - DELETE /mcp  : session teardown.
 *  - GET  /health : status / readiness (from `statusManager`).
 *
 * DNS rebinding protection is on unless ENABLE_DNS_REBINDING_PROTECTION=false;
 * allowed hosts default to 127.0.0.1 / localhost and the bound host/port.
 *
 * Malformed or out-of-order session usage gets 400 (-32000), uncaught internal
 * errors 500 (-32603).
 */
import express from "express";
import { randomUUID } from "node:crypto";
import { Server, StreamableHTTPServerTransport, isInitializeRequest } from "../mcp-sdk";
import type { Config } from "../config";
import { statusManager } from "../status";

export type HttpSettings = Pick<
  Config,
  "MCP_PORT" | "HOST" | "ALLOWED_HOSTS" | "ENABLE_DNS_REBINDING_PROTECTION"
>;

function sessionHeader(req: express.Request): string | undefined {
  const value = req.headers["mcp-session-id"];
  return typeof value === "string" ? value : undefined;
}

/**
 * Bootstraps the Express HTTP server & per-session MCP transport layer.
 *
 * @param createServer Factory producing a new, unconnected MCP `Server` instance for each session.
 * @returns Resolves once the HTTP listener is bound and ready.
 */
export async function startHttpTransport(createServer: () => Server, settings: HttpSettings) {
  const app = express();
  app.use(express.json({ limit: "2mb" }));

  const { MCP_PORT: port, HOST: host } = settings;
  const allowedHosts = settings.ALLOWED_HOSTS
    ? [...settings.ALLOWED_HOSTS]
    : Array.from(
        new Set([
          "127.0.0.1",
          `127.0.0.1:${port}`,
          "localhost",
          `localhost:${port}`,
          host,
          `${host}:${port}`,
        ]),
      );

  /** Active session transports mapped by session id. */
  const transports: Record<string, StreamableHTTPServerTransport> = {};

  app.post("/mcp", async (req: express.Request, res: express.Response) => {
    try {
      const sessionId = sessionHeader(req);
      let transport: StreamableHTTPServerTransport | undefined = sessionId
        ? transports[sessionId]
        : undefined;

      // Session creation path: only when no header AND the body is a valid initialize request.
      if (!transport && !sessionId && isInitializeRequest(req.body)) {
        const created = new StreamableHTTPServerTransport({
          sessionIdGenerator: () => randomUUID(),
          onsessioninitialized: (sid: string) => {
            transports[sid] = created;
          },
          enableDnsRebindingProtection: settings.ENABLE_DNS_REBINDING_PROTECTION,
          allowedHosts,
        });

        const server = createServer();
        let closing = false;
        created.onclose = () => {
          if (closing) return;
          closing = true;
          if (created.sessionId) delete transports[created.sessionId];
          // server.close() closes the transport again, which would re-enter onclose.
          created.onclose = undefined;
          server.close().catch((e) => console.error("[MCP] Error closing session server:", e));
        };
        await server.connect(created);
        transport = created;
      }

      if (!transport) {
        res.status(400).json({
          jsonrpc: "2.0",
          error: { code: -32000, message: "Bad Request: No valid session ID provided" },
          id: null,
        });
        return;
      }

      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      console.error("[MCP] HTTP POST error:", err);
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: "2.0",
          error: { code: -32603, message: "Internal server error" },
          id: null,
        });
      }
    }
  });

  /** GET and DELETE /mcp are only valid for an existing session. */
  const handleSessionRequest = async (req: express.Request, res: express.Response) => {
    const sessionId = sessionHeader(req);
    const transport = sessionId ? transports[sessionId] : undefined;
    if (!transport) {
      res.status(400).send("Invalid or missing session ID");
      return;
    }
    await transport.handleRequest(req, res);
  };

  app.get("/mcp", handleSessionRequest);
  app.delete("/mcp", handleSessionRequest);

  app.get("/health", (_req, res) => {
    res.json(statusManager.getStatus());
  });

  await new Promise<void>((resolve) => {
    app.listen(port, host, () => {
      console.error(`[MCP] Streamable HTTP listening at http://${host}:${port}/mcp`);
      resolve();
    });
  });
}
