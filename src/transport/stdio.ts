import { Server, StdioServerTransport } from "../mcp-sdk";

/**
 * Serve MCP over stdin/stdout. stdout then belongs to the protocol, so all
 * diagnostics go to stderr.
 *
 * @param createServer Factory returning a new, unconnected MCP Server instance.
 * @returns The connected server, for shutdown.
 */
export async function startStdioTransport(createServer: () => Server): Promise<Server> {
  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  return server;
}
