import { type Server, StdioServerTransport } from "../mcp-sdk";

/**
 * Serve MCP over stdin/stdout. Stdout carries protocol frames only; every log line
 * goes to stderr.
 */
export async function startStdioTransport(createServer: () => Server) {
  const server = createServer();
  const transport = new StdioServerTransport();
  transport.onclose = () => {
    console.error("[MCP] stdio transport closed");
  };
  transport.onerror = (err: Error) => {
    console.error("[MCP] stdio transport error:", err.message);
  };
  await server.connect(transport);
  console.error("[MCP] Listening on stdio");
}
