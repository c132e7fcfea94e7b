import { CallToolRequestSchema, ListToolsRequestSchema, Server } from "./mcp-sdk";
import { APP_NAME, APP_VERSION } from "./config";
import { type ToolServices, callTool, toolDefinitions } from "./tools";

/**
 * Factory for a fresh MCP Server with the search tools registered.
 *
 * A new instance is created per transport session (HTTP mode may serve several
 * clients). The services, and with them the worker pool settings, the index store and
 * the result cache, are shared across sessions.
 */
export function createServerFactory(services: ToolServices): () => Server {
  const tools = toolDefinitions(services.sandbox.getRoots());

  return () => {
    const server = new Server(
      { name: APP_NAME, version: APP_VERSION },
      { capabilities: { tools: {} } },
    );

    server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools }));

    server.setRequestHandler(CallToolRequestSchema, async (req) =>
      callTool(services, req.params.name, req.params.arguments),
    );

    return server;
  };
}
