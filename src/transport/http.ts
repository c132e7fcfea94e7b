/**
 * Streamable HTTP transport.
 *
 * One `StreamableHTTPServerTransport` + `Server` pair per MCP session:
 *  - POST /mcp without `mcp-session-id` and with an `initialize` body opens a session;
 *    the generated id comes back in the response headers.
 *  - Later POST, GET (stream) and DELETE (teardown) requests carry that id.
 *  - A closed transport is evicted from the session map.
 *  - GET /health answers with the status snapshot: roots, ripgrep availability and the
 *    search / chunk / index / cache counters.
 *
 * Environment variables:
 *  MCP_PORT: Port to bind (default 3000)
 *  HOST: Interface to bind (default 127.0.0.1)
 *  ALLOWED_HOSTS: Comma-separated host[:port] whitelist; defaults to local-only hosts.
 *  ENABLE_DNS_REBINDING_PROTECTION: Set to "false" to disable (not recommended).
 */
import express from "express";
import { randomUUID } from "node:crypto";
import { type Server, StreamableHTTPServerTransport, isInitializeRequest } from "../mcp-sdk";
import { statusManager } from "../status";

type Sessions = Map<string, StreamableHTTPServerTransport>;

function sessionIdOf(req: express.Request): string | undefined {
  const raw = req.headers["mcp-session-id"];
  return typeof raw === "string" && raw.length > 0 ? raw : undefined;
}

function rpcError(res: express.Response, status: number, code: number, message: string) {
  if (res.headersSent) return;
  res.status(status).json({ jsonrpc: "2.0", error: { code, message }, id: null });
}

function allowedHosts(host: string, port: number): string[] {
  const fromEnv = process.env.ALLOWED_HOSTS?.split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  if (fromEnv && fromEnv.length > 0) return fromEnv;
  const local = new Set(["127.0.0.1", "localhost", host]);
  return [...local].flatMap((h) => [h, `${h}:${port}`]);
}

/** New session: transport registered under its id once the handshake assigns one. */
async function openSession(
  sessions: Sessions,
  createServer: () => Server,
  hosts: string[],
): Promise<StreamableHTTPServerTransport> {
  const transport: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
    sessionIdGenerator: () => randomUUID(),
    onsessioninitialized: (sid: string) => {
      sessions.set(sid, transport);
      console.error(`[MCP] Session ${sid} opened (${sessions.size} active)`);
    },
    enableDnsRebindingProtection:
      (process.env.ENABLE_DNS_REBINDING_PROTECTION ?? "true") !== "false",
    allowedHosts: hosts,
  });

  const server = createServer();
  transport.onclose = () => {
    // server.close() closes the transport again; detach first so this runs once.
    transport.onclose = undefined;
    if (transport.sessionId) sessions.delete(transport.sessionId);
    server.close().catch((e: unknown) => {
      console.error("[MCP] Error closing session server:", e);
    });
  };
  await server.connect(transport);
  return transport;
}

/**
 * Start the Express listener and route MCP traffic to per-session transports.
 *
 * @param createServer Factory producing a new, unconnected MCP `Server` for each session.
 * @returns Resolves once the HTTP listener is bound.
 */
export async function startHttpTransport(createServer: () => Server) {
  const port = Number(process.env.MCP_PORT ?? 3000);
  const host = (process.env.HOST ?? "127.0.0.1").trim();
  const hosts = allowedHosts(host, port);
  const sessions: Sessions = new Map();

  const app = express();
  app.use(express.json({ limit: "2mb" }));

  app.post("/mcp", async (req: express.Request, res: express.Response) => {
    try {
      const sessionId = sessionIdOf(req);
      let transport = sessionId ? sessions.get(sessionId) : undefined;
      if (!transport && !sessionId && isInitializeRequest(req.body)) {
        transport = await openSession(sessions, createServer, hosts);
      }
      if (!transport) {
        rpcError(res, 400, -32000, "Bad Request: No valid session ID provided");
        return;
      }
      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      console.error("[MCP] HTTP POST error:", err);
      rpcError(res, 500, -32603, "Internal server error");
    }
  });

  // Streaming (GET) and teardown (DELETE) only make sense for a live session.
  const forSession = async (req: express.Request, res: express.Response) => {
    const sessionId = sessionIdOf(req);
    const transport = sessionId ? sessions.get(sessionId) : undefined;
    if (!transport) {
      res.status(400).send("Invalid or missing session ID");
      return;
    }
    try {
      await transport.handleRequest(req, res);
    } catch (err) {
      console.error(`[MCP] HTTP ${req.method} error:`, err);
      rpcError(res, 500, -32603, "Internal server error");
    }
  };
  app.get("/mcp", forSession);
  app.delete("/mcp", forSession);

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
