import { randomUUID } from "node:crypto";
import type { FastifyInstance, FastifyRequest } from "fastify";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { registerTools, SERVER_VERSION } from "./tools/index.js";

/** Active MCP sessions keyed by session ID */
const sessions = new Map<string, StreamableHTTPServerTransport>();

export function createMcpServer(): McpServer {
  const mcp = new McpServer({
    name: "wp-rank",
    version: SERVER_VERSION,
  });

  registerTools(mcp);
  return mcp;
}

function sessionIdOf(request: FastifyRequest): string | undefined {
  const header = request.headers["mcp-session-id"];
  return typeof header === "string" ? header : undefined;
}

function transportFor(request: FastifyRequest): StreamableHTTPServerTransport | undefined {
  const sessionId = sessionIdOf(request);
  return sessionId === undefined ? undefined : sessions.get(sessionId);
}

/**
 * Register MCP Streamable HTTP routes on the Fastify instance.
 * Handles POST (requests), GET (SSE stream), DELETE (session cleanup).
 */
export function registerMcpRoutes(app: FastifyInstance) {
  // ─── POST /mcp — Initialize or send requests ────────────
  app.post("/mcp", async (request, reply) => {
    const existing = transportFor(request);

    // Existing session — forward request
    if (existing) {
      await existing.handleRequest(request.raw, reply.raw, request.body);
      return reply.hijack();
    }

    // New session — create transport + server
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
    });

    transport.onclose = () => {
      if (transport.sessionId) {
        sessions.delete(transport.sessionId);
      }
    };

    const server = createMcpServer();
    await server.connect(transport);

    await transport.handleRequest(request.raw, reply.raw, request.body);

    // Store session AFTER handleRequest — sessionId is assigned during initialize
    if (transport.sessionId) {
      sessions.set(transport.sessionId, transport);
      request.log.info({ sessionId: transport.sessionId }, "mcp session opened");
    }
    return reply.hijack();
  });

  // ─── GET /mcp — SSE stream for server-initiated messages ─
  app.get("/mcp", async (request, reply) => {
    const transport = transportFor(request);
    if (!transport) {
      return reply.status(400).send({ error: "Invalid or missing session ID" });
    }

    await transport.handleRequest(request.raw, reply.raw, request.body);
    return reply.hijack();
  });

  // ─── DELETE /mcp — Terminate session ─────────────────────
  app.delete("/mcp", async (request, reply) => {
    const sessionId = sessionIdOf(request);
    const transport = transportFor(request);

    if (sessionId !== undefined && transport) {
      await transport.close();
      sessions.delete(sessionId);
      request.log.info({ sessionId }, "mcp session closed");
    }

    return reply.status(200).send({ ok: true });
  });
}
