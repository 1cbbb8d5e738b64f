import Fastify from "fastify";
import cors from "@fastify/cors";
import type { ServerConfig } from "./config.js";
import { registerErrorHandler } from "./errors.js";
import { registerRankRoutes } from "./routes/rank.js";
import { registerMcpRoutes } from "./mcp/router.js";

const LOCALHOST_ORIGIN = /^http:\/\/localhost:\d+$/;

export async function createServer(config: ServerConfig) {
  const app = Fastify({
    logger: {
      level: config.logLevel,
    },
  });

  // ─── CORS ────────────────────────────────────────────────
  await app.register(cors, {
    origin: [...config.corsOrigins, LOCALHOST_ORIGIN],
    methods: ["GET", "POST", "DELETE", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization", "mcp-session-id"],
    credentials: true,
  });

  // ─── Errors ──────────────────────────────────────────────
  registerErrorHandler(app);

  // ─── Health Check ────────────────────────────────────────
  app.get("/health", async () => ({
    status: "ok",
    timestamp: new Date().toISOString(),
  }));

  // ─── Ranking ─────────────────────────────────────────────
  registerRankRoutes(app);

  // ─── MCP Routes ──────────────────────────────────────────
  registerMcpRoutes(app);

  return app;
}
