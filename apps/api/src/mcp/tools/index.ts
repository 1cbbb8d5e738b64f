import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { structuredRankShape } from "../../schemas.js";
import { handleRankTool } from "./rank.js";

export const SERVER_VERSION = "0.1.0";

/** Register all MCP tools with the server. */
export function registerTools(server: McpServer) {
  // ─── wp_ping ─────────────────────────────────────────────
  server.tool(
    "wp_ping",
    "Health check tool. Returns server status and timestamp.",
    {},
    async () => ({
      content: [
        {
          type: "text" as const,
          text: JSON.stringify({
            status: "ok",
            timestamp: new Date().toISOString(),
            version: SERVER_VERSION,
          }),
        },
      ],
    }),
  );

  // ─── wp_rank ─────────────────────────────────────────────
  server.tool(
    "wp_rank",
    "Rank alternatives with the Weighted Product method. Each alternative has one score per criterion (all > 0). Each criterion has a non-negative weight (normalized to sum 1) and a kind: 'benefit' (higher is better) or 'cost' (lower is better). Returns alternatives best first with raw score S and preference score V (V sums to 1).",
    structuredRankShape,
    async (input) => handleRankTool(input),
  );
}
