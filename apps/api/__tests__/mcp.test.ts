import { afterEach, describe, expect, it } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { createMcpServer } from "../src/mcp/router.js";
import { handleRankTool } from "../src/mcp/tools/rank.js";

const input = {
  alternatives: [
    { label: "A", scores: [80, 70] },
    { label: "B", scores: [60, 90] },
  ],
  criteria: [
    { weight: 0.5, kind: "benefit" as const },
    { weight: 0.5, kind: "cost" as const },
  ],
};

function firstText(result: unknown): string {
  const parsed = CallToolResultSchema.parse(result);
  const first = parsed.content[0];
  if (first?.type !== "text") throw new Error("expected text content");
  return first.text;
}

describe("handleRankTool", () => {
  it("returns the ranking as JSON text", () => {
    const result = handleRankTool(input);
    expect(result.isError).toBeUndefined();
    const payload: unknown = JSON.parse(firstText(result));
    expect(payload).toMatchObject({
      rankings: [{ label: "A", rank: 1 }, { label: "B", rank: 2 }],
      weights: { renormalized: false },
      exponents: [0.5, -0.5],
    });
  });

  it("sends the same payload as text and structured content", () => {
    const result = handleRankTool(input);
    expect(JSON.parse(firstText(result))).toEqual(result.structuredContent);
  });

  it("reports engine errors as tool errors", () => {
    const result = handleRankTool({ ...input, criteria: input.criteria.map((c) => ({ ...c, weight: 0 })) });
    expect(result.isError).toBe(true);
    expect(JSON.parse(firstText(result))).toMatchObject({ error: "ZERO_WEIGHT_SUM" });
  });
});

describe("MCP server", () => {
  let client: Client | undefined;

  afterEach(async () => {
    await client?.close();
    client = undefined;
  });

  async function connect(): Promise<Client> {
    const server = createMcpServer();
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    const c = new Client({ name: "wp-rank-test", version: "0.0.0" });
    await c.connect(clientTransport);
    client = c;
    return c;
  }

  it("lists the ranking tools", async () => {
    const c = await connect();
    const { tools } = await c.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual(["wp_ping", "wp_rank"]);
  });

  it("ranks through wp_rank", async () => {
    const c = await connect();
    const result = await c.callTool({ name: "wp_rank", arguments: input });
    expect(JSON.parse(firstText(result))).toMatchObject({
      rankings: [{ label: "A" }, { label: "B" }],
    });
  });
});
