import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { runRanking } from "../../services/ranking.service.js";
import type { StructuredRankRequest } from "../../schemas.js";
import { mapError } from "../../errors.js";

/**
 * wp_rank handler. Caller mistakes come back as an isError result so the
 * model can correct its call; anything unexpected is rethrown.
 */
export function handleRankTool(input: StructuredRankRequest): CallToolResult {
  try {
    const outcome = runRanking(input);
    const payload = {
      rankings: outcome.rankings,
      weights: outcome.weights,
      exponents: outcome.exponents,
      totalRawScore: outcome.totalRawScore,
    };
    return {
      structuredContent: payload,
      content: [
        {
          type: "text" as const,
          text: JSON.stringify(payload),
        },
      ],
    };
  } catch (error) {
    const mapped = mapError(error);
    if (!mapped) throw error;
    return {
      isError: true,
      content: [
        {
          type: "text" as const,
          text: JSON.stringify({ error: mapped.code, message: mapped.message, details: mapped.details }),
        },
      ],
    };
  }
}
