import type { FastifyInstance } from "fastify";
import { createApiResponse } from "@wprank/shared";
import { rankRequestSchema } from "../schemas.js";
import { runRanking } from "../services/ranking.service.js";

export function registerRankRoutes(app: FastifyInstance) {
  // ─── POST /rank — Weighted Product ranking ───────────────
  // Accepts the structured form or the table + comma-separated text form.
  app.post("/rank", async (request) => {
    const body = rankRequestSchema.parse(request.body);
    const outcome = runRanking(body);

    request.log.info(
      {
        alternatives: outcome.rankings.length,
        criteria: outcome.exponents.length,
        renormalized: outcome.weights.renormalized,
      },
      "ranking computed",
    );
    if (outcome.weights.renormalized) {
      request.log.debug({ sum: outcome.weights.sum }, "weights renormalized");
    }

    return createApiResponse(outcome);
  });
}
