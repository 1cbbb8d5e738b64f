import { rankCriteria, type Criterion, type RankingResult } from "@wprank/engine-core";
import {
  parseRankingForm,
  toCriteriaSummary,
  toResultTable,
  type CriterionSummary,
  type ResultTable,
} from "@wprank/shared";
import type { RankRequest } from "../schemas.js";

export interface RankingOutcome extends RankingResult {
  criteria: CriterionSummary[];
  table: ResultTable;
}

/**
 * Run one ranking from either request form.
 * Input errors from the parser or the engine propagate to the caller.
 */
export function runRanking(request: RankRequest): RankingOutcome {
  let labels: string[];
  let matrix: number[][];
  let criteria: Criterion[];

  if ("table" in request) {
    ({ labels, matrix, criteria } = parseRankingForm(request));
  } else {
    labels = request.alternatives.map((a) => a.label);
    matrix = request.alternatives.map((a) => a.scores);
    criteria = request.criteria;
  }

  const result = rankCriteria(matrix, criteria, labels);
  return {
    ...result,
    criteria: toCriteriaSummary(criteria),
    table: toResultTable(result),
  };
}
