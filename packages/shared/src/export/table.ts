import type { Criterion, RankingResult } from "@wprank/engine-core";
import { RESULT_COLUMNS } from "../constants.js";
import type { CriterionSummary, ResultRow } from "../types/table.js";

export interface ResultTable {
  columns: readonly string[];
  rows: ResultRow[];
}

/** Rank, Alternative, S, V, best first. */
export function toResultTable(result: RankingResult): ResultTable {
  return {
    columns: RESULT_COLUMNS,
    rows: result.rankings.map((r): ResultRow => [r.rank, r.label, r.rawScore, r.preferenceScore]),
  };
}

export function toCriteriaSummary(criteria: readonly Criterion[]): CriterionSummary[] {
  return criteria.map((c, j) => ({
    criterion: c.name ?? `C${j + 1}`,
    weight: c.weight,
    kind: c.kind,
  }));
}
