import type { Criterion } from "@wprank/engine-core";
import type { RankingForm } from "../types/table.js";
import { InputParseError } from "../errors.js";
import { buildCriteria, parseCriteriaTypes, parseWeights } from "./criteria.js";
import { parseTable } from "./table.js";

export interface ParsedRankingForm {
  labels: string[];
  matrix: number[][];
  criteria: Criterion[];
}

/**
 * Turn the text-form request (sheet rows plus comma-separated weights and
 * types) into typed engine inputs. Counts are checked against the table's
 * criterion columns.
 */
export function parseRankingForm(form: RankingForm): ParsedRankingForm {
  if (form.weights.trim() === "" || form.types.trim() === "") {
    throw new InputParseError("weights and criteria types must not be empty", {
      field: form.weights.trim() === "" ? "weights" : "types",
    });
  }

  const table = parseTable(form.table, { hasHeader: form.hasHeader });
  const criteria = buildCriteria(
    parseWeights(form.weights),
    parseCriteriaTypes(form.types),
    table.criteria,
  );

  return { labels: table.labels, matrix: table.matrix, criteria };
}
