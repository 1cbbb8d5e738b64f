// ─── Shared Types ────────────────────────────────────────────
export type { ApiResponse, ApiError } from "./types/api.js";
export type {
  TableCell,
  TableRows,
  ParsedTable,
  RankingForm,
  ResultRow,
  CriterionSummary,
} from "./types/table.js";

// ─── Constants ───────────────────────────────────────────────
export { CRITERION_KINDS, RESULT_COLUMNS, LIST_SEPARATOR, DECIMAL_PATTERN } from "./constants.js";

// ─── Errors ──────────────────────────────────────────────────
export { InputParseError } from "./errors.js";

// ─── Input Parsing ───────────────────────────────────────────
export { splitList, parseWeights, parseCriteriaTypes, buildCriteria } from "./parse/criteria.js";
export { parseTable } from "./parse/table.js";
export type { ParseTableOptions } from "./parse/table.js";
export { parseRankingForm } from "./parse/form.js";
export type { ParsedRankingForm } from "./parse/form.js";

// ─── Result Tables ───────────────────────────────────────────
export { toResultTable, toCriteriaSummary } from "./export/table.js";
export type { ResultTable } from "./export/table.js";

// ─── Utilities ───────────────────────────────────────────────
export { createApiResponse, createApiError } from "./utils/api.js";
