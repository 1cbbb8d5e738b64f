/** One decoded spreadsheet cell. */
export type TableCell = string | number | null;

/**
 * Decoded rows of a score sheet.
 * Column 0 holds the alternative label, columns 1.. hold criterion values.
 */
export type TableRows = readonly (readonly TableCell[])[];

export interface ParsedTable {
  labels: string[];
  /** Criterion names from the header row, or C1..Cn without one. */
  criteria: string[];
  matrix: number[][];
}

/** Text-form ranking request: a table plus comma-separated weights and types. */
export interface RankingForm {
  table: TableRows;
  hasHeader?: boolean;
  weights: string;
  types: string;
}

export type ResultRow = [rank: number, alternative: string, s: number, v: number];

export interface CriterionSummary {
  criterion: string;
  weight: number;
  kind: string;
}
