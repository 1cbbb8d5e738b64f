import { z } from "zod";
import type { ParsedTable, TableCell, TableRows } from "../types/table.js";
import { InputParseError } from "../errors.js";
import { DECIMAL_PATTERN } from "../constants.js";

const valueSchema = z.union([
  z.number(),
  z.string().trim().regex(DECIMAL_PATTERN).pipe(z.coerce.number()),
]);

export interface ParseTableOptions {
  /** First row holds column names. Defaults to true. */
  hasHeader?: boolean;
}

/**
 * Split decoded sheet rows into labels, criterion names and a numeric matrix.
 * Column 0 is the alternative label; every later column is one criterion.
 * Value checks beyond "is a number" (positivity, finiteness) belong to the engine.
 */
export function parseTable(rows: TableRows, options: ParseTableOptions = {}): ParsedTable {
  const hasHeader = options.hasHeader ?? true;
  const header = hasHeader ? rows[0] : undefined;
  const body = hasHeader ? rows.slice(1) : rows;
  const offset = hasHeader ? 1 : 0;

  const width = header?.length ?? body[0]?.length ?? 0;
  if (width < 2) {
    throw new InputParseError(
      "table needs an alternative column and at least one criterion column",
      { columns: width },
    );
  }
  if (body.length === 0) {
    throw new InputParseError("table has no alternatives", { rows: 0 });
  }

  const criteria = header
    ? header.slice(1).map((cell, j) => cellText(cell) || `C${j + 1}`)
    : Array.from({ length: width - 1 }, (_, j) => `C${j + 1}`);

  const labels: string[] = [];
  const matrix: number[][] = [];

  body.forEach((row, i) => {
    const rowIndex = i + offset;
    if (row.length !== width) {
      throw new InputParseError(
        `row ${rowIndex + 1} has ${row.length} cells, expected ${width}`,
        { row: rowIndex, expected: width, actual: row.length },
      );
    }
    labels.push(cellText(row[0]));
    matrix.push(
      row.slice(1).map((cell, j) => {
        const parsed = valueSchema.safeParse(cell);
        if (!parsed.success) {
          throw new InputParseError(
            `row ${rowIndex + 1}, column ${j + 2}: "${cellText(cell)}" is not a number`,
            { row: rowIndex, column: j + 1, value: cell },
          );
        }
        return parsed.data;
      }),
    );
  });

  return { labels, criteria, matrix };
}

function cellText(cell: TableCell): string {
  return cell === null ? "" : String(cell).trim();
}
