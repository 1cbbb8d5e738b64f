import { z } from "zod";
import type { Criterion, CriterionKind } from "@wprank/engine-core";
import { CRITERION_KINDS, DECIMAL_PATTERN, LIST_SEPARATOR } from "../constants.js";
import { InputParseError } from "../errors.js";

const weightSchema = z
  .string()
  .regex(DECIMAL_PATTERN)
  .pipe(z.coerce.number().finite().nonnegative());
const kindSchema = z.enum(CRITERION_KINDS);

/** Split a comma-separated list, trimming entries and dropping empty ones. */
export function splitList(text: string): string[] {
  return text
    .split(LIST_SEPARATOR)
    .map((part) => part.trim())
    .filter((part) => part !== "");
}

/** "0.28, 0.22,0.5" → [0.28, 0.22, 0.5]. */
export function parseWeights(text: string): number[] {
  return splitList(text).map((part, i) => {
    const parsed = weightSchema.safeParse(part);
    if (!parsed.success) {
      throw new InputParseError(
        `weight ${i + 1} ("${part}") is not a non-negative number`,
        { field: "weights", position: i + 1, value: part },
      );
    }
    return parsed.data;
  });
}

/** "benefit, Cost" → ["benefit", "cost"]. */
export function parseCriteriaTypes(text: string): CriterionKind[] {
  return splitList(text).map((part, i) => {
    const parsed = kindSchema.safeParse(part.toLowerCase());
    if (!parsed.success) {
      throw new InputParseError(
        `criteria type ${i + 1} ("${part}") must be "benefit" or "cost"`,
        { field: "types", position: i + 1, value: part },
      );
    }
    return parsed.data;
  });
}

/** Zip weights, kinds and optional names into one criterion list. */
export function buildCriteria(
  weights: readonly number[],
  kinds: readonly CriterionKind[],
  names?: readonly string[],
): Criterion[] {
  const expected = names?.length ?? weights.length;
  if (weights.length !== expected) {
    throw new InputParseError(
      `number of weights (${weights.length}) does not match number of criteria (${expected})`,
      { field: "weights", expected, actual: weights.length },
    );
  }
  if (kinds.length !== expected) {
    throw new InputParseError(
      `number of criteria types (${kinds.length}) does not match number of criteria (${expected})`,
      { field: "types", expected, actual: kinds.length },
    );
  }
  return weights.map((weight, j) => {
    const name = names?.[j];
    return name === undefined ? { weight, kind: kinds[j] } : { name, weight, kind: kinds[j] };
  });
}
