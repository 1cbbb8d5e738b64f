import type { CriterionKind, ScoreMatrix } from './types.js';
import {
  InvalidInputError,
  InvalidValueError,
  ShapeMismatchError,
  ZeroWeightSumError,
} from './errors.js';

/** Match 'benefit' / 'cost' ignoring case and surrounding whitespace. */
export function normalizeCriterionKind(value: unknown): CriterionKind | null {
  if (typeof value !== 'string') return null;
  const kind = value.trim().toLowerCase();
  if (kind === 'benefit' || kind === 'cost') return kind;
  return null;
}

/** Every row must have the same column count and every entry must be finite and > 0. */
export function validateMatrix(matrix: ScoreMatrix): InvalidInputError | null {
  if (matrix.length < 1) {
    return new ShapeMismatchError('matrix', 1, matrix.length, { atLeast: true });
  }
  const nCrit = matrix[0].length;
  if (nCrit < 1) {
    return new ShapeMismatchError('matrix', 1, nCrit, { row: 0, atLeast: true });
  }
  for (let i = 0; i < matrix.length; i++) {
    const row = matrix[i];
    if (row.length !== nCrit) {
      return new ShapeMismatchError('matrix', nCrit, row.length, { row: i });
    }
    for (let j = 0; j < nCrit; j++) {
      const x = row[j];
      if (typeof x !== 'number' || !Number.isFinite(x) || x <= 0) {
        return new InvalidValueError('matrix', i, x, 'entries must be finite and > 0', j);
      }
    }
  }
  return null;
}

export function validateWeights(weights: readonly number[], nCrit: number): InvalidInputError | null {
  if (weights.length !== nCrit) {
    return new ShapeMismatchError('weights', nCrit, weights.length);
  }
  for (let j = 0; j < weights.length; j++) {
    const w = weights[j];
    if (typeof w !== 'number' || !Number.isFinite(w) || w < 0) {
      return new InvalidValueError('weights', j, w, 'weights must be finite and >= 0');
    }
  }
  if (weights.every((w) => w === 0)) {
    return new ZeroWeightSumError(weights.length);
  }
  return null;
}

export function validateCriteriaTypes(
  criteriaTypes: readonly string[],
  nCrit: number,
): InvalidInputError | null {
  if (criteriaTypes.length !== nCrit) {
    return new ShapeMismatchError('criteriaTypes', nCrit, criteriaTypes.length);
  }
  for (let j = 0; j < criteriaTypes.length; j++) {
    if (normalizeCriterionKind(criteriaTypes[j]) === null) {
      return new InvalidValueError('criteriaTypes', j, criteriaTypes[j], "must be 'benefit' or 'cost'");
    }
  }
  return null;
}

export function validateLabels(labels: readonly string[], nAlt: number): InvalidInputError | null {
  if (labels.length !== nAlt) {
    return new ShapeMismatchError('labels', nAlt, labels.length);
  }
  return null;
}

/** Validate all rank() inputs. Returns the first violation found, or null. */
export function validateRankingInput(
  matrix: ScoreMatrix,
  weights: readonly number[],
  criteriaTypes: readonly string[],
  labels: readonly string[],
): InvalidInputError | null {
  const mErr = validateMatrix(matrix);
  if (mErr) return mErr;

  const nAlt = matrix.length;
  const nCrit = matrix[0].length;

  const wErr = validateWeights(weights, nCrit);
  if (wErr) return wErr;

  const tErr = validateCriteriaTypes(criteriaTypes, nCrit);
  if (tErr) return tErr;

  return validateLabels(labels, nAlt);
}
