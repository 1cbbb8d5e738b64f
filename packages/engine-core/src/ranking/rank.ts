import type { Criterion, CriterionKind, RankingResult, ScoreMatrix } from '../types.js';
import { normalizeCriterionKind, validateRankingInput } from '../validation.js';
import { normalizeWeights } from '../weights/normalize.js';
import { computeExponents } from '../weights/exponents.js';
import { computeRawScores } from '../scoring/raw-score.js';
import { computePreferenceScores } from '../scoring/preference.js';
import { sortByPreference } from './sort.js';

/**
 * Rank alternatives with the Weighted Product method.
 *
 *   w'_j = w_j / Σw
 *   e_j  = ±w'_j   (negative for cost criteria)
 *   S_i  = Π_j x_ij ^ e_j
 *   V_i  = S_i / Σ S
 *
 * Pure function: validates everything before computing, throws an
 * InvalidInputError subclass on the first violation and DegenerateResultError
 * when Σ S is zero. Criteria types are matched case-insensitively.
 */
export function rank(
  matrix: ScoreMatrix,
  weights: readonly number[],
  criteriaTypes: readonly string[],
  labels: readonly string[],
): RankingResult {
  const inputError = validateRankingInput(matrix, weights, criteriaTypes, labels);
  if (inputError) throw inputError;

  // Validation above accepted every label, so no entry is dropped here.
  const kinds = criteriaTypes.map(normalizeCriterionKind).filter(isKind);
  const normalization = normalizeWeights(weights);
  const exponents = computeExponents(normalization.weights, kinds);
  const rawScores = computeRawScores(matrix, exponents);
  const { totalRawScore, preferenceScores } = computePreferenceScores(rawScores);

  const rankings = sortByPreference(
    rawScores.map((rawScore, index) => ({
      label: labels[index],
      index,
      rawScore,
      preferenceScore: preferenceScores[index],
    })),
  );

  return { rankings, weights: normalization, exponents, totalRawScore };
}

/** rank() over a per-criterion configuration list. */
export function rankCriteria(
  matrix: ScoreMatrix,
  criteria: readonly Criterion[],
  labels: readonly string[],
): RankingResult {
  return rank(
    matrix,
    criteria.map((c) => c.weight),
    criteria.map((c) => c.kind),
    labels,
  );
}

function isKind(kind: CriterionKind | null): kind is CriterionKind {
  return kind !== null;
}
