import { DegenerateResultError } from '../errors.js';
import { sum } from '../utils.js';

/**
 * V_i = S_i / Σ S. Throws DegenerateResultError when Σ S is zero, or when it
 * overflowed to a non-finite value.
 */
export function computePreferenceScores(rawScores: readonly number[]): {
  totalRawScore: number;
  preferenceScores: number[];
} {
  const totalRawScore = sum(rawScores);
  if (!(totalRawScore > 0) || !Number.isFinite(totalRawScore)) {
    throw new DegenerateResultError(totalRawScore);
  }
  return {
    totalRawScore,
    preferenceScores: rawScores.map((s) => s / totalRawScore),
  };
}
