import type { WeightNormalization } from '../types.js';
import { ZeroWeightSumError } from '../errors.js';
import { isClose, sum } from '../utils.js';

/**
 * w'_i = w_i / Σw.
 *
 * Always divides, even when Σw is already 1, so normalizing twice yields the
 * same vector up to rounding. `renormalized` reports whether the input sum
 * was off by more than SUM_TOLERANCE.
 *
 * When Σw overflows to Infinity the weights are first divided by the largest
 * one; `sum` then stays Infinity.
 */
export function normalizeWeights(weights: readonly number[]): WeightNormalization {
  const total = sum(weights);
  if (total === 0) {
    throw new ZeroWeightSumError(weights.length);
  }
  return {
    weights: Number.isFinite(total) ? weights.map((w) => w / total) : divideByScaledSum(weights),
    sum: total,
    renormalized: !isClose(total, 1),
  };
}

function divideByScaledSum(weights: readonly number[]): number[] {
  const max = Math.max(...weights);
  const scaled = weights.map((w) => w / max);
  const scaledTotal = sum(scaled);
  return scaled.map((w) => w / scaledTotal);
}
