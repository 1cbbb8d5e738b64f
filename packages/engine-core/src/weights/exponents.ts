import type { CriterionKind } from '../types.js';

/**
 * e_j = w'_j for benefit criteria, -w'_j for cost criteria.
 * A negative exponent inverts the criterion: larger raw cost lowers S.
 */
export function computeExponents(
  normalizedWeights: readonly number[],
  kinds: readonly CriterionKind[],
): number[] {
  return normalizedWeights.map((w, j) => (kinds[j] === 'cost' ? -w : w));
}
