import type { ScoreMatrix } from '../types.js';

/** S_i = Π_j x_ij ^ e_j. */
export function computeRawScores(matrix: ScoreMatrix, exponents: readonly number[]): number[] {
  return matrix.map((row) => {
    let s = 1;
    for (let j = 0; j < exponents.length; j++) {
      s *= Math.pow(row[j], exponents[j]);
    }
    return s;
  });
}
