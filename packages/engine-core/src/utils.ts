/** Tolerance used when comparing a weight sum against 1. */
export const SUM_TOLERANCE = 1e-9;

export function sum(values: readonly number[]): number {
  let total = 0;
  for (const v of values) total += v;
  return total;
}

export function isClose(a: number, b: number, tolerance = SUM_TOLERANCE): boolean {
  return Math.abs(a - b) <= tolerance;
}
