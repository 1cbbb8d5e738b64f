import { describe, expect, it } from 'vitest';
import {
  DegenerateResultError,
  InvalidValueError,
  ShapeMismatchError,
  rank,
  rankCriteria,
  sortByPreference,
} from '../src/index.js';

const TOL = 1e-9;

const matrix = [
  [4, 200, 3],
  [5, 250, 2],
  [3, 150, 4],
];
const weights = [3, 2, 5];
const types = ['benefit', 'cost', 'benefit'];
const labels = ['A1', 'A2', 'A3'];

function preferenceOf(result: ReturnType<typeof rank>, label: string): number {
  const entry = result.rankings.find((r) => r.label === label);
  if (!entry) throw new Error(`missing ${label}`);
  return entry.preferenceScore;
}

describe('rank', () => {
  it('preference scores sum to 1', () => {
    const result = rank(matrix, weights, types, labels);
    const total = result.rankings.reduce((acc, r) => acc + r.preferenceScore, 0);
    expect(Math.abs(total - 1)).toBeLessThanOrEqual(TOL);
  });

  it('normalized weights sum to 1 whether or not the input did', () => {
    for (const w of [[3, 2, 5], [0.3, 0.2, 0.5], [1, 1, 1], [0, 0, 7]]) {
      const result = rank(matrix, w, types, labels);
      const total = result.weights.weights.reduce((acc, x) => acc + x, 0);
      expect(Math.abs(total - 1)).toBeLessThanOrEqual(TOL);
    }
  });

  it('ranks with huge finite weights as with their normalized form', () => {
    const huge = rank([[2, 3], [3, 2]], [1e308, 1e308], ['benefit', 'cost'], ['A', 'B']);
    const unit = rank([[2, 3], [3, 2]], [0.5, 0.5], ['benefit', 'cost'], ['A', 'B']);
    expect(huge.exponents).toEqual([0.5, -0.5]);
    expect(huge.rankings.map((r) => r.label)).toEqual(['B', 'A']);
    expect(huge.rankings[0].preferenceScore).toBe(unit.rankings[0].preferenceScore);
  });

  it('gives the same ranking for scaled weights', () => {
    const a = rank(matrix, [3, 2, 5], types, labels);
    const b = rank(matrix, [0.3, 0.2, 0.5], types, labels);
    expect(b.weights.renormalized).toBe(false);
    expect(a.rankings.map((r) => r.label)).toEqual(b.rankings.map((r) => r.label));
    for (let i = 0; i < a.rankings.length; i++) {
      expect(Math.abs(a.rankings[i].preferenceScore - b.rankings[i].preferenceScore)).toBeLessThanOrEqual(TOL);
    }
  });

  it('assigns 1-based ranks and keeps the input row index', () => {
    const result = rank(matrix, weights, types, labels);
    expect(result.rankings.map((r) => r.rank)).toEqual([1, 2, 3]);
    expect(result.rankings.map((r) => r.index)).toEqual([2, 0, 1]);
  });

  it('matches criteria types case-insensitively', () => {
    const a = rank(matrix, weights, types, labels);
    const b = rank(matrix, weights, [' Benefit', 'COST', 'benefit '], labels);
    expect(b.exponents).toEqual(a.exponents);
  });

  it('maps each mixed-case label to the sign of its own exponent', () => {
    const result = rank([[2, 3, 4]], [1, 1, 2], [' COST', 'Benefit ', 'cost'], ['A']);
    expect(result.exponents).toEqual([-0.25, 0.25, -0.5]);
  });

  it('raising a benefit entry raises that alternative\'s preference', () => {
    const before = rank(matrix, weights, types, labels);
    const bumped = matrix.map((row) => [...row]);
    bumped[1][0] = 6;
    const after = rank(bumped, weights, types, labels);
    expect(preferenceOf(after, 'A2')).toBeGreaterThan(preferenceOf(before, 'A2'));
  });

  it('raising a cost entry lowers that alternative\'s preference', () => {
    const before = rank(matrix, weights, types, labels);
    const bumped = matrix.map((row) => [...row]);
    bumped[1][1] = 300;
    const after = rank(bumped, weights, types, labels);
    expect(preferenceOf(after, 'A2')).toBeLessThan(preferenceOf(before, 'A2'));
  });

  it('keeps input order for identical rows', () => {
    const result = rank(
      [
        [1, 1],
        [2, 2],
        [1, 1],
      ],
      [1, 1],
      ['benefit', 'benefit'],
      ['A', 'B', 'C'],
    );
    expect(result.rankings.map((r) => r.label)).toEqual(['B', 'A', 'C']);
    expect(result.rankings[1].preferenceScore).toBe(result.rankings[2].preferenceScore);
  });

  it('does not mutate its inputs', () => {
    const w = [3, 2, 5];
    const m = matrix.map((row) => [...row]);
    rank(m, w, types, labels);
    expect(w).toEqual([3, 2, 5]);
    expect(m).toEqual(matrix);
  });

  it('returns a fresh result on every call', () => {
    const a = rank(matrix, weights, types, labels);
    const b = rank(matrix, weights, types, labels);
    expect(a).toEqual(b);
    expect(a.rankings).not.toBe(b.rankings);
    a.rankings[0].label = 'changed';
    expect(b.rankings[0].label).toBe('A3');
  });

  it('throws ShapeMismatchError on a label count mismatch', () => {
    expect(() => rank(matrix, weights, types, ['A1', 'A2'])).toThrow(ShapeMismatchError);
  });

  it('throws InvalidValueError on an unknown criteria type', () => {
    expect(() => rank(matrix, weights, ['benefit', 'expense', 'benefit'], labels)).toThrow(
      "criteriaTypes[1]: must be 'benefit' or 'cost' (got expense)",
    );
  });

  it('throws DegenerateResultError when the raw scores overflow', () => {
    expect(() => rank([[Number.MIN_VALUE]], [1], ['cost'], ['A'])).toThrow(DegenerateResultError);
  });

  it('rejects a negative weight', () => {
    expect(() => rank(matrix, [1, -1, 1], types, labels)).toThrow(InvalidValueError);
  });
});

describe('rankCriteria', () => {
  it('is equivalent to rank over split vectors', () => {
    const viaCriteria = rankCriteria(
      matrix,
      [
        { name: 'quality', weight: 3, kind: 'benefit' },
        { name: 'price', weight: 2, kind: 'cost' },
        { name: 'support', weight: 5, kind: 'benefit' },
      ],
      labels,
    );
    expect(viaCriteria).toEqual(rank(matrix, weights, types, labels));
  });
});

describe('sortByPreference', () => {
  it('breaks ties by input index, not by array position', () => {
    const sorted = sortByPreference([
      { label: 'late', index: 2, rawScore: 1, preferenceScore: 0.25 },
      { label: 'top', index: 1, rawScore: 2, preferenceScore: 0.5 },
      { label: 'early', index: 0, rawScore: 1, preferenceScore: 0.25 },
    ]);
    expect(sorted.map((r) => [r.label, r.rank])).toEqual([
      ['top', 1],
      ['early', 2],
      ['late', 3],
    ]);
  });
});
