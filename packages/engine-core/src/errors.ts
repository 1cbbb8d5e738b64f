import { EngineError } from './types.js';

export type InputField = 'matrix' | 'weights' | 'criteriaTypes' | 'labels';

/** Base class for every precondition violation. Malformed input is a caller bug: never retried. */
export abstract class InvalidInputError extends Error {
  abstract readonly code: EngineError;
  abstract readonly detail: Record<string, unknown>;
}

export class ShapeMismatchError extends InvalidInputError {
  readonly code = EngineError.SHAPE_MISMATCH;
  readonly detail: { field: InputField; expected: number; actual: number; row?: number; atLeast?: boolean };

  constructor(
    field: InputField,
    expected: number,
    actual: number,
    options: { row?: number; atLeast?: boolean } = {},
  ) {
    const { row, atLeast } = options;
    const where = row === undefined ? field : `${field}[${row}]`;
    super(`${where}: expected length ${atLeast ? 'at least ' : ''}${expected}, got ${actual}`);
    this.name = 'ShapeMismatchError';
    this.detail = { field, expected, actual };
    if (row !== undefined) this.detail.row = row;
    if (atLeast) this.detail.atLeast = true;
  }
}

export class InvalidValueError extends InvalidInputError {
  readonly code = EngineError.INVALID_VALUE;
  readonly detail: { field: InputField; index: number; column?: number; value: unknown };

  constructor(field: InputField, index: number, value: unknown, reason: string, column?: number) {
    const where = column === undefined ? `${field}[${index}]` : `${field}[${index}][${column}]`;
    super(`${where}: ${reason} (got ${String(value)})`);
    this.name = 'InvalidValueError';
    this.detail = column === undefined ? { field, index, value } : { field, index, column, value };
  }
}

export class ZeroWeightSumError extends InvalidInputError {
  readonly code = EngineError.ZERO_WEIGHT_SUM;
  readonly detail: { count: number };

  constructor(count: number) {
    super(`weights: all ${count} weights are zero, normalization is undefined`);
    this.name = 'ZeroWeightSumError';
    this.detail = { count };
  }
}

/** Σ S_i collapsed to zero (or overflowed), so V cannot be computed. */
export class DegenerateResultError extends Error {
  readonly code = EngineError.DEGENERATE_RESULT;
  readonly detail: { totalRawScore: number };

  constructor(totalRawScore: number) {
    super(`total raw score is ${totalRawScore}, preference scores are undefined`);
    this.name = 'DegenerateResultError';
    this.detail = { totalRawScore };
  }
}
