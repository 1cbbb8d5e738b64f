/** Criterion direction. Benefit: higher is better. Cost: lower is better. */
export type CriterionKind = 'benefit' | 'cost';

/** Rows = alternatives, columns = criteria. Entries must be finite and > 0. */
export type ScoreMatrix = readonly (readonly number[])[];

/** Validated per-criterion configuration. */
export interface Criterion {
  name?: string;
  weight: number;
  kind: CriterionKind;
}

/** Result of the weight normalization step: w' = w / Σw. */
export interface WeightNormalization {
  weights: number[];
  sum: number;
  /** True when the input sum differed from 1 beyond tolerance. */
  renormalized: boolean;
}

export interface RankedAlternative {
  label: string;
  /** Row position in the input matrix. */
  index: number;
  /** 1-based. */
  rank: number;
  rawScore: number;
  preferenceScore: number;
}

/** Output of rank(). Freshly allocated per call. */
export interface RankingResult {
  rankings: RankedAlternative[];
  weights: WeightNormalization;
  exponents: number[];
  totalRawScore: number;
}

/** Engine error codes. */
export enum EngineError {
  SHAPE_MISMATCH = 'SHAPE_MISMATCH',
  INVALID_VALUE = 'INVALID_VALUE',
  ZERO_WEIGHT_SUM = 'ZERO_WEIGHT_SUM',
  DEGENERATE_RESULT = 'DEGENERATE_RESULT',
}
