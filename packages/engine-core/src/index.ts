// Types
export type {
  CriterionKind,
  ScoreMatrix,
  Criterion,
  WeightNormalization,
  RankedAlternative,
  RankingResult,
} from './types.js';
export { EngineError } from './types.js';

// Errors
export type { InputField } from './errors.js';
export {
  InvalidInputError,
  ShapeMismatchError,
  InvalidValueError,
  ZeroWeightSumError,
  DegenerateResultError,
} from './errors.js';

// Core functions
export { rank, rankCriteria } from './ranking/rank.js';
export { sortByPreference } from './ranking/sort.js';
export { normalizeWeights } from './weights/normalize.js';
export { computeExponents } from './weights/exponents.js';
export { computeRawScores } from './scoring/raw-score.js';
export { computePreferenceScores } from './scoring/preference.js';

// Validation
export {
  normalizeCriterionKind,
  validateMatrix,
  validateWeights,
  validateCriteriaTypes,
  validateLabels,
  validateRankingInput,
} from './validation.js';

// Utils
export { sum, isClose, SUM_TOLERANCE } from './utils.js';
