export const CRITERION_KINDS = ["benefit", "cost"] as const;

/** Column headers of an exported ranking table. */
export const RESULT_COLUMNS = ["Rank", "Alternative", "S", "V"] as const;

export const LIST_SEPARATOR = ",";

/** Plain decimal with optional sign and exponent. No hex, binary, octal or Infinity. */
export const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
