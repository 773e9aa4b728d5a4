/**
 * Application constants
 */

export const DEFAULT_RESERVOIR_CAPACITY = 10_000;
export const DEFAULT_DISTINCT_LIMIT = 1_000_000;
export const DEFAULT_SEED = 42;

// Tokens are compared after trimming and lower-casing
export const DEFAULT_MISSING_TOKENS = ["", "na", "n/a", "null", "nan", "none"];
export const DEFAULT_BOOLEAN_TRUE = ["true", "yes"];
export const DEFAULT_BOOLEAN_FALSE = ["false", "no"];

// Normal-consistency constants for robust scale estimates
export const MAD_SCALE = 1.4826;
export const MEAN_AD_SCALE = 1.2533;

export const SUPPORTED_EXTENSIONS = ["csv", "tsv", "json"] as const;

export const ERROR_MESSAGES = {
  NO_FILE: 'Usage: datainspect [--types] [--summary] [--diagnose] [--json] <file>',
  EMPTY_INPUT: 'Input has no header row',
  UNSUPPORTED_JSON: 'Unsupported JSON structure: expected an object or an array of objects',
};
