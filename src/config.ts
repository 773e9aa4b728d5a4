import { z } from "zod";
import {
  DEFAULT_BOOLEAN_FALSE,
  DEFAULT_BOOLEAN_TRUE,
  DEFAULT_DISTINCT_LIMIT,
  DEFAULT_MISSING_TOKENS,
  DEFAULT_RESERVOIR_CAPACITY,
  DEFAULT_SEED,
} from "./utils/constants.js";
import { DataInspectError } from "./utils/errors.js";

// Thresholds used by the diagnostic rules
export const ThresholdsSchema = z.object({
  missingWarning: z.number().min(0).max(1).default(0.1),
  missingCritical: z.number().min(0).max(1).default(0.5),
  identifierMinCount: z.number().int().nonnegative().default(20),
  identifierRatio: z.number().min(0).max(1).default(0.95),
  // Integer identifiers must fill their range: (max - min + 1) / distinct
  identifierMaxRangeRatio: z.number().min(1).default(1.05),
  nearConstantModalFraction: z.number().min(0).max(1).default(0.99),
  nearConstantRelativeSpread: z.number().positive().default(1e-6),
  mixedCriticalFraction: z.number().min(0).max(1).default(0.2),
  outlierRobustZ: z.number().positive().default(5),
});

const tokenList = (defaults: string[]) =>
  z.array(z.string().transform(token => token.trim().toLowerCase())).default(defaults);

export const ConfigSchema = z.object({
  // Values retained per numeric column for median/MAD
  reservoirCapacity: z.number().int().positive().default(DEFAULT_RESERVOIR_CAPACITY),
  // Distinct integer values tracked per numeric column
  distinctLimit: z.number().int().positive().default(DEFAULT_DISTINCT_LIMIT),
  seed: z.number().int().default(DEFAULT_SEED),
  missingTokens: tokenList(DEFAULT_MISSING_TOKENS),
  booleanTrue: tokenList(DEFAULT_BOOLEAN_TRUE),
  booleanFalse: tokenList(DEFAULT_BOOLEAN_FALSE),
  thresholds: ThresholdsSchema.default({}),
});

export type Thresholds = z.infer<typeof ThresholdsSchema>;
export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;

const THRESHOLD_ENV_VARS: Array<[keyof Thresholds, string]> = [
  ["missingWarning", "DATAINSPECT_MISSING_WARNING"],
  ["missingCritical", "DATAINSPECT_MISSING_CRITICAL"],
  ["identifierMinCount", "DATAINSPECT_IDENTIFIER_MIN_COUNT"],
  ["identifierRatio", "DATAINSPECT_IDENTIFIER_RATIO"],
  ["identifierMaxRangeRatio", "DATAINSPECT_IDENTIFIER_RANGE_RATIO"],
  ["nearConstantModalFraction", "DATAINSPECT_NEAR_CONSTANT_FRACTION"],
  ["nearConstantRelativeSpread", "DATAINSPECT_NEAR_CONSTANT_SPREAD"],
  ["mixedCriticalFraction", "DATAINSPECT_MIXED_CRITICAL"],
  ["outlierRobustZ", "DATAINSPECT_OUTLIER_Z"],
];

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") {
    return undefined;
  }
  return Number(value);
}

function parseList(value: string | undefined): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  return value.split(",");
}

/**
 * Build the raw config input from DATAINSPECT_* environment variables.
 * Unset variables are left out so the schema defaults apply.
 */
function readEnvVars(env: NodeJS.ProcessEnv): ConfigInput {
  const thresholds: Partial<Record<keyof Thresholds, number>> = {};
  for (const [key, name] of THRESHOLD_ENV_VARS) {
    const value = parseNumber(env[name]);
    if (value !== undefined) {
      thresholds[key] = value;
    }
  }

  return {
    reservoirCapacity: parseNumber(env.DATAINSPECT_RESERVOIR_CAPACITY),
    distinctLimit: parseNumber(env.DATAINSPECT_DISTINCT_LIMIT),
    seed: parseNumber(env.DATAINSPECT_SEED),
    missingTokens: parseList(env.DATAINSPECT_MISSING_TOKENS),
    booleanTrue: parseList(env.DATAINSPECT_BOOLEAN_TRUE),
    booleanFalse: parseList(env.DATAINSPECT_BOOLEAN_FALSE),
    thresholds,
  };
}

/**
 * Resolve a complete config from partial input, applying defaults
 */
export function resolveConfig(input: ConfigInput = {}): Config {
  return ConfigSchema.parse(input);
}

/**
 * Load and validate configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  try {
    return resolveConfig(readEnvVars(env));
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map(i => `  - ${i.path.join('.')}: ${i.message}`).join('\n');
      throw new DataInspectError(
        "CONFIG",
        `Configuration error:\n${issues}`,
        [
          "DATAINSPECT_RESERVOIR_CAPACITY=10000 (values kept per numeric column for median/MAD)",
          "DATAINSPECT_DISTINCT_LIMIT=1000000 (distinct integers tracked per numeric column)",
          "DATAINSPECT_SEED=42 (reservoir sampling seed)",
          "DATAINSPECT_MISSING_TOKENS=,na,n/a,null,nan,none (comma-separated)",
          "DATAINSPECT_BOOLEAN_TRUE=true,yes and DATAINSPECT_BOOLEAN_FALSE=false,no",
          `Thresholds: ${THRESHOLD_ENV_VARS.map(([, name]) => name).join(", ")}`,
        ]
      );
    }
    throw error;
  }
}
