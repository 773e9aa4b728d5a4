import type { ClassifierOptions, FieldValue } from "../types/field.js";

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

const I64_MIN = -(2n ** 63n);
const I64_MAX = 2n ** 63n - 1n;

/**
 * Classify one raw field. First match wins:
 * missing, integer, float, boolean, text.
 */
export function classifyField(raw: string, options: ClassifierOptions): FieldValue {
  const trimmed = raw.trim();
  const lowered = trimmed.toLowerCase();

  if (trimmed === "" || options.missingTokens.includes(lowered)) {
    return { tag: "missing" };
  }

  if (INTEGER_PATTERN.test(trimmed)) {
    const value = BigInt(trimmed);
    // Out-of-range integers fall through to float, like an i64 parse would
    if (value >= I64_MIN && value <= I64_MAX) {
      return { tag: "integer", value };
    }
  }

  if (FLOAT_PATTERN.test(trimmed)) {
    const value = Number(trimmed);
    if (Number.isFinite(value)) {
      return { tag: "float", value };
    }
  }

  if (options.booleanTrue.includes(lowered)) {
    return { tag: "boolean", value: true };
  }
  if (options.booleanFalse.includes(lowered)) {
    return { tag: "boolean", value: false };
  }

  return { tag: "text", value: trimmed };
}

/**
 * Numeric value of a classified field, or null for non-numeric tags
 */
export function numericValue(field: FieldValue): number | null {
  switch (field.tag) {
    case "integer":
      return Number(field.value);
    case "float":
      return field.value;
    default:
      return null;
  }
}
