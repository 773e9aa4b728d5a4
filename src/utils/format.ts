/**
 * Format a number with at most `digits` decimals, trailing zeros trimmed
 */
export function formatNumber(value: number, digits: number = 4): string {
  if (!Number.isFinite(value)) {
    return String(value);
  }
  if (Number.isInteger(value)) {
    return value.toString();
  }
  const fixed = value.toFixed(digits);
  const trimmed = fixed.replace(/\.?0+$/, "");
  return trimmed === "-0" ? "0" : trimmed;
}

/**
 * Format a fraction in [0, 1] as a percentage with one decimal
 */
export function formatPercent(fraction: number): string {
  return `${formatNumber(fraction * 100, 1)}%`;
}
