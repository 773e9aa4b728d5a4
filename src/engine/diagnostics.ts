import type { Thresholds } from "../config.js";
import type {
  ColumnRef,
  ColumnReport,
  Finding,
  FindingKind,
  Severity,
} from "../types/report.js";
import { formatNumber, formatPercent } from "../utils/format.js";

type Rule = (column: ColumnReport, rowCount: number, thresholds: Thresholds) => Omit<Finding, "column"> | null;

function finding(
  kind: FindingKind,
  severity: Severity,
  message: string,
  evidence: Record<string, number>
): Omit<Finding, "column"> {
  return { kind, severity, message, evidence };
}

const missingValues: Rule = (column, rowCount, t) => {
  if (rowCount === 0 || column.missingCount === 0) return null;
  const fraction = column.missingCount / rowCount;
  const severity: Severity =
    fraction >= t.missingCritical ? "critical" : fraction >= t.missingWarning ? "warning" : "info";
  return finding(
    "missing-values",
    severity,
    `${formatPercent(fraction)} of values are missing (${column.missingCount} of ${rowCount} rows)`,
    { fraction, count: column.missingCount }
  );
};

/**
 * Distinct count and non-missing count for columns that can hold
 * identifiers: categorical columns, and integer-only numeric columns whose
 * values fill most of their range (row numbers, sequence keys). Sparse
 * whole numbers such as amounts are not identifiers however unique they are.
 */
function identifierCandidate(column: ColumnReport, t: Thresholds): { distinct: number; total: number } | null {
  if (column.kind === "categorical") {
    return { distinct: column.categorical.distinctCount, total: column.categorical.nonMissingCount };
  }
  const { numeric } = column;
  if (!numeric.integerOnly || !numeric.distinctCount || numeric.min === null || numeric.max === null) {
    return null;
  }
  const span = numeric.max - numeric.min + 1;
  if (span / numeric.distinctCount > t.identifierMaxRangeRatio) {
    return null;
  }
  return { distinct: numeric.distinctCount, total: numeric.count };
}

const identifierLike: Rule = (column, _rowCount, t) => {
  const candidate = identifierCandidate(column, t);
  if (!candidate || candidate.total < t.identifierMinCount || candidate.total === 0) return null;
  const distinctRatio = candidate.distinct / candidate.total;
  if (distinctRatio < t.identifierRatio) return null;
  return finding(
    "identifier-like",
    "warning",
    `${candidate.distinct} distinct values across ${candidate.total} non-missing rows (ratio ${formatNumber(distinctRatio)}); looks like an identifier`,
    { distinctRatio, distinctCount: candidate.distinct, nonMissingCount: candidate.total }
  );
};

const nearConstant: Rule = (column, _rowCount, t) => {
  if (column.kind === "categorical") {
    const { categorical } = column;
    if (categorical.nonMissingCount === 0 || categorical.modalFraction < t.nearConstantModalFraction) {
      return null;
    }
    return finding(
      "near-constant",
      "warning",
      `Value "${categorical.modalValue ?? ""}" makes up ${formatPercent(categorical.modalFraction)} of non-missing values`,
      { modalFraction: categorical.modalFraction, modalFrequency: categorical.modalFrequency }
    );
  }

  const { numeric } = column;
  if (numeric.count <= 1 || numeric.stddev === null || numeric.mean === null) return null;
  const constant =
    numeric.stddev === 0 ||
    (numeric.mean !== 0 && numeric.stddev / Math.abs(numeric.mean) < t.nearConstantRelativeSpread);
  if (!constant) return null;
  return finding(
    "near-constant",
    "warning",
    `Values barely vary (stddev ${formatNumber(numeric.stddev)}, mean ${formatNumber(numeric.mean)})`,
    { stddev: numeric.stddev, mean: numeric.mean }
  );
};

const mixedType: Rule = (column, _rowCount, t) => {
  if (column.nonconformingCount === 0 || column.nonMissingCount === 0) return null;
  const fraction = column.nonconformingCount / column.nonMissingCount;
  return finding(
    "mixed-type",
    fraction >= t.mixedCriticalFraction ? "critical" : "warning",
    `${column.nonconformingCount} of ${column.nonMissingCount} non-missing values (${formatPercent(fraction)}) are not ${column.majorityType}`,
    { count: column.nonconformingCount, fraction }
  );
};

const extremeOutliers: Rule = (column, _rowCount, t) => {
  if (column.kind !== "numeric" || column.numeric.outlierCount === 0) return null;
  const { numeric } = column;
  const estimate = numeric.outlierCountExact ? "" : "an estimated ";
  return finding(
    "extreme-outliers",
    "critical",
    `${estimate}${numeric.outlierCount} value(s) lie ${formatNumber(t.outlierRobustZ)}+ robust deviations from the median ${formatNumber(numeric.median ?? 0)}`,
    { count: numeric.outlierCount, median: numeric.median ?? 0, mad: numeric.mad ?? 0 }
  );
};

// Evaluated in this order for every column
const RULES: Rule[] = [missingValues, identifierLike, nearConstant, mixedType, extremeOutliers];

/**
 * Findings for one column, in rule-table order
 */
export function diagnoseColumn(column: ColumnReport, rowCount: number, thresholds: Thresholds): Finding[] {
  const ref: ColumnRef = { name: column.name, index: column.index };
  const findings: Finding[] = [];
  for (const rule of RULES) {
    const result = rule(column, rowCount, thresholds);
    if (result) {
      findings.push({ column: ref, ...result });
    }
  }
  return findings;
}

/**
 * Findings for every column, columns in header order
 */
export function diagnose(columns: ColumnReport[], rowCount: number, thresholds: Thresholds): Finding[] {
  return [...columns]
    .sort((a, b) => a.index - b.index)
    .flatMap(column => diagnoseColumn(column, rowCount, thresholds));
}

const SEVERITY_RANK: Record<Severity, number> = { info: 0, warning: 1, critical: 2 };

export function severityAtLeast(severity: Severity, minimum: Severity): boolean {
  return SEVERITY_RANK[severity] >= SEVERITY_RANK[minimum];
}
