/**
 * Resolved type of a column. "mixed" is reported when any non-missing
 * field disagrees with the column's majority.
 */
export type ColumnType = "numeric" | "categorical" | "boolean" | "mixed";

/**
 * Which accumulator variant a column keeps after resolution
 */
export type AccumulationKind = "numeric" | "categorical";

export type Severity = "info" | "warning" | "critical";

export type FindingKind =
  | "missing-values"
  | "identifier-like"
  | "near-constant"
  | "mixed-type"
  | "extreme-outliers";

export interface ColumnRef {
  name: string;
  index: number;
}

export interface Finding {
  column: ColumnRef;
  severity: Severity;
  kind: FindingKind;
  message: string;
  evidence: Record<string, number>;
}

/**
 * Finalized numeric statistics. Fields that need at least one (or two)
 * values are null when the column has fewer.
 */
export interface NumericSummary {
  count: number;
  min: number | null;
  max: number | null;
  mean: number | null;
  stddev: number | null;
  median: number | null;
  mad: number | null;
  outlierCount: number;
  /** false when the outlier count was scaled up from a reservoir sample */
  outlierCountExact: boolean;
  /** Distinct integer values, or null when the column holds non-integers */
  distinctCount: number | null;
  distinctExact: boolean;
  integerOnly: boolean;
}

export interface CategoricalSummary {
  nonMissingCount: number;
  distinctCount: number;
  /** False when numeric values past the key limit were counted without a key */
  distinctExact: boolean;
  distinctRatio: number;
  modalValue: string | null;
  modalFrequency: number;
  modalFraction: number;
}

interface ColumnReportBase {
  name: string;
  index: number;
  inferredType: ColumnType;
  /** Majority type among non-missing values, even when inferredType is "mixed" */
  majorityType: Exclude<ColumnType, "mixed">;
  rowCount: number;
  missingCount: number;
  nonMissingCount: number;
  nonconformingCount: number;
}

export interface NumericColumnReport extends ColumnReportBase {
  kind: "numeric";
  numeric: NumericSummary;
}

export interface CategoricalColumnReport extends ColumnReportBase {
  kind: "categorical";
  categorical: CategoricalSummary;
}

export type ColumnReport = NumericColumnReport | CategoricalColumnReport;

export interface InspectionReport {
  rowCount: number;
  malformedRowCount: number;
  columns: ColumnReport[];
  findings: Finding[];
}
