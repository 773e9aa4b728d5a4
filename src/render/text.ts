import type { FileType } from "../sources/types.js";
import type { ColumnReport, Finding, InspectionReport } from "../types/report.js";
import { formatNumber } from "../utils/format.js";

export interface RenderOptions {
  types?: boolean;
  summary?: boolean;
  diagnose?: boolean;
}

function value(n: number | null): string {
  return n === null ? "-" : formatNumber(n);
}

function describeType(column: ColumnReport): string {
  if (column.inferredType === "mixed") {
    return `mixed (majority ${column.majorityType})`;
  }
  if (column.kind === "numeric" && column.numeric.count > 0) {
    return `numeric (${column.numeric.integerOnly ? "integer" : "float"})`;
  }
  return column.inferredType;
}

function summaryLine(column: ColumnReport): string {
  const head = `  - ${column.name} (${column.inferredType}): count=${column.nonMissingCount} missing=${column.missingCount}`;
  if (column.kind === "numeric") {
    const n = column.numeric;
    return `${head} min=${value(n.min)} max=${value(n.max)} mean=${value(n.mean)} stddev=${value(n.stddev)} median=${value(n.median)} outliers=${n.outlierCount}`;
  }
  const c = column.categorical;
  return `${head} distinct=${c.distinctCount} ratio=${formatNumber(c.distinctRatio)} mode=${c.modalValue ?? "-"}`;
}

function findingLine(finding: Finding): string {
  return `  - ${finding.column.name}: ${finding.severity} ${finding.kind}: ${finding.message}`;
}

/**
 * Render an inspection report as the text the CLI prints
 */
export function renderReport(
  report: InspectionReport & { fileType?: FileType },
  options: RenderOptions = {}
): string {
  const lines: string[] = [];
  if (report.fileType) {
    lines.push(`File type: ${report.fileType.toUpperCase()}`);
  }
  lines.push(`Rows: ${report.rowCount}`);
  if (report.malformedRowCount > 0) {
    lines.push(`Malformed rows skipped: ${report.malformedRowCount}`);
  }
  lines.push("Columns:");
  report.columns.forEach(column => lines.push(`  - ${column.name}`));

  if (options.types) {
    lines.push("Inferred types:");
    report.columns.forEach(column => lines.push(`  - ${column.name}: ${describeType(column)}`));
  }

  if (options.summary) {
    lines.push("Summary:");
    report.columns.forEach(column => lines.push(summaryLine(column)));
  }

  if (options.diagnose) {
    lines.push("Diagnostics:");
    for (const column of report.columns) {
      const findings = report.findings.filter(f => f.column.index === column.index);
      if (findings.length === 0) {
        lines.push(`  - ${column.name}: ok`);
      } else {
        findings.forEach(f => lines.push(findingLine(f)));
      }
    }
  }

  return lines.join("\n");
}
