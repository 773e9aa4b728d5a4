import type { Config } from "../config.js";
import { severityAtLeast } from "../engine/diagnostics.js";
import { inspectFile } from "../inspect.js";
import type { Finding, Severity } from "../types/report.js";
import { DiagnoseFileSchema, type DiagnoseFileParams } from "../types/schema.js";
import { handleToolError } from "../utils/tool-error.js";
import type { ToolResponse } from "./types.js";

const description = `Lists data-quality findings for a tabular file (.csv, .tsv or .json records).
Findings cover missing values, identifier-like columns, near-constant columns, mixed-type contamination and extreme outliers, each with a severity (info, warning, critical) and numeric evidence.
Use minSeverity to drop lower-severity findings. Every column also gets a status: its worst severity, or "ok".
`;

type ColumnStatus = Severity | "ok";

function worstSeverity(findings: Finding[]): ColumnStatus {
  return findings.reduce<ColumnStatus>((worst, finding) => {
    if (worst === "ok" || severityAtLeast(finding.severity, worst)) {
      return finding.severity;
    }
    return worst;
  }, "ok");
}

/**
 * Creates a tool that reports findings and a per-column status
 */
export function createDiagnoseFileTool(config: Config) {
  return {
    name: "diagnose_file",
    description,
    schema: DiagnoseFileSchema.shape,
    handler: async (params: DiagnoseFileParams): Promise<ToolResponse> => {
      try {
        const { path, minSeverity } = DiagnoseFileSchema.parse(params);
        const inspection = await inspectFile(path, config);

        const columns = inspection.columns.map(column => ({
          name: column.name,
          status: worstSeverity(inspection.findings.filter(f => f.column.index === column.index)),
        }));

        const response = {
          path,
          rowCount: inspection.rowCount,
          malformedRowCount: inspection.malformedRowCount,
          findings: inspection.findings.filter(f => severityAtLeast(f.severity, minSeverity)),
          columns,
        };

        return {
          content: [
            {
              type: "text",
              text: JSON.stringify(response, null, 2),
            },
          ],
        };
      } catch (error) {
        return handleToolError(error, "diagnose_file", { path: params.path });
      }
    }
  };
}
