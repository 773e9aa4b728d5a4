import type { Config } from "../config.js";
import { inspectFile } from "../inspect.js";
import { InspectFileSchema, type InspectFileParams } from "../types/schema.js";
import { handleToolError } from "../utils/tool-error.js";
import type { ToolResponse } from "./types.js";

const description = `Profiles a tabular file (.csv, .tsv or .json records) in a single pass and returns per-column statistics.
Numeric columns report min, max, mean, standard deviation, median, MAD and a count of extreme outliers judged against the median/MAD.
Categorical and boolean columns report distinct counts, the distinct ratio and the modal value.
Set includeFindings to false to omit the data-quality findings (missing values, identifier-like columns, near-constant columns, mixed types, outliers).
`;

/**
 * Creates a tool that inspects a file and returns the full report as JSON
 * 
 * @param config - Inspection configuration (thresholds, token sets, reservoir size)
 * @returns A configured tool object with name, schema, and handler
 */
export function createInspectFileTool(config: Config) {
  return {
    name: "inspect_file",
    description,
    schema: InspectFileSchema.shape,
    handler: async (params: InspectFileParams): Promise<ToolResponse> => {
      try {
        const { path, includeFindings } = InspectFileSchema.parse(params);
        const inspection = await inspectFile(path, config);
        // undefined keys are dropped by JSON.stringify
        const body = includeFindings ? inspection : { ...inspection, findings: undefined };

        return {
          content: [
            {
              type: "text",
              text: JSON.stringify(body, null, 2),
            },
          ],
        };
      } catch (error) {
        return handleToolError(error, "inspect_file", { path: params.path });
      }
    }
  };
}
