import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";

export const DATA_QUALITY_REVIEW = "data-quality-review";

const REVIEW_STEPS = [
  "Call diagnose_file on the path to get findings and a status for every column.",
  "Call inspect_file for the statistics behind any column that is not ok.",
  "For each critical finding, explain what it means for downstream analysis and quote its evidence.",
  "Group warnings by kind (missing values, identifier-like, near-constant, mixed type).",
  "Finish with the columns that look safe to analyse as they are.",
];

/**
 * Handler for the data-quality-review prompt
 */
export function handleDataQualityReview(args: { path: string }) {
  const steps = REVIEW_STEPS.map((step, i) => `${i + 1}. ${step}`).join("\n");
  return {
    messages: [
      {
        role: "user" as const,
        content: {
          type: "text" as const,
          text: `Please review the data quality of ${args.path}.\n\n${steps}`
        }
      }
    ]
  };
}

/**
 * Register prompt capabilities with the MCP server
 * 
 * @param server - The MCP server instance
 */
export function registerPrompts(server: McpServer) {
  server.prompt(
    DATA_QUALITY_REVIEW,
    "Review the data quality of a tabular file using the inspection tools",
    { path: z.string().describe("Path to the .csv, .tsv or .json file to review") },
    handleDataQualityReview
  );
  console.error(`Registered prompt: ${DATA_QUALITY_REVIEW}`);
}
