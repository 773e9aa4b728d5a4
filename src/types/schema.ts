import { z } from "zod";

export const SeveritySchema = z.enum(["info", "warning", "critical"]);

/**
 * Schema for inspecting a file
 */
export const InspectFileSchema = z.object({
  path: z.string().min(1).describe("Path to a .csv, .tsv or .json file"),
  includeFindings: z.boolean().optional().default(true).describe("Include data-quality findings in the report"),
});

/**
 * Schema for listing a file's data-quality findings
 */
export const DiagnoseFileSchema = z.object({
  path: z.string().min(1).describe("Path to a .csv, .tsv or .json file"),
  minSeverity: SeveritySchema.optional().default("info").describe("Only report findings at or above this severity"),
});

export type InspectFileParams = z.input<typeof InspectFileSchema>;
export type DiagnoseFileParams = z.input<typeof DiagnoseFileSchema>;
