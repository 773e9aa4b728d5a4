import { DataInspectError } from "./errors.js";
import { z } from "zod";

export interface ToolErrorResponse {
  [key: string]: unknown;
  content: { type: "text"; text: string }[];
  isError: true;
}

/**
 * Handles errors from tool execution and returns a formatted error response
 */
export function handleToolError(
  error: unknown,
  toolName: string,
  options: {
    suppressConsole?: boolean;
    path?: string;
  } = {}
): ToolErrorResponse {
  let errorMessage = "Unknown error occurred";

  if (error instanceof DataInspectError) {
    errorMessage = error.getFormattedMessage();
  } else if (error instanceof z.ZodError) {
    errorMessage = `Invalid parameters: ${error.errors.map(err => `${err.path.join('.')}: ${err.message}`).join(", ")}`;
  } else if (error instanceof Error) {
    errorMessage = error.message;
  }

  // Log the error to stderr for debugging, unless suppressed
  if (!options.suppressConsole) {
    console.error(`Tool '${toolName}' failed:`, error);
  }

  const target = options.path ? ` on '${options.path}'` : "";
  const helpText = `Failed to execute tool '${toolName}'${target}: ${errorMessage}\n\n` +
    `Please verify:\n` +
    `- The path exists and is readable by the server\n` +
    `- The file is a .csv, .tsv or .json file\n` +
    `- The file has a header row\n`;

  return {
    content: [
      {
        type: "text",
        text: helpText,
      },
    ],
    isError: true,
  };
}
