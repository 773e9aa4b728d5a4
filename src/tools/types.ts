/**
 * Shape every tool handler resolves to, compatible with the MCP SDK's
 * CallToolResult
 */
export interface ToolResponse {
  [key: string]: unknown;
  content: { type: "text"; text: string }[];
  isError?: boolean;
}
