import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { Config } from "../config.js";
import { createInspectFileTool } from "./inspect-file.js";
import { createDiagnoseFileTool } from "./diagnose-file.js";

/**
 * Register all tools with the MCP server
 * 
 * @param server - The MCP server instance
 * @param config - Inspection configuration shared by every tool
 */
export function registerTools(server: McpServer, config: Config) {
  // Profiling tools
  const inspect = createInspectFileTool(config);
  server.tool(inspect.name, inspect.description, inspect.schema, inspect.handler);

  // Diagnostic tools
  const diagnoseTool = createDiagnoseFileTool(config);
  server.tool(diagnoseTool.name, diagnoseTool.description, diagnoseTool.schema, diagnoseTool.handler);
}
