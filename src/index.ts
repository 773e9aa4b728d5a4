#!/usr/bin/env node
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import process from "node:process";
import { loadConfig } from "./config.js";
import { isEntryPoint } from "./utils/functions.js";
import { registerTools } from "./tools/index.js";
import { registerPrompts } from "./prompts/index.js";

function checkNodeVersion() {
  const requiredMajorVersion = 20;
  const nodeVersion: string = process.versions.node;
  const majorVersion = nodeVersion.split('.')[0];
  if (!majorVersion) {
    console.error(`Error: Unable to determine Node.js major version. Node.js version ${requiredMajorVersion} or higher is required.`);
    process.exit(1);
  }

  const currentMajorVersion = parseInt(majorVersion, 10);
  if (isNaN(currentMajorVersion) || currentMajorVersion < requiredMajorVersion) {
    console.error(
      `Error: Node.js version ${requiredMajorVersion} or higher is required. Current version: ${nodeVersion}`
    );
    process.exit(1);
  }
}

/**
 * Build the MCP server with every tool and prompt registered
 */
export function createServer(config = loadConfig()): McpServer {
  const server = new McpServer({
    name: "datainspect",
    version: "0.1.0",
  });

  registerTools(server, config);
  registerPrompts(server);
  return server;
}

/**
 * Main function to run the datainspect MCP server
 */
async function main() {
  checkNodeVersion();
  console.error("Loading configuration from environment variables...");
  const config = loadConfig();
  console.error(
    `Reservoir capacity ${config.reservoirCapacity}, outlier threshold ${config.thresholds.outlierRobustZ} robust deviations`
  );

  const server = createServer(config);
  const transport = new StdioServerTransport();

  const maxRetries = 3;
  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      await server.connect(transport);
      console.error("datainspect MCP server running on stdio");
      return;
    } catch (error) {
      console.error(`Connection attempt ${attempt} failed: ${error instanceof Error ? error.message : String(error)}`);
      if (attempt < maxRetries) {
        console.error(`Retrying in 1 second...`);
        await new Promise(resolve => setTimeout(resolve, 1000));
      }
    }
  }
  throw new Error(`Could not connect after ${maxRetries} attempts`);
}

// Run main with proper error handling
if (isEntryPoint(import.meta.url)) {
  main().catch((error) => {
    console.error("Fatal error in main():", error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
}
