import { describe, it, expect, vi } from "vitest";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { createServer } from "./index.js";
import { resolveConfig } from "./config.js";

describe("createServer", () => {
  it("builds a server with tools and prompts registered", () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const tool = vi.spyOn(McpServer.prototype, "tool");
    const prompt = vi.spyOn(McpServer.prototype, "prompt");

    const server = createServer(resolveConfig());

    expect(server).toBeInstanceOf(McpServer);
    expect(tool).toHaveBeenCalledTimes(2);
    expect(prompt).toHaveBeenCalledTimes(1);
  });
});
