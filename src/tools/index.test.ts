import { describe, it, expect, vi } from "vitest";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { registerTools } from "./index.js";
import { resolveConfig } from "../config.js";

describe("registerTools", () => {
  it("registers every tool with the server", () => {
    const server = new McpServer({ name: "test", version: "0.0.0" });
    const spy = vi.spyOn(server, "tool");
    registerTools(server, resolveConfig());
    expect(spy.mock.calls.map(call => call[0])).toEqual(["inspect_file", "diagnose_file"]);
  });
});
