import { describe, it, expect, afterEach } from "vitest";
import { realpathSync } from "node:fs";
import { fileURLToPath, pathToFileURL } from "node:url";
import { isEntryPoint } from "./functions.js";

describe("isEntryPoint", () => {
  const originalArgv = process.argv;

  afterEach(() => {
    process.argv = originalArgv;
  });

  it("is false for a module that is not the started script", () => {
    expect(isEntryPoint(import.meta.url)).toBe(false);
  });

  it("is true for the script Node was started with", () => {
    const script = realpathSync(fileURLToPath(import.meta.url));
    process.argv = [originalArgv[0] ?? "node", script];
    expect(isEntryPoint(pathToFileURL(script).href)).toBe(true);
  });

  it("is false when there is no script path", () => {
    process.argv = [originalArgv[0] ?? "node"];
    expect(isEntryPoint(pathToFileURL("/tmp/cli.js").href)).toBe(false);
  });

  it("is false when the script path cannot be resolved", () => {
    process.argv = [originalArgv[0] ?? "node", "/does/not/exist.js"];
    expect(isEntryPoint(pathToFileURL("/does/not/exist.js").href)).toBe(false);
  });
});
