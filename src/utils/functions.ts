import { realpathSync } from "node:fs";
import process from "node:process";
import { pathToFileURL } from "node:url";

/**
 * True when the module at `moduleUrl` is the script Node was started with.
 * Resolves symlinks so npm's bin links count.
 */
export function isEntryPoint(moduleUrl: string): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return moduleUrl === pathToFileURL(realpathSync(script)).href;
  } catch {
    // argv[1] is not a readable path (e.g. a REPL)
    return false;
  }
}
