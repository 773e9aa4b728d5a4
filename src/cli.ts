#!/usr/bin/env node
import process from "node:process";
import { parseArgs } from "node:util";
import { loadConfig } from "./config.js";
import { isEntryPoint } from "./utils/functions.js";
import { inspectFile } from "./inspect.js";
import { renderReport } from "./render/text.js";
import { ERROR_MESSAGES } from "./utils/constants.js";
import { DataInspectError } from "./utils/errors.js";

/**
 * Run the command line tool and return its exit code. The report goes to
 * stdout; usage and errors go to stderr.
 */
export async function runCli(args: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  let parsed;
  try {
    parsed = parseArgs({
      args,
      allowPositionals: true,
      options: {
        types: { type: "boolean", default: false },
        summary: { type: "boolean", default: false },
        diagnose: { type: "boolean", default: false },
        json: { type: "boolean", default: false },
      },
    });
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    console.error(ERROR_MESSAGES.NO_FILE);
    return 1;
  }

  const file = parsed.positionals[parsed.positionals.length - 1];
  if (!file) {
    console.error(ERROR_MESSAGES.NO_FILE);
    return 1;
  }

  try {
    const config = loadConfig(env);
    const report = await inspectFile(file, config);
    if (parsed.values.json) {
      console.log(JSON.stringify(report, null, 2));
    } else {
      console.log(renderReport(report, parsed.values));
    }
    return 0;
  } catch (error) {
    if (error instanceof DataInspectError) {
      console.error(error.getFormattedMessage());
      return 1;
    }
    throw error;
  }
}

if (isEntryPoint(import.meta.url)) {
  runCli(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch((error) => {
      console.error("Fatal error:", error);
      process.exit(1);
    });
}
