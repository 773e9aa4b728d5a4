import { resolveConfig, type Config } from "./config.js";
import { InspectionEngine } from "./engine/engine.js";
import { openRowSource } from "./sources/index.js";
import type { FileType, RowSource } from "./sources/types.js";
import type { InspectionReport } from "./types/report.js";
import { DataInspectError, InputError, StreamError } from "./utils/errors.js";
import { ERROR_MESSAGES } from "./utils/constants.js";

export interface FileInspection extends InspectionReport {
  path: string;
  fileType: FileType;
}

async function nextRow(
  iterator: AsyncIterator<string[]>,
  dataRows: number
): Promise<IteratorResult<string[]>> {
  try {
    return await iterator.next();
  } catch (error) {
    if (error instanceof DataInspectError) {
      throw error;
    }
    throw new StreamError(dataRows, error);
  }
}

/**
 * Run one pass over a row source. A read failure aborts the pass with a
 * StreamError naming the data row it happened at; no report is produced.
 */
export async function inspectSource(source: RowSource, config: Config = resolveConfig()): Promise<InspectionReport> {
  const engine = new InspectionEngine(config);
  const iterator = source.rows[Symbol.asyncIterator]();
  let dataRows = 0;

  try {
    for (;;) {
      const next = await nextRow(iterator, dataRows);
      if (next.done) break;
      // Engine failures are not read failures and propagate as they are
      if (engine.currentState === "empty") {
        engine.start(next.value);
        continue;
      }
      engine.ingest(next.value);
      dataRows += 1;
    }
  } catch (error) {
    await iterator.return?.();
    throw error;
  }

  if (engine.currentState === "empty") {
    throw new InputError(ERROR_MESSAGES.EMPTY_INPUT, ["Check that the file is not empty"]);
  }
  if (engine.malformedRowCount > 0) {
    console.error(`Skipped ${engine.malformedRowCount} malformed row(s) with the wrong field count`);
  }

  engine.finalize();
  return engine.report();
}

/**
 * Open a file by extension and inspect it
 */
export async function inspectFile(path: string, config: Config = resolveConfig()): Promise<FileInspection> {
  const source = await openRowSource(path);
  const report = await inspectSource(source, config);
  return { path, fileType: source.fileType, ...report };
}
