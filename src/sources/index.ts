import { createReadStream } from "node:fs";
import { readFile, stat } from "node:fs/promises";
import { extname } from "node:path";
import { SUPPORTED_EXTENSIONS } from "../utils/constants.js";
import { InputError } from "../utils/errors.js";
import { isErrnoException } from "../utils/typeguards.js";
import { readDelimitedRows } from "./delimited.js";
import { parseJsonRecords } from "./json.js";
import type { FileType, RowSource } from "./types.js";

export type { FileType, RowSource } from "./types.js";
export { readDelimitedRows } from "./delimited.js";
export { parseJsonRecords } from "./json.js";

function fileTypeOf(path: string): FileType {
  const extension = extname(path).slice(1).toLowerCase();
  const match = SUPPORTED_EXTENSIONS.find(supported => supported === extension);
  if (!match) {
    throw new InputError(`Unsupported file type: ${extension || "(none)"}`, [
      `Use one of: ${SUPPORTED_EXTENSIONS.map(e => `.${e}`).join(", ")}`,
    ]);
  }
  return match;
}

async function* jsonRows(path: string): AsyncGenerator<string[]> {
  const table = parseJsonRecords(await readFile(path, "utf8"));
  yield table.header;
  yield* table.rows;
}

/**
 * Open a file as a row source, choosing the reader from its extension
 */
export async function openRowSource(path: string): Promise<RowSource> {
  const fileType = fileTypeOf(path);
  try {
    const info = await stat(path);
    if (!info.isFile()) {
      throw new InputError(`Not a file: ${path}`);
    }
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      throw new InputError(`File not found: ${path}`, ["Check the path and try again"]);
    }
    throw error;
  }

  if (fileType === "json") {
    return { fileType, rows: jsonRows(path) };
  }
  const delimiter = fileType === "tsv" ? "\t" : ",";
  return { fileType, rows: readDelimitedRows(createReadStream(path), { delimiter }) };
}
