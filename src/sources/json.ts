import { InputError } from "../utils/errors.js";
import { ERROR_MESSAGES } from "../utils/constants.js";
import { isValidObject } from "../utils/typeguards.js";

export interface JsonTable {
  header: string[];
  rows: string[][];
}

/**
 * Render one JSON value as the raw text a delimited file would carry
 */
function toField(value: unknown): string {
  if (value === null || value === undefined) {
    return "";
  }
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return JSON.stringify(value);
}

/**
 * Turn a JSON document into a table. Accepts an array of objects or a
 * single object; the first record's keys become the header.
 */
export function parseJsonRecords(text: string): JsonTable {
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    throw new InputError(
      `Invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
      ["Check that the file is a complete JSON document"]
    );
  }

  let records: Record<string, unknown>[];
  if (Array.isArray(document)) {
    records = document.filter(isValidObject);
    if (records.length === 0) {
      throw new InputError(ERROR_MESSAGES.UNSUPPORTED_JSON, ["The array holds no objects"]);
    }
  } else if (isValidObject(document)) {
    records = [document];
  } else {
    throw new InputError(ERROR_MESSAGES.UNSUPPORTED_JSON);
  }

  const header = Object.keys(records[0] ?? {});
  const rows = records.map(record => header.map(key => toField(record[key])));
  return { header, rows };
}
