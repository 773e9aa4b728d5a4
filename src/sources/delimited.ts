import { parse } from "csv-parse";
import type { Readable } from "node:stream";

export interface DelimitedOptions {
  delimiter: string;
}

/**
 * Tokenize a delimited stream into rows of raw fields. Rows keep whatever
 * field count they have; the engine decides which are malformed.
 */
export async function* readDelimitedRows(
  input: Readable,
  options: DelimitedOptions
): AsyncGenerator<string[]> {
  const parser = parse({
    delimiter: options.delimiter,
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
    relax_quotes: true,
  });

  // pipe() does not forward source errors
  input.on("error", error => parser.destroy(error));
  input.pipe(parser);

  for await (const record of parser) {
    if (Array.isArray(record)) {
      yield record.map(field => String(field));
    }
  }
}
