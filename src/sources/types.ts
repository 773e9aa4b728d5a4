export type FileType = "csv" | "tsv" | "json";

/**
 * An opened input. `rows` yields the header first, then data rows in
 * file order, each as raw field strings.
 */
export interface RowSource {
  fileType: FileType;
  rows: AsyncIterable<string[]>;
}
