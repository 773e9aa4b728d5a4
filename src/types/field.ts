/**
 * One classified field. Produced fresh per field by the classifier.
 */
export type FieldValue =
  | { tag: "missing" }
  | { tag: "integer"; value: bigint }
  | { tag: "float"; value: number }
  | { tag: "boolean"; value: boolean }
  | { tag: "text"; value: string };

export type ValueTag = FieldValue["tag"];

/**
 * Options the classifier needs; all tokens are matched case-insensitively
 */
export interface ClassifierOptions {
  missingTokens: string[];
  booleanTrue: string[];
  booleanFalse: string[];
}
