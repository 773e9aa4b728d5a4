/**
 * Base error class for inspection failures
 */
export type ErrorCode = "INPUT" | "STREAM" | "USAGE" | "CONFIG";

export class DataInspectError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public suggestions: string[] = []
  ) {
    super(message);
    this.name = "DataInspectError";
  }

  /**
   * Get a formatted error message including suggestions
   */
  getFormattedMessage(): string {
    let output = this.message;
    if (this.suggestions.length > 0) {
      output += "\n\nSuggested next steps:";
      this.suggestions.forEach(suggestion => {
        output += `\n- ${suggestion}`;
      });
    }
    return output;
  }
}

/**
 * The input file cannot be inspected at all (unknown type, empty, bad structure)
 */
export class InputError extends DataInspectError {
  constructor(message: string, suggestions: string[] = []) {
    super("INPUT", message, suggestions);
    this.name = "InputError";
  }
}

/**
 * Reading rows failed part-way through; no report is produced
 */
export class StreamError extends DataInspectError {
  constructor(
    public rowIndex: number,
    public cause: unknown
  ) {
    super(
      "STREAM",
      `Failed to read input at data row ${rowIndex}: ${cause instanceof Error ? cause.message : String(cause)}`,
      ["Check that the file is readable and not truncated", "Re-run once the file is complete"]
    );
    this.name = "StreamError";
  }
}

/**
 * The engine was driven out of order. This is a programming error.
 */
export class UsageError extends DataInspectError {
  constructor(message: string) {
    super("USAGE", message);
    this.name = "UsageError";
  }
}
