import type { FieldValue } from "../types/field.js";
import type { AccumulationKind, ColumnType } from "../types/report.js";
import { UsageError } from "../utils/errors.js";

type Vote = Exclude<ColumnType, "mixed">;

// Tie-break order: earlier wins
const VOTE_PRIORITY: Vote[] = ["numeric", "boolean", "categorical"];

export interface TypeResolution {
  /** Majority vote among non-missing fields */
  majority: Vote;
  /** Reported type: the majority, or "mixed" when any field disagrees */
  columnType: ColumnType;
  /** Which accumulator variant the column keeps */
  accumulation: AccumulationKind;
  missingCount: number;
  nonMissingCount: number;
  nonconformingCount: number;
}

function voteFor(field: FieldValue): Vote | null {
  switch (field.tag) {
    case "missing":
      return null;
    case "integer":
    case "float":
      return "numeric";
    case "boolean":
      return "boolean";
    case "text":
      return "categorical";
  }
}

/**
 * Collects one classification per row for a column and resolves the
 * column's type once the stream ends
 */
export class ColumnTypeResolver {
  private votes: Record<Vote, number> = { numeric: 0, boolean: 0, categorical: 0 };
  private missing = 0;
  private resolution: TypeResolution | null = null;

  observe(field: FieldValue): void {
    if (this.resolution) {
      throw new UsageError("Cannot observe a field after the column type was resolved");
    }
    const vote = voteFor(field);
    if (vote === null) {
      this.missing += 1;
      return;
    }
    this.votes[vote] += 1;
  }

  /**
   * Fold in the counts of a resolver that saw a later slice of the rows
   */
  merge(other: ColumnTypeResolver): void {
    if (this.resolution || other.resolution) {
      throw new UsageError("Cannot merge resolvers after resolution");
    }
    for (const vote of VOTE_PRIORITY) {
      this.votes[vote] += other.votes[vote];
    }
    this.missing += other.missing;
  }

  finalize(): TypeResolution {
    if (this.resolution) {
      throw new UsageError("Column type was already resolved");
    }

    const nonMissingCount = VOTE_PRIORITY.reduce((sum, vote) => sum + this.votes[vote], 0);
    let majority: Vote = "categorical";
    if (nonMissingCount > 0) {
      majority = VOTE_PRIORITY.reduce((best, vote) =>
        this.votes[vote] > this.votes[best] ? vote : best
      );
    }

    const nonconformingCount = nonMissingCount - this.votes[majority];
    this.resolution = {
      majority,
      columnType: nonconformingCount > 0 ? "mixed" : majority,
      accumulation: majority === "numeric" ? "numeric" : "categorical",
      missingCount: this.missing,
      nonMissingCount,
      nonconformingCount,
    };
    return this.resolution;
  }
}
