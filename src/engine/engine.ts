import type { Config } from "../config.js";
import { resolveConfig } from "../config.js";
import type { ClassifierOptions } from "../types/field.js";
import type { ColumnReport, InspectionReport } from "../types/report.js";
import { UsageError } from "../utils/errors.js";
import { classifyField } from "./classify.js";
import { ColumnProfile } from "./column.js";
import { diagnose } from "./diagnostics.js";
import { createRandom } from "./reservoir.js";

// "merged" marks a shard whose state was handed to another engine
export type EngineState = "empty" | "streaming" | "finalized" | "reported" | "merged";

/**
 * Drives one pass over a table: header first, then rows in file order,
 * then finalize and report. Each instance is single-use.
 */
export class InspectionEngine {
  private state: EngineState = "empty";
  private columns: ColumnProfile[] = [];
  private rows = 0;
  private malformed = 0;
  private classifier: ClassifierOptions;
  private finalized: ColumnReport[] = [];

  constructor(private config: Config = resolveConfig()) {
    this.classifier = {
      missingTokens: config.missingTokens,
      booleanTrue: config.booleanTrue,
      booleanFalse: config.booleanFalse,
    };
  }

  get currentState(): EngineState {
    return this.state;
  }

  get rowCount(): number {
    return this.rows;
  }

  get malformedRowCount(): number {
    return this.malformed;
  }

  get header(): string[] {
    return this.columns.map(column => column.name);
  }

  private expect(state: EngineState, action: string): void {
    if (this.state !== state) {
      throw new UsageError(`Cannot ${action} while the engine is ${this.state}`);
    }
  }

  /**
   * Fix the column set. One accumulator per column, created here.
   */
  start(header: string[]): void {
    this.expect("empty", "start");
    // Each column samples from its own stream so results do not depend on column count
    this.columns = header.map((name, index) => new ColumnProfile(name, index, {
      reservoirCapacity: this.config.reservoirCapacity,
      distinctLimit: this.config.distinctLimit,
      outlierRobustZ: this.config.thresholds.outlierRobustZ,
      random: createRandom(this.config.seed + index),
    }));
    this.state = "streaming";
  }

  /**
   * Route each field to its column. A row with the wrong field count is
   * skipped and counted; returns false in that case.
   */
  ingest(fields: string[]): boolean {
    this.expect("streaming", "ingest a row");
    if (fields.length !== this.columns.length) {
      this.malformed += 1;
      return false;
    }
    this.columns.forEach((column, index) => {
      column.update(classifyField(fields[index] ?? "", this.classifier));
    });
    this.rows += 1;
    return true;
  }

  /**
   * Fold in an engine that streamed the rows immediately after this one's.
   * Shards must be merged in row order for reproducible results.
   */
  merge(shard: InspectionEngine): void {
    this.expect("streaming", "merge");
    shard.expect("streaming", "be merged");
    const header = shard.header;
    if (header.length !== this.columns.length || header.some((name, i) => name !== this.columns[i]?.name)) {
      throw new UsageError("Cannot merge engines with different headers");
    }
    this.columns.forEach((column, index) => {
      const other = shard.columns[index];
      if (other) {
        column.merge(other);
      }
    });
    this.rows += shard.rows;
    this.malformed += shard.malformed;
    shard.state = "merged";
  }

  finalize(): ColumnReport[] {
    this.expect("streaming", "finalize");
    this.finalized = this.columns.map(column => column.finalize());
    this.state = "finalized";
    return this.finalized;
  }

  report(): InspectionReport {
    this.expect("finalized", "report");
    const findings = diagnose(this.finalized, this.rows, this.config.thresholds);
    this.state = "reported";
    return {
      rowCount: this.rows,
      malformedRowCount: this.malformed,
      columns: this.finalized,
      findings,
    };
  }
}

/**
 * Run one complete pass over an in-memory table
 */
export function inspectRows(header: string[], rows: Iterable<string[]>, config?: Config): InspectionReport {
  const engine = new InspectionEngine(config);
  engine.start(header);
  for (const row of rows) {
    engine.ingest(row);
  }
  engine.finalize();
  return engine.report();
}
