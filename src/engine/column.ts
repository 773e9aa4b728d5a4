import type { FieldValue } from "../types/field.js";
import type { ColumnReport } from "../types/report.js";
import { UsageError } from "../utils/errors.js";
import { CategoricalAccumulator } from "./categorical-accumulator.js";
import { NumericAccumulator, type NumericAccumulatorOptions } from "./numeric-accumulator.js";
import { ColumnTypeResolver } from "./type-resolver.js";

/**
 * State for one column over the pass. Fields are classified before the
 * column's type is known, so numeric values feed the numeric accumulator
 * and every non-missing value feeds the categorical one; finalize keeps
 * the one the resolved type selects and discards the other.
 */
export class ColumnProfile {
  private resolver = new ColumnTypeResolver();
  private numeric: NumericAccumulator;
  private categorical: CategoricalAccumulator;
  private rows = 0;
  private closed = false;

  constructor(
    readonly name: string,
    readonly index: number,
    options: NumericAccumulatorOptions
  ) {
    this.numeric = new NumericAccumulator(options);
    this.categorical = new CategoricalAccumulator(options.distinctLimit);
  }

  update(field: FieldValue): void {
    if (this.closed) {
      throw new UsageError(`Column "${this.name}" is already finalized`);
    }
    this.rows += 1;
    this.resolver.observe(field);
    switch (field.tag) {
      case "integer":
        this.numeric.update(Number(field.value), field.value);
        this.categorical.updateNumeric(field.value);
        break;
      case "float":
        this.numeric.update(field.value);
        this.categorical.updateNumeric(field.value);
        break;
      case "boolean":
      case "text":
        this.categorical.update(field.value);
        break;
      case "missing":
        break;
    }
  }

  merge(other: ColumnProfile): void {
    if (this.closed || other.closed) {
      throw new UsageError(`Column "${this.name}" is already finalized`);
    }
    this.rows += other.rows;
    this.resolver.merge(other.resolver);
    this.numeric.merge(other.numeric);
    this.categorical.merge(other.categorical);
  }

  finalize(): ColumnReport {
    if (this.closed) {
      throw new UsageError(`Column "${this.name}" is already finalized`);
    }
    this.closed = true;

    const resolution = this.resolver.finalize();
    const base = {
      name: this.name,
      index: this.index,
      inferredType: resolution.columnType,
      majorityType: resolution.majority,
      rowCount: this.rows,
      missingCount: resolution.missingCount,
      nonMissingCount: resolution.nonMissingCount,
      nonconformingCount: resolution.nonconformingCount,
    };

    if (resolution.accumulation === "numeric") {
      return { ...base, kind: "numeric", numeric: this.numeric.finalize() };
    }
    return { ...base, kind: "categorical", categorical: this.categorical.finalize() };
  }
}
