import type { CategoricalSummary } from "../types/report.js";
import { UsageError } from "../utils/errors.js";

interface Entry {
  count: number;
  /** Position of the value's first appearance, for tie-breaks */
  order: number;
  numeric: boolean;
}

/**
 * Exact value frequencies for a non-numeric column with an incrementally
 * maintained modal value. Ties go to the value seen first.
 *
 * Numeric fields are counted too, keyed by their canonical text, so a
 * categorical column's counts cover every non-missing field. Only
 * `numericKeyLimit` distinct numeric keys are kept; later new numbers are
 * counted without a key and the distinct count becomes a lower bound.
 */
export class CategoricalAccumulator {
  private frequencies = new Map<string, Entry>();
  private nonMissing = 0;
  private numericKeys = 0;
  private untracked = 0;
  private modal: string | null = null;
  private modalEntry: Entry | null = null;
  private summary: CategoricalSummary | null = null;

  constructor(private numericKeyLimit: number = Infinity) {}

  update(value: string | boolean): void {
    this.assertOpen();
    this.add(String(value), 1, false);
  }

  updateNumeric(value: bigint | number): void {
    this.assertOpen();
    const key = String(value);
    if (this.numericKeys >= this.numericKeyLimit && !this.frequencies.has(key)) {
      this.nonMissing += 1;
      this.untracked += 1;
      return;
    }
    this.add(key, 1, true);
  }

  private add(key: string, count: number, numeric: boolean): void {
    this.nonMissing += count;
    let entry = this.frequencies.get(key);
    if (!entry) {
      entry = { count: 0, order: this.frequencies.size, numeric };
      this.frequencies.set(key, entry);
      if (numeric) this.numericKeys += 1;
    }
    entry.count += count;

    const current = this.modalEntry;
    if (
      current === null ||
      entry.count > current.count ||
      (entry.count === current.count && entry.order < current.order)
    ) {
      this.modal = key;
      this.modalEntry = entry;
    }
  }

  /**
   * Fold in an accumulator over a later slice of the same column. Its
   * values keep their first-seen order after this one's.
   */
  merge(other: CategoricalAccumulator): void {
    this.assertOpen();
    other.assertOpen();
    const entries = Array.from(other.frequencies.entries()).sort((a, b) => a[1].order - b[1].order);
    for (const [key, entry] of entries) {
      this.add(key, entry.count, entry.numeric);
    }
    this.nonMissing += other.untracked;
    this.untracked += other.untracked;
  }

  get distinctCount(): number {
    return this.frequencies.size;
  }

  frequencyOf(value: string): number {
    return this.frequencies.get(value)?.count ?? 0;
  }

  private assertOpen(): void {
    if (this.summary) {
      throw new UsageError("Categorical accumulator is already finalized");
    }
  }

  finalize(): CategoricalSummary {
    this.assertOpen();
    const modalFrequency = this.modalEntry?.count ?? 0;
    const n = this.nonMissing;
    this.summary = {
      nonMissingCount: n,
      distinctCount: this.frequencies.size,
      distinctExact: this.untracked === 0,
      distinctRatio: n > 0 ? this.frequencies.size / n : 0,
      modalValue: this.modal,
      modalFrequency,
      modalFraction: n > 0 ? modalFrequency / n : 0,
    };
    return this.summary;
  }
}
