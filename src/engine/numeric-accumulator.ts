import type { NumericSummary } from "../types/report.js";
import { MAD_SCALE, MEAN_AD_SCALE } from "../utils/constants.js";
import { UsageError } from "../utils/errors.js";
import { Reservoir } from "./reservoir.js";

export interface NumericAccumulatorOptions {
  reservoirCapacity: number;
  distinctLimit: number;
  outlierRobustZ: number;
  random: () => number;
}

/**
 * Median of an already sorted array
 */
export function median(sorted: number[]): number | null {
  const n = sorted.length;
  if (n === 0) return null;
  const mid = Math.floor(n / 2);
  const upper = sorted[mid] ?? 0;
  if (n % 2 === 1) return upper;
  const lower = sorted[mid - 1] ?? upper;
  return (lower + upper) / 2;
}

/**
 * Robust center and scale of a sample: median and normal-consistent MAD.
 * `scale` falls back to the scaled mean absolute deviation when more than
 * half the sample sits on the median.
 */
export function robustScale(sorted: number[]): { center: number; mad: number; scale: number } | null {
  const center = median(sorted);
  if (center === null) return null;

  const deviations = sorted.map(x => Math.abs(x - center)).sort((a, b) => a - b);
  const mad = (median(deviations) ?? 0) * MAD_SCALE;
  if (mad > 0) {
    return { center, mad, scale: mad };
  }
  const meanAbs = deviations.reduce((sum, d) => sum + d, 0) / deviations.length;
  return { center, mad, scale: meanAbs * MEAN_AD_SCALE };
}

/**
 * Online statistics for one numeric column: Welford mean/variance,
 * min/max, a reservoir for median/MAD and distinct integer tracking
 */
export class NumericAccumulator {
  private count = 0;
  private mean = 0;
  private m2 = 0;
  private min = Infinity;
  private max = -Infinity;
  private reservoir: Reservoir;
  private distinct: Set<bigint> | null = new Set();
  private distinctOverflow = false;
  private summary: NumericSummary | null = null;

  constructor(private options: NumericAccumulatorOptions) {
    this.reservoir = new Reservoir(options.reservoirCapacity, options.random);
  }

  /**
   * Fold one value in. Integer fields pass their exact value so distinct
   * identifiers can be counted; a float disables distinct tracking.
   */
  update(x: number, exact?: bigint): void {
    this.assertOpen();
    this.count += 1;
    const delta = x - this.mean;
    this.mean += delta / this.count;
    const delta2 = x - this.mean;
    this.m2 += delta * delta2;

    if (x < this.min) this.min = x;
    if (x > this.max) this.max = x;

    this.reservoir.add(x);
    this.trackDistinct(exact);
  }

  private trackDistinct(exact: bigint | undefined): void {
    if (this.distinct === null) return;
    if (exact === undefined) {
      this.distinct = null;
      return;
    }
    if (this.distinct.size < this.options.distinctLimit || this.distinct.has(exact)) {
      this.distinct.add(exact);
    } else {
      this.distinctOverflow = true;
    }
  }

  /**
   * Combine with an accumulator over a later slice of the same column
   * using the parallel variance formula
   */
  merge(other: NumericAccumulator): void {
    this.assertOpen();
    other.assertOpen();
    if (other.count === 0) return;

    const total = this.count + other.count;
    const delta = other.mean - this.mean;
    this.mean += delta * (other.count / total);
    this.m2 += other.m2 + delta * delta * ((this.count * other.count) / total);
    this.count = total;
    this.min = Math.min(this.min, other.min);
    this.max = Math.max(this.max, other.max);
    this.reservoir.merge(other.reservoir);

    if (this.distinct === null || other.distinct === null) {
      this.distinct = null;
    } else {
      for (const value of other.distinct) {
        if (this.distinct.size < this.options.distinctLimit || this.distinct.has(value)) {
          this.distinct.add(value);
        } else {
          this.distinctOverflow = true;
        }
      }
      this.distinctOverflow = this.distinctOverflow || other.distinctOverflow;
    }
  }

  private assertOpen(): void {
    if (this.summary) {
      throw new UsageError("Numeric accumulator is already finalized");
    }
  }

  finalize(): NumericSummary {
    this.assertOpen();
    const hasValues = this.count > 0;
    const sample = this.reservoir.sorted();
    const robust = robustScale(sample);

    let sampleOutliers = 0;
    if (robust && robust.scale > 0) {
      for (const x of sample) {
        if (Math.abs(x - robust.center) / robust.scale >= this.options.outlierRobustZ) {
          sampleOutliers += 1;
        }
      }
    }

    const exact = this.reservoir.complete;
    const outlierCount = exact || sample.length === 0
      ? sampleOutliers
      : Math.round((sampleOutliers * this.reservoir.seen) / sample.length);

    this.summary = {
      count: this.count,
      min: hasValues ? this.min : null,
      max: hasValues ? this.max : null,
      mean: hasValues ? this.mean : null,
      stddev: this.count > 1 ? Math.sqrt(this.m2 / (this.count - 1)) : null,
      median: robust ? robust.center : null,
      mad: robust ? robust.mad : null,
      outlierCount,
      outlierCountExact: exact,
      distinctCount: hasValues && this.distinct ? this.distinct.size : null,
      distinctExact: this.distinct !== null && !this.distinctOverflow,
      integerOnly: hasValues && this.distinct !== null,
    };
    return this.summary;
  }

  /** Sample variance, null with fewer than two values */
  get variance(): number | null {
    return this.count > 1 ? this.m2 / (this.count - 1) : null;
  }
}
