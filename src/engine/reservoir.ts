/**
 * Seeded PRNG (mulberry32). Reservoir sampling must be reproducible so two
 * runs over the same file give the same report.
 */
export function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Fixed-capacity uniform sample of a stream (Algorithm R). `seen` counts
 * every value offered, so merged reservoirs stay uniform over the union.
 */
export class Reservoir {
  private items: number[] = [];
  private seenCount = 0;

  constructor(
    readonly capacity: number,
    private random: () => number
  ) {}

  get seen(): number {
    return this.seenCount;
  }

  /** True while every value offered is still retained */
  get complete(): boolean {
    return this.items.length === this.seenCount;
  }

  add(value: number): void {
    this.seenCount += 1;
    if (this.items.length < this.capacity) {
      this.items.push(value);
      return;
    }
    const slot = Math.floor(this.random() * this.seenCount);
    if (slot < this.capacity) {
      this.items[slot] = value;
    }
  }

  /**
   * Merge a reservoir over a later slice of the same column. The number of
   * draws from each side follows sampling without replacement from the two
   * seen populations; the draws themselves are uniform within each side.
   */
  merge(other: Reservoir): void {
    const total = this.seenCount + other.seenCount;
    if (this.complete && other.complete && total <= this.capacity) {
      this.items = this.items.concat(other.items);
      this.seenCount = total;
      return;
    }

    const left = this.items.slice();
    const right = other.items.slice();
    let leftWeight = this.seenCount;
    let rightWeight = other.seenCount;
    const size = Math.min(this.capacity, left.length + right.length);
    const merged: number[] = [];

    while (merged.length < size) {
      const fromLeft =
        right.length === 0 ||
        (left.length > 0 && this.random() * (leftWeight + rightWeight) < leftWeight);
      const pool = fromLeft ? left : right;
      const index = Math.floor(this.random() * pool.length);
      const last = pool.pop();
      if (last === undefined) {
        break;
      }
      if (index < pool.length) {
        merged.push(pool[index] ?? last);
        pool[index] = last;
      } else {
        merged.push(last);
      }
      if (fromLeft) {
        leftWeight = Math.max(0, leftWeight - 1);
      } else {
        rightWeight = Math.max(0, rightWeight - 1);
      }
    }

    this.items = merged;
    this.seenCount = total;
  }

  /** Sorted copy of the retained values */
  sorted(): number[] {
    return this.items.slice().sort((a, b) => a - b);
  }

  get size(): number {
    return this.items.length;
  }
}
