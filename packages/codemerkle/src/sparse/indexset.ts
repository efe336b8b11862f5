/**
 * SparseIndexSet - a set of non-negative integers stored as runs
 *
 * Elements are kept as a sorted list of disjoint, non-adjacent half-open runs
 * [start, end). Memory and query cost scale with the number of runs, never
 * with the magnitude of the largest element, so a handful of executed bytes
 * near the end of a 24KiB domain costs the same as a handful near the start.
 */
export class SparseIndexSet implements Iterable<number> {
  private starts: number[] = [];
  private ends: number[] = [];
  private count = 0;

  /**
   * Builds a set from an explicit list of elements (duplicates allowed, any order)
   */
  static from(values: Iterable<number>): SparseIndexSet {
    const set = new SparseIndexSet();
    for (const value of values) {
      set.add(value);
    }
    return set;
  }

  /** Number of elements in the set */
  get size(): number {
    return this.count;
  }

  get isEmpty(): boolean {
    return this.count === 0;
  }

  add(value: number): void {
    checkIndex(value, "value");
    this.addRange(value, value + 1);
  }

  /**
   * Unions every integer in [lo, hi) into the set. An empty or inverted range
   * is a no-op.
   */
  addRange(lo: number, hi: number): void {
    checkIndex(lo, "lo");
    checkIndex(hi, "hi");
    if (hi <= lo) {
      return;
    }

    const runCount = this.starts.length;

    // Appending at (or touching) the tail is the common case when sets are
    // built in ascending order, so skip the search for it.
    if (runCount === 0 || lo > this.ends[runCount - 1]) {
      this.starts.push(lo);
      this.ends.push(hi);
      this.count += hi - lo;
      return;
    }

    // First run that ends at or after lo can merge with [lo, hi)
    const first = this.firstRunEndingAtOrAfter(lo);
    let last = first;
    let mergedStart = lo;
    let mergedEnd = hi;
    let absorbed = 0;
    while (last < runCount && this.starts[last] <= hi) {
      mergedStart = Math.min(mergedStart, this.starts[last]);
      mergedEnd = Math.max(mergedEnd, this.ends[last]);
      absorbed += this.ends[last] - this.starts[last];
      last++;
    }

    this.starts.splice(first, last - first, mergedStart);
    this.ends.splice(first, last - first, mergedEnd);
    this.count += mergedEnd - mergedStart - absorbed;
  }

  has(value: number): boolean {
    if (!Number.isSafeInteger(value) || value < 0) {
      return false;
    }
    const run = this.lastRunStartingAtOrBefore(value);
    return run >= 0 && value < this.ends[run];
  }

  /**
   * Largest element
   * @throws RangeError if the set is empty
   */
  max(): number {
    if (this.count === 0) {
      throw new RangeError("max() of an empty SparseIndexSet");
    }
    return this.ends[this.ends.length - 1] - 1;
  }

  /**
   * Smallest element
   * @throws RangeError if the set is empty
   */
  min(): number {
    if (this.count === 0) {
      throw new RangeError("min() of an empty SparseIndexSet");
    }
    return this.starts[0];
  }

  /**
   * Number of elements x with lo <= x < hi; 0 for an empty or inverted range
   */
  countInRange(lo: number, hi: number): number {
    checkIndex(lo, "lo");
    checkIndex(hi, "hi");
    if (hi <= lo) {
      return 0;
    }
    let total = 0;
    for (
      let run = this.firstRunEndingAfter(lo);
      run < this.starts.length && this.starts[run] < hi;
      run++
    ) {
      total += Math.min(this.ends[run], hi) - Math.max(this.starts[run], lo);
    }
    return total;
  }

  /**
   * Ascending elements x with lo <= x < hi
   */
  elementsInRange(lo: number, hi: number): number[] {
    const elements: number[] = [];
    for (const [start, end] of this.clampedRuns(lo, hi)) {
      for (let value = start; value < end; value++) {
        elements.push(value);
      }
    }
    return elements;
  }

  /**
   * The subset of elements in [lo, hi) as a new set
   */
  clamp(lo: number, hi: number): SparseIndexSet {
    const clamped = new SparseIndexSet();
    for (const [start, end] of this.clampedRuns(lo, hi)) {
      clamped.addRange(start, end);
    }
    return clamped;
  }

  /**
   * Ascending runs as [start, end) pairs
   */
  *runs(): IterableIterator<readonly [number, number]> {
    for (let run = 0; run < this.starts.length; run++) {
      yield [this.starts[run], this.ends[run]];
    }
  }

  *values(): IterableIterator<number> {
    for (const [start, end] of this.runs()) {
      for (let value = start; value < end; value++) {
        yield value;
      }
    }
  }

  [Symbol.iterator](): IterableIterator<number> {
    return this.values();
  }

  toArray(): number[] {
    return Array.from(this.values());
  }

  clone(): SparseIndexSet {
    const copy = new SparseIndexSet();
    copy.starts = [...this.starts];
    copy.ends = [...this.ends];
    copy.count = this.count;
    return copy;
  }

  equals(other: SparseIndexSet): boolean {
    if (this.count !== other.count || this.starts.length !== other.starts.length) {
      return false;
    }
    for (let run = 0; run < this.starts.length; run++) {
      if (
        this.starts[run] !== other.starts[run] ||
        this.ends[run] !== other.ends[run]
      ) {
        return false;
      }
    }
    return true;
  }

  // --- Helper functions ---

  private *clampedRuns(
    lo: number,
    hi: number,
  ): IterableIterator<readonly [number, number]> {
    checkIndex(lo, "lo");
    checkIndex(hi, "hi");
    if (hi <= lo) {
      return;
    }
    for (
      let run = this.firstRunEndingAfter(lo);
      run < this.starts.length && this.starts[run] < hi;
      run++
    ) {
      yield [Math.max(this.starts[run], lo), Math.min(this.ends[run], hi)];
    }
  }

  /** Index of the first run with end > value, or the run count */
  private firstRunEndingAfter(value: number): number {
    let lo = 0;
    let hi = this.ends.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.ends[mid] > value) {
        hi = mid;
      } else {
        lo = mid + 1;
      }
    }
    return lo;
  }

  /** Index of the first run with end >= value, or the run count */
  private firstRunEndingAtOrAfter(value: number): number {
    return value === 0 ? 0 : this.firstRunEndingAfter(value - 1);
  }

  /** Index of the last run with start <= value, or -1 */
  private lastRunStartingAtOrBefore(value: number): number {
    let lo = 0;
    let hi = this.starts.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.starts[mid] <= value) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return lo - 1;
  }
}

function checkIndex(value: number, name: string): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(
      `${name} must be a non-negative safe integer, got ${value}`,
    );
  }
}
