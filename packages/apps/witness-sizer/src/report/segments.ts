/**
 * Segment size statistics
 */

const SPARK_BARS = "▁▂▃▄▅▆▇█";

/**
 * Median of ascending values
 */
export function median(sorted: readonly number[]): number {
  if (sorted.length === 0) {
    throw new RangeError("median of an empty list");
  }
  const mid = sorted.length >> 1;
  return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

/**
 * Segment lengths kept as a count per distinct length.
 *
 * Lengths are bounded by the maximum code size, so memory stays bounded over
 * a whole run while the median remains exact.
 */
export class SegmentSizeHistogram {
  private readonly counts = new Map<number, number>();
  private total = 0;

  get count(): number {
    return this.total;
  }

  add(size: number): void {
    this.counts.set(size, (this.counts.get(size) ?? 0) + 1);
    this.total++;
  }

  addAll(sizes: Iterable<number>): void {
    for (const size of sizes) {
      this.add(size);
    }
  }

  /**
   * Median of every length added, or undefined when empty
   */
  median(): number | undefined {
    if (this.total === 0) {
      return undefined;
    }
    const mid = this.total >> 1;
    return this.total % 2 === 1
      ? this.valueAt(mid)
      : (this.valueAt(mid - 1) + this.valueAt(mid)) / 2;
  }

  /** Value at a position of the ascending order */
  private valueAt(position: number): number {
    let seen = 0;
    for (const size of [...this.counts.keys()].sort((a, b) => a - b)) {
      seen += this.counts.get(size) ?? 0;
      if (seen > position) {
        return size;
      }
    }
    throw new RangeError(`position ${position} is beyond ${this.total} sizes`);
  }
}

/**
 * One bar per value, scaled between the smallest and largest value
 */
export function sparkline(values: readonly number[]): string {
  if (values.length === 0) {
    return "";
  }
  const lo = Math.min(...values);
  const hi = Math.max(...values);
  const top = SPARK_BARS.length - 1;
  return values
    .map((value) =>
      SPARK_BARS[hi === lo ? 0 : Math.round(((value - lo) / (hi - lo)) * top)],
    )
    .join("");
}

/**
 * Summarises ascending segment lengths as a sparkline over one-byte buckets.
 *
 * Half the segments are at most the median long, so buckets span 1 to
 * 2 * median - 1 bytes; the share of longer segments is reported as a
 * percentage instead of being drawn.
 *
 * @example
 * segmentSizeSummary([1, 1, 2, 3, 3, 3]) // "median=2\t\t1▅▁█3 (+0% more)"
 */
export function segmentSizeSummary(sorted: readonly number[]): string {
  if (sorted.length === 0) {
    return "no segments";
  }

  const mid = Math.trunc(median(sorted));
  const lastBucket = 2 * mid - 1;
  if (lastBucket < 1) {
    return `can't bucketize sizes=[${sorted.join(",")}]`;
  }

  const buckets = new Array<number>(lastBucket).fill(0);
  let drawn = 0;
  for (const size of sorted) {
    if (size > lastBucket) {
      // sorted, so everything after is longer too
      break;
    }
    if (size >= 1) {
      buckets[size - 1]++;
      drawn++;
    }
  }

  const remaining = (1 - drawn / sorted.length) * 100;
  return `median=${mid}\t\t1${sparkline(buckets)}${lastBucket} (+${remaining.toFixed(0)}% more)`;
}
