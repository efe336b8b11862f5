/**
 * Running totals of executed bytes, chunks and witness hashes.
 *
 * One tally per scope (block, file, run). Chunk and hash counts are kept per
 * chunk size; hash sizes only come in when converting counts to overheads.
 */

export interface ChunkSizeTotals {
  chunks: number;
  hashes: number;
}

/**
 * Merklization overheads in percent of the executed bytes
 */
export interface Overhead {
  /** Unexecuted bytes carried by chunks */
  chunk: number;
  /** Witness hash bytes */
  hash: number;
  /** Chunks plus hashes beyond the executed bytes */
  total: number;
}

export class MerklizationTally {
  private executed = 0;
  private readonly totals = new Map<number, ChunkSizeTotals>();

  constructor(readonly chunkSizes: readonly number[]) {
    for (const chunkSize of chunkSizes) {
      this.totals.set(chunkSize, { chunks: 0, hashes: 0 });
    }
  }

  get executedBytes(): number {
    return this.executed;
  }

  addExecutedBytes(bytes: number): void {
    this.executed += bytes;
  }

  addEstimate(chunkSize: number, chunks: number, hashes: number): void {
    const totals = this.totalsFor(chunkSize);
    totals.chunks += chunks;
    totals.hashes += hashes;
  }

  /**
   * Adds another tally over the same chunk sizes into this one
   */
  merge(other: MerklizationTally): void {
    this.executed += other.executed;
    for (const [chunkSize, totals] of other.totals) {
      this.addEstimate(chunkSize, totals.chunks, totals.hashes);
    }
  }

  chunks(chunkSize: number): number {
    return this.totalsFor(chunkSize).chunks;
  }

  hashes(chunkSize: number): number {
    return this.totalsFor(chunkSize).hashes;
  }

  chunkBytes(chunkSize: number): number {
    return this.chunks(chunkSize) * chunkSize;
  }

  /**
   * Chunk overhead alone, or null when nothing was executed
   */
  chunkOverhead(chunkSize: number): number | null {
    if (this.executed === 0) {
      return null;
    }
    return ((this.chunkBytes(chunkSize) - this.executed) / this.executed) * 100;
  }

  /**
   * Overheads for a chunk and hash size, or null when nothing was executed
   */
  overhead(chunkSize: number, hashSize: number): Overhead | null {
    if (this.executed === 0) {
      return null;
    }
    const chunkBytes = this.chunkBytes(chunkSize);
    const hashBytes = this.hashes(chunkSize) * hashSize;
    return {
      chunk: ((chunkBytes - this.executed) / this.executed) * 100,
      hash: (hashBytes / this.executed) * 100,
      total: ((chunkBytes + hashBytes - this.executed) / this.executed) * 100,
    };
  }

  private totalsFor(chunkSize: number): ChunkSizeTotals {
    const totals = this.totals.get(chunkSize);
    if (totals === undefined) {
      throw new Error(`No totals kept for chunk size ${chunkSize}`);
    }
    return totals;
  }
}
