import type { SparseIndexSet } from "../sparse/indexset.js";

/**
 * Coverage of executed bytes by chunks
 */
export interface ChunkCoverage {
  /** Number of executed bytes */
  executedBytes: number;
  /** Bytes carried by the present chunks (chunks * chunkSize) */
  chunkedBytes: number;
  /** Whether chunkedBytes >= executedBytes */
  covered: boolean;
}

/**
 * Consistency check between a byte set and the chunk set derived from it.
 *
 * Chunking can only add bytes, so an uncovered result means the chunk set
 * was derived incorrectly.
 */
export function chunkCoverage(
  byteSet: SparseIndexSet,
  chunkSet: SparseIndexSet,
  chunkSize: number,
): ChunkCoverage {
  const executedBytes = byteSet.size;
  const chunkedBytes = chunkSet.size * chunkSize;
  return {
    executedBytes,
    chunkedBytes,
    covered: chunkedBytes >= executedBytes,
  };
}

/**
 * Character legend for renderContractMap
 */
export const ContractMapChar = {
  /** Executed and chunked */
  Merklized: "M",
  /** Chunked but never executed: chunking overhead */
  Overhead: "m",
  /** Executed but missing from every chunk */
  Unchunked: "X",
  /** Neither executed nor chunked */
  Untouched: ".",
  /** Chunk boundary */
  Boundary: "|",
} as const;

/**
 * Renders one character per code byte, with a boundary marker before each chunk.
 *
 * @example
 * renderContractMap(SparseIndexSet.from([1]), 6, SparseIndexSet.from([0]), 4)
 * // "|mMmm|.."
 */
export function renderContractMap(
  byteSet: SparseIndexSet,
  codeSize: number,
  chunkSet: SparseIndexSet,
  chunkSize: number,
): string {
  const chars: string[] = [];
  for (let b = 0; b < codeSize; b++) {
    if (b % chunkSize === 0) {
      chars.push(ContractMapChar.Boundary);
    }
    const executed = byteSet.has(b);
    const chunked = chunkSet.has(Math.floor(b / chunkSize));
    if (executed && chunked) {
      chars.push(ContractMapChar.Merklized);
    } else if (chunked) {
      chars.push(ContractMapChar.Overhead);
    } else if (executed) {
      chars.push(ContractMapChar.Unchunked);
    } else {
      chars.push(ContractMapChar.Untouched);
    }
  }
  return chars.join("");
}
