import { ContractViolationError } from "../errors.js";
import { SparseIndexSet } from "../sparse/indexset.js";

/**
 * Maximum contract code size in bytes (EIP-170)
 */
export const MAX_CODE_SIZE = 0x6000;

/**
 * Derives the chunk-presence set of a byte-presence set.
 *
 * Chunk c is present iff at least one byte in [c * chunkSize, (c + 1) * chunkSize)
 * is present. Only chunks up to floor(max / chunkSize) can be present, and the
 * work done is proportional to the runs of the byte set rather than to that bound.
 *
 * With chunkSize 1 chunks and bytes coincide and the byte set itself is
 * returned; callers treat both as read-only from this point on.
 *
 * @param byteSet - Executed bytes of one contract
 * @param chunkSize - Chunk size in bytes
 * @returns The set of chunk indices touched by byteSet
 */
export function deriveChunkmap(
  byteSet: SparseIndexSet,
  chunkSize: number,
): SparseIndexSet {
  if (!Number.isSafeInteger(chunkSize) || chunkSize < 1) {
    throw new ContractViolationError("chunkSize", chunkSize, 1);
  }

  if (chunkSize === 1) {
    return byteSet;
  }

  const chunkmap = new SparseIndexSet();
  for (const [start, end] of byteSet.runs()) {
    const firstChunk = Math.floor(start / chunkSize);
    const lastChunk = Math.floor((end - 1) / chunkSize);
    chunkmap.addRange(firstChunk, lastChunk + 1);
  }
  return chunkmap;
}

/**
 * Number of leaves of the theoretical tree for a contract of maximal size
 *
 * @param chunkSize - Chunk size in bytes
 * @param maxCodeSize - Domain bound in bytes
 */
export function maxTheoreticalChunks(
  chunkSize: number,
  maxCodeSize: number = MAX_CODE_SIZE,
): number {
  if (!Number.isSafeInteger(chunkSize) || chunkSize < 1) {
    throw new ContractViolationError("chunkSize", chunkSize, 1);
  }
  const chunks = Math.floor(maxCodeSize / chunkSize);
  if (chunks < 1) {
    throw new ContractViolationError("maxTheoreticalChunks", chunks, 1);
  }
  return chunks;
}
