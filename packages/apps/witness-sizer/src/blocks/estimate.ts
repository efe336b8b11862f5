/**
 * Per-contract chunking and witness estimate
 */

import {
  ContractViolationError,
  chunkCoverage,
  deriveChunkmap,
  estimateMerklization,
  maxTheoreticalChunks,
  type ChunkCoverage,
  type LevelSummary,
  type SparseIndexSet,
  type TreeObserver,
} from "@chunkwitness/codemerkle";
import { ContractEstimateError } from "../errors.js";
import type { ContractExecution } from "./accumulator.js";

export interface ContractEstimate {
  readonly codehash: string;
  readonly codeSize: number;
  readonly instances: number;
  readonly chunkSize: number;
  readonly executedBytes: number;
  /** Present chunks */
  readonly chunks: number;
  /** chunks * chunkSize */
  readonly chunkedBytes: number;
  /** Witness hashes needed to authenticate the chunks */
  readonly missingHashes: number;
  readonly coverage: ChunkCoverage;
  readonly chunkmap: SparseIndexSet;
  readonly levels: readonly LevelSummary[];
}

/**
 * Chunks one contract's executed bytes and estimates its witness hashes.
 *
 * @throws ContractEstimateError if the execution violates the tree's domain
 *   bounds (for instance bytes beyond the maximum code size)
 */
export function estimateContract(
  execution: ContractExecution,
  chunkSize: number,
  arity: number,
  observer?: TreeObserver,
): ContractEstimate {
  try {
    const chunkmap = deriveChunkmap(execution.bytes, chunkSize);
    const estimate = estimateMerklization(
      chunkmap,
      arity,
      maxTheoreticalChunks(chunkSize),
      observer,
    );
    const coverage = chunkCoverage(execution.bytes, chunkmap, chunkSize);

    return {
      codehash: execution.codehash,
      codeSize: execution.codeSize,
      instances: execution.instances,
      chunkSize,
      executedBytes: coverage.executedBytes,
      chunks: chunkmap.size,
      chunkedBytes: coverage.chunkedBytes,
      missingHashes: estimate.missingHashes,
      coverage,
      chunkmap,
      levels: estimate.levels,
    };
  } catch (error) {
    if (error instanceof ContractViolationError) {
      throw new ContractEstimateError(execution.codehash, chunkSize, error);
    }
    throw error;
  }
}
