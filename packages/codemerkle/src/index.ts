/**
 * @chunkwitness/codemerkle - witness size estimation for merklized contract code
 *
 * Turns the set of executed bytes of a contract into the set of fixed-size
 * chunks that must be revealed, and counts the sibling hashes needed to
 * authenticate those chunks against the root of a fixed-arity Merkle tree.
 * No hash values are computed.
 *
 * @packageDocumentation
 */

export { SparseIndexSet } from "./sparse/indexset.js";

export {
  MAX_CODE_SIZE,
  deriveChunkmap,
  maxTheoreticalChunks,
} from "./chunks/chunker.js";
export {
  ContractMapChar,
  chunkCoverage,
  renderContractMap,
} from "./chunks/contractmap.js";
export type { ChunkCoverage } from "./chunks/contractmap.js";

export {
  countMissingHashes,
  estimateMerklization,
  treeLevelCount,
} from "./tree/estimator.js";
export { DotGraphObserver } from "./tree/dotgraph.js";
export type {
  ChildState,
  LevelSummary,
  MerklizationEstimate,
  TreeEdge,
  TreeNode,
  TreeObserver,
  TreeTop,
} from "./tree/types.js";

export { ContractViolationError } from "./errors.js";
export type { ContractBound } from "./errors.js";
