/**
 * Witness hash estimation for a fixed-arity Merkle tree over chunks
 *
 * The tree is never materialized. Each level is a SparseIndexSet of present
 * nodes; the next level holds the parents of present nodes. A present parent
 * whose sibling group is only partly present costs one witness hash per
 * missing sibling.
 *
 *   Leaves    0 1 2 3 4 5
 *   L1        0   1   2
 *   L2        0       1
 *   L3        0
 */

import { ContractViolationError } from "../errors.js";
import { SparseIndexSet } from "../sparse/indexset.js";
import type {
  ChildState,
  LevelSummary,
  MerklizationEstimate,
  TreeObserver,
} from "./types.js";

/**
 * Counts the sibling hashes a verifier needs to authenticate exactly the
 * chunks in chunkSet.
 *
 * @param chunkSet - Present chunk indices (level 0)
 * @param arity - Children per internal node
 * @param maxTheoreticalChunks - Leaf-level width of the theoretical tree
 * @param observer - Optional structural observer; see TreeObserver
 * @returns Number of missing sibling hashes
 * @throws ContractViolationError on an invalid arity or width, or a chunk
 *   index beyond maxTheoreticalChunks
 */
export function countMissingHashes(
  chunkSet: SparseIndexSet,
  arity: number,
  maxTheoreticalChunks: number,
  observer?: TreeObserver,
): number {
  return estimateMerklization(chunkSet, arity, maxTheoreticalChunks, observer)
    .missingHashes;
}

/**
 * Same as countMissingHashes, also returning a summary of each level.
 */
export function estimateMerklization(
  chunkSet: SparseIndexSet,
  arity: number,
  maxTheoreticalChunks: number,
  observer?: TreeObserver,
): MerklizationEstimate {
  checkShape(arity, maxTheoreticalChunks);

  // No chunks, no root, no hashes
  if (chunkSet.isEmpty) {
    return { missingHashes: 0, levels: [] };
  }

  const maxChunk = chunkSet.max();
  if (maxChunk >= maxTheoreticalChunks) {
    throw new ContractViolationError(
      "chunkIndex",
      maxChunk,
      maxTheoreticalChunks,
    );
  }

  const levels: LevelSummary[] = [];
  let missingHashes = 0;
  let level = 0;
  let levelSet = chunkSet;
  let theoreticalWidth = maxTheoreticalChunks;

  while (theoreticalWidth >= arity) {
    const theoreticalParentWidth = Math.ceil(theoreticalWidth / arity);

    // Only parents of present nodes can be present. The observer wants the
    // full static shape, so it gets every theoretical parent instead.
    const candidates =
      observer === undefined
        ? parentsOfPresent(levelSet, arity)
        : indicesBelow(theoreticalParentWidth);

    const parents = new SparseIndexSet();
    let levelMissing = 0;

    for (const p of candidates) {
      const siblingsStart = p * arity;
      // The last group of a level is narrower when the width isn't a multiple of arity
      const siblingsEnd = Math.min(siblingsStart + arity, theoreticalWidth);
      const present = levelSet.countInRange(siblingsStart, siblingsEnd);

      if (observer !== undefined) {
        for (let s = siblingsStart; s < siblingsEnd; s++) {
          observer.onEdge({
            parent: { level: level + 1, index: p },
            child: { level, index: s },
            state: childState(levelSet, level, s, present > 0),
          });
        }
      }

      if (present === 0) {
        continue;
      }

      parents.add(p);
      levelMissing += arity - present;
    }

    levels.push({
      level,
      theoreticalWidth,
      presentNodes: levelSet.size,
      presentParents: parents.size,
      missingHashes: levelMissing,
    });

    missingHashes += levelMissing;
    levelSet = parents;
    theoreticalWidth = theoreticalParentWidth;
    level++;
  }

  observer?.onTop?.({ level, nodes: levelSet.toArray() });

  return { missingHashes, levels };
}

/**
 * Number of levels the estimator processes for a non-empty chunk set
 */
export function treeLevelCount(
  maxTheoreticalChunks: number,
  arity: number,
): number {
  checkShape(arity, maxTheoreticalChunks);
  let levels = 0;
  for (let width = maxTheoreticalChunks; width >= arity; levels++) {
    width = Math.ceil(width / arity);
  }
  return levels;
}

// --- Helper functions ---

function checkShape(arity: number, maxTheoreticalChunks: number): void {
  if (!Number.isSafeInteger(arity) || arity < 2) {
    throw new ContractViolationError("arity", arity, 2);
  }
  if (!Number.isSafeInteger(maxTheoreticalChunks) || maxTheoreticalChunks < 1) {
    throw new ContractViolationError(
      "maxTheoreticalChunks",
      maxTheoreticalChunks,
      1,
    );
  }
}

/**
 * Distinct parent indices of the present nodes, ascending
 */
function* parentsOfPresent(
  levelSet: SparseIndexSet,
  arity: number,
): IterableIterator<number> {
  let previous = -1;
  for (const [start, end] of levelSet.runs()) {
    const last = Math.floor((end - 1) / arity);
    for (let p = Math.max(Math.floor(start / arity), previous + 1); p <= last; p++) {
      yield p;
    }
    previous = Math.max(previous, last);
  }
}

function* indicesBelow(limit: number): IterableIterator<number> {
  for (let i = 0; i < limit; i++) {
    yield i;
  }
}

function childState(
  levelSet: SparseIndexSet,
  level: number,
  index: number,
  groupPresent: boolean,
): ChildState {
  if (!groupPresent) {
    return "absent";
  }
  if (!levelSet.has(index)) {
    return "witness";
  }
  return level === 0 ? "leaf" : "internal";
}
