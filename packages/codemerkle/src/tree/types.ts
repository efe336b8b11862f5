/**
 * Types for merklization estimates and structural observation
 */

/**
 * TreeNode - A position in the theoretical tree
 */
export interface TreeNode {
  /** Tree level; chunks are level 0 */
  level: number;
  /** Index of the node within its level */
  index: number;
}

/**
 * State of a child as seen from its parent.
 *
 * - leaf: a present chunk (level 0)
 * - internal: a present node above level 0, recomputed by the verifier
 * - witness: a missing sibling whose hash must be supplied
 * - absent: the whole sibling group is absent, so is the parent
 */
export type ChildState = "leaf" | "internal" | "witness" | "absent";

/**
 * TreeEdge - One (parent, child) relation visited by the estimator
 */
export interface TreeEdge {
  parent: TreeNode;
  child: TreeNode;
  state: ChildState;
}

/**
 * TreeTop - The present nodes of the topmost level.
 *
 * This is the single root unless the theoretical width dropped below the
 * arity before reaching 1, in which case up to arity - 1 nodes remain.
 */
export interface TreeTop {
  level: number;
  nodes: number[];
}

/**
 * Observer of the conceptual tree shape.
 *
 * Attaching an observer makes the estimator visit every theoretical parent,
 * not just those with present children. It never changes the estimate.
 */
export interface TreeObserver {
  /** Called for every (parent, child) relation visited */
  onEdge(edge: TreeEdge): void;
  /** Called once after the last level with the present top nodes */
  onTop?(top: TreeTop): void;
}

/**
 * LevelSummary - Per-level figures of one estimate
 */
export interface LevelSummary {
  /** Level of the children examined (0 = chunks) */
  level: number;
  /** Theoretical node count at this level */
  theoreticalWidth: number;
  /** Present nodes at this level */
  presentNodes: number;
  /** Present parents derived for the next level */
  presentParents: number;
  /** Witness hashes charged at this level */
  missingHashes: number;
}

/**
 * MerklizationEstimate - Result of estimateMerklization
 */
export interface MerklizationEstimate {
  /** Total missing sibling hashes over all levels */
  missingHashes: number;
  /** One entry per processed level, bottom-up */
  levels: LevelSummary[];
}
