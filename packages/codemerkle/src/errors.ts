/**
 * Error types raised by the chunking and tree estimation functions.
 *
 * These are contract violations: the caller handed in parameters that are
 * inconsistent with each other (for instance a chunk that lies beyond the
 * declared maximum code size). They are never clamped or recovered from
 * inside this package; callers decide how far the failure propagates.
 */

/**
 * The bound a ContractViolationError refers to.
 *
 * - arity: tree arity must be an integer >= 2
 * - chunkSize: chunk size must be an integer >= 1
 * - maxTheoreticalChunks: the leaf-level theoretical width must be an integer >= 1
 * - chunkIndex: every chunk index must be < maxTheoreticalChunks
 */
export type ContractBound =
  | "arity"
  | "chunkSize"
  | "maxTheoreticalChunks"
  | "chunkIndex";

/**
 * Error thrown when an input violates a declared domain bound.
 */
export class ContractViolationError extends Error {
  /** Which bound was violated */
  readonly bound: ContractBound;

  /** The offending value */
  readonly value: number;

  /** The limit the value had to respect */
  readonly limit: number;

  constructor(bound: ContractBound, value: number, limit: number) {
    super(describeViolation(bound, value, limit));
    this.name = "ContractViolationError";
    this.bound = bound;
    this.value = value;
    this.limit = limit;
  }
}

function describeViolation(
  bound: ContractBound,
  value: number,
  limit: number,
): string {
  switch (bound) {
    case "arity":
      return `arity must be an integer >= ${limit}, got ${value}`;
    case "chunkSize":
      return `chunk size must be an integer >= ${limit}, got ${value}`;
    case "maxTheoreticalChunks":
      return `max theoretical chunks must be an integer >= ${limit}, got ${value}`;
    case "chunkIndex":
      return `chunk index ${value} is outside the theoretical width ${limit}`;
  }
}
