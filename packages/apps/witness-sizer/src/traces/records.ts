/**
 * Trace record types and type guards.
 *
 * A trace file maps block ids to the transactions replayed in that block.
 * Every transaction that ran code lists the executed byte segments of the
 * contract it called.
 */

/**
 * Inclusive range of executed code offsets. A segment with End < Start
 * covers no bytes.
 */
export interface TraceSegment {
  Start: number;
  End: number;
}

/**
 * One replayed transaction.
 */
export interface TxTrace {
  /** Transaction hash, null for a plain value transfer that ran no code */
  Tx: string | null;
  /** Address of the called contract */
  TxAddr?: string;
  /** Code hash of the called contract */
  CodeHash?: string;
  /** Code size in bytes of the called contract */
  CodeSize?: number;
  /** Executed segments, in execution order */
  Segments?: TraceSegment[];
}

/**
 * A transaction that executed code
 */
export interface CodeTxTrace extends TxTrace {
  Tx: string;
  TxAddr: string;
  CodeHash: string;
  CodeSize: number;
  Segments: TraceSegment[];
}

/**
 * Block id to transaction traces
 */
export type BlockTraces = Record<string, TxTrace[]>;

/**
 * Type guard for a single segment.
 */
export function isTraceSegment(value: unknown): value is TraceSegment {
  if (!isRecord(value)) {
    return false;
  }
  return isOffset(value.Start) && isOffset(value.End);
}

/**
 * Type guard for a transaction trace; code-running transactions must carry
 * every code field.
 */
export function isTxTrace(value: unknown): value is TxTrace {
  if (!isRecord(value)) {
    return false;
  }
  if (value.Tx === null) {
    return true;
  }
  return (
    typeof value.Tx === "string" &&
    typeof value.TxAddr === "string" &&
    typeof value.CodeHash === "string" &&
    isOffset(value.CodeSize) &&
    Array.isArray(value.Segments) &&
    value.Segments.every(isTraceSegment)
  );
}

/**
 * Narrows a validated trace to one that ran code
 */
export function isCodeTxTrace(trace: TxTrace): trace is CodeTxTrace {
  return trace.Tx !== null;
}

// --- Helper functions ---

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isOffset(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}
