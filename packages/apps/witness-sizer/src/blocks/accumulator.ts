/**
 * Per-block accumulation of executed bytes.
 *
 * All transactions of a block that call the same code share one byte set:
 * a chunk revealed for one transaction is already in the block's witness
 * for the next.
 */

import { SparseIndexSet } from "@chunkwitness/codemerkle";
import { TraceFormatError } from "../errors.js";
import { isCodeTxTrace, type TxTrace } from "../traces/records.js";

/**
 * Everything executed of one contract within a block
 */
export interface ContractExecution {
  readonly codehash: string;
  /** Code size as declared by the first transaction calling it */
  readonly codeSize: number;
  /** Transactions that called this code */
  instances: number;
  /** Executed byte offsets */
  readonly bytes: SparseIndexSet;
}

/**
 * Segment figures of one transaction, for transaction-level reporting
 */
export interface TxSegments {
  readonly txAddr: string;
  readonly codehash: string;
  readonly segmentCount: number;
  /** Sorted segment lengths; empty unless segment sizes are collected */
  readonly segmentSizes: readonly number[];
}

export interface BlockExecution {
  readonly block: string;
  /** Code hash to execution, in first-seen order */
  readonly contracts: ReadonlyMap<string, ContractExecution>;
  readonly transactions: number;
  /** Transactions that ran no code */
  readonly emptyTransactions: number;
  /** Transactions that called code already seen in this block */
  readonly reusedContracts: number;
  readonly segmentCount: number;
  /** Sorted segment lengths; empty unless segment sizes are collected */
  readonly segmentSizes: readonly number[];
  readonly txSegments: readonly TxSegments[];
}

export interface AccumulateOptions {
  /** Record segment lengths for the segment statistics */
  collectSegmentSizes: boolean;
}

/**
 * Unions the segments of every transaction in a block into one byte set per
 * code hash.
 *
 * @throws TraceFormatError if transactions were lost in the classification
 */
export function accumulateBlock(
  block: string,
  traces: readonly TxTrace[],
  options: AccumulateOptions,
): BlockExecution {
  const contracts = new Map<string, ContractExecution>();
  const txSegments: TxSegments[] = [];
  const segmentSizes: number[] = [];
  let emptyTransactions = 0;
  let reusedContracts = 0;
  let segmentCount = 0;

  for (const trace of traces) {
    if (!isCodeTxTrace(trace)) {
      emptyTransactions++;
      continue;
    }

    let execution = contracts.get(trace.CodeHash);
    if (execution === undefined) {
      execution = {
        codehash: trace.CodeHash,
        codeSize: trace.CodeSize,
        instances: 0,
        bytes: new SparseIndexSet(),
      };
      contracts.set(trace.CodeHash, execution);
    } else {
      reusedContracts++;
    }
    execution.instances++;

    const txSizes: number[] = [];
    for (const segment of trace.Segments) {
      // Segment ends are inclusive; End < Start adds no bytes
      execution.bytes.addRange(segment.Start, segment.End + 1);
      if (options.collectSegmentSizes) {
        txSizes.push(segment.End - segment.Start + 1);
      }
    }
    txSizes.sort(ascending);
    segmentSizes.push(...txSizes);
    segmentCount += trace.Segments.length;

    txSegments.push({
      txAddr: trace.TxAddr,
      codehash: trace.CodeHash,
      segmentCount: trace.Segments.length,
      segmentSizes: txSizes,
    });
  }

  let executedTransactions = 0;
  for (const execution of contracts.values()) {
    executedTransactions += execution.instances;
  }
  if (executedTransactions + emptyTransactions !== traces.length) {
    throw new TraceFormatError(
      `classified ${executedTransactions} executing and ${emptyTransactions} empty transactions out of ${traces.length}`,
      { block },
    );
  }

  return {
    block,
    contracts,
    transactions: traces.length,
    emptyTransactions,
    reusedContracts,
    segmentCount,
    segmentSizes: segmentSizes.sort(ascending),
    txSegments,
  };
}

/**
 * Transactions that executed code
 */
export function executedTransactions(execution: BlockExecution): number {
  return execution.transactions - execution.emptyTransactions;
}

function ascending(a: number, b: number): number {
  return a - b;
}
