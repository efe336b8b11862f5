/**
 * @chunkwitness/witness-sizer - trace replay driver for the witness estimator
 *
 * Re-exports the pieces of the CLI for programmatic runs; the executable
 * entrypoint is main.ts.
 */

export { CLI_NAME, createProgram, main } from "./cli.js";
export { runWitnessSizer } from "./run.js";
export type { RunDependencies, RunResult } from "./run.js";

export {
  DEFAULT_OPTIONS,
  DetailLevel,
  parseWitnessSizerConfig,
} from "./config.js";
export type {
  GraphRequest,
  WitnessSizerConfig,
  WitnessSizerOptions,
} from "./config.js";

export { createConsoleLogger, isLogLevel, LOG_LEVELS } from "./logger.js";
export type { ConsoleLoggerOptions, Logger, LogLevel } from "./logger.js";

export { ConfigError, ContractEstimateError, TraceFormatError } from "./errors.js";

export {
  listTraceFiles,
  parseBlockTraces,
  readTraceFile,
  TRACE_FILE_SUFFIX,
} from "./traces/files.js";
export { isCodeTxTrace, isTraceSegment, isTxTrace } from "./traces/records.js";
export type { BlockTraces, CodeTxTrace, TraceSegment, TxTrace } from "./traces/records.js";

export { accumulateBlock, executedTransactions } from "./blocks/accumulator.js";
export type {
  AccumulateOptions,
  BlockExecution,
  ContractExecution,
  TxSegments,
} from "./blocks/accumulator.js";
export { estimateContract } from "./blocks/estimate.js";
export type { ContractEstimate } from "./blocks/estimate.js";

export { MerklizationTally } from "./report/tally.js";
export type { ChunkSizeTotals, Overhead } from "./report/tally.js";
export {
  median,
  SegmentSizeHistogram,
  segmentSizeSummary,
  sparkline,
} from "./report/segments.js";
export { engNumber, formatContractLine, formatOverheadLines } from "./report/format.js";
