/**
 * Witness-sizer run: replays trace files and reports merklization overheads.
 *
 * For every file, every block is accumulated into one byte set per contract,
 * each contract is chunked and estimated once per chunk size, and the results
 * are totalled per block, per file and for the whole run.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { DotGraphObserver, renderContractMap } from "@chunkwitness/codemerkle";
import {
  accumulateBlock,
  executedTransactions,
  type BlockExecution,
} from "./blocks/accumulator.js";
import { estimateContract, type ContractEstimate } from "./blocks/estimate.js";
import { DetailLevel, type WitnessSizerConfig } from "./config.js";
import { ContractEstimateError } from "./errors.js";
import type { Logger } from "./logger.js";
import {
  formatBlockHeader,
  formatContractLine,
  formatFileHeader,
  formatOverheadLines,
  formatRunningHeader,
  formatTxLine,
} from "./report/format.js";
import { SegmentSizeHistogram, segmentSizeSummary } from "./report/segments.js";
import { MerklizationTally } from "./report/tally.js";
import { listTraceFiles, readTraceFile } from "./traces/files.js";
import type { BlockTraces, TxTrace } from "./traces/records.js";

export interface RunDependencies {
  logger: Logger;
  /** Report sink, one line per call (default: console.log) */
  out?: (line: string) => void;
  listFiles?: (paths: readonly string[]) => Promise<string[]>;
  readTraces?: (file: string) => Promise<BlockTraces>;
  writeGraph?: (path: string, contents: string) => Promise<void>;
  /** Millisecond clock for throughput logging */
  now?: () => number;
}

export interface RunResult {
  files: number;
  blocks: number;
  tally: MerklizationTally;
  /** Contract estimates aborted by a domain bound violation */
  failedEstimates: number;
  /** Contract estimates whose chunks didn't cover the executed bytes */
  inconsistentEstimates: number;
}

interface RunContext {
  config: WitnessSizerConfig;
  logger: Logger;
  out: (line: string) => void;
  writeGraph: (path: string, contents: string) => Promise<void>;
  failedEstimates: number;
  inconsistentEstimates: number;
}

interface BlockResult {
  tally: MerklizationTally;
  segmentSizes: readonly number[];
}

export async function runWitnessSizer(
  config: WitnessSizerConfig,
  deps: RunDependencies,
): Promise<RunResult> {
  const listFiles = deps.listFiles ?? listTraceFiles;
  const readTraces = deps.readTraces ?? readTraceFile;
  const now = deps.now ?? Date.now;
  const context: RunContext = {
    config,
    logger: deps.logger,
    out: deps.out ?? ((line) => console.log(line)),
    writeGraph: deps.writeGraph ?? writeGraphFile,
    failedEstimates: 0,
    inconsistentEstimates: 0,
  };
  const { out, logger } = context;

  out(
    `Chunking for tree arity=${config.arity}, ` +
      `chunk size=[${config.chunkSizes.join(", ")}], ` +
      `hash size=[${config.hashSizes.join(", ")}]`,
  );

  const files = await listFiles(config.traces);
  const runTally = new MerklizationTally(config.chunkSizes);
  const runSegmentSizes = new SegmentSizeHistogram();
  let totalBlocks = 0;

  for (const file of files) {
    const started = now();
    const blockTraces = await readTraces(file);
    const fileTally = new MerklizationTally(config.chunkSizes);
    const fileSegmentSizes: number[] = [];
    let blocks = 0;

    for (const [block, traces] of Object.entries(blockTraces)) {
      blocks++;
      totalBlocks++;
      const result = await processBlock(context, block, traces);
      if (result !== undefined) {
        fileTally.merge(result.tally);
        fileSegmentSizes.push(...result.segmentSizes);
      }
    }

    fileSegmentSizes.sort((a, b) => a - b);
    out(
      formatFileHeader(
        file,
        blocks,
        fileTally.executedBytes,
        config.segmentStats
          ? { count: fileSegmentSizes.length, summary: segmentSizeSummary(fileSegmentSizes) }
          : undefined,
      ),
    );
    for (const line of formatOverheadLines(fileTally, config.hashSizes)) {
      out(line);
    }

    const elapsedMs = now() - started;
    logger.info(
      `file ${file}: ${blocks} blocks in ${(elapsedMs / 1000).toFixed(0)} seconds = ` +
        `${elapsedMs > 0 ? ((blocks * 1000) / elapsedMs).toFixed(1) : "inf"}bps.`,
    );

    runTally.merge(fileTally);
    runSegmentSizes.addAll(fileSegmentSizes);

    if (files.length < 2) {
      continue;
    }
    out(
      formatRunningHeader(
        totalBlocks,
        config.segmentStats ? runSegmentSizes.median() : undefined,
      ),
    );
    for (const line of formatOverheadLines(runTally, config.hashSizes, {
      showHashCount: true,
    })) {
      out(line);
    }
  }

  return {
    files: files.length,
    blocks: totalBlocks,
    tally: runTally,
    failedEstimates: context.failedEstimates,
    inconsistentEstimates: context.inconsistentEstimates,
  };
}

// --- Helper functions ---

async function processBlock(
  context: RunContext,
  block: string,
  traces: readonly TxTrace[],
): Promise<BlockResult | undefined> {
  const { config, logger, out } = context;

  if (traces.length === 0) {
    logger.debug(`Block ${block} is empty`);
    return undefined;
  }

  const execution = accumulateBlock(block, traces, {
    collectSegmentSizes: config.segmentStats,
  });

  if (config.detailLevel >= DetailLevel.Transaction) {
    for (const tx of execution.txSegments) {
      out(
        formatTxLine(
          block,
          tx,
          config.segmentStats ? segmentSizeSummary(tx.segmentSizes) : undefined,
        ),
      );
    }
  }

  if (executedTransactions(execution) === 0) {
    logger.debug(`Block ${block} had no segments`);
    return undefined;
  }

  const tally = await estimateBlock(context, execution);

  if (config.detailLevel >= DetailLevel.Block) {
    out(
      formatBlockHeader(
        block,
        tally.executedBytes,
        config.segmentStats
          ? {
              count: execution.segmentCount,
              summary: segmentSizeSummary(execution.segmentSizes),
            }
          : undefined,
      ),
    );
    for (const line of formatOverheadLines(tally, config.hashSizes)) {
      out(line);
    }
  }

  return { tally, segmentSizes: execution.segmentSizes };
}

async function estimateBlock(
  context: RunContext,
  execution: BlockExecution,
): Promise<MerklizationTally> {
  const { config, logger, out } = context;
  const tally = new MerklizationTally(config.chunkSizes);

  for (const contract of execution.contracts.values()) {
    tally.addExecutedBytes(contract.bytes.size);

    for (const chunkSize of config.chunkSizes) {
      const graph =
        config.graph !== undefined && config.graph.codehash === contract.codehash
          ? new DotGraphObserver()
          : undefined;

      let estimate: ContractEstimate;
      try {
        estimate = estimateContract(contract, chunkSize, config.arity, graph);
      } catch (error) {
        if (!(error instanceof ContractEstimateError)) {
          throw error;
        }
        context.failedEstimates++;
        logger.error(error.message, {
          block: execution.block,
          codehash: error.codehash,
          chunkSize: error.chunkSize,
          bound: error.violation.bound,
          value: error.violation.value,
          limit: error.violation.limit,
        });
        continue;
      }

      if (logger.isLevelEnabled("debug")) {
        for (const level of estimate.levels) {
          logger.debug(
            `Contract ${contract.codehash} chunksize=${chunkSize} L${level.level}`,
            { ...level },
          );
        }
      }

      if (!estimate.coverage.covered) {
        context.inconsistentEstimates++;
        logger.error(
          `Contract ${contract.codehash} in block ${execution.block} executes ` +
            `${estimate.executedBytes} but merklizes to ${estimate.chunkedBytes}`,
        );
        out(
          renderContractMap(
            contract.bytes,
            contract.codeSize,
            estimate.chunkmap,
            chunkSize,
          ),
        );
      }

      if (config.detailLevel >= DetailLevel.Contract) {
        out(formatContractLine(estimate));
      }

      tally.addEstimate(chunkSize, estimate.chunks, estimate.missingHashes);

      if (graph !== undefined && config.graph !== undefined) {
        // One file per block the contract runs in
        const path = join(
          config.graph.dir,
          `${contract.codehash}-${execution.block}-${chunkSize}.dot`,
        );
        await context.writeGraph(path, graph.toString());
        logger.info(`Wrote tree graph ${path}`, {
          block: execution.block,
          codehash: contract.codehash,
          chunkSize,
        });
      }
    }
  }

  return tally;
}

async function writeGraphFile(path: string, contents: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, contents, "utf8");
}
