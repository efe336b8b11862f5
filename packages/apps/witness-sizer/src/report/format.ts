/**
 * Report line formatting.
 *
 * Lines are tab-separated for easy grepping and column alignment in a
 * terminal. Every function returns lines without trailing newlines.
 */

import type { ContractEstimate } from "../blocks/estimate.js";
import type { TxSegments } from "../blocks/accumulator.js";
import type { MerklizationTally } from "./tally.js";

const ENG_PREFIXES = ["", "k", "M", "G", "T", "P"];

/**
 * Engineering notation with at most three significant digits.
 *
 * @example
 * engNumber(768)     // "768"
 * engNumber(1500)    // "1.5k"
 * engNumber(1234567) // "1.23M"
 */
export function engNumber(value: number): string {
  let scaled = value;
  let prefix = 0;
  while (Math.abs(scaled) >= 1000 && prefix < ENG_PREFIXES.length - 1) {
    scaled /= 1000;
    prefix++;
  }
  const digits = Math.abs(scaled) >= 100 ? 0 : Math.abs(scaled) >= 10 ? 1 : 2;
  const text = prefix === 0 && Number.isInteger(scaled)
    ? String(scaled)
    : Number(scaled.toFixed(digits)).toString();
  return `${text}${ENG_PREFIXES[prefix]}`;
}

/**
 * Percentage padded to five characters with one decimal, "  n/a" when undefined
 */
export function formatPercent(value: number | null): string {
  return (value === null ? "n/a" : value.toFixed(1)).padStart(5);
}

export function formatKiB(bytes: number): string {
  return `${(bytes / 1024).toFixed(1)}K`;
}

export interface OverheadLineOptions {
  /** Repeat the hash count on each hash size line */
  showHashCount?: boolean;
}

/**
 * Overhead lines of a tally: one per chunk size, followed by one per hash size
 */
export function formatOverheadLines(
  tally: MerklizationTally,
  hashSizes: readonly number[],
  options: OverheadLineOptions = {},
): string[] {
  const lines: string[] = [];
  for (const chunkSize of tally.chunkSizes) {
    const chunks = tally.chunks(chunkSize);
    const hashes = tally.hashes(chunkSize);
    lines.push(
      `\tchunksize=${String(chunkSize).padStart(2)}\t` +
        `chunk_oh=${formatPercent(tally.chunkOverhead(chunkSize))}% (${engNumber(chunks)} chunks) + ${engNumber(hashes)} hashes\t`,
    );
    for (const hashSize of hashSizes) {
      const overhead = tally.overhead(chunkSize, hashSize);
      const hashCount = options.showHashCount ? ` (${engNumber(hashes)} hashes)` : "";
      lines.push(
        `\t\thashsize=${String(hashSize).padStart(2)}` +
          `\t hash_oh=${formatPercent(overhead?.hash ?? null)}%${hashCount}` +
          `\t\ttotal_oh=${formatPercent(overhead?.total ?? null)}%`,
      );
    }
  }
  return lines;
}

export function formatBlockHeader(
  block: string,
  executedBytes: number,
  segments?: { count: number; summary: string },
): string {
  return (
    `Block ${block}: exec=${formatKiB(executedBytes)}\t` +
    (segments === undefined ? "" : `segs=${segments.count}\tseg_sizes:${segments.summary}`)
  );
}

export function formatFileHeader(
  file: string,
  blocks: number,
  executedBytes: number,
  segments?: { count: number; summary: string },
): string {
  return (
    `file ${file}: blocks=${blocks}\texec=${formatKiB(executedBytes)}\t` +
    (segments === undefined ? "" : `segs=${segments.count}\tseg_sizes:${segments.summary}`)
  );
}

export function formatRunningHeader(blocks: number, medianSegmentSize?: number): string {
  return (
    `running total: blocks=${blocks}\t` +
    (medianSegmentSize === undefined ? "" : `\tmedian segsize:${medianSegmentSize.toFixed(1)}`)
  );
}

/**
 * Contract line; inconsistent chunkings are flagged with "??????"
 */
export function formatContractLine(estimate: ContractEstimate): string {
  const waste =
    estimate.chunkedBytes === 0
      ? 0
      : ((estimate.chunkedBytes - estimate.executedBytes) / estimate.chunkedBytes) * 100;
  return (
    `Contract ${estimate.codehash}: ` +
    `${estimate.instances} txs ` +
    `size=${estimate.codeSize}\t` +
    `executed=${estimate.executedBytes}\t` +
    `chunksize=${estimate.chunkSize}\t` +
    `chunks=${estimate.chunks}=${estimate.chunkedBytes}B\t` +
    `wasted=${waste.toFixed(0)}%\t` +
    `hashes=${estimate.missingHashes}` +
    (estimate.coverage.covered ? "" : "\t\t??????")
  );
}

export function formatTxLine(
  block: string,
  tx: TxSegments,
  segmentSummary?: string,
): string {
  return (
    `Block ${block} codehash=${tx.codehash} tx=${tx.txAddr} segs=${tx.segmentCount}` +
    (segmentSummary === undefined ? "" : ` seg_sizes:${segmentSummary}`)
  );
}
