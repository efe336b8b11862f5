/**
 * Command line options and their validated configuration.
 */

import { ConfigError } from "./errors.js";
import { isLogLevel, type LogLevel } from "./logger.js";

/**
 * How much of the report is printed. One level implies the lower ones.
 */
export const DetailLevel = {
  File: 0,
  Block: 1,
  Contract: 2,
  Transaction: 3,
} as const;

export type DetailLevel = (typeof DetailLevel)[keyof typeof DetailLevel];

/**
 * Options as collected by commander (all raw strings)
 */
export interface WitnessSizerOptions {
  readonly chunkSize: string[];
  readonly hashSize: string[];
  readonly arity: string;
  readonly log: string;
  readonly jobId?: string;
  readonly detailLevel: string;
  readonly segmentStats?: boolean;
  readonly graph?: string;
  readonly graphDir: string;
}

/**
 * Graph output request for a single contract
 */
export interface GraphRequest {
  /** Code hash of the contract to draw */
  readonly codehash: string;
  /** Directory the .dot files are written to */
  readonly dir: string;
}

export interface WitnessSizerConfig {
  /** Trace files, or a single directory of .json.gz traces */
  readonly traces: readonly string[];
  readonly chunkSizes: readonly number[];
  /** Only used to convert hash counts to bytes */
  readonly hashSizes: readonly number[];
  readonly arity: number;
  readonly logLevel: LogLevel;
  readonly jobId?: number;
  readonly detailLevel: DetailLevel;
  readonly segmentStats: boolean;
  readonly graph?: GraphRequest;
}

export const DEFAULT_OPTIONS = {
  chunkSize: ["32"],
  hashSize: ["32"],
  arity: "2",
  log: "info",
  detailLevel: "1",
  graphDir: ".",
} as const;

/**
 * Validates raw command line input.
 *
 * @throws ConfigError naming the first invalid option
 */
export function parseWitnessSizerConfig(
  traces: readonly string[],
  options: WitnessSizerOptions,
): WitnessSizerConfig {
  if (traces.length === 0) {
    throw new ConfigError("traces", "at least one trace file or directory is required");
  }

  const log = options.log.toLowerCase();
  if (!isLogLevel(log)) {
    throw new ConfigError("--log", `unknown log level "${options.log}"`);
  }

  return {
    traces: [...traces],
    chunkSizes: parseIntegerList("--chunk-size", options.chunkSize, 1),
    hashSizes: parseIntegerList("--hash-size", options.hashSize, 1),
    arity: parseInteger("--arity", options.arity, 2),
    logLevel: log,
    jobId:
      options.jobId === undefined
        ? undefined
        : parseInteger("--job-id", options.jobId, 0),
    detailLevel: parseDetailLevel(options.detailLevel),
    segmentStats: options.segmentStats === true,
    graph:
      options.graph === undefined
        ? undefined
        : { codehash: options.graph, dir: options.graphDir },
  };
}

// --- Helper functions ---

function parseInteger(option: string, raw: string, min: number): number {
  const trimmed = raw.trim();
  const value = /^-?\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : Number.NaN;
  if (!Number.isSafeInteger(value)) {
    throw new ConfigError(option, `expected an integer, got "${raw}"`);
  }
  if (value < min) {
    throw new ConfigError(option, `must be >= ${min}, got ${value}`);
  }
  return value;
}

function parseIntegerList(
  option: string,
  raw: readonly string[],
  min: number,
): number[] {
  if (raw.length === 0) {
    throw new ConfigError(option, "expected at least one value");
  }
  return raw.map((value) => parseInteger(option, value, min));
}

function parseDetailLevel(raw: string): DetailLevel {
  const value = parseInteger("--detail-level", raw, DetailLevel.File);
  const level = DETAIL_LEVELS.find((candidate) => candidate === value);
  if (level === undefined) {
    throw new ConfigError(
      "--detail-level",
      `must be between ${DetailLevel.File} and ${DetailLevel.Transaction}, got ${value}`,
    );
  }
  return level;
}

const DETAIL_LEVELS: readonly DetailLevel[] = Object.values(DetailLevel);
