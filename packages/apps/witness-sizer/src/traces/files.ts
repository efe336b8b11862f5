/**
 * Trace file discovery and decoding.
 */

import { readdir, readFile, stat } from "node:fs/promises";
import { join } from "node:path";
import { promisify } from "node:util";
import { gunzip } from "node:zlib";
import { TraceFormatError } from "../errors.js";
import { isTxTrace, type BlockTraces, type TxTrace } from "./records.js";

const gunzipAsync = promisify(gunzip);

export const TRACE_FILE_SUFFIX = ".json.gz";

/**
 * Resolves the trace arguments to the files to process.
 *
 * A single directory expands to the .json.gz files it contains; anything
 * else is taken as a list of files. Either way the result is sorted so that
 * blocks are processed in file-name order.
 */
export async function listTraceFiles(paths: readonly string[]): Promise<string[]> {
  if (paths.length === 1 && (await isDirectory(paths[0]))) {
    const dir = paths[0];
    const entries = await readdir(dir);
    return entries
      .filter((entry) => entry.endsWith(TRACE_FILE_SUFFIX))
      .sort()
      .map((entry) => join(dir, entry));
  }
  return [...paths].sort();
}

/**
 * Reads and validates a gzipped JSON trace file.
 *
 * @throws TraceFormatError if the content isn't gzipped JSON of the expected shape
 */
export async function readTraceFile(path: string): Promise<BlockTraces> {
  const compressed = await readFile(path);

  let json: string;
  try {
    json = (await gunzipAsync(compressed)).toString("utf8");
  } catch (error) {
    throw new TraceFormatError(
      `not a gzip stream (${error instanceof Error ? error.message : String(error)})`,
      { file: path },
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    throw new TraceFormatError(
      `invalid JSON (${error instanceof Error ? error.message : String(error)})`,
      { file: path },
    );
  }

  return parseBlockTraces(parsed, path);
}

/**
 * Validates decoded trace content.
 */
export function parseBlockTraces(value: unknown, file?: string): BlockTraces {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new TraceFormatError("expected an object of blocks", { file });
  }

  const blocks: BlockTraces = {};
  for (const [block, traces] of Object.entries(value)) {
    if (!Array.isArray(traces)) {
      throw new TraceFormatError("expected an array of transactions", {
        file,
        block,
      });
    }
    const checked: TxTrace[] = [];
    traces.forEach((trace: unknown, position: number) => {
      if (!isTxTrace(trace)) {
        throw new TraceFormatError(`malformed transaction at position ${position}`, {
          file,
          block,
        });
      }
      checked.push(trace);
    });
    blocks[block] = checked;
  }
  return blocks;
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
}

function isNotFound(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}
