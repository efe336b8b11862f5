/**
 * witness-sizer command line
 *
 * Usage:
 *   witness-sizer <traces...> [options]
 *
 * Reads a directory of .json.gz trace files (or the listed files), applies
 * fixed-size chunking to the executed code of every contract, and reports
 * the chunk and witness hash overheads of merklizing it.
 */

import { Command, CommanderError } from "commander";
import {
  DEFAULT_OPTIONS,
  parseWitnessSizerConfig,
  type WitnessSizerConfig,
  type WitnessSizerOptions,
} from "./config.js";
import { ConfigError } from "./errors.js";
import { LOG_LEVELS, createConsoleLogger } from "./logger.js";
import { runWitnessSizer } from "./run.js";

export const CLI_NAME = "witness-sizer";

/** Exit code for invalid command line input */
export const EXIT_USAGE = 2;

/** Commander exits that follow a successful help or version request */
const INFO_EXIT_CODES: ReadonlySet<string> = new Set([
  "commander.help",
  "commander.helpDisplayed",
  "commander.version",
]);

/**
 * Builds the command; the action receives the validated configuration.
 *
 * Commander's own parse errors (unknown options, missing traces) are thrown
 * as CommanderError instead of exiting the process.
 */
export function createProgram(
  onRun: (config: WitnessSizerConfig) => Promise<void>,
): Command {
  return new Command()
    .name(CLI_NAME)
    .exitOverride()
    .description(
      "Applies fixed-size chunking to the code executed in replayed transactions " +
        "and estimates the resulting witness sizes",
    )
    .argument("<traces...>", "directory with, or list of, .json.gz trace files")
    .option(
      "-s, --chunk-size <sizes...>",
      "chunk sizes in bytes",
      [...DEFAULT_OPTIONS.chunkSize],
    )
    .option(
      "-m, --hash-size <sizes...>",
      "hash sizes in bytes, used only to convert hash counts to bytes",
      [...DEFAULT_OPTIONS.hashSize],
    )
    .option("-a, --arity <n>", "children per Merkle tree node", DEFAULT_OPTIONS.arity)
    .option(`-l, --log <level>`, `log level (${LOG_LEVELS.join(", ")})`, DEFAULT_OPTIONS.log)
    .option("-j, --job-id <n>", "id prefixed to log lines, to tell parallel runs apart")
    .option(
      "-d, --detail-level <n>",
      "3=transaction, 2=contract, 1=block, 0=file; one level implies the lower ones",
      DEFAULT_OPTIONS.detailLevel,
    )
    .option("-g, --segment-stats", "collect and show segment size statistics")
    .option("--graph <codehash>", "write the tree graph of this contract as .dot files")
    .option("--graph-dir <dir>", "directory for graph files", DEFAULT_OPTIONS.graphDir)
    .action(async (traces: string[], options: WitnessSizerOptions) => {
      await onRun(parseWitnessSizerConfig(traces, options));
    });
}

/**
 * Runs the CLI and resolves to the process exit code.
 */
export async function main(argv: readonly string[]): Promise<number> {
  let exitCode = 0;
  const program = createProgram(async (config) => {
    const logger = createConsoleLogger({
      level: config.logLevel,
      jobId: config.jobId,
    });
    const result = await runWitnessSizer(config, { logger });
    if (result.failedEstimates > 0) {
      logger.error(`${result.failedEstimates} contract estimates failed`);
      exitCode = 1;
    }
  });

  try {
    await program.parseAsync([...argv]);
  } catch (error) {
    // Commander has already written its message (or the help text)
    if (error instanceof CommanderError) {
      return INFO_EXIT_CODES.has(error.code) ? 0 : EXIT_USAGE;
    }
    if (error instanceof ConfigError) {
      console.error(`${CLI_NAME}: ${error.message}`);
      return EXIT_USAGE;
    }
    console.error(
      `${CLI_NAME}: ${error instanceof Error ? error.message : String(error)}`,
      error instanceof Error ? error.stack : undefined,
    );
    return 1;
  }
  return exitCode;
}
