/**
 * Error types for the witness-sizer run.
 *
 * ConfigError and TraceFormatError stop the run. ContractEstimateError is
 * attributed to a single contract and chunk size; the run logs it and
 * continues with the next contract.
 */

import type { ContractViolationError } from "@chunkwitness/codemerkle";

/**
 * Error thrown when a command line option fails validation.
 */
export class ConfigError extends Error {
  /** Option name as given on the command line */
  readonly option: string;

  constructor(option: string, message: string) {
    super(`${option}: ${message}`);
    this.name = "ConfigError";
    this.option = option;
  }
}

/**
 * Error thrown when a trace file doesn't have the expected shape.
 */
export class TraceFormatError extends Error {
  /** Trace file the problem was found in, when known */
  readonly file?: string;

  /** Block id the problem was found in, when known */
  readonly block?: string;

  constructor(message: string, location: { file?: string; block?: string } = {}) {
    super(
      [
        location.file !== undefined ? `file ${location.file}` : undefined,
        location.block !== undefined ? `block ${location.block}` : undefined,
        message,
      ]
        .filter((part) => part !== undefined)
        .join(": "),
    );
    this.name = "TraceFormatError";
    this.file = location.file;
    this.block = location.block;
  }
}

/**
 * Error thrown when a contract's execution violates the tree's domain bounds.
 */
export class ContractEstimateError extends Error {
  /** Code hash of the offending contract */
  readonly codehash: string;

  /** Chunk size the estimate was made for */
  readonly chunkSize: number;

  /** The underlying violation */
  readonly violation: ContractViolationError;

  constructor(
    codehash: string,
    chunkSize: number,
    violation: ContractViolationError,
  ) {
    super(
      `Contract ${codehash} at chunk size ${chunkSize}: ${violation.message}`,
      { cause: violation },
    );
    this.name = "ContractEstimateError";
    this.codehash = codehash;
    this.chunkSize = chunkSize;
    this.violation = violation;
  }
}
