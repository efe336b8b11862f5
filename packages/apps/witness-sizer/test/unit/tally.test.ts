import { describe, it, expect } from "vitest";
import { MerklizationTally } from "../../src/report/tally.js";

describe("MerklizationTally", () => {
  it("should start empty for every chunk size", () => {
    const tally = new MerklizationTally([8, 32]);

    expect(tally.executedBytes).toBe(0);
    expect(tally.chunks(8)).toBe(0);
    expect(tally.hashes(32)).toBe(0);
    expect(tally.chunkOverhead(32)).toBeNull();
    expect(tally.overhead(32, 32)).toBeNull();
  });

  it("should compute overheads relative to executed bytes", () => {
    const tally = new MerklizationTally([32]);
    tally.addExecutedBytes(100);
    tally.addEstimate(32, 4, 10);

    expect(tally.chunkBytes(32)).toBe(128);
    expect(tally.chunkOverhead(32)).toBeCloseTo(28);

    const overhead = tally.overhead(32, 32);
    expect(overhead?.chunk).toBeCloseTo(28);
    expect(overhead?.hash).toBeCloseTo(320);
    expect(overhead?.total).toBeCloseTo(348);
  });

  it("should merge another tally", () => {
    const run = new MerklizationTally([8, 32]);
    run.addExecutedBytes(100);
    run.addEstimate(32, 4, 10);

    const block = new MerklizationTally([8, 32]);
    block.addExecutedBytes(50);
    block.addEstimate(32, 1, 2);
    block.addEstimate(8, 7, 3);

    run.merge(block);

    expect(run.executedBytes).toBe(150);
    expect(run.chunks(32)).toBe(5);
    expect(run.hashes(32)).toBe(12);
    expect(run.chunks(8)).toBe(7);
    expect(run.hashes(8)).toBe(3);
  });

  it("should reject chunk sizes it doesn't track", () => {
    const tally = new MerklizationTally([32]);
    expect(() => tally.addEstimate(64, 1, 1)).toThrow(
      "No totals kept for chunk size 64",
    );
  });
});
