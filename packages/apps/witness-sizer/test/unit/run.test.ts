import { describe, it, expect, vi } from "vitest";
import { join } from "node:path";
import { DetailLevel, type WitnessSizerConfig } from "../../src/config.js";
import type { Logger } from "../../src/logger.js";
import { runWitnessSizer, type RunDependencies } from "../../src/run.js";
import type { BlockTraces } from "../../src/traces/records.js";

const config: WitnessSizerConfig = {
  traces: ["traces"],
  chunkSizes: [4],
  hashSizes: [32],
  arity: 2,
  logLevel: "info",
  detailLevel: DetailLevel.Contract,
  segmentStats: false,
};

// 0xc1 executes bytes 0-5 and 10: 3 chunks of 4 bytes, 12 witness hashes
const traces: BlockTraces = {
  "1": [
    {
      Tx: "0xt1",
      TxAddr: "0xa1",
      CodeHash: "0xc1",
      CodeSize: 64,
      Segments: [
        { Start: 0, End: 3 },
        { Start: 10, End: 10 },
      ],
    },
    { Tx: null },
    {
      Tx: "0xt2",
      TxAddr: "0xa1",
      CodeHash: "0xc1",
      CodeSize: 64,
      Segments: [{ Start: 2, End: 5 }],
    },
  ],
  "2": [],
};

const overheadLines = [
  "\tchunksize= 4\tchunk_oh= 71.4% (3 chunks) + 12 hashes\t",
  "\t\thashsize=32\t hash_oh=5485.7%\t\ttotal_oh=5557.1%",
];

function stubLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    isLevelEnabled: () => false,
  };
}

function deps(files: Record<string, BlockTraces>, lines: string[]): RunDependencies {
  const clock = [0, 2000, 2000, 4000];
  return {
    logger: stubLogger(),
    out: (line) => lines.push(line),
    listFiles: async () => Object.keys(files),
    readTraces: async (file) => files[file],
    writeGraph: vi.fn(async () => {}),
    now: () => clock.shift() ?? 0,
  };
}

describe("runWitnessSizer", () => {
  it("should report contracts, blocks and files", async () => {
    const lines: string[] = [];
    const dependencies = deps({ "f1.json.gz": traces }, lines);

    const result = await runWitnessSizer(config, dependencies);

    expect(lines).toEqual([
      "Chunking for tree arity=2, chunk size=[4], hash size=[32]",
      "Contract 0xc1: 2 txs size=64\texecuted=7\tchunksize=4\tchunks=3=12B\twasted=42%\thashes=12",
      "Block 1: exec=0.0K\t",
      ...overheadLines,
      "file f1.json.gz: blocks=2\texec=0.0K\t",
      ...overheadLines,
    ]);
    expect(result.files).toBe(1);
    expect(result.blocks).toBe(2);
    expect(result.tally.executedBytes).toBe(7);
    expect(result.tally.hashes(4)).toBe(12);
    expect(result.failedEstimates).toBe(0);
    expect(result.inconsistentEstimates).toBe(0);
    expect(dependencies.logger.info).toHaveBeenCalledWith(
      "file f1.json.gz: 2 blocks in 2 seconds = 1.0bps.",
    );
  });

  it("should only print file totals at detail level 0", async () => {
    const lines: string[] = [];

    await runWitnessSizer(
      { ...config, detailLevel: DetailLevel.File },
      deps({ "f1.json.gz": traces }, lines),
    );

    expect(lines.slice(1)).toEqual([
      "file f1.json.gz: blocks=2\texec=0.0K\t",
      ...overheadLines,
    ]);
  });

  it("should print running totals across several files", async () => {
    const lines: string[] = [];

    const result = await runWitnessSizer(
      { ...config, detailLevel: DetailLevel.File },
      deps({ "f1.json.gz": traces, "f2.json.gz": traces }, lines),
    );

    expect(lines.filter((line) => line.startsWith("running total"))).toEqual([
      "running total: blocks=2\t",
      "running total: blocks=4\t",
    ]);
    expect(lines[lines.length - 1]).toBe(
      "\t\thashsize=32\t hash_oh=5485.7% (24 hashes)\t\ttotal_oh=5557.1%",
    );
    expect(result.tally.executedBytes).toBe(14);
  });

  it("should log and skip contracts beyond the maximum code size", async () => {
    const lines: string[] = [];
    const dependencies = deps(
      {
        "f1.json.gz": {
          "9": [
            {
              Tx: "0xt9",
              TxAddr: "0xa9",
              CodeHash: "0xbad",
              CodeSize: 30000,
              Segments: [{ Start: 24576, End: 24576 }],
            },
          ],
        },
      },
      lines,
    );

    const result = await runWitnessSizer(config, dependencies);

    expect(result.failedEstimates).toBe(1);
    expect(result.tally.hashes(4)).toBe(0);
    expect(dependencies.logger.error).toHaveBeenCalledWith(
      "Contract 0xbad at chunk size 4: chunk index 6144 is outside the theoretical width 6144",
      {
        block: "9",
        codehash: "0xbad",
        chunkSize: 4,
        bound: "chunkIndex",
        value: 6144,
        limit: 6144,
      },
    );
  });

  it("should write the tree graph of the requested contract", async () => {
    const lines: string[] = [];
    const dependencies = deps({ "f1.json.gz": traces }, lines);

    await runWitnessSizer(
      { ...config, graph: { codehash: "0xc1", dir: "graphs" } },
      dependencies,
    );

    expect(dependencies.writeGraph).toHaveBeenCalledTimes(1);
    expect(dependencies.writeGraph).toHaveBeenCalledWith(
      join("graphs", "0xc1-1-4.dot"),
      expect.stringMatching(/^graph \{\n/),
    );
  });

  it("should write one graph per block the contract runs in", async () => {
    const lines: string[] = [];
    const dependencies = deps(
      { "f1.json.gz": { "1": traces["1"], "2": traces["1"] } },
      lines,
    );

    await runWitnessSizer(
      { ...config, graph: { codehash: "0xc1", dir: "graphs" } },
      dependencies,
    );

    expect(dependencies.writeGraph).toHaveBeenCalledTimes(2);
    expect(dependencies.writeGraph).toHaveBeenNthCalledWith(
      1,
      join("graphs", "0xc1-1-4.dot"),
      expect.any(String),
    );
    expect(dependencies.writeGraph).toHaveBeenNthCalledWith(
      2,
      join("graphs", "0xc1-2-4.dot"),
      expect.any(String),
    );
  });

  it("should print the run median segment size across files", async () => {
    const lines: string[] = [];

    await runWitnessSizer(
      { ...config, detailLevel: DetailLevel.File, segmentStats: true },
      deps({ "f1.json.gz": traces, "f2.json.gz": traces }, lines),
    );

    // each file has segment lengths 1, 4 and 4
    expect(lines.filter((line) => line.startsWith("running total"))).toEqual([
      "running total: blocks=2\t\tmedian segsize:4.0",
      "running total: blocks=4\t\tmedian segsize:4.0",
    ]);
  });

  it("should print per-transaction lines at detail level 3", async () => {
    const lines: string[] = [];

    await runWitnessSizer(
      { ...config, detailLevel: DetailLevel.Transaction, segmentStats: true },
      deps({ "f1.json.gz": traces }, lines),
    );

    expect(lines.slice(1, 3)).toEqual([
      "Block 1 codehash=0xc1 tx=0xa1 segs=2 seg_sizes:median=2\t\t1█▁▁3 (+50% more)",
      "Block 1 codehash=0xc1 tx=0xa1 segs=1 seg_sizes:median=4\t\t1▁▁▁█▁▁▁7 (+0% more)",
    ]);
  });
});
