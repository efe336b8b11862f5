import { afterAll, afterEach, beforeAll, describe, it, expect, vi } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { gzipSync } from "node:zlib";
import { createProgram, EXIT_USAGE, main } from "../../src/cli.js";
import { DetailLevel, type WitnessSizerConfig } from "../../src/config.js";

const argv0 = ["node", "witness-sizer"];

describe("createProgram", () => {
  async function parse(args: string[]): Promise<WitnessSizerConfig | undefined> {
    let parsed: WitnessSizerConfig | undefined;
    await createProgram(async (config) => {
      parsed = config;
    }).parseAsync([...argv0, ...args]);
    return parsed;
  }

  it("should collect variadic sizes and numeric options", async () => {
    const config = await parse(["traces", "-s", "8", "32", "-a", "4", "-d", "2"]);

    expect(config?.traces).toEqual(["traces"]);
    expect(config?.chunkSizes).toEqual([8, 32]);
    expect(config?.hashSizes).toEqual([32]);
    expect(config?.arity).toBe(4);
    expect(config?.detailLevel).toBe(DetailLevel.Contract);
  });

  it("should take several trace files", async () => {
    const config = await parse(["b.json.gz", "a.json.gz", "--segment-stats"]);

    expect(config?.traces).toEqual(["b.json.gz", "a.json.gz"]);
    expect(config?.segmentStats).toBe(true);
  });

  it("should pass the graph options", async () => {
    const config = await parse(["traces", "--graph", "0xc1", "--graph-dir", "out"]);

    expect(config?.graph).toEqual({ codehash: "0xc1", dir: "out" });
  });
});

describe("main", () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), "witness-sizer-cli-"));
    await writeFile(
      join(dir, "good.json.gz"),
      gzipSync(
        JSON.stringify({
          "1": [
            {
              Tx: "0xt1",
              TxAddr: "0xa1",
              CodeHash: "0xc1",
              CodeSize: 64,
              Segments: [{ Start: 0, End: 40 }],
            },
          ],
        }),
      ),
    );
    await writeFile(
      join(dir, "bad.json.gz"),
      gzipSync(
        JSON.stringify({
          "2": [
            {
              Tx: "0xt2",
              TxAddr: "0xa2",
              CodeHash: "0xbad",
              CodeSize: 30000,
              Segments: [{ Start: 24576, End: 24600 }],
            },
          ],
        }),
      ),
    );
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function silence() {
    return {
      log: vi.spyOn(console, "log").mockImplementation(() => {}),
      info: vi.spyOn(console, "info").mockImplementation(() => {}),
      error: vi.spyOn(console, "error").mockImplementation(() => {}),
    };
  }

  it("should report a trace file and exit cleanly", async () => {
    const consoleSpies = silence();

    const code = await main([...argv0, join(dir, "good.json.gz"), "-d", "0"]);

    expect(code).toBe(0);
    expect(consoleSpies.log).toHaveBeenNthCalledWith(
      1,
      "Chunking for tree arity=2, chunk size=[32], hash size=[32]",
    );
    // bytes 0-40 span chunks 0 and 1
    expect(consoleSpies.log).toHaveBeenCalledWith(
      "\tchunksize=32\tchunk_oh= 56.1% (2 chunks) + 9 hashes\t",
    );
  });

  it("should write graph files", async () => {
    silence();
    const graphDir = join(dir, "graphs");

    const code = await main([
      ...argv0,
      join(dir, "good.json.gz"),
      "--graph",
      "0xc1",
      "--graph-dir",
      graphDir,
    ]);

    expect(code).toBe(0);
    const graph = await readFile(join(graphDir, "0xc1-1-32.dot"), "utf8");
    expect(graph.startsWith("graph {\n")).toBe(true);
    expect(graph.endsWith("}\n")).toBe(true);
  });

  it("should exit with 1 when a contract estimate fails", async () => {
    const consoleSpies = silence();

    const code = await main([...argv0, join(dir, "bad.json.gz")]);

    expect(code).toBe(1);
    expect(consoleSpies.error).toHaveBeenCalledWith(
      expect.stringMatching(/1 contract estimates failed$/),
    );
  });

  it("should exit with a usage code on invalid options", async () => {
    const consoleSpies = silence();

    const code = await main([...argv0, dir, "-a", "1"]);

    expect(code).toBe(EXIT_USAGE);
    expect(consoleSpies.error).toHaveBeenCalledWith(
      "witness-sizer: --arity: must be >= 2, got 1",
    );
  });

  describe("commander parse errors", () => {
    function captureStreams() {
      return {
        stdout: vi.spyOn(process.stdout, "write").mockImplementation(() => true),
        stderr: vi.spyOn(process.stderr, "write").mockImplementation(() => true),
      };
    }

    it("should return the usage code for an unknown option", async () => {
      const streams = captureStreams();
      const exit = vi.spyOn(process, "exit").mockImplementation(() => {
        throw new Error("process.exit called");
      });

      const code = await main([...argv0, dir, "--bogus"]);

      expect(code).toBe(EXIT_USAGE);
      expect(exit).not.toHaveBeenCalled();
      expect(streams.stderr).toHaveBeenCalledWith(
        expect.stringContaining("unknown option '--bogus'"),
      );
    });

    it("should return the usage code when no traces are given", async () => {
      const streams = captureStreams();
      const exit = vi.spyOn(process, "exit").mockImplementation(() => {
        throw new Error("process.exit called");
      });

      const code = await main([...argv0]);

      expect(code).toBe(EXIT_USAGE);
      expect(exit).not.toHaveBeenCalled();
      expect(streams.stderr).toHaveBeenCalledWith(
        expect.stringContaining("missing required argument 'traces'"),
      );
    });

    it("should exit cleanly after printing help", async () => {
      const streams = captureStreams();

      const code = await main([...argv0, "--help"]);

      expect(code).toBe(0);
      expect(streams.stdout).toHaveBeenCalledWith(
        expect.stringContaining("Usage: witness-sizer"),
      );
    });
  });
});
