import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { execa } from "execa";
import { afterEach, describe, expect, it, vi } from "vitest";

import { MemoryLogger } from "../__tests__/fakes.js";

import { createExecaSpawner, runSiblings, type SiblingSpawner, type SpawnResult } from "./fan-out.js";

// =============================================================================
// TEST SETUP
// =============================================================================

vi.mock("execa", () => ({
  execa: vi.fn(),
}));

const execaMock = vi.mocked(execa);
const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;

  execaMock.mockReset();
});

function makeTempDir(prefix: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

function recordingSpawner(results: Record<string, SpawnResult | Error>): {
  spawn: SiblingSpawner;
  calls: Array<{ args: string[]; timeoutMs?: number }>;
} {
  const calls: Array<{ args: string[]; timeoutMs?: number }> = [];
  const spawn: SiblingSpawner = async (args, opts) => {
    calls.push({ args, ...(opts.timeoutMs === undefined ? {} : { timeoutMs: opts.timeoutMs }) });
    const runId = args[1] ?? "";
    const result = results[runId] ?? { exitCode: 0, timedOut: false, output: "" };
    if (result instanceof Error) throw result;
    return result;
  };
  return { spawn, calls };
}

// =============================================================================
// TESTS
// =============================================================================

describe("runSiblings", () => {
  it("starts one sibling per index with derived run ids", async () => {
    const { spawn, calls } = recordingSpawner({});
    const logger = new MemoryLogger();

    const outcomes = await runSiblings({
      token: "abc",
      count: 3,
      argsFor: (sibling) => ["--run-id", sibling.runId, "--parallel-child-index", String(sibling.index)],
      spawn,
      logger,
      timeoutMs: 60_000,
    });

    expect(outcomes.map((o) => [o.index, o.runId, o.exitCode])).toEqual([
      [1, "abc-1", 0],
      [2, "abc-2", 0],
      [3, "abc-3", 0],
    ]);
    expect(calls.map((call) => call.args)).toEqual([
      ["--run-id", "abc-1", "--parallel-child-index", "1"],
      ["--run-id", "abc-2", "--parallel-child-index", "2"],
      ["--run-id", "abc-3", "--parallel-child-index", "3"],
    ]);
    expect(calls.every((call) => call.timeoutMs === 60_000)).toBe(true);
    expect(logger.find("fanout.complete")?.payload).toEqual({ count: 3, timed_out: [] });
  });

  it("logs timeouts, failures and spawn errors without throwing", async () => {
    const { spawn } = recordingSpawner({
      "abc-1": { exitCode: 1, timedOut: false, output: "" },
      "abc-2": { exitCode: -1, timedOut: true, output: "" },
      "abc-3": new Error("spawn ENOENT"),
    });
    const logger = new MemoryLogger();

    const outcomes = await runSiblings({
      token: "abc",
      count: 3,
      argsFor: (sibling) => ["--run-id", sibling.runId],
      spawn,
      logger,
    });

    expect(outcomes.map((o) => [o.exitCode, o.timedOut])).toEqual([
      [1, false],
      [-1, true],
      [-1, false],
    ]);
    expect(logger.find("fanout.sibling.failed")?.payload.run_id).toBe("abc-1");
    expect(logger.find("fanout.sibling.timeout")?.level).toBe("error");
    expect(logger.find("fanout.sibling.spawn_failed")?.payload.message).toBe("spawn ENOENT");
    expect(logger.find("fanout.complete")?.payload.timed_out).toEqual(["abc-2"]);
  });

  it("writes each sibling's console output beside the parent logs", async () => {
    const dir = makeTempDir("fan-out-");
    const { spawn } = recordingSpawner({ "abc-1": { exitCode: 0, timedOut: false, output: "hello" } });

    await runSiblings({
      token: "abc",
      count: 1,
      argsFor: (sibling) => ["--run-id", sibling.runId],
      spawn,
      logger: new MemoryLogger(),
      consoleLogDir: dir,
    });

    expect(fs.readFileSync(path.join(dir, "abc-1.console.log"), "utf8")).toBe("hello\n");
  });
});

describe("createExecaSpawner", () => {
  it("runs the CLI entrypoint without rejecting on failure", async () => {
    execaMock.mockResolvedValueOnce({
      exitCode: 2,
      timedOut: false,
      all: " failed run \n",
    } as Awaited<ReturnType<typeof execa>>);

    const spawn = createExecaSpawner({ command: "/usr/bin/node", baseArgs: ["/app/dist/index.js"] });
    const result = await spawn(["run", "--run-id", "abc-1"], { timeoutMs: 1000, env: { A: "1" } });

    expect(result).toEqual({ exitCode: 2, timedOut: false, output: "failed run" });
    expect(execaMock).toHaveBeenCalledWith(
      "/usr/bin/node",
      ["/app/dist/index.js", "run", "--run-id", "abc-1"],
      expect.objectContaining({ reject: false, all: true, timeout: 1000, env: { A: "1" } }),
    );
  });
});
