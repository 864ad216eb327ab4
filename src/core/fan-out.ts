/*
Purpose: run sibling invocations of the CLI for a parallel pass and wait for all of them.
Assumptions: siblings share nothing while running; each writes its own report artifact and the
  parent reduces them afterwards. One wall-clock bound applies to the whole group.
Usage: await runSiblings({ token, count, argsFor, timeoutMs, logger, spawn: createExecaSpawner(cli) });
*/

import path from "node:path";

import { execa } from "execa";
import fse from "fs-extra";

import { formatErrorMessage } from "./error-format.js";
import { logOrchestratorEvent, type RunLogger } from "./logger.js";
import { siblingRunId } from "./run-identity.js";

// =============================================================================
// TYPES
// =============================================================================

export type SpawnResult = {
  exitCode: number;
  timedOut: boolean;
  output: string;
};

export type SiblingSpawner = (
  args: string[],
  opts: { timeoutMs?: number; env: NodeJS.ProcessEnv },
) => Promise<SpawnResult>;

export type CliInvocation = {
  command: string;
  baseArgs: string[];
};

export type SiblingOutcome = {
  index: number;
  runId: string;
  exitCode: number;
  timedOut: boolean;
  durationMs: number;
};

export type RunSiblingsInput = {
  token: string;
  count: number;
  argsFor: (sibling: { index: number; runId: string }) => string[];
  spawn: SiblingSpawner;
  logger: RunLogger;
  timeoutMs?: number;
  consoleLogDir?: string;
  env?: NodeJS.ProcessEnv;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function runSiblings(input: RunSiblingsInput): Promise<SiblingOutcome[]> {
  const env = input.env ?? process.env;

  logOrchestratorEvent(input.logger, "fanout.start", {
    count: input.count,
    ...(input.timeoutMs !== undefined ? { timeout_ms: input.timeoutMs } : {}),
  });

  const siblings = Array.from({ length: input.count }, (_, i) => {
    const index = i + 1;
    return { index, runId: siblingRunId(input.token, index) };
  });

  // Every sibling starts now, so a per-process timeout equals the shared deadline.
  const outcomes = await Promise.all(
    siblings.map(async (sibling): Promise<SiblingOutcome> => {
      const startedAt = Date.now();
      logOrchestratorEvent(input.logger, "fanout.sibling.start", {
        index: sibling.index,
        run_id: sibling.runId,
      });

      let result: SpawnResult;
      try {
        result = await input.spawn(input.argsFor(sibling), { timeoutMs: input.timeoutMs, env });
      } catch (err) {
        logOrchestratorEvent(
          input.logger,
          "fanout.sibling.spawn_failed",
          { index: sibling.index, run_id: sibling.runId, message: formatErrorMessage(err) },
          "error",
        );
        result = { exitCode: -1, timedOut: false, output: "" };
      }

      if (input.consoleLogDir && result.output) {
        await fse.outputFile(
          path.join(input.consoleLogDir, `${sibling.runId}.console.log`),
          result.output + "\n",
          "utf8",
        );
      }

      const outcome: SiblingOutcome = {
        ...sibling,
        exitCode: result.exitCode,
        timedOut: result.timedOut,
        durationMs: Date.now() - startedAt,
      };
      logSiblingOutcome(input.logger, outcome);
      return outcome;
    }),
  );

  logOrchestratorEvent(input.logger, "fanout.complete", {
    count: outcomes.length,
    timed_out: outcomes.filter((o) => o.timedOut).map((o) => o.runId),
  });

  return outcomes;
}

export function createExecaSpawner(cli: CliInvocation): SiblingSpawner {
  return async (args, opts) => {
    const res = await execa(cli.command, [...cli.baseArgs, ...args], {
      reject: false,
      all: true,
      stdin: "ignore",
      env: opts.env,
      timeout: opts.timeoutMs,
    });

    return {
      exitCode: res.exitCode ?? -1,
      timedOut: res.timedOut,
      output: (res.all ?? "").trim(),
    };
  };
}

/** How the current process was started, so siblings run the same entrypoint. */
export function currentCliInvocation(): CliInvocation {
  const script = process.argv[1];
  return {
    command: process.execPath,
    baseArgs: [...process.execArgv, ...(script ? [script] : [])],
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

function logSiblingOutcome(logger: RunLogger, outcome: SiblingOutcome): void {
  const payload = {
    index: outcome.index,
    run_id: outcome.runId,
    exit_code: outcome.exitCode,
    duration_ms: outcome.durationMs,
  };

  if (outcome.timedOut) {
    logOrchestratorEvent(logger, "fanout.sibling.timeout", payload, "error");
  } else if (outcome.exitCode !== 0) {
    logOrchestratorEvent(logger, "fanout.sibling.failed", payload, "warn");
  } else {
    logOrchestratorEvent(logger, "fanout.sibling.complete", payload);
  }
}
