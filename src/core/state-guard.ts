/**
 * GlobalStateGuard: keeps process-wide state (environment variable names by default) from
 * leaking out of a run.
 * Purpose: run the body, then always restore the pre-run set of names, whatever happened.
 * Assumptions: the body may export names for child processes (run id, log dir); only names
 *   added during the run are removed, and the final status name survives.
 * Usage: const { exitCode } = await runWithStateGuard({ body, logger, forceSuccess });
 */

import type { RunStatus } from "./aggregator.js";
import { resolveErrorLocation, toError } from "./errors.js";
import { formatErrorMessage } from "./error-format.js";
import {
  logOrchestratorEvent,
  type JsonObject,
  type LogLevel,
  type RunLogger,
} from "./logger.js";

// =============================================================================
// TYPES
// =============================================================================

export interface StateScope {
  names(): string[];
  set(name: string, value: string): void;
  remove(name: string): void;
}

export type GuardedRunInput = {
  body: () => Promise<RunStatus>;
  logger: RunLogger;
  scope?: StateScope;
  forceSuccess?: boolean;
  statusName?: string;
};

export type GuardedRunResult = {
  status: RunStatus;
  exitCode: 0 | 1;
  forced: boolean;
  removed: string[];
  error?: Error;
  // Log writes that failed along the way; the run outcome stands regardless.
  logErrors?: Error[];
};

export const RUN_STATUS_NAME = "INFRA_VALIDATE_RUN_STATUS";

// =============================================================================
// SCOPES
// =============================================================================

export function processEnvScope(env: NodeJS.ProcessEnv = process.env): StateScope {
  return {
    names: () => Object.keys(env),
    set: (name, value) => {
      env[name] = value;
    },
    remove: (name) => {
      delete env[name];
    },
  };
}

// =============================================================================
// GUARD
// =============================================================================

export async function runWithStateGuard(input: GuardedRunInput): Promise<GuardedRunResult> {
  const scope = input.scope ?? processEnvScope();
  const statusName = input.statusName ?? RUN_STATUS_NAME;
  const baseline = new Set(scope.names());
  const log = guardedLog(input.logger);

  let settled: { status: RunStatus; error?: Error } = { status: "Failure" };
  let removed: string[] = [];

  try {
    // Stage 1: run the body to a settled status.
    settled = await settle(input.body, log);
    log.event(
      "run.status",
      { status: settled.status },
      settled.status === "Success" ? "info" : "error",
    );
  } finally {
    // Stage 2: always restore the baseline, then publish the status under the exempt name.
    removed = restoreBaseline(scope, baseline, statusName, log);
    bestEffort(log, "state.status_export_failed", () => scope.set(statusName, settled.status));
  }

  const forced = Boolean(input.forceSuccess);
  if (forced && settled.status !== "Success") {
    log.event("run.status.forced", { computed: settled.status, reported: "Success" }, "warn");
  }

  const exitCode: 0 | 1 = forced || settled.status === "Success" ? 0 : 1;

  return {
    status: settled.status,
    exitCode,
    forced,
    removed,
    ...(settled.error ? { error: settled.error } : {}),
    ...(log.failures.length > 0 ? { logErrors: log.failures } : {}),
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

type GuardedLog = {
  event: (type: string, payload: JsonObject, level?: LogLevel) => void;
  failures: Error[];
};

// A failed log write is collected, never thrown: cleanup must run either way.
function guardedLog(logger: RunLogger): GuardedLog {
  const failures: Error[] = [];
  return {
    failures,
    event: (type, payload, level) => {
      try {
        logOrchestratorEvent(logger, type, payload, level);
      } catch (err) {
        failures.push(toError(err));
      }
    },
  };
}

async function settle(
  body: () => Promise<RunStatus>,
  log: GuardedLog,
): Promise<{ status: RunStatus; error?: Error }> {
  try {
    return { status: await body() };
  } catch (err) {
    const error = toError(err);
    const location = resolveErrorLocation(error);
    log.event(
      "run.error",
      {
        error: error.name,
        message: formatErrorMessage(error),
        ...(location ? { location } : {}),
      },
      "error",
    );
    return { status: "Failure", error };
  }
}

function restoreBaseline(
  scope: StateScope,
  baseline: ReadonlySet<string>,
  exempt: string,
  log: GuardedLog,
): string[] {
  const removed: string[] = [];
  const current = bestEffort(log, "state.snapshot_failed", () => scope.names()) ?? [];

  for (const name of current) {
    if (baseline.has(name) || name === exempt) continue;
    bestEffort(log, "state.remove_failed", () => {
      scope.remove(name);
      removed.push(name);
    });
  }

  log.event("state.restored", { removed });
  return removed;
}

function bestEffort<T>(log: GuardedLog, failureType: string, fn: () => T): T | undefined {
  try {
    return fn();
  } catch (err) {
    log.event(failureType, { message: formatErrorMessage(err) }, "warn");
    return undefined;
  }
}
