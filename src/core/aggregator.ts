/*
Purpose: reduce any number of report records into one pass/fail outcome.
Assumptions: summation is order independent, so records from parallel siblings can be
  merged in whatever order they are collected.
Usage: aggregate(records, expected, { parallel, isParallelChild }); aggregateRun({ ... }) for the
  collect-then-reduce step with logging.
*/

import { AggregationError } from "./errors.js";
import { formatErrorMessage } from "./error-format.js";
import { logOrchestratorEvent, type RunLogger } from "./logger.js";
import { collectReports, type ReportRecord } from "./report.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunStatus = "Success" | "Failure";

export type AggregateResult = Readonly<{
  totalTests: number;
  totalFailures: number;
  totalErrors: number;
  status: RunStatus;
}>;

export type AggregationMode = {
  parallel: boolean;
  isParallelChild: boolean;
};

export const EMPTY_RECORD: ReportRecord = Object.freeze({ tests: 0, failures: 0, errors: 0 });

// =============================================================================
// REDUCTION
// =============================================================================

export function mergeRecords(left: ReportRecord, right: ReportRecord): ReportRecord {
  return {
    tests: left.tests + right.tests,
    failures: left.failures + right.failures,
    errors: left.errors + right.errors,
  };
}

export function isDeferredToParent(mode: AggregationMode): boolean {
  return mode.isParallelChild && !mode.parallel;
}

export function aggregate(
  records: readonly ReportRecord[],
  expectedCount: number,
  mode: AggregationMode,
): AggregateResult {
  // A non-fan-out sibling leaves scoring to its parent and never inspects its own records.
  // Kept as-is until it is confirmed that every such child is scored by a parent.
  if (isDeferredToParent(mode)) {
    return freezeResult({ totalTests: 0, totalFailures: 0, totalErrors: 0, status: "Success" });
  }

  if (records.length < expectedCount) {
    throw new AggregationError(
      `Expected ${expectedCount} report(s) but found ${records.length}.`,
    );
  }

  for (const record of records) {
    assertValidRecord(record);
  }

  const total = records.reduce(mergeRecords, EMPTY_RECORD);
  const status: RunStatus =
    total.failures === 0 && total.errors === 0 && total.tests > 0 ? "Success" : "Failure";

  return freezeResult({
    totalTests: total.tests,
    totalFailures: total.failures,
    totalErrors: total.errors,
    status,
  });
}

// =============================================================================
// COLLECT + AGGREGATE
// =============================================================================

export type AggregateRunInput = {
  reportDir: string;
  reportNames: string[];
  mode: AggregationMode;
  logger: RunLogger;
};

export type AggregateRunResult = {
  result: AggregateResult;
  error?: AggregationError;
};

export async function aggregateRun(input: AggregateRunInput): Promise<AggregateRunResult> {
  if (isDeferredToParent(input.mode)) {
    const result = aggregate([], input.reportNames.length, input.mode);
    logOrchestratorEvent(input.logger, "aggregate.deferred", {
      reason: "parallel child without fan-out; parent aggregates",
    });
    return { result };
  }

  try {
    const records = await collectReports(input.reportDir, input.reportNames);
    const result = aggregate(records, input.reportNames.length, input.mode);
    logOrchestratorEvent(input.logger, "aggregate.complete", {
      reports: input.reportNames.length,
      tests: result.totalTests,
      failures: result.totalFailures,
      errors: result.totalErrors,
      status: result.status,
    });
    if (result.totalTests === 0) {
      logOrchestratorEvent(
        input.logger,
        "aggregate.no_tests",
        { message: "Reports contain zero tests; treating the run as failed." },
        "warn",
      );
    }
    return { result };
  } catch (err) {
    if (!(err instanceof AggregationError)) {
      throw err;
    }
    logOrchestratorEvent(
      input.logger,
      "aggregate.failed",
      {
        message: formatErrorMessage(err),
        ...(err.reportPath ? { report: err.reportPath } : {}),
      },
      "error",
    );
    return {
      result: freezeResult({ totalTests: 0, totalFailures: 0, totalErrors: 0, status: "Failure" }),
      error: err,
    };
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function freezeResult(result: AggregateResult): AggregateResult {
  return Object.freeze({ ...result });
}

function assertValidRecord(record: ReportRecord): void {
  for (const value of [record.tests, record.failures, record.errors]) {
    if (!Number.isInteger(value) || value < 0) {
      throw new AggregationError(
        `Report counts must be non-negative integers (got tests=${record.tests}, failures=${record.failures}, errors=${record.errors}).`,
      );
    }
  }
}
