import path from "node:path";

import { type Command, InvalidArgumentError, Option } from "commander";
import fse from "fs-extra";
import { stringify as stringifyYaml } from "yaml";

import type { ControllerRegistry } from "../controllers/registry.js";
import { createDefaultRegistry } from "../controllers/registry.js";
import {
  aggregateRun,
  type AggregateResult,
  type AggregateRunResult,
  type RunStatus,
} from "../core/aggregator.js";
import { loadParameterFile } from "../core/config-loader.js";
import { resolveParameterFilePath } from "../core/config-discovery.js";
import {
  createAnsiFormatter,
  formatErrorLines,
  renderErrorLines,
  resolveColorEnabled,
} from "../core/error-format.js";
import {
  createExecaSpawner,
  currentCliInvocation,
  runSiblings,
  type SiblingSpawner,
} from "../core/fan-out.js";
import { ControllerLifecycleDriver, type LifecycleResult } from "../core/lifecycle.js";
import {
  JsonlLogger,
  consoleEcho,
  logOrchestratorEvent,
  orchestratorLogPath,
  type AttachableLogger,
} from "../core/logger.js";
import {
  PARAMETER_KEYS,
  resolveParameters,
  type ParameterSet,
  type ParameterSource,
} from "../core/parameters.js";
import { expectedReportNames, reportFileName } from "../core/report.js";
import { createOrReuseRunContext, type RunContext } from "../core/run-identity.js";
import { processEnvScope, runWithStateGuard } from "../core/state-guard.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunCommandOptions = {
  overrides: ParameterSource;
  parameterFile?: string;
  parallel: boolean;
  parallelCount?: number;
  parallelTimeoutMinutes?: number;
  exitWithZero: boolean;
  runId?: string;
  parallelChildIndex?: number;
  reportDir?: string;
  logRoot: string;
  workRoot: string;
  workspaceRoot: string;
  debug?: boolean;
};

export type RunCommandDeps = {
  registry?: ControllerRegistry;
  logger?: AttachableLogger;
  env?: NodeJS.ProcessEnv;
  spawn?: SiblingSpawner;
  cwd?: string;
  print?: (line: string) => void;
  printError?: (text: string) => void;
};

export type RunOutcome = {
  status: RunStatus;
  exitCode: 0 | 1;
  forced: boolean;
  context: RunContext | null;
  lifecycle: LifecycleResult | null;
  aggregate: AggregateResult | null;
  error?: Error;
  logErrors?: Error[];
};

type RunCliFlags = {
  platform?: string;
  location?: string;
  resourceGroup?: string;
  image?: string;
  vmSize?: string;
  testCategory?: string;
  testArea?: string;
  testTags?: string;
  testNames?: string;
  testPriority?: string;
  excludeTests?: string;
  iterations?: number;
  secretsFile?: string;
  customParameters?: string;
  codeCoverage: boolean;
  telemetry: boolean;
  useExistingResources: boolean;
  resourceCleanup?: string;
  exitWithZero: boolean;
  parallel: boolean;
  parallelCount?: number;
  parallelTimeoutMinutes?: number;
  parameterFile?: string;
  logRoot: string;
  workRoot: string;
  workspaceRoot: string;
  debug: boolean;
  runId?: string;
  parallelChildIndex?: number;
  reportDir?: string;
};

export const DEFAULT_LOG_ROOT = "logs";
export const DEFAULT_WORK_ROOT = path.join(".infra-validate", "work");
export const RUN_ID_ENV = "INFRA_VALIDATE_RUN_ID";
export const LOG_DIR_ENV = "INFRA_VALIDATE_LOG_DIR";

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function registerRunCommand(program: Command, deps: RunCommandDeps = {}): void {
  program
    .command("run")
    .description("Resolve parameters, drive the selected platform and aggregate its reports")
    .option("--platform <name>", "Test platform (required here or in the parameter file)")
    .option("--location <name>", "Platform location")
    .option("--resource-group <name>", "Existing resource group to run in")
    .option("--image <name>", "Image to deploy")
    .option("--vm-size <size>", "VM size to deploy")
    .option("--test-category <list>", "Comma-separated test categories, or All")
    .option("--test-area <list>", "Comma-separated test areas, or All")
    .option("--test-tags <list>", "Comma-separated tags; a case matches if it has any")
    .option("--test-names <globs>", "Comma-separated test name globs")
    .option("--test-priority <list>", "Comma-separated priorities")
    .option("--exclude-tests <globs>", "Comma-separated test name globs to skip")
    .option("--iterations <n>", "Times to run each selected case", positiveInt("--iterations"))
    .option("--secrets-file <path>", "YAML mapping of secrets exposed to test commands")
    .option("--custom-parameters <pairs>", "Extra key=value pairs separated by ;")
    .option("--code-coverage", "Collect code coverage", false)
    .option("--telemetry", "Send telemetry", false)
    .option("--use-existing-resources", "Reuse resources instead of deploying", false)
    .addOption(
      new Option("--resource-cleanup <mode>", "Resource cleanup after the run").choices([
        "always",
        "keep",
      ]),
    )
    .option("--exit-with-zero", "Exit 0 regardless of the computed status", false)
    .option("--parallel", "Let the platform run selected cases concurrently", false)
    .option(
      "--parallel-count <n>",
      "Fan out into this many sibling runs and aggregate their reports",
      positiveInt("--parallel-count"),
    )
    .option(
      "--parallel-timeout-minutes <n>",
      "Shared deadline for all sibling runs",
      positiveInt("--parallel-timeout-minutes"),
    )
    .option("--parameter-file <path>", "YAML parameter file")
    .option("--log-root <dir>", "Directory for run log directories", DEFAULT_LOG_ROOT)
    .option("--work-root <dir>", "Directory for run working directories", DEFAULT_WORK_ROOT)
    .option("--workspace-root <dir>", "Directory holding test definitions", ".")
    .option("--debug", "Show error details", false)
    .addOption(new Option("--run-id <id>", "Reuse a run token").hideHelp())
    .addOption(
      new Option("--parallel-child-index <n>", "Index of this sibling run")
        .argParser(positiveInt("--parallel-child-index"))
        .hideHelp(),
    )
    .addOption(new Option("--report-dir <dir>", "Directory for report artifacts").hideHelp())
    .action(async (_opts: unknown, command: Command) => {
      const flags = command.opts<RunCliFlags>();
      const outcome = await runCommand(toRunOptions(flags), deps);
      process.exitCode = outcome.exitCode;
    });
}

function toRunOptions(flags: RunCliFlags): RunCommandOptions {
  return {
    overrides: {
      [PARAMETER_KEYS.platform]: flags.platform,
      [PARAMETER_KEYS.location]: flags.location,
      [PARAMETER_KEYS.resourceGroup]: flags.resourceGroup,
      [PARAMETER_KEYS.image]: flags.image,
      [PARAMETER_KEYS.vmSize]: flags.vmSize,
      [PARAMETER_KEYS.testCategory]: flags.testCategory,
      [PARAMETER_KEYS.testArea]: flags.testArea,
      [PARAMETER_KEYS.testTags]: flags.testTags,
      [PARAMETER_KEYS.testNames]: flags.testNames,
      [PARAMETER_KEYS.testPriority]: flags.testPriority,
      [PARAMETER_KEYS.excludeTests]: flags.excludeTests,
      [PARAMETER_KEYS.iterations]: flags.iterations,
      [PARAMETER_KEYS.secretsFile]: flags.secretsFile,
      [PARAMETER_KEYS.customParameters]: flags.customParameters,
      [PARAMETER_KEYS.enableCodeCoverage]: flags.codeCoverage,
      [PARAMETER_KEYS.enableTelemetry]: flags.telemetry,
      [PARAMETER_KEYS.useExistingResources]: flags.useExistingResources,
      [PARAMETER_KEYS.resourceCleanup]: flags.resourceCleanup,
    },
    parameterFile: flags.parameterFile,
    parallel: flags.parallel,
    parallelCount: flags.parallelCount,
    parallelTimeoutMinutes: flags.parallelTimeoutMinutes,
    exitWithZero: flags.exitWithZero,
    runId: flags.runId,
    parallelChildIndex: flags.parallelChildIndex,
    reportDir: flags.reportDir,
    // Siblings inherit these verbatim, so they must not depend on the child's cwd.
    logRoot: path.resolve(flags.logRoot),
    workRoot: path.resolve(flags.workRoot),
    workspaceRoot: path.resolve(flags.workspaceRoot),
    debug: flags.debug,
  };
}

export function positiveInt(flag: string): (value: string) => number {
  return (value) => {
    const parsed = Number(value);
    if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed) || parsed < 1) {
      throw new InvalidArgumentError(`${flag} expects a positive integer.`);
    }
    return parsed;
  };
}

// =============================================================================
// RUN COMMAND
// =============================================================================

export async function runCommand(
  opts: RunCommandOptions,
  deps: RunCommandDeps = {},
): Promise<RunOutcome> {
  const env = deps.env ?? process.env;
  const logger = deps.logger ?? new JsonlLogger({ echo: consoleEcho });
  const registry = deps.registry ?? createDefaultRegistry();
  const print = deps.print ?? ((line: string) => console.log(line));
  const printError = deps.printError ?? ((text: string) => console.error(text));

  let context: RunContext | null = null;
  let lifecycle: LifecycleResult | null = null;
  let aggregate: AggregateResult | null = null;

  const guarded = await runWithStateGuard({
    logger,
    scope: processEnvScope(env),
    forceSuccess: opts.exitWithZero,
    body: async () => {
      const params = await resolveRunParameters(opts, logger, deps.cwd);

      const ctx = await createOrReuseRunContext({
        suppliedId: opts.runId,
        logRoot: opts.logRoot,
        workRoot: opts.workRoot,
        reportDir: opts.reportDir,
      });
      context = ctx;
      logger.attach(orchestratorLogPath(ctx.logDir), ctx.runId);

      // Exported for test commands and siblings; removed again by the state guard.
      env[RUN_ID_ENV] = ctx.runId;
      env[LOG_DIR_ENV] = ctx.logDir;

      const isParallelChild = opts.parallelChildIndex !== undefined;
      // Plain --parallel stays in one lifecycle and lets the controller run cases concurrently.
      const fanOutCount = isParallelChild ? undefined : opts.parallelCount;

      logOrchestratorEvent(logger, "run.start", {
        run_id: ctx.runId,
        reused: ctx.reused,
        log_dir: ctx.logDir,
        report_dir: ctx.reportDir,
        parallel: opts.parallel,
        fan_out: fanOutCount !== undefined,
        ...(isParallelChild ? { parallel_child_index: opts.parallelChildIndex ?? null } : {}),
      });

      if (fanOutCount !== undefined) {
        await runFanOut({ opts, ctx, params, count: fanOutCount, logger, env, spawn: deps.spawn });
        const aggregated = await aggregateRun({
          reportDir: ctx.reportDir,
          reportNames: expectedReportNames(ctx.runId, { childCount: fanOutCount }),
          mode: { parallel: true, isParallelChild: false },
          logger,
        });
        aggregate = aggregated.result;
        return settleAggregation(aggregated);
      }

      const driver = new ControllerLifecycleDriver({
        registry,
        params,
        context: ctx,
        logger,
        workspaceRoot: opts.workspaceRoot,
        reportPath: path.join(ctx.reportDir, reportFileName(ctx.runId)),
        parallel: opts.parallel,
        env,
      });
      lifecycle = await driver.run();

      if (lifecycle.state === "Failed") {
        return "Failure";
      }

      const aggregated = await aggregateRun({
        reportDir: ctx.reportDir,
        reportNames: expectedReportNames(ctx.runId),
        mode: { parallel: opts.parallel, isParallelChild },
        logger,
      });
      aggregate = aggregated.result;
      return settleAggregation(aggregated);
    },
  });

  const outcome: RunOutcome = {
    status: guarded.status,
    exitCode: guarded.exitCode,
    forced: guarded.forced,
    context,
    lifecycle,
    aggregate,
    ...(guarded.error ? { error: guarded.error } : {}),
    ...(guarded.logErrors ? { logErrors: guarded.logErrors } : {}),
  };

  reportOutcome(outcome, { debug: opts.debug ?? false, print, printError });
  return outcome;
}

// =============================================================================
// INTERNALS
// =============================================================================

async function resolveRunParameters(
  opts: RunCommandOptions,
  logger: AttachableLogger,
  cwd?: string,
): Promise<ParameterSet> {
  const resolution = resolveParameterFilePath({ explicitPath: opts.parameterFile, cwd });
  const fileParams = resolution.filePath ? await loadParameterFile(resolution.filePath) : undefined;

  logOrchestratorEvent(logger, "parameters.source", {
    source: resolution.source,
    ...(resolution.filePath ? { file: resolution.filePath } : {}),
  });

  return resolveParameters(fileParams, opts.overrides, logger);
}

async function runFanOut(args: {
  opts: RunCommandOptions;
  ctx: RunContext;
  params: ParameterSet;
  count: number;
  logger: AttachableLogger;
  env: NodeJS.ProcessEnv;
  spawn?: SiblingSpawner;
}): Promise<void> {
  const { opts, ctx } = args;

  // Siblings read the parent's resolved parameters instead of re-resolving their own.
  // Kept out of the log directory: the values are unmasked.
  const parameterFile = path.join(ctx.workspaceDir, "parameters.yaml");
  await fse.outputFile(parameterFile, stringifyYaml(args.params.toRecord()), "utf8");

  const childLogRoot = path.join(ctx.logDir, "children");

  await runSiblings({
    token: ctx.runId,
    count: args.count,
    spawn: args.spawn ?? createExecaSpawner(currentCliInvocation()),
    logger: args.logger,
    env: args.env,
    consoleLogDir: childLogRoot,
    ...(opts.parallelTimeoutMinutes !== undefined
      ? { timeoutMs: opts.parallelTimeoutMinutes * 60_000 }
      : {}),
    argsFor: (sibling) => [
      "run",
      "--parameter-file",
      parameterFile,
      "--run-id",
      sibling.runId,
      "--parallel-child-index",
      String(sibling.index),
      "--report-dir",
      ctx.reportDir,
      "--log-root",
      childLogRoot,
      "--work-root",
      opts.workRoot,
      "--workspace-root",
      opts.workspaceRoot,
    ],
  });
}

// A missing or unreadable report is fatal for the run, not just a failed tally.
function settleAggregation(aggregated: AggregateRunResult): RunStatus {
  if (aggregated.error) {
    throw aggregated.error;
  }
  return aggregated.result.status;
}

function reportOutcome(
  outcome: RunOutcome,
  io: { debug: boolean; print: (line: string) => void; printError: (text: string) => void },
): void {
  if (outcome.error) {
    const format = createAnsiFormatter(resolveColorEnabled());
    io.printError(
      renderErrorLines(formatErrorLines(outcome.error, { mode: io.debug ? "debug" : "short" }), format),
    );
  }

  if (outcome.logErrors) {
    const [first] = outcome.logErrors;
    io.printError(
      `Warning: ${outcome.logErrors.length} log event(s) could not be written${first ? ` (${first.message})` : ""}.`,
    );
  }

  const failure = outcome.lifecycle?.failure;
  if (failure) {
    io.printError(
      `Lifecycle failed during ${failure.phase}: ${failure.message}${failure.location ? ` (at ${failure.location})` : ""}`,
    );
  }

  if (outcome.lifecycle?.summary) {
    io.print(outcome.lifecycle.summary);
  }

  if (outcome.aggregate) {
    const { totalTests, totalFailures, totalErrors } = outcome.aggregate;
    io.print(`Totals: tests=${totalTests} failures=${totalFailures} errors=${totalErrors}`);
  }

  const runLabel = outcome.context ? `Run ${outcome.context.runId}` : "Run";
  io.print(`${runLabel} finished with status: ${outcome.status}`);

  if (outcome.forced && outcome.status !== "Success") {
    io.print(`Exit code forced to 0 by --exit-with-zero (computed status: ${outcome.status}).`);
  }
}
