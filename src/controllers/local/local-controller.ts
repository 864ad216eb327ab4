/*
Purpose: reference backend for the "Local" platform; runs test cases as shell commands on this host.
Assumptions: nothing is provisioned, so VM/resource parameters are rejected; test definitions live
  under <workspaceRoot>/testcases and have been validated before loadTestCases runs.
Usage: registered in createDefaultRegistry(); selected with `--platform Local`.
*/

import path from "node:path";

import { execaCommand } from "execa";
import fse from "fs-extra";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

import { ConfigurationError } from "../../core/errors.js";
import { logOrchestratorEvent } from "../../core/logger.js";
import { PARAMETER_KEYS, type ParameterSet } from "../../core/parameters.js";
import { maskText } from "../../core/secrets.js";
import { renderTemplate } from "../../core/templates.js";
import type { ControllerDeps, CustomParameters, TestController } from "../controller.js";

import { buildJunitReport, type TestCaseOutcome, type TestCaseResult } from "./junit.js";
import {
  readTestDefinitions,
  resolveTestCaseFilters,
  selectTestCases,
  type TestCaseDefinition,
  type TestCaseFilters,
} from "./test-definitions.js";

// =============================================================================
// TYPES
// =============================================================================

export type CommandResult = {
  exitCode: number;
  timedOut: boolean;
  output: string;
};

export type CommandRunner = (
  command: string,
  opts: { cwd: string; env: NodeJS.ProcessEnv; timeoutSeconds: number },
) => Promise<CommandResult>;

const UNSUPPORTED_PARAMETERS = [
  PARAMETER_KEYS.vmSize,
  PARAMETER_KEYS.resourceGroup,
  PARAMETER_KEYS.location,
] as const;

const OUTPUT_PREVIEW_LIMIT = 4000;

const SecretsFileSchema = z.record(
  z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "Secret names must be valid environment variable names"),
  z.union([z.string(), z.number(), z.boolean()]),
);

// =============================================================================
// CONTROLLER
// =============================================================================

export class LocalController implements TestController {
  readonly platform = "Local";

  private filters: TestCaseFilters | null = null;
  private secrets: Record<string, string> = {};
  private workspaceRoot: string | null = null;
  private customParams: CustomParameters = {};
  private cases: TestCaseDefinition[] = [];
  private results: TestCaseResult[] = [];

  constructor(
    private readonly deps: ControllerDeps,
    private readonly runCommand: CommandRunner = runShellCommand,
  ) {}

  async parseAndValidateParameters(params: ParameterSet): Promise<void> {
    const unsupported = UNSUPPORTED_PARAMETERS.filter((key) => params.has(key));
    if (unsupported.length > 0) {
      throw new ConfigurationError(
        `Parameter(s) ${unsupported.join(", ")} are not supported on the Local platform.`,
      );
    }

    this.filters = resolveTestCaseFilters(params);
    logOrchestratorEvent(this.deps.logger, "local.parameters", {
      categories: this.filters.categories,
      areas: this.filters.areas,
      tags: this.filters.tags,
      names: this.filters.names,
      priorities: this.filters.priorities,
      exclude: this.filters.exclude,
    });
  }

  async prepareTestEnvironment(secretsFile: string | undefined): Promise<void> {
    if (!secretsFile) {
      logOrchestratorEvent(this.deps.logger, "local.secrets.none");
      return;
    }

    const resolved = path.resolve(secretsFile);
    if (!(await fse.pathExists(resolved))) {
      throw new Error(`Secrets file not found at ${resolved}.`);
    }

    const parsed = SecretsFileSchema.safeParse(parseYaml(await fse.readFile(resolved, "utf8")));
    if (!parsed.success) {
      throw new Error(
        `Secrets file ${resolved} must be a mapping of NAME: value pairs (${parsed.error.issues[0]?.message ?? "invalid"}).`,
      );
    }

    this.secrets = Object.fromEntries(
      Object.entries(parsed.data).map(([name, value]) => [name, String(value)]),
    );
    logOrchestratorEvent(this.deps.logger, "local.secrets.loaded", {
      count: Object.keys(this.secrets).length,
    });
  }

  async loadTestCases(workspaceRoot: string, customParams: CustomParameters): Promise<void> {
    const filters = this.requireFilters();
    const definitions = await readTestDefinitions(workspaceRoot);
    const selected = selectTestCases(definitions, filters);

    if (selected.length === 0) {
      throw new Error(
        `No test cases matched the selection filters (${definitions.length} defined).`,
      );
    }

    this.workspaceRoot = workspaceRoot;
    this.customParams = customParams;
    this.cases = selected;
    logOrchestratorEvent(this.deps.logger, "local.cases.loaded", {
      defined: definitions.length,
      selected: selected.map((test) => test.name),
    });
  }

  async runLoadedTestCases(reportPath: string, iterations: number, parallel: boolean): Promise<void> {
    const cwd = this.requireWorkspaceRoot();
    const jobs = this.cases.flatMap((test) =>
      Array.from({ length: iterations }, (_, i) => ({ test, iteration: i + 1 })),
    );

    const results: TestCaseResult[] = [];
    if (parallel) {
      results.push(...(await Promise.all(jobs.map((job) => this.runCase(job.test, job.iteration, cwd)))));
    } else {
      for (const job of jobs) {
        results.push(await this.runCase(job.test, job.iteration, cwd));
      }
    }

    this.results = results;
    await fse.outputFile(reportPath, buildJunitReport(this.platform, results), "utf8");
    logOrchestratorEvent(this.deps.logger, "local.report.written", {
      path: reportPath,
      tests: results.length,
    });
  }

  async getSummary(): Promise<string> {
    const count = (outcome: TestCaseOutcome): number =>
      this.results.filter((result) => result.outcome === outcome).length;

    return renderTemplate("run-summary", {
      platform: this.platform,
      runId: this.deps.context.runId,
      total: this.results.length,
      passed: count("pass"),
      failed: count("fail"),
      errored: count("error"),
      cases: this.results.map((result) => ({
        status: result.outcome.toUpperCase(),
        label: result.iteration > 1 ? `${result.name} #${result.iteration}` : result.name,
        duration: `${(result.durationMs / 1000).toFixed(2)}s`,
      })),
    });
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private async runCase(
    test: TestCaseDefinition,
    iteration: number,
    cwd: string,
  ): Promise<TestCaseResult> {
    const startedAt = Date.now();
    logOrchestratorEvent(this.deps.logger, "local.case.start", { name: test.name, iteration });

    const res = await this.runCommand(test.command, {
      cwd,
      env: this.buildEnv(test, iteration),
      timeoutSeconds: test.timeout,
    });

    const output = maskText(res.output, Object.values(this.secrets));
    const outcome = classifyOutcome(res);
    const durationMs = Date.now() - startedAt;

    // "@" never appears in a test name, so repeats cannot collide with another case's log.
    const logName = iteration > 1 ? `${test.name}@${iteration}.log` : `${test.name}.log`;
    await fse.outputFile(
      path.join(this.deps.context.logDir, "cases", logName),
      output + "\n",
      "utf8",
    );

    const result: TestCaseResult = {
      name: test.name,
      area: test.area,
      iteration,
      outcome,
      durationMs,
      ...(outcome === "pass" ? {} : { message: describeOutcome(res, test.timeout) }),
      ...(outcome === "pass" || !output ? {} : { output: output.slice(-OUTPUT_PREVIEW_LIMIT) }),
    };

    logOrchestratorEvent(
      this.deps.logger,
      "local.case.complete",
      { name: test.name, iteration, outcome, exit_code: res.exitCode, duration_ms: durationMs },
      outcome === "pass" ? "info" : "warn",
    );
    return result;
  }

  private buildEnv(test: TestCaseDefinition, iteration: number): NodeJS.ProcessEnv {
    const env: NodeJS.ProcessEnv = { ...process.env, ...this.secrets };
    for (const [key, value] of Object.entries(this.customParams)) {
      env[`INFRA_PARAM_${key.toUpperCase().replace(/[^A-Z0-9]/g, "_")}`] = value;
    }
    env.INFRA_VALIDATE_TEST_NAME = test.name;
    env.INFRA_VALIDATE_ITERATION = String(iteration);
    return env;
  }

  private requireFilters(): TestCaseFilters {
    if (!this.filters) {
      throw new Error("Parameters have not been validated.");
    }
    return this.filters;
  }

  private requireWorkspaceRoot(): string {
    if (!this.workspaceRoot) {
      throw new Error("Test cases have not been loaded.");
    }
    return this.workspaceRoot;
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export async function runShellCommand(
  command: string,
  opts: { cwd: string; env: NodeJS.ProcessEnv; timeoutSeconds: number },
): Promise<CommandResult> {
  const res = await execaCommand(command, {
    cwd: opts.cwd,
    env: opts.env,
    shell: true,
    reject: false,
    all: true,
    stdin: "ignore",
    timeout: opts.timeoutSeconds * 1000,
  });

  return {
    exitCode: res.exitCode ?? -1,
    timedOut: res.timedOut,
    output: (res.all ?? "").trim(),
  };
}

function classifyOutcome(res: CommandResult): TestCaseOutcome {
  if (res.timedOut || res.exitCode < 0) return "error";
  return res.exitCode === 0 ? "pass" : "fail";
}

function describeOutcome(res: CommandResult, timeoutSeconds: number): string {
  if (res.timedOut) return `Timed out after ${timeoutSeconds}s`;
  if (res.exitCode < 0) return "Command could not be started";
  return `Exited with code ${res.exitCode}`;
}
