import fse from "fs-extra";

import type {
  ControllerDeps,
  CustomParameters,
  TestController,
} from "../controllers/controller.js";
import { ControllerRegistry } from "../controllers/registry.js";
import type { AttachableLogger, JsonObject, LogEvent, LogLevel } from "../core/logger.js";
import type { ParameterSet } from "../core/parameters.js";
import type { ReportRecord } from "../core/report.js";
import type { StateScope } from "../core/state-guard.js";

// =============================================================================
// LOGGER
// =============================================================================

export type RecordedEvent = { type: string; level: LogLevel; payload: JsonObject };

export class MemoryLogger implements AttachableLogger {
  readonly events: RecordedEvent[] = [];
  attached: { filePath: string; runId: string } | null = null;
  failOn: Set<string> = new Set();

  log(event: LogEvent): void {
    if (this.failOn.has(event.type)) {
      throw new Error(`ENOSPC: cannot write ${event.type}`);
    }
    this.events.push({ type: event.type, level: event.level ?? "info", payload: event.payload ?? {} });
  }

  attach(filePath: string, runId: string): void {
    this.attached = { filePath, runId };
  }

  types(): string[] {
    return this.events.map((event) => event.type);
  }

  find(type: string): RecordedEvent | undefined {
    return this.events.find((event) => event.type === type);
  }
}

// =============================================================================
// STATE SCOPE
// =============================================================================

export class MapStateScope implements StateScope {
  readonly values: Map<string, string>;
  failRemovalOf: Set<string> = new Set();

  constructor(initial: Record<string, string> = {}) {
    this.values = new Map(Object.entries(initial));
  }

  names(): string[] {
    return [...this.values.keys()];
  }

  set(name: string, value: string): void {
    this.values.set(name, value);
  }

  remove(name: string): void {
    if (this.failRemovalOf.has(name)) {
      throw new Error(`cannot remove ${name}`);
    }
    this.values.delete(name);
  }
}

// =============================================================================
// CONTROLLER
// =============================================================================

export type FakeControllerMethod =
  | "parseAndValidateParameters"
  | "prepareTestEnvironment"
  | "loadTestCases"
  | "runLoadedTestCases"
  | "getSummary";

export type FakeControllerOptions = {
  failOn?: Partial<Record<FakeControllerMethod, Error>>;
  // Counts written to the report path; null writes nothing.
  report?: ReportRecord | null;
  summary?: string;
};

export class FakeController implements TestController {
  readonly platform = "Fake";
  readonly calls: Array<{ method: FakeControllerMethod; args: unknown[] }> = [];

  constructor(
    readonly deps: ControllerDeps,
    private readonly opts: FakeControllerOptions = {},
  ) {}

  async parseAndValidateParameters(params: ParameterSet): Promise<void> {
    this.record("parseAndValidateParameters", [params.toRecord()]);
  }

  async prepareTestEnvironment(secretsFile: string | undefined): Promise<void> {
    this.record("prepareTestEnvironment", [secretsFile]);
  }

  async loadTestCases(workspaceRoot: string, customParams: CustomParameters): Promise<void> {
    this.record("loadTestCases", [workspaceRoot, customParams]);
  }

  async runLoadedTestCases(reportPath: string, iterations: number, parallel: boolean): Promise<void> {
    this.record("runLoadedTestCases", [reportPath, iterations, parallel]);
    const report = this.opts.report === undefined ? { tests: 1, failures: 0, errors: 0 } : this.opts.report;
    if (report) {
      await fse.outputFile(reportPath, junitXml(report), "utf8");
    }
  }

  async getSummary(): Promise<string> {
    this.record("getSummary", []);
    return this.opts.summary ?? "fake summary";
  }

  methods(): FakeControllerMethod[] {
    return this.calls.map((call) => call.method);
  }

  private record(method: FakeControllerMethod, args: unknown[]): void {
    this.calls.push({ method, args });
    const failure = this.opts.failOn?.[method];
    if (failure) {
      throw failure;
    }
  }
}

/** Registry holding one "Fake" platform; `created` collects every controller it builds. */
export function fakeRegistry(opts: FakeControllerOptions = {}): {
  registry: ControllerRegistry;
  created: FakeController[];
} {
  const created: FakeController[] = [];
  const registry = new ControllerRegistry().register("Fake", (deps) => {
    const controller = new FakeController(deps, opts);
    created.push(controller);
    return controller;
  });
  return { registry, created };
}

// =============================================================================
// REPORTS
// =============================================================================

export function junitXml(...suites: ReportRecord[]): string {
  const body = suites
    .map(
      (suite, i) =>
        `  <testsuite name="suite-${i + 1}" tests="${suite.tests}" failures="${suite.failures}" errors="${suite.errors}"></testsuite>`,
    )
    .join("\n");
  return `<?xml version="1.0" encoding="UTF-8"?>\n<testsuites>\n${body}\n</testsuites>\n`;
}
