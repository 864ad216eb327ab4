import type { RunLogger } from "../core/logger.js";
import type { ParameterSet } from "../core/parameters.js";
import type { RunContext } from "../core/run-identity.js";

export type CustomParameters = Readonly<Record<string, string>>;

export type ControllerDeps = {
  context: RunContext;
  logger: RunLogger;
};

/**
 * Capability set every platform backend implements. Methods are awaited strictly in
 * order by the lifecycle driver; whatever a method does internally (worker pools,
 * provisioning, child processes) is opaque to the caller.
 */
export interface TestController {
  readonly platform: string;
  parseAndValidateParameters(params: ParameterSet): Promise<void>;
  prepareTestEnvironment(secretsFile: string | undefined): Promise<void>;
  loadTestCases(workspaceRoot: string, customParams: CustomParameters): Promise<void>;
  runLoadedTestCases(reportPath: string, iterations: number, parallel: boolean): Promise<void>;
  getSummary(): Promise<string>;
}

export type ControllerFactory = (deps: ControllerDeps) => TestController;
