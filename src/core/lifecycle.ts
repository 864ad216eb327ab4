/**
 * ControllerLifecycleDriver walks one backend controller through the fixed phase order:
 * Created → Selected → Validated → EnvironmentReady → CasesLoaded → Executed → Reported.
 *
 * Each phase produces an explicit outcome. The first failing outcome among the phases up to
 * Executed stops the walk and the driver settles in Failed, recording the phase, message and
 * call-site. A failing summary (Reported) is logged and otherwise ignored. Phase errors never
 * escape `run()`; callers read the returned LifecycleResult. Nothing is retried.
 */

import type { CustomParameters, TestController } from "../controllers/controller.js";
import type { ControllerRegistry } from "../controllers/registry.js";

import { ConfigurationError, LifecyclePhaseError, resolveErrorLocation, toError } from "./errors.js";
import { formatErrorMessage } from "./error-format.js";
import { logOrchestratorEvent, type RunLogger } from "./logger.js";
import { PARAMETER_KEYS, parseCustomParameters, type ParameterSet } from "./parameters.js";
import type { RunContext } from "./run-identity.js";

// =============================================================================
// TYPES
// =============================================================================

export const LIFECYCLE_STATES = [
  "Created",
  "Selected",
  "Validated",
  "EnvironmentReady",
  "CasesLoaded",
  "Executed",
  "Reported",
] as const;

export type LifecyclePhase = (typeof LIFECYCLE_STATES)[number];

export type LifecycleState = LifecyclePhase | "Failed";

export type PhaseOutcome = { ok: true } | { ok: false; error: Error };

export type LifecycleFailure = {
  phase: LifecyclePhase;
  message: string;
  location?: string;
  error: Error;
};

export type LifecycleResult = {
  state: "Reported" | "Failed";
  platform: string;
  reached: LifecyclePhase[];
  summary?: string;
  failure?: LifecycleFailure;
};

/** External check that test definitions are well-formed before cases are loaded. */
export type TestDefinitionValidator = (workspaceRoot: string) => Promise<void>;

export type LifecycleInput = {
  registry: ControllerRegistry;
  params: ParameterSet;
  context: RunContext;
  logger: RunLogger;
  workspaceRoot: string;
  reportPath: string;
  parallel: boolean;
  env?: NodeJS.ProcessEnv;
  validateTestDefinitions?: TestDefinitionValidator;
};

export const SECRETS_FILE_ENV = "INFRA_VALIDATE_SECRETS_FILE";

type Phase = {
  target: LifecyclePhase;
  run: () => Promise<void>;
};

// =============================================================================
// DRIVER
// =============================================================================

export class ControllerLifecycleDriver {
  private current: LifecycleState = "Created";
  private readonly reached: LifecyclePhase[] = ["Created"];
  private controller: TestController | null = null;
  private iterations = 1;
  private customParams: CustomParameters = {};

  constructor(private readonly input: LifecycleInput) {}

  get state(): LifecycleState {
    return this.current;
  }

  async run(): Promise<LifecycleResult> {
    if (this.current !== "Created") {
      throw new Error(`Lifecycle already started (state: ${this.current}).`);
    }

    const platform = this.input.params.getString(PARAMETER_KEYS.platform) ?? "";
    const phases: Phase[] = [
      { target: "Selected", run: () => this.select(platform) },
      { target: "Validated", run: () => this.validate() },
      { target: "EnvironmentReady", run: () => this.prepareEnvironment() },
      { target: "CasesLoaded", run: () => this.loadCases() },
      { target: "Executed", run: () => this.execute() },
    ];

    for (const phase of phases) {
      const outcome = await attempt(phase.run);
      if (!outcome.ok) {
        return this.fail(platform, phase.target, outcome.error);
      }
      this.transition(phase.target);
    }

    const summary = await this.summarize();
    this.transition("Reported");

    return {
      state: "Reported",
      platform,
      reached: [...this.reached],
      ...(summary === undefined ? {} : { summary }),
    };
  }

  // ---------------------------------------------------------------------------
  // Phases
  // ---------------------------------------------------------------------------

  private async select(platform: string): Promise<void> {
    this.controller = this.input.registry.create(platform, {
      context: this.input.context,
      logger: this.input.logger,
    });
  }

  private async validate(): Promise<void> {
    const controller = this.requireController();
    await controller.parseAndValidateParameters(this.input.params);
    this.iterations = resolveIterations(this.input.params);
    this.customParams = parseCustomParameters(
      this.input.params.getString(PARAMETER_KEYS.customParameters),
    );
  }

  private async prepareEnvironment(): Promise<void> {
    const secrets = resolveSecretsFile(this.input.params, this.input.env ?? process.env);
    logOrchestratorEvent(this.input.logger, "lifecycle.secrets", {
      source: secrets.source,
      ...(secrets.filePath ? { file: secrets.filePath } : {}),
    });
    await this.requireController().prepareTestEnvironment(secrets.filePath);
  }

  private async loadCases(): Promise<void> {
    const platform = this.input.params.getString(PARAMETER_KEYS.platform) ?? "";
    const validator =
      this.input.validateTestDefinitions ?? this.input.registry.definitionValidator(platform);
    if (validator) {
      await validator(this.input.workspaceRoot);
      logOrchestratorEvent(this.input.logger, "lifecycle.definitions_valid", {
        workspace: this.input.workspaceRoot,
      });
    }
    await this.requireController().loadTestCases(this.input.workspaceRoot, this.customParams);
  }

  private async execute(): Promise<void> {
    logOrchestratorEvent(this.input.logger, "lifecycle.execute", {
      report: this.input.reportPath,
      iterations: this.iterations,
      parallel: this.input.parallel,
    });
    await this.requireController().runLoadedTestCases(
      this.input.reportPath,
      this.iterations,
      this.input.parallel,
    );
  }

  private async summarize(): Promise<string | undefined> {
    try {
      const summary = await this.requireController().getSummary();
      logOrchestratorEvent(this.input.logger, "lifecycle.summary", { text: summary });
      return summary;
    } catch (err) {
      logOrchestratorEvent(
        this.input.logger,
        "lifecycle.summary_failed",
        { message: formatErrorMessage(err) },
        "warn",
      );
      return undefined;
    }
  }

  // ---------------------------------------------------------------------------
  // State bookkeeping
  // ---------------------------------------------------------------------------

  private transition(target: LifecyclePhase): void {
    const from = this.current;
    if (from === "Failed") {
      throw new Error(`Cannot move to ${target} from Failed.`);
    }
    if (LIFECYCLE_STATES.indexOf(target) !== LIFECYCLE_STATES.indexOf(from) + 1) {
      throw new Error(`Illegal lifecycle transition ${from} -> ${target}.`);
    }

    this.current = target;
    this.reached.push(target);
    logOrchestratorEvent(this.input.logger, "lifecycle.transition", { from, to: target });
  }

  private fail(platform: string, phase: LifecyclePhase, error: Error): LifecycleResult {
    const from = this.current;
    const message = formatErrorMessage(error);
    const location = resolveErrorLocation(error);
    const wrapped =
      error instanceof ConfigurationError || error instanceof LifecyclePhaseError
        ? error
        : new LifecyclePhaseError(message, phase, location, error);

    this.current = "Failed";
    logOrchestratorEvent(
      this.input.logger,
      "lifecycle.failed",
      {
        from,
        phase,
        error: wrapped.name,
        message,
        ...(location ? { location } : {}),
      },
      "error",
    );

    return {
      state: "Failed",
      platform,
      reached: [...this.reached],
      failure: { phase, message, ...(location ? { location } : {}), error: wrapped },
    };
  }

  private requireController(): TestController {
    if (!this.controller) {
      throw new Error("No controller selected.");
    }
    return this.controller;
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export async function attempt(fn: () => Promise<void>): Promise<PhaseOutcome> {
  try {
    await fn();
    return { ok: true };
  } catch (err) {
    return { ok: false, error: toError(err) };
  }
}

export function resolveIterations(params: ParameterSet): number {
  if (!params.has(PARAMETER_KEYS.iterations)) return 1;

  const value = params.getNumber(PARAMETER_KEYS.iterations);
  if (value === undefined || !Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(
      `Parameter "iterations" must be a positive integer (got ${String(params.get(PARAMETER_KEYS.iterations))}).`,
    );
  }
  return value;
}

export function resolveSecretsFile(
  params: ParameterSet,
  env: NodeJS.ProcessEnv,
): { filePath: string | undefined; source: "env" | "parameter" | "none" } {
  const fromEnv = env[SECRETS_FILE_ENV]?.trim();
  if (fromEnv) {
    return { filePath: fromEnv, source: "env" };
  }

  const fromParams = params.getString(PARAMETER_KEYS.secretsFile);
  if (fromParams) {
    return { filePath: fromParams, source: "parameter" };
  }

  return { filePath: undefined, source: "none" };
}
