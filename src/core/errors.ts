/*
Purpose: error taxonomy shared by parameter resolution, the controller lifecycle, report aggregation and the CLI.
Assumptions: UserFacingError instances are safe to display to operators.
Usage: throw new ConfigurationError("..."); throw new UserFacingError({ code, title, message, hint, next, cause }).
*/

// =============================================================================
// CORE ERRORS
// =============================================================================

export class OrchestratorError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "OrchestratorError";
    // Start the stack at the throw site so resolveErrorLocation skips constructor frames.
    Error.captureStackTrace(this, new.target);
  }
}

export class ConfigurationError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigurationError";
  }
}

export class LifecyclePhaseError extends OrchestratorError {
  constructor(
    message: string,
    public readonly phase: string,
    public readonly location: string | undefined,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "LifecyclePhaseError";
  }
}

export class AggregationError extends OrchestratorError {
  constructor(
    message: string,
    public readonly reportPath?: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "AggregationError";
  }
}

export class RunError extends OrchestratorError {
  constructor(
    message: string,
    public readonly location: string | undefined,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "RunError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  unknown: "UNKNOWN",
  config: "CONFIG_ERROR",
  lifecycle: "LIFECYCLE_ERROR",
  aggregation: "AGGREGATION_ERROR",
  template: "TEMPLATE_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  public readonly code: UserFacingErrorCode;
  public readonly title: string;
  public readonly hint?: string;
  public readonly next?: string;
  public readonly cause?: unknown;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    Error.captureStackTrace(this, new.target);
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.cause = input.cause;
  }
}

// =============================================================================
// CALL-SITE LOCATION
// =============================================================================

const STACK_FRAME_PATTERN = /^\s*at\s+(?:.*?\s+\()?(.+?:\d+:\d+)\)?\s*$/;

/**
 * First `file:line:column` frame of an error's stack, or undefined when the
 * value carries no parseable stack.
 */
export function resolveErrorLocation(error: unknown): string | undefined {
  if (error instanceof LifecyclePhaseError || error instanceof RunError) {
    if (error.location) return error.location;
  }
  if (!(error instanceof Error) || !error.stack) {
    return undefined;
  }

  for (const line of error.stack.split("\n").slice(1)) {
    const match = STACK_FRAME_PATTERN.exec(line);
    if (match) {
      return match[1];
    }
  }

  return undefined;
}

/** Coerce any thrown value into an Error without losing the original as cause. */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new RunError(typeof value === "string" ? value : String(value), undefined, value);
}
