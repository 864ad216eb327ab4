/*
Purpose: normalize errors into operator-facing lines and provide ANSI styling helpers.
Assumptions: debug mode may include stack traces; non-TTY output should disable color.
Usage: formatErrorLines(err, { mode: "debug" }); createAnsiFormatter(resolveColorEnabled({ stream })).
*/

import {
  AggregationError,
  ConfigurationError,
  LifecyclePhaseError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
  resolveErrorLocation,
  type UserFacingErrorInput,
} from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatOptions = {
  mode?: ErrorFormatMode;
};

export type ErrorFormatLineKind =
  | "title"
  | "message"
  | "hint"
  | "next"
  | "phase"
  | "location"
  | "code"
  | "name"
  | "cause"
  | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "bold" | "dim" | "red" | "green" | "yellow" | "cyan";

export type AnsiFormatter = (value: string, styles?: AnsiStyle[]) => string;

export type AnsiColorOptions = {
  stream?: { isTTY?: boolean };
  useColor?: boolean;
};

// =============================================================================
// ANSI COLOR HELPERS
// =============================================================================

const ANSI_RESET = "\x1b[0m";

const ANSI_STYLES: Record<AnsiStyle, string> = {
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
};

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  return (value: string, styles: AnsiStyle[] = []): string => {
    if (!enabled || styles.length === 0) {
      return value;
    }

    const prefix = styles.map((style) => ANSI_STYLES[style]).join("");
    return `${prefix}${value}${ANSI_RESET}`;
  };
}

export function resolveColorEnabled(options: AnsiColorOptions = {}): boolean {
  const stream = options.stream ?? process.stderr;
  const isTty = Boolean(stream.isTTY);

  if (options.useColor === undefined) {
    return isTty;
  }

  return options.useColor && isTty;
}

// =============================================================================
// ERROR FORMATTING
// =============================================================================

export function formatErrorLines(
  error: unknown,
  options: ErrorFormatOptions = {},
): ErrorFormatLine[] {
  const mode = options.mode ?? "short";
  const normalized = normalizeUserFacingError(error);
  const lines: ErrorFormatLine[] = [{ kind: "title", text: normalized.title }];

  if (normalized.message.trim() !== normalized.title.trim()) {
    lines.push({ kind: "message", text: normalized.message });
  }
  if (normalized.hint) {
    lines.push({ kind: "hint", text: normalized.hint });
  }
  if (normalized.next) {
    lines.push({ kind: "next", text: normalized.next });
  }

  const phaseError = findInChain(error, LifecyclePhaseError);
  if (phaseError) {
    lines.push({ kind: "phase", text: phaseError.phase });
  }

  const location = resolveErrorLocation(phaseError ?? error);
  if (location) {
    lines.push({ kind: "location", text: location });
  }

  if (mode === "debug") {
    lines.push({ kind: "code", text: normalized.code });

    if (error instanceof Error && error.name) {
      lines.push({ kind: "name", text: error.name });
    }

    const cause = normalized.cause === undefined ? undefined : formatErrorMessage(normalized.cause);
    if (cause && cause !== normalized.message) {
      lines.push({ kind: "cause", text: cause });
    }

    if (error instanceof Error && error.stack) {
      lines.push({ kind: "stack", text: error.stack });
    }
  }

  return lines;
}

export function renderErrorLines(lines: ErrorFormatLine[], format: AnsiFormatter): string {
  return lines
    .map((line) => {
      switch (line.kind) {
        case "title":
          return format(line.text, ["bold", "red"]);
        case "hint":
          return format(`Hint: ${line.text}`, ["yellow"]);
        case "next":
          return format(`Next: ${line.text}`, ["cyan"]);
        case "phase":
          return `Phase: ${line.text}`;
        case "location":
          return format(`At: ${line.text}`, ["dim"]);
        case "code":
        case "name":
        case "cause":
          return format(`${line.kind}: ${line.text}`, ["dim"]);
        default:
          return line.text;
      }
    })
    .join("\n");
}

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    const message = error.message.trim();
    if (message) return message;
    if (error.name) return error.name;
  }

  if (typeof error === "string") {
    return error;
  }

  if (error && typeof error === "object" && "message" in error) {
    const { message } = error;
    if (typeof message === "string" && message.trim()) {
      return message.trim();
    }
  }

  return String(error);
}

// =============================================================================
// INTERNALS
// =============================================================================

const DEFAULT_ERROR_TITLE = "Unexpected error";
const DEFAULT_ERROR_MESSAGE = "An unexpected error occurred.";

function normalizeUserFacingError(error: unknown): UserFacingErrorInput {
  if (error instanceof UserFacingError) {
    return {
      code: error.code,
      title: error.title.trim() || DEFAULT_ERROR_TITLE,
      message: error.message.trim() || DEFAULT_ERROR_MESSAGE,
      hint: error.hint?.trim() || undefined,
      next: error.next?.trim() || undefined,
      cause: error.cause,
    };
  }

  if (error instanceof ConfigurationError) {
    return {
      code: USER_FACING_ERROR_CODES.config,
      title: "Configuration invalid.",
      message: formatErrorMessage(error),
      hint: "Check the parameter file and command-line overrides.",
      cause: error.cause,
    };
  }

  if (error instanceof LifecyclePhaseError) {
    return {
      code: USER_FACING_ERROR_CODES.lifecycle,
      title: `Run failed during ${error.phase}.`,
      message: formatErrorMessage(error),
      cause: error.cause,
    };
  }

  if (error instanceof AggregationError) {
    return {
      code: USER_FACING_ERROR_CODES.aggregation,
      title: "Result reports could not be aggregated.",
      message: formatErrorMessage(error),
      hint: error.reportPath ? `Expected report: ${error.reportPath}` : undefined,
      cause: error.cause,
    };
  }

  if (error instanceof Error) {
    return {
      code: USER_FACING_ERROR_CODES.unknown,
      title: DEFAULT_ERROR_TITLE,
      message: formatErrorMessage(error) || DEFAULT_ERROR_MESSAGE,
      cause: error.cause,
    };
  }

  return {
    code: USER_FACING_ERROR_CODES.unknown,
    title: DEFAULT_ERROR_TITLE,
    message:
      error === null || error === undefined ? DEFAULT_ERROR_MESSAGE : formatErrorMessage(error),
  };
}

function findInChain<T extends Error>(
  error: unknown,
  ctor: abstract new (...args: never[]) => T,
): T | undefined {
  let current: unknown = error;
  for (let depth = 0; depth < 8 && current; depth += 1) {
    if (current instanceof ctor) return current;
    current = current instanceof Error ? current.cause : undefined;
  }
  return undefined;
}
