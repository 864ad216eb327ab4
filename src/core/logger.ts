/*
Purpose: structured JSONL event log for a run, with an optional console echo.
Assumptions: one logger per invocation; events emitted before the run's log directory
  exists are buffered and written once a file is attached.
Usage: const log = new JsonlLogger({ echo: consoleEcho }); log.attach(orchestratorLogPath(ctx.logDir), ctx.runId);
  logOrchestratorEvent(log, "lifecycle.transition", { from, to });
*/

import fs from "node:fs";
import path from "node:path";

import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogEvent = {
  type: string;
  level?: LogLevel;
  payload?: JsonObject;
};

export type LogRecord = {
  ts: string;
  level: LogLevel;
  type: string;
  run_id: string | null;
  payload?: JsonObject;
};

export type LogEcho = (record: LogRecord) => void;

export interface RunLogger {
  log(event: LogEvent): void;
}

export interface AttachableLogger extends RunLogger {
  attach(filePath: string, runId: string): void;
}

// =============================================================================
// JSONL LOGGER
// =============================================================================

export class JsonlLogger implements AttachableLogger {
  private filePath: string | null = null;
  private runId: string | null = null;
  private readonly pending: string[] = [];
  private readonly echo?: LogEcho;

  constructor(opts: { echo?: LogEcho } = {}) {
    this.echo = opts.echo;
  }

  get path(): string | null {
    return this.filePath;
  }

  attach(filePath: string, runId: string): void {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    this.filePath = filePath;
    this.runId = runId;

    if (this.pending.length > 0) {
      const lines = this.pending.splice(0, this.pending.length).map((line) => this.stamp(line));
      fs.appendFileSync(filePath, lines.join(""), "utf8");
    }
  }

  log(event: LogEvent): void {
    const record: LogRecord = {
      ts: isoNow(),
      level: event.level ?? "info",
      type: event.type,
      run_id: this.runId,
      ...(event.payload ? { payload: event.payload } : {}),
    };

    this.echo?.(record);

    const line = JSON.stringify(record) + "\n";
    if (!this.filePath) {
      this.pending.push(line);
      return;
    }
    fs.appendFileSync(this.filePath, line, "utf8");
  }

  // Buffered lines were serialized before the run id was known.
  private stamp(line: string): string {
    return line.replace('"run_id":null', `"run_id":${JSON.stringify(this.runId)}`);
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export function logOrchestratorEvent(
  logger: RunLogger,
  type: string,
  payload?: JsonObject,
  level: LogLevel = "info",
): void {
  logger.log({ type, level, payload });
}

export const consoleEcho: LogEcho = (record) => {
  if (record.level === "debug") return;

  const details = record.payload ? ` ${formatPayload(record.payload)}` : "";
  const line = `[${record.level}] ${record.type}${details}`;

  if (record.level === "error") {
    console.error(line);
  } else if (record.level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
};

function formatPayload(payload: JsonObject): string {
  return Object.entries(payload)
    .map(([key, value]) => `${key}=${typeof value === "string" ? value : JSON.stringify(value)}`)
    .join(" ");
}

export function orchestratorLogPath(logDir: string): string {
  return path.join(logDir, "orchestrator.jsonl");
}
