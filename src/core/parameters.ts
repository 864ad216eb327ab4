/*
Purpose: merge parameter-file values with per-invocation overrides into one ParameterSet.
Assumptions: keys are compared case-insensitively; only `platform` is required here, every
  other key is validated by the controller that ends up running.
Usage: const params = resolveParameters(fileParams, overrides, logger);
*/

import { ConfigurationError } from "./errors.js";
import { logOrchestratorEvent, type RunLogger } from "./logger.js";
import { maskParameterValue } from "./secrets.js";

// =============================================================================
// TYPES
// =============================================================================

export type ParameterValue = string | number | boolean;

export type ParameterInput = ParameterValue | readonly string[] | null | undefined;

export type ParameterSource = Readonly<Record<string, ParameterInput>>;

export const PARAMETER_KEYS = {
  platform: "platform",
  location: "location",
  resourceGroup: "resourceGroup",
  image: "image",
  vmSize: "vmSize",
  testCategory: "testCategory",
  testArea: "testArea",
  testTags: "testTags",
  testNames: "testNames",
  testPriority: "testPriority",
  excludeTests: "excludeTests",
  iterations: "iterations",
  secretsFile: "secretsFile",
  customParameters: "customParameters",
  enableCodeCoverage: "enableCodeCoverage",
  enableTelemetry: "enableTelemetry",
  useExistingResources: "useExistingResources",
  resourceCleanup: "resourceCleanup",
} as const;

// =============================================================================
// PARAMETER SET
// =============================================================================

type Entry = { key: string; value: ParameterValue };

export class ParameterSet implements Iterable<[string, ParameterValue]> {
  private readonly entries = new Map<string, Entry>();

  static fromRecord(record: Readonly<Record<string, ParameterValue>>): ParameterSet {
    const set = new ParameterSet();
    for (const [key, value] of Object.entries(record)) {
      set.set(key, value);
    }
    return set;
  }

  get size(): number {
    return this.entries.size;
  }

  /** Insert or replace. A replaced key keeps its original position. */
  set(key: string, value: ParameterValue): void {
    const id = normalizeKey(key);
    if (!id) {
      throw new ConfigurationError("Parameter names must not be empty.");
    }
    this.entries.set(id, { key: key.trim(), value });
  }

  has(key: string): boolean {
    return this.entries.has(normalizeKey(key));
  }

  get(key: string): ParameterValue | undefined {
    return this.entries.get(normalizeKey(key))?.value;
  }

  getString(key: string): string | undefined {
    const value = this.get(key);
    if (value === undefined) return undefined;
    const text = String(value).trim();
    return text.length > 0 ? text : undefined;
  }

  getNumber(key: string): number | undefined {
    const value = this.get(key);
    if (value === undefined || typeof value === "boolean") return undefined;
    const parsed = typeof value === "number" ? value : Number(value.trim());
    return Number.isFinite(parsed) ? parsed : undefined;
  }

  getFlag(key: string): boolean {
    const value = this.get(key);
    if (typeof value === "boolean") return value;
    if (typeof value === "number") return value !== 0;
    if (typeof value === "string") return /^(true|yes|1|on)$/i.test(value.trim());
    return false;
  }

  getList(key: string): string[] {
    const text = this.getString(key);
    if (!text) return [];
    return text
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item.length > 0);
  }

  keys(): string[] {
    return [...this.entries.values()].map((entry) => entry.key);
  }

  toRecord(): Record<string, ParameterValue> {
    const record: Record<string, ParameterValue> = {};
    for (const entry of this.entries.values()) {
      record[entry.key] = entry.value;
    }
    return record;
  }

  *[Symbol.iterator](): Iterator<[string, ParameterValue]> {
    for (const entry of this.entries.values()) {
      yield [entry.key, entry.value];
    }
  }
}

// =============================================================================
// RESOLUTION
// =============================================================================

export function resolveParameters(
  fileParams: ParameterSource | undefined,
  overrideParams: ParameterSource,
  logger: RunLogger,
): ParameterSet {
  const fromFile = collectSource(fileParams ?? {}, "parameter file");
  const fromOverrides = collectSource(overrideParams, "overrides");
  const resolved = new ParameterSet();

  for (const [key, value] of fromFile) {
    resolved.set(key, value);
  }

  for (const [key, value] of fromOverrides) {
    const previous = resolved.get(key);
    if (previous !== undefined) {
      logOrchestratorEvent(
        logger,
        "parameters.override",
        {
          key,
          file_value: maskParameterValue(key, previous),
          override_value: maskParameterValue(key, value),
        },
        "warn",
      );
    }
    resolved.set(key, value);
  }

  if (!resolved.getString(PARAMETER_KEYS.platform)) {
    throw new ConfigurationError(
      "Test platform is not set. Add `platform` to the parameter file or pass --platform.",
    );
  }

  logOrchestratorEvent(logger, "parameters.resolved", {
    keys: resolved.keys(),
    platform: resolved.getString(PARAMETER_KEYS.platform) ?? null,
  });

  return resolved;
}

/**
 * Parse `key=value;key=value` into a record. Empty segments are ignored; a segment
 * without `=` or with an empty key is rejected.
 */
export function parseCustomParameters(raw: string | undefined): Record<string, string> {
  const result: Record<string, string> = {};
  if (!raw) return result;

  for (const segment of raw.split(";")) {
    const trimmed = segment.trim();
    if (!trimmed) continue;

    const eq = trimmed.indexOf("=");
    const key = eq > 0 ? trimmed.slice(0, eq).trim() : "";
    if (!key) {
      throw new ConfigurationError(
        `Invalid custom parameter "${trimmed}". Expected key=value pairs separated by ";".`,
      );
    }
    result[key] = trimmed.slice(eq + 1).trim();
  }

  return result;
}

// =============================================================================
// INTERNALS
// =============================================================================

function normalizeKey(key: string): string {
  return key.trim().toLowerCase();
}

// Drops values that carry no explicit intent (unset, blank, false, empty list).
function normalizeInput(value: ParameterInput): ParameterValue | undefined {
  if (value === undefined || value === null || value === false) return undefined;
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }
  if (typeof value === "number" || typeof value === "boolean") return value;

  const items = value.map((item) => item.trim()).filter((item) => item.length > 0);
  return items.length > 0 ? items.join(",") : undefined;
}

function collectSource(source: ParameterSource, label: string): Array<[string, ParameterValue]> {
  const seen = new Map<string, string>();
  const collected: Array<[string, ParameterValue]> = [];

  for (const [key, raw] of Object.entries(source)) {
    const id = normalizeKey(key);
    const existing = seen.get(id);
    if (existing !== undefined) {
      throw new ConfigurationError(
        `Parameter "${key}" is defined more than once in the ${label} (also as "${existing}").`,
      );
    }
    seen.set(id, key);

    const value = normalizeInput(raw);
    if (value !== undefined) {
      collected.push([key.trim(), value]);
    }
  }

  return collected;
}
