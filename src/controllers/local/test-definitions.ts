import path from "node:path";

import fse from "fs-extra";
import { minimatch } from "minimatch";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

import { formatSchemaIssues } from "../../core/config-loader.js";
import { ConfigurationError } from "../../core/errors.js";
import { PARAMETER_KEYS, type ParameterSet } from "../../core/parameters.js";

// =============================================================================
// SCHEMA
// =============================================================================

export const TEST_DEFINITIONS_DIR = "testcases";

// Names become per-case log file names, so no path separators and no leading dot.
export const TEST_NAME_PATTERN = /^[A-Za-z0-9_][A-Za-z0-9_.-]*$/;

export const TestCaseSchema = z
  .object({
    name: z
      .string()
      .min(1)
      .regex(TEST_NAME_PATTERN, "Use letters, digits, '_', '.' and '-', not starting with '.' or '-'"),
    category: z.string().min(1).default("Functional"),
    area: z.string().min(1),
    tags: z.array(z.string().min(1)).default([]),
    priority: z.number().int().nonnegative().default(2),
    command: z.string().min(1),
    timeout: z.number().int().positive().default(600),
  })
  .strict();

export const TestDefinitionFileSchema = z
  .object({
    tests: z.array(TestCaseSchema).min(1),
  })
  .strict();

export type TestCaseDefinition = z.infer<typeof TestCaseSchema>;

export type TestCaseFilters = {
  categories: string[];
  areas: string[];
  tags: string[];
  names: string[];
  priorities: number[];
  exclude: string[];
};

// =============================================================================
// LOADING
// =============================================================================

export async function readTestDefinitions(workspaceRoot: string): Promise<TestCaseDefinition[]> {
  const dir = path.join(workspaceRoot, TEST_DEFINITIONS_DIR);
  if (!(await fse.pathExists(dir))) {
    throw new ConfigurationError(`No test definitions directory at ${dir}.`);
  }

  const files = (await fse.readdir(dir))
    .filter((file) => file.endsWith(".yaml") || file.endsWith(".yml"))
    .sort();
  if (files.length === 0) {
    throw new ConfigurationError(`No test definition files (*.yaml) in ${dir}.`);
  }

  const issues: string[] = [];
  const definitions: TestCaseDefinition[] = [];
  const seen = new Map<string, string>();

  for (const file of files) {
    const filePath = path.join(dir, file);
    let document: unknown;
    try {
      document = parseYaml(await fse.readFile(filePath, "utf8"));
    } catch (err) {
      issues.push(`${file}: not valid YAML (${err instanceof Error ? err.message : String(err)})`);
      continue;
    }

    const parsed = TestDefinitionFileSchema.safeParse(document);
    if (!parsed.success) {
      issues.push(...formatSchemaIssues(parsed.error.issues).map((line) => `${file}: ${line}`));
      continue;
    }

    for (const test of parsed.data.tests) {
      const key = test.name.toLowerCase();
      const owner = seen.get(key);
      if (owner) {
        issues.push(`${file}: test "${test.name}" is already defined in ${owner}`);
        continue;
      }
      seen.set(key, file);
      definitions.push(test);
    }
  }

  if (issues.length > 0) {
    throw new ConfigurationError(`Invalid test definitions:\n${issues.join("\n")}`);
  }

  return definitions;
}

export async function validateTestDefinitions(workspaceRoot: string): Promise<void> {
  await readTestDefinitions(workspaceRoot);
}

// =============================================================================
// SELECTION
// =============================================================================

export function resolveTestCaseFilters(params: ParameterSet): TestCaseFilters {
  const priorities = params.getList(PARAMETER_KEYS.testPriority).map((raw) => {
    const value = Number(raw);
    if (!Number.isInteger(value) || value < 0) {
      throw new ConfigurationError(`Invalid test priority "${raw}"; expected a non-negative integer.`);
    }
    return value;
  });

  return {
    categories: withoutAll(params.getList(PARAMETER_KEYS.testCategory)),
    areas: withoutAll(params.getList(PARAMETER_KEYS.testArea)),
    tags: params.getList(PARAMETER_KEYS.testTags),
    names: params.getList(PARAMETER_KEYS.testNames),
    priorities,
    exclude: params.getList(PARAMETER_KEYS.excludeTests),
  };
}

/** Every non-empty filter must match; names and exclusions are case-insensitive globs. */
export function selectTestCases(
  definitions: readonly TestCaseDefinition[],
  filters: TestCaseFilters,
): TestCaseDefinition[] {
  return definitions.filter((test) => {
    if (filters.categories.length > 0 && !includesIgnoreCase(filters.categories, test.category)) {
      return false;
    }
    if (filters.areas.length > 0 && !includesIgnoreCase(filters.areas, test.area)) {
      return false;
    }
    if (filters.tags.length > 0 && !test.tags.some((tag) => includesIgnoreCase(filters.tags, tag))) {
      return false;
    }
    if (filters.names.length > 0 && !matchesAny(filters.names, test.name)) {
      return false;
    }
    if (filters.priorities.length > 0 && !filters.priorities.includes(test.priority)) {
      return false;
    }
    return !matchesAny(filters.exclude, test.name);
  });
}

// =============================================================================
// INTERNALS
// =============================================================================

function withoutAll(values: string[]): string[] {
  return values.some((value) => value.toLowerCase() === "all") ? [] : values;
}

function includesIgnoreCase(values: string[], candidate: string): boolean {
  const needle = candidate.toLowerCase();
  return values.some((value) => value.toLowerCase() === needle);
}

function matchesAny(patterns: string[], name: string): boolean {
  return patterns.some((pattern) => minimatch(name, pattern, { nocase: true }));
}
