import path from "node:path";

import fse from "fs-extra";
import { parse as parseYaml } from "yaml";
import { z, type ZodIssue } from "zod";

import { USER_FACING_ERROR_CODES, UserFacingError } from "./errors.js";
import type { ParameterSource } from "./parameters.js";

// =============================================================================
// SCHEMA
// =============================================================================

export const ParameterFileSchema = z.record(
  z.union([z.string(), z.number(), z.boolean(), z.array(z.string()), z.null()]),
);

export type ParameterFile = z.infer<typeof ParameterFileSchema>;

// =============================================================================
// PUBLIC API
// =============================================================================

export async function loadParameterFile(filePath: string): Promise<ParameterSource> {
  const resolvedPath = path.resolve(filePath);

  if (!(await fse.pathExists(resolvedPath))) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Parameter file missing.",
      message: `Parameter file not found at ${resolvedPath}.`,
      hint: "Check the --parameter-file path, or omit it to run from command-line options only.",
    });
  }

  let raw: string;
  try {
    raw = await fse.readFile(resolvedPath, "utf8");
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Parameter file unreadable.",
      message: `Failed to read parameter file at ${resolvedPath}.`,
      hint: "Check file permissions.",
      cause: err,
    });
  }

  let document: unknown;
  try {
    document = parseYaml(raw);
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Parameter file is not valid YAML.",
      message: `Failed to parse ${resolvedPath}.`,
      cause: err,
    });
  }

  // An empty file parses to null and means "no parameters".
  if (document === null || document === undefined) {
    return {};
  }

  const parsed = ParameterFileSchema.safeParse(document);
  if (!parsed.success) {
    const issues = formatSchemaIssues(parsed.error.issues).map((line) => `- ${line}`);
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Parameter file invalid.",
      message: `Parameter file ${resolvedPath} must be a flat mapping of scalar values:\n${issues.join("\n")}`,
      hint: "Nested sections are not supported; use one key per parameter.",
    });
  }

  return parsed.data;
}

export function formatSchemaIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

    if (issue.code === "invalid_type") {
      return `${location}: Expected ${issue.expected}, received ${issue.received}`;
    }
    if (issue.code === "invalid_union") {
      return `${location}: Expected a string, number, boolean or list of strings`;
    }

    return `${location}: ${issue.message}`;
  });
}
