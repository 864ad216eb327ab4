import fs from "node:fs";
import path from "node:path";

import { stringify as stringifyYaml } from "yaml";

const REPO_CONFIG_DIR = ".infra-validate";
const REPO_PARAMETER_FILE = "parameters.yaml";

export type ParameterFileSource = "explicit" | "repo" | "none";

export type ParameterFileResolution = {
  filePath: string | null;
  source: ParameterFileSource;
};

export type InitResult = {
  repoRoot: string;
  filePath: string;
  status: "created" | "overwritten" | "exists";
};

const STARTER_PARAMETERS = {
  platform: "Local",
  testCategory: "All",
  testArea: "All",
  iterations: 1,
};

export function resolveParameterFilePath(args: {
  explicitPath?: string;
  cwd?: string;
}): ParameterFileResolution {
  const cwd = args.cwd ?? process.cwd();

  if (args.explicitPath) {
    return { filePath: path.resolve(cwd, args.explicitPath), source: "explicit" };
  }

  const repoRoot = findRepoRoot(cwd);
  if (repoRoot) {
    const candidate = repoParameterFilePath(repoRoot);
    if (fs.existsSync(candidate)) {
      return { filePath: candidate, source: "repo" };
    }
  }

  return { filePath: null, source: "none" };
}

export function initRepoParameters(args: { cwd?: string; force?: boolean }): InitResult {
  const cwd = args.cwd ?? process.cwd();
  const repoRoot = findRepoRoot(cwd);
  if (!repoRoot) {
    throw new Error("No git repository found in the current or parent directories.");
  }

  const filePath = repoParameterFilePath(repoRoot);
  const exists = fs.existsSync(filePath);
  const force = args.force ?? false;
  if (exists && !force) {
    return { repoRoot, filePath, status: "exists" };
  }

  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, stringifyYaml(STARTER_PARAMETERS), "utf8");
  return { repoRoot, filePath, status: exists ? "overwritten" : "created" };
}

export function repoParameterFilePath(repoRoot: string): string {
  return path.join(repoRoot, REPO_CONFIG_DIR, REPO_PARAMETER_FILE);
}

export function findRepoRoot(startDir: string): string | null {
  return findUp(startDir, (dir) => fs.existsSync(path.join(dir, ".git")));
}

export function findPackageRoot(startDir: string): string | null {
  return findUp(startDir, (dir) => fs.existsSync(path.join(dir, "package.json")));
}

function findUp(start: string, predicate: (dir: string) => boolean): string | null {
  let current = path.resolve(start);
  while (true) {
    if (predicate(current)) return current;

    const parent = path.dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}
