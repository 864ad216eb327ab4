/**
 * Run identity: the token that names one invocation and the directories it owns.
 * Purpose: derive workspace, log and report paths from the token so a sibling
 *   spawned with a supplied token lands on exactly the paths its parent expects.
 * Usage: const ctx = await createOrReuseRunContext({ logRoot, workRoot, suppliedId });
 */

import path from "node:path";

import fse from "fs-extra";

import { datetimePath, generateRunToken } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunContext = Readonly<{
  runId: string;
  workspaceDir: string;
  logDir: string;
  reportDir: string;
  createdAt: string;
  reused: boolean;
}>;

export type RunIdentityInput = {
  logRoot: string;
  workRoot: string;
  suppliedId?: string;
  reportDir?: string;
  now?: Date;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function createOrReuseRunContext(input: RunIdentityInput): Promise<RunContext> {
  const now = input.now ?? new Date();
  const supplied = input.suppliedId?.trim();
  const runId = supplied || generateRunToken();

  const logDir = supplied
    ? path.resolve(input.logRoot, runId)
    : path.resolve(input.logRoot, `${datetimePath(now)}-${runId}`);
  const workspaceDir = path.resolve(input.workRoot, runId);
  const reportDir = input.reportDir ? path.resolve(input.reportDir) : logDir;

  // ensureDir is a no-op for existing directories; permission errors propagate.
  await fse.ensureDir(logDir);
  await fse.ensureDir(workspaceDir);
  await fse.ensureDir(reportDir);

  return Object.freeze({
    runId,
    workspaceDir,
    logDir,
    reportDir,
    createdAt: now.toISOString(),
    reused: Boolean(supplied),
  });
}

export function siblingRunId(token: string, index: number): string {
  return `${token}-${index}`;
}
