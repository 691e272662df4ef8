import { execSync } from "child_process";
import fs from "fs";
import os from "os";
import path from "path";
import { logger } from "../logger";
import { GitDiff } from "./diff";
import { parseStagedDiff } from "./diffCollector";

const MAX_BUFFER = 32 * 1024 * 1024;

function runGit(command: string, cwd: string): string {
  logger.debug(`git ${command}`);
  try {
    return execSync(`git ${command}`, {
      cwd,
      stdio: ["ignore", "pipe", "pipe"],
      encoding: "utf-8",
      maxBuffer: MAX_BUFFER,
    }).trimEnd();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Git command failed: ${message}`);
  }
}

export function isGitRepo(cwd: string): boolean {
  try {
    runGit("rev-parse --is-inside-work-tree", cwd);
    return true;
  } catch {
    return false;
  }
}

export function hasStagedChanges(cwd: string): boolean {
  return runGit("diff --cached --name-only", cwd).trim().length > 0;
}

/** Reads everything staged in the index as a GitDiff. */
export function getStagedChanges(cwd: string): GitDiff {
  const numstat = runGit("diff --cached --numstat -M", cwd);
  const nameStatus = runGit("diff --cached --name-status -M", cwd);
  const patch = runGit("diff --cached -M", cwd);
  return parseStagedDiff(numstat, nameStatus, patch);
}

export function commitMessage(cwd: string, message: string): void {
  const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "commitwright-"));
  const filePath = path.join(tempDir, "message.txt");
  fs.writeFileSync(filePath, message + "\n", "utf-8");
  try {
    runGit(`commit -F "${filePath}"`, cwd);
  } finally {
    fs.rmSync(tempDir, { recursive: true, force: true });
  }
}
