/**
 * Git integration: repository initialization and snapshot tags.
 */

import { join } from "node:path";
import { GIT_TIMEOUT_MS } from "../config/constants.js";
import { WorkspaceError } from "../errors/index.js";
import { directoryExists } from "./fs-utils.js";
import { runProcess } from "./process.js";

export interface GitClient {
  init(dir: string): Promise<void>;
  isRepository(dir: string): Promise<boolean>;
  /** Annotated tag on HEAD. */
  tag(dir: string, name: string, message: string): Promise<void>;
}

async function git(dir: string, args: string[]): Promise<void> {
  const result = await runProcess("git", args, { cwd: dir, timeoutMs: GIT_TIMEOUT_MS });
  if (result.timedOut) {
    throw new WorkspaceError(`git ${args[0] ?? ""} timed out after ${GIT_TIMEOUT_MS / 1000}s`);
  }
  if (result.exitCode !== 0) {
    throw new WorkspaceError(`git ${args[0] ?? ""} failed: ${result.stderr.trim() || `exit code ${result.exitCode}`}`);
  }
}

export const systemGit: GitClient = {
  init: (dir) => git(dir, ["init", "--quiet"]),
  isRepository: (dir) => directoryExists(join(dir, ".git")),
  tag: (dir, name, message) => git(dir, ["tag", "-a", name, "-m", message]),
};
