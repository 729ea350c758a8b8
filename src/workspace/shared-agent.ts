/**
 * Link a team-wide `.agent/` directory into a workspace.
 */

import { cp, rm, symlink } from "node:fs/promises";
import { join, resolve } from "node:path";
import { CreationError, errorMessage } from "../errors/index.js";
import { directoryExists } from "./fs-utils.js";

export interface LinkOperations {
  symlink: (target: string, path: string) => Promise<void>;
  copy: (source: string, destination: string) => Promise<void>;
}

const defaultOperations: LinkOperations = {
  symlink: (target, path) => symlink(target, path, "dir"),
  copy: (source, destination) => cp(source, destination, { recursive: true }),
};

export interface SharedAgentResult {
  mode: "symlink" | "copy";
  warnings: string[];
}

/**
 * Replace `<workspace>/.agent` with a symlink to `sharedPath`, falling back to
 * a recursive copy where symlinks are not permitted.
 */
export async function linkSharedAgent(
  workspaceRoot: string,
  sharedPath: string,
  ops: LinkOperations = defaultOperations,
): Promise<SharedAgentResult> {
  const source = resolve(sharedPath);
  if (!(await directoryExists(source))) {
    throw new CreationError(`Shared agent directory not found: ${source}`);
  }

  const agentDir = join(workspaceRoot, ".agent");
  await rm(agentDir, { recursive: true, force: true });

  try {
    await ops.symlink(source, agentDir);
    return { mode: "symlink", warnings: [] };
  } catch (error) {
    await ops.copy(source, agentDir);
    return {
      mode: "copy",
      warnings: [`Could not symlink shared agent (${errorMessage(error)}); copied ${source} instead`],
    };
  }
}
