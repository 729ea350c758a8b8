/**
 * Regenerate a workspace's helper scripts from the current templates.
 */

import { resolve } from "node:path";
import { Output } from "../output/output.js";
import { getHelperScripts } from "../templates/scripts.js";
import { createBackup } from "./backup.js";
import { withWorkspaceLock } from "./lock.js";
import { readWorkspaceMetadata, updateWorkspaceMetadata } from "./metadata.js";
import { summarizeWriteFailures, writeFilesConcurrently } from "./write-pool.js";
import { WorkspaceError } from "../errors/index.js";

export interface UpdateScriptsOptions {
  output?: Output;
  now?: Date;
}

export interface UpdateScriptsResult {
  success: boolean;
  path: string;
  backupPath: string;
  scripts: string[];
}

export async function updateScripts(path: string, opts: UpdateScriptsOptions = {}): Promise<UpdateScriptsResult> {
  const output = opts.output ?? new Output();
  const root = resolve(path);
  const workspace = await readWorkspaceMetadata(root);
  const { provider } = workspace;
  const now = opts.now ?? new Date();
  const scripts = getHelperScripts(workspace.tier, provider);

  return withWorkspaceLock(root, provider.configDirname, "update-scripts", async () => {
    const backup = await createBackup(root, provider.configDirname, "pre_update", Object.keys(scripts), now);
    output.info(`Backed up ${backup.files.length} script(s) to ${backup.path}`);

    const { written, failures } = await writeFilesConcurrently(root, scripts, { isExecutable: () => true });
    if (failures.length > 0) {
      throw new WorkspaceError(summarizeWriteFailures(failures), { failures, backupPath: backup.path });
    }
    for (const script of written) output.detail(`Updated ${script}`);

    await updateWorkspaceMetadata(workspace, { scripts_updated: now.toISOString() });
    output.success(`Updated ${written.length} helper script(s)`);
    return { success: true, path: root, backupPath: backup.path, scripts: written };
  });
}
