/**
 * Pre-operation backups under `<configDir>/backups/`.
 */

import { mkdir } from "node:fs/promises";
import { basename, join } from "node:path";
import { BACKUPS_DIRNAME } from "../config/constants.js";
import { copyFileWithParents, fileExists, formatTimestamp, uniqueChildPath } from "./fs-utils.js";

export interface BackupResult {
  path: string;
  name: string;
  files: string[];
}

export function backupsDir(workspaceRoot: string, configDir: string): string {
  return join(workspaceRoot, configDir, BACKUPS_DIRNAME);
}

/**
 * Copy the listed files (those that exist) into a new
 * `<prefix>_YYYYMMDD_HHMMSS` backup directory.
 */
export async function createBackup(
  workspaceRoot: string,
  configDir: string,
  prefix: string,
  relativePaths: readonly string[],
  now: Date = new Date(),
): Promise<BackupResult> {
  const parent = backupsDir(workspaceRoot, configDir);
  await mkdir(parent, { recursive: true });
  const path = await uniqueChildPath(parent, `${prefix}_${formatTimestamp(now)}`);
  await mkdir(path);

  const files: string[] = [];
  for (const relativePath of relativePaths) {
    const source = join(workspaceRoot, relativePath);
    if (await fileExists(source)) {
      await copyFileWithParents(source, join(path, relativePath));
      files.push(relativePath);
    }
  }
  return { path, name: basename(path), files };
}
