/**
 * Per-workspace operation lock.
 *
 * Upgrade, rollback, snapshot and script updates hold `<configDir>/operation.lock`
 * while they mutate the workspace. The file is created exclusively, so a
 * second invocation against the same workspace fails fast instead of
 * interleaving writes.
 */

import { mkdir, open, readFile, rm, type FileHandle } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import { LOCK_FILENAME } from "../config/constants.js";
import { WorkspaceError, isErrnoException, isNotFound } from "../errors/index.js";

export const LockInfo = z.object({
  pid: z.number().int(),
  operation: z.string(),
  acquired: z.string(),
});
export type LockInfo = z.infer<typeof LockInfo>;

export function lockPath(workspaceRoot: string, configDir: string): string {
  return join(workspaceRoot, configDir, LOCK_FILENAME);
}

/** " (operation, pid N)" from an existing lock file, or "" when unreadable. */
async function describeHolder(path: string): Promise<string> {
  try {
    const parsed = LockInfo.safeParse(JSON.parse(await readFile(path, "utf-8")));
    return parsed.success ? ` (${parsed.data.operation}, pid ${parsed.data.pid})` : "";
  } catch (error) {
    if (isNotFound(error) || error instanceof SyntaxError) return "";
    throw error;
  }
}

async function acquire(path: string): Promise<FileHandle> {
  try {
    return await open(path, "wx");
  } catch (error) {
    if (isErrnoException(error) && error.code === "EEXIST") {
      throw new WorkspaceError(
        `Workspace is locked by another operation${await describeHolder(path)}. ` +
          `Remove ${path} if no other process is running.`,
        { lockPath: path },
      );
    }
    throw error;
  }
}

/**
 * Run `fn` while holding the workspace lock. The lock is released even when
 * `fn` throws.
 */
export async function withWorkspaceLock<T>(
  workspaceRoot: string,
  configDir: string,
  operation: string,
  fn: () => Promise<T>,
): Promise<T> {
  const path = lockPath(workspaceRoot, configDir);
  await mkdir(join(workspaceRoot, configDir), { recursive: true });

  const handle = await acquire(path);
  try {
    const info: LockInfo = { pid: process.pid, operation, acquired: new Date().toISOString() };
    await handle.writeFile(`${JSON.stringify(info)}\n`, "utf-8");
  } catch (error) {
    await handle.close();
    await rm(path, { force: true });
    throw error;
  }
  await handle.close();

  try {
    return await fn();
  } finally {
    await rm(path, { force: true });
  }
}
