/**
 * Rollback from a snapshot or a pre-operation backup.
 *
 * Archive snapshots restore the captured tree exactly: files absent from the
 * archive are removed (protected paths excepted). Directory snapshots and
 * backups only overwrite the files they contain.
 */

import { mkdtemp, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";
import { SNAPSHOT_STAMP_FILENAME } from "../config/constants.js";
import { RollbackError, errorMessage, isNotFound } from "../errors/index.js";
import { Output } from "../output/output.js";
import { extractArchiveSafely } from "./archive.js";
import { backupsDir } from "./backup.js";
import { copyFileWithParents, directoryExists, findSymlinkedPrefix, isUnderPrefix, listFiles } from "./fs-utils.js";
import { withWorkspaceLock } from "./lock.js";
import { detectProvider } from "./metadata.js";
import { listSnapshots, protectedPaths, type SnapshotEntry } from "./snapshot.js";
import type { ConfirmFn } from "./types.js";
import { validateBackupName } from "./validators.js";

export type RestoreSourceKind = "archive" | "directory" | "backup";

export interface RestoreSource {
  name: string;
  kind: RestoreSourceKind;
  path: string;
}

export interface RollbackOptions {
  /** Snapshot or backup name (exact or partial). Defaults to the latest backup. */
  backup?: string;
  yes?: boolean;
  confirm?: ConfirmFn;
  output?: Output;
}

export interface RollbackResult {
  success: boolean;
  restored: boolean;
  path: string;
  source?: RestoreSource;
  filesRestored: string[];
  filesRemoved: string[];
  warnings: string[];
}

async function listBackups(dir: string): Promise<RestoreSource[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isDirectory())
      .map((entry): RestoreSource => ({ name: entry.name, kind: "backup", path: join(dir, entry.name) }))
      .sort((a, b) => b.name.localeCompare(a.name));
  } catch (error) {
    if (isNotFound(error)) return [];
    throw error;
  }
}

function fromSnapshot(entry: SnapshotEntry): RestoreSource {
  return { name: entry.name, kind: entry.kind, path: entry.path };
}

/**
 * Locate the restore source.
 *
 * With a name: exact archive, exact directory snapshot, exact backup, then
 * partial matches (newest name wins). Without: the newest backup.
 */
export async function resolveRestoreSource(
  workspaceRoot: string,
  configDir: string,
  name?: string,
): Promise<RestoreSource> {
  const snapshots = (await listSnapshots(workspaceRoot)).map(fromSnapshot);
  const dir = backupsDir(workspaceRoot, configDir);
  const backups = await listBackups(dir);

  if (name !== undefined) {
    validateBackupName(name);
    const ordered = [
      ...snapshots.filter((s) => s.kind === "archive"),
      ...snapshots.filter((s) => s.kind === "directory"),
      ...backups,
    ];
    const exact = ordered.find((s) => s.name === name);
    if (exact) return exact;
    const partial = ordered.filter((s) => s.name.includes(name)).sort((a, b) => b.name.localeCompare(a.name));
    const newest = partial[0];
    if (newest) return newest;
    const available = ordered.map((s) => s.name).join(", ") || "none";
    throw new RollbackError(`Backup not found: ${name}. Available backups: ${available}`);
  }

  if (!(await directoryExists(dir))) {
    if (snapshots.length > 0) {
      throw new RollbackError(
        `No backups directory found. Available snapshots: ${snapshots.map((s) => s.name).join(", ")}. ` +
          "Pass a snapshot name to restore it.",
      );
    }
    throw new RollbackError(`No backups directory found at ${dir}`);
  }
  const latest = backups[0];
  if (!latest) {
    throw new RollbackError(`No backups found in ${dir}`);
  }
  return latest;
}

/**
 * Copy `files` back into the workspace. A file whose destination, or any
 * parent of it, is a symbolic link is not written; the link could point
 * outside the workspace.
 */
async function restoreFiles(
  sourceRoot: string,
  workspaceRoot: string,
  files: readonly string[],
  output: Output,
  warnings: string[],
): Promise<string[]> {
  const restored: string[] = [];
  for (const file of files) {
    const link = await findSymlinkedPrefix(workspaceRoot, file);
    if (link !== undefined) {
      const message = `Skipped ${file}: ${link} is a symbolic link`;
      warnings.push(message);
      output.warning(message);
      continue;
    }
    await copyFileWithParents(join(sourceRoot, file), join(workspaceRoot, file));
    restored.push(file);
  }
  return restored;
}

async function extractSnapshot(source: RestoreSource, staging: string): Promise<void> {
  try {
    await extractArchiveSafely(source.path, staging);
  } catch (error) {
    if (error instanceof RollbackError) throw error;
    throw new RollbackError(
      `Failed to restore from snapshot: ${errorMessage(error)}`,
      { snapshot: source.path },
      { cause: error },
    );
  }
}

/**
 * Roll a workspace back to a snapshot or backup.
 */
export async function rollbackWorkspace(path: string, opts: RollbackOptions = {}): Promise<RollbackResult> {
  const output = opts.output ?? new Output();
  const root = resolve(path);
  if (!(await directoryExists(root))) {
    throw new RollbackError(`Workspace not found: ${root}`);
  }
  const provider = await detectProvider(root);
  const source = await resolveRestoreSource(root, provider.configDirname, opts.backup);

  const result: RollbackResult = {
    success: true,
    restored: false,
    path: root,
    source,
    filesRestored: [],
    filesRemoved: [],
    warnings: [],
  };

  output.info(`Restore source: ${source.name} (${source.kind})`);
  if (!opts.yes) {
    const proceed = opts.confirm ? await opts.confirm(`Restore ${root} from ${source.name}?`) : false;
    if (!proceed) {
      output.info("Rollback cancelled");
      return result;
    }
  }

  await withWorkspaceLock(root, provider.configDirname, "rollback", async () => {
    const isRestorable = (rel: string): boolean => rel !== SNAPSHOT_STAMP_FILENAME;

    if (source.kind === "archive") {
      const staging = await mkdtemp(join(tmpdir(), "tierforge-restore-"));
      try {
        await extractSnapshot(source, staging);
        const files = (await listFiles(staging)).filter(isRestorable);
        result.filesRestored = await restoreFiles(staging, root, files, output, result.warnings);

        const keep = new Set(files);
        const excluded = protectedPaths(provider);
        const current = await listFiles(root, { exclude: (rel) => isUnderPrefix(rel, excluded) });
        for (const file of current) {
          if (keep.has(file)) continue;
          await rm(join(root, file), { force: true });
          result.filesRemoved.push(file);
          output.detail(`Removed file: ${file}`);
        }
      } finally {
        await rm(staging, { recursive: true, force: true });
      }
    } else {
      const files = (await listFiles(source.path)).filter(isRestorable);
      if (files.length === 0) {
        throw new RollbackError(`Backup directory is empty: ${source.path}`);
      }
      result.filesRestored = await restoreFiles(source.path, root, files, output, result.warnings);
    }
  });

  result.restored = true;
  output.success(
    `Restored ${result.filesRestored.length} file(s), removed ${result.filesRemoved.length} file(s) from ${source.name}`,
  );
  return result;
}
