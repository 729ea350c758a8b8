/**
 * Point-in-time snapshots under `.snapshots/`.
 *
 * - directory: copies of the critical paths plus `snapshot.json`
 * - archive: the whole workspace (minus protected paths) as a tar.gz
 */

import type { Dirent } from "node:fs";
import { mkdir, mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, join, resolve } from "node:path";
import { SNAPSHOTS_DIRNAME, SNAPSHOT_STAMP_FILENAME, LOCK_FILENAME, BACKUPS_DIRNAME } from "../config/constants.js";
import { errorMessage, isNotFound } from "../errors/index.js";
import { Output } from "../output/output.js";
import type { WorkspaceProvider } from "../providers/types.js";
import type { SnapshotStamp } from "../schemas/snapshot.js";
import { createArchive } from "./archive.js";
import {
  copyFileWithParents,
  directoryExists,
  fileExists,
  formatTimestamp,
  isSymbolicLink,
  isUnderPrefix,
  listFiles,
  uniqueChildPath,
} from "./fs-utils.js";
import { systemGit, type GitClient } from "./git.js";
import { withWorkspaceLock } from "./lock.js";
import { readWorkspaceMetadata } from "./metadata.js";
import { validateBackupName } from "./validators.js";

export type SnapshotFormat = "archive" | "directory";

export const ARCHIVE_EXTENSION = ".tar.gz";

export interface SnapshotOptions {
  name: string;
  format?: SnapshotFormat;
  /** Tag HEAD with the snapshot name when the workspace is a git repository. */
  gitTag?: boolean;
  gitClient?: GitClient;
  output?: Output;
  now?: Date;
}

export interface SnapshotResult {
  success: boolean;
  path: string;
  /** Snapshot identifier, e.g. `snapshot-release-20260101_120000`. */
  name: string;
  format: SnapshotFormat;
  files: string[];
  gitTag: string | null;
  warnings: string[];
}

export interface SnapshotEntry {
  name: string;
  kind: SnapshotFormat;
  path: string;
}

/** Paths copied into a directory snapshot. */
export function criticalPaths(provider: WorkspaceProvider): string[] {
  return [
    `${provider.configDirname}/workspace.json`,
    `${provider.configDirname}/settings.json`,
    provider.configFilename,
    "Makefile",
    "pyproject.toml",
    "src",
    ".agent",
  ];
}

/** Never captured in an archive snapshot and never removed by a restore. */
export function protectedPaths(provider: WorkspaceProvider): string[] {
  return [
    SNAPSHOTS_DIRNAME,
    `${provider.configDirname}/${BACKUPS_DIRNAME}`,
    ".git",
    `${provider.configDirname}/${LOCK_FILENAME}`,
  ];
}

/** Snapshots in `.snapshots/`, newest name first. */
export async function listSnapshots(workspaceRoot: string): Promise<SnapshotEntry[]> {
  const dir = join(workspaceRoot, SNAPSHOTS_DIRNAME);
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (error) {
    if (isNotFound(error)) return [];
    throw error;
  }
  const snapshots: SnapshotEntry[] = [];
  for (const entry of entries) {
    if (entry.isFile() && entry.name.endsWith(ARCHIVE_EXTENSION)) {
      snapshots.push({
        name: entry.name.slice(0, -ARCHIVE_EXTENSION.length),
        kind: "archive",
        path: join(dir, entry.name),
      });
    } else if (entry.isDirectory()) {
      snapshots.push({ name: entry.name, kind: "directory", path: join(dir, entry.name) });
    }
  }
  return snapshots.sort((a, b) => b.name.localeCompare(a.name));
}

/**
 * Copy the critical paths into `dest`. Symbolic links (such as a linked
 * shared `.agent/`) are skipped and reported in `skipped`.
 */
async function copyCriticalPaths(
  root: string,
  dest: string,
  provider: WorkspaceProvider,
): Promise<{ copied: string[]; skipped: string[] }> {
  const copied: string[] = [];
  const skipped: string[] = [];
  for (const item of criticalPaths(provider)) {
    const source = join(root, item);
    if (await isSymbolicLink(source)) {
      skipped.push(item);
    } else if (await fileExists(source)) {
      await copyFileWithParents(source, join(dest, item));
      copied.push(item);
    } else if (await directoryExists(source)) {
      for (const file of await listFiles(source)) {
        await copyFileWithParents(join(source, file), join(dest, item, file));
        copied.push(`${item}/${file}`);
      }
    }
  }
  return { copied, skipped };
}

function serializeStamp(stamp: SnapshotStamp): string {
  return `${JSON.stringify(stamp, null, 2)}\n`;
}

/**
 * Capture a snapshot of the workspace.
 */
export async function createSnapshot(path: string, opts: SnapshotOptions): Promise<SnapshotResult> {
  const output = opts.output ?? new Output();
  validateBackupName(opts.name);
  const root = resolve(path);
  const { provider } = await readWorkspaceMetadata(root);
  const format = opts.format ?? "archive";
  const now = opts.now ?? new Date();
  const timestamp = formatTimestamp(now);
  const warnings: string[] = [];

  return withWorkspaceLock(root, provider.configDirname, "snapshot", async () => {
    const snapshotsDir = join(root, SNAPSHOTS_DIRNAME);
    await mkdir(snapshotsDir, { recursive: true });
    const baseName = `snapshot-${opts.name}-${timestamp}`;
    const target =
      format === "archive"
        ? await uniqueChildPath(snapshotsDir, baseName, ARCHIVE_EXTENSION)
        : await uniqueChildPath(snapshotsDir, baseName);
    const id = format === "archive" ? basename(target, ARCHIVE_EXTENSION) : basename(target);

    let gitTag: string | null = null;
    if (opts.gitTag) {
      const git = opts.gitClient ?? systemGit;
      if (await git.isRepository(root)) {
        try {
          await git.tag(root, id, `Snapshot ${opts.name}`);
          gitTag = id;
        } catch (error) {
          warnings.push(`Could not create git tag: ${errorMessage(error)}`);
        }
      } else {
        warnings.push("Not a git repository; snapshot was not tagged");
      }
      for (const warning of warnings) output.warning(warning);
    }

    const stamp = serializeStamp({ name: id, timestamp, git_tag: gitTag });
    let files: string[];

    if (format === "directory") {
      await mkdir(target);
      const critical = await copyCriticalPaths(root, target, provider);
      files = critical.copied;
      for (const item of critical.skipped) {
        const message = `Skipped symbolic link: ${item}`;
        warnings.push(message);
        output.warning(message);
      }
      await writeFile(join(target, SNAPSHOT_STAMP_FILENAME), stamp, "utf-8");
    } else {
      const excluded = protectedPaths(provider);
      files = await listFiles(root, { exclude: (rel) => isUnderPrefix(rel, excluded) });
      const staging = await mkdtemp(join(tmpdir(), "tierforge-snapshot-"));
      try {
        for (const file of files) {
          await copyFileWithParents(join(root, file), join(staging, file));
        }
        await writeFile(join(staging, SNAPSHOT_STAMP_FILENAME), stamp, "utf-8");
        await createArchive(target, staging, [...files, SNAPSHOT_STAMP_FILENAME]);
      } finally {
        await rm(staging, { recursive: true, force: true });
      }
    }

    output.success(`Snapshot created: ${target} (${files.length} file(s))`);
    return { success: true, path: target, name: id, format, files, gitTag, warnings };
  });
}
