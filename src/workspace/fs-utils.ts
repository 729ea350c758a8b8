/**
 * Filesystem helpers shared by the workspace operations.
 */

import { copyFile, lstat, mkdir, readdir, stat } from "node:fs/promises";
import { dirname, join, sep } from "node:path";
import { isNotFound } from "../errors/index.js";

export async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (error) {
    if (isNotFound(error)) return false;
    throw error;
  }
}

export async function directoryExists(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (error) {
    if (isNotFound(error)) return false;
    throw error;
  }
}

export async function fileExists(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch (error) {
    if (isNotFound(error)) return false;
    throw error;
  }
}

/** True when `path` itself is a symbolic link (not followed). */
export async function isSymbolicLink(path: string): Promise<boolean> {
  try {
    return (await lstat(path)).isSymbolicLink();
  } catch (error) {
    if (isNotFound(error)) return false;
    throw error;
  }
}

/**
 * First prefix of `relativePath` (the path itself included) that is a
 * symbolic link under `root`, or undefined when none is.
 */
export async function findSymlinkedPrefix(root: string, relativePath: string): Promise<string | undefined> {
  const parts = relativePath.split("/");
  for (let i = 1; i <= parts.length; i++) {
    const prefix = parts.slice(0, i).join("/");
    if (await isSymbolicLink(join(root, prefix))) return prefix;
  }
  return undefined;
}

export function toPosix(relativePath: string): string {
  return sep === "/" ? relativePath : relativePath.split(sep).join("/");
}

/** True when `relativePath` equals one of `prefixes` or lies beneath one. */
export function isUnderPrefix(relativePath: string, prefixes: readonly string[]): boolean {
  return prefixes.some((prefix) => relativePath === prefix || relativePath.startsWith(`${prefix}/`));
}

export interface ListFilesOptions {
  /** Relative POSIX paths (files or directories) to skip. */
  exclude?: (relativePath: string) => boolean;
}

/**
 * Regular files beneath `root` as sorted relative POSIX paths.
 * Symbolic links are not followed or listed.
 */
export async function listFiles(root: string, opts: ListFilesOptions = {}): Promise<string[]> {
  const files: string[] = [];

  async function walk(relativeDir: string): Promise<void> {
    const entries = await readdir(join(root, relativeDir), { withFileTypes: true });
    for (const entry of entries) {
      const relativePath = relativeDir ? `${relativeDir}/${entry.name}` : entry.name;
      if (opts.exclude?.(relativePath)) continue;
      if (entry.isDirectory()) {
        await walk(relativePath);
      } else if (entry.isFile()) {
        files.push(relativePath);
      }
    }
  }

  await walk("");
  return files.sort();
}

export async function copyFileWithParents(source: string, destination: string): Promise<void> {
  await mkdir(dirname(destination), { recursive: true });
  await copyFile(source, destination);
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** Local time as `YYYYMMDD_HHMMSS`. */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * `parent/base`, or `parent/base_2`, `parent/base_3`... when taken.
 * Existing backups are never overwritten.
 */
export async function uniqueChildPath(parent: string, base: string, suffix = ""): Promise<string> {
  let candidate = join(parent, `${base}${suffix}`);
  for (let n = 2; await pathExists(candidate); n++) {
    candidate = join(parent, `${base}_${n}${suffix}`);
  }
  return candidate;
}
