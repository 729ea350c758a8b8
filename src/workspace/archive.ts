/**
 * tar.gz snapshot archives with member validation before extraction.
 */

import { dirname, isAbsolute, relative, resolve, sep } from "node:path";
import { create, extract, list } from "tar";
import { RollbackError } from "../errors/index.js";

export interface ArchiveMember {
  path: string;
  type: string;
  linkpath?: string;
}

/** True when `child` is `parent` or lies beneath it. */
export function isInside(parent: string, child: string): boolean {
  const rel = relative(parent, child);
  return rel === "" || (!isAbsolute(rel) && rel.split(sep)[0] !== "..");
}

export async function createArchive(file: string, cwd: string, paths: string[]): Promise<void> {
  await create({ gzip: true, file, cwd, portable: true }, paths);
}

export async function listArchive(file: string): Promise<ArchiveMember[]> {
  const members: ArchiveMember[] = [];
  await list({
    file,
    onReadEntry: (entry) => {
      members.push({ path: entry.path, type: entry.type, linkpath: entry.linkpath });
    },
  });
  return members;
}

/**
 * Reject any member, or link target, that would resolve outside `destination`.
 */
export function assertSafeMembers(members: readonly ArchiveMember[], destination: string): void {
  const root = resolve(destination);
  for (const member of members) {
    const target = resolve(root, member.path);
    if (!isInside(root, target)) {
      throw new RollbackError(`Unsafe archive member: ${member.path}`);
    }
    if (member.linkpath && (member.type === "SymbolicLink" || member.type === "Link")) {
      const linkTarget =
        member.type === "SymbolicLink" ? resolve(dirname(target), member.linkpath) : resolve(root, member.linkpath);
      if (!isInside(root, linkTarget)) {
        throw new RollbackError(`Unsafe archive member: ${member.path} -> ${member.linkpath}`);
      }
    }
  }
}

/**
 * Validate every member, then extract into `destination`. Nothing is written
 * when any member is unsafe.
 */
export async function extractArchiveSafely(file: string, destination: string): Promise<ArchiveMember[]> {
  const members = await listArchive(file);
  assertSafeMembers(members, destination);
  await extract({ file, cwd: destination, strict: true });
  return members;
}
