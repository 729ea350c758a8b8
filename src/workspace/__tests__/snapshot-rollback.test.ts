/**
 * Snapshot capture and rollback, including archive member validation.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdir, readFile, rm, symlink, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { gzipSync } from "node:zlib";
import { createSnapshot, listSnapshots, protectedPaths } from "../snapshot.js";
import { resolveRestoreSource, rollbackWorkspace } from "../rollback.js";
import { createWorkspace } from "../create.js";
import { fileExists, isUnderPrefix, listFiles, pathExists } from "../fs-utils.js";
import { createBackup } from "../backup.js";
import { createBufferedOutput } from "../../output/output.js";
import { getProvider } from "../../providers/index.js";
import { RollbackError } from "../../errors/index.js";
import { FIXED_NOW, FIXED_STAMP, createDemo, fakeGit, makeTempDir, readJson } from "./fixtures.js";

async function readTree(root: string): Promise<Map<string, Buffer>> {
  const excluded = protectedPaths(getProvider("gemini"));
  const files = await listFiles(root, { exclude: (rel) => isUnderPrefix(rel, excluded) });
  const tree = new Map<string, Buffer>();
  for (const file of files) tree.set(file, await readFile(join(root, file)));
  return tree;
}

/** A one-file ustar archive whose member name is taken verbatim. */
function tarGzWithMember(name: string, content: string): Buffer {
  const data = Buffer.from(content, "utf-8");
  const header = Buffer.alloc(512);
  const field = (value: string, offset: number, length: number): void => {
    header.write(value, offset, length, "ascii");
  };
  field(name, 0, 100);
  field("0000644\0", 100, 8);
  field("0000000\0", 108, 8);
  field("0000000\0", 116, 8);
  field(`${data.length.toString(8).padStart(11, "0")}\0`, 124, 12);
  field(`${Math.floor(FIXED_NOW.getTime() / 1000).toString(8).padStart(11, "0")}\0`, 136, 12);
  field("        ", 148, 8);
  field("0", 156, 1);
  field("ustar\0", 257, 6);
  field("00", 263, 2);
  let sum = 0;
  for (const byte of header) sum += byte;
  field(`${sum.toString(8).padStart(6, "0")}\0 `, 148, 8);

  const padded = Buffer.alloc(Math.ceil(data.length / 512) * 512);
  data.copy(padded);
  return gzipSync(Buffer.concat([header, padded, Buffer.alloc(1024)]));
}

describe("snapshots and rollback", () => {
  let cwd: string;
  let root: string;

  beforeEach(async () => {
    cwd = await makeTempDir("snapshot");
    root = join(cwd, "demo");
    await createDemo(cwd, "1");
  });

  afterEach(async () => {
    await rm(cwd, { recursive: true, force: true });
  });

  it("restores an archive snapshot byte for byte and prunes new files", async () => {
    const { output, lines } = createBufferedOutput();
    const before = await readTree(root);

    const snapshot = await createSnapshot(root, { name: "base", output, now: FIXED_NOW });
    const id = `snapshot-base-${FIXED_STAMP}`;
    expect(snapshot.name).toBe(id);
    expect(snapshot.path).toBe(join(root, ".snapshots", `${id}.tar.gz`));
    expect(snapshot.files).toEqual([...before.keys()]);

    await writeFile(join(root, "Makefile"), "broken\n");
    await rm(join(root, "README.md"));
    await writeFile(join(root, "src/extra.py"), "print('new')\n");

    const result = await rollbackWorkspace(root, { backup: "base", yes: true, output });

    expect(result.restored).toBe(true);
    expect(result.source).toEqual({ name: id, kind: "archive", path: snapshot.path });
    expect(result.filesRemoved).toEqual(["src/extra.py"]);
    const after = await readTree(root);
    expect([...after.keys()]).toEqual([...before.keys()]);
    for (const [file, content] of before) {
      expect(after.get(file)?.equals(content), file).toBe(true);
    }
    expect(await fileExists(join(root, "snapshot.json"))).toBe(false);
    expect(await fileExists(snapshot.path)).toBe(true);
    expect(lines.at(-1)).toBe(`✅ Restored ${before.size} file(s), removed 1 file(s) from ${id}`);
  });

  it("writes critical files and a stamp for directory snapshots", async () => {
    const { output } = createBufferedOutput();
    const snapshot = await createSnapshot(root, { name: "base", format: "directory", output, now: FIXED_NOW });
    const id = `snapshot-base-${FIXED_STAMP}`;

    expect(snapshot.path).toBe(join(root, ".snapshots", id));
    expect(snapshot.files).toEqual([
      ".gemini/workspace.json",
      ".gemini/settings.json",
      "GEMINI.md",
      "Makefile",
      "src/main.py",
    ]);
    expect(await readJson(join(snapshot.path, "snapshot.json"))).toEqual({
      name: id,
      timestamp: FIXED_STAMP,
      git_tag: null,
    });
  });

  it("overwrites from a directory snapshot without deleting other files", async () => {
    const { output } = createBufferedOutput();
    await createSnapshot(root, { name: "base", format: "directory", output, now: FIXED_NOW });
    const makefile = await readFile(join(root, "Makefile"), "utf-8");
    await writeFile(join(root, "Makefile"), "broken\n");
    await writeFile(join(root, "notes.txt"), "keep me\n");

    const result = await rollbackWorkspace(root, { backup: `snapshot-base-${FIXED_STAMP}`, yes: true, output });

    expect(result.source?.kind).toBe("directory");
    expect(result.filesRemoved).toEqual([]);
    expect(result.filesRestored).not.toContain("snapshot.json");
    expect(await readFile(join(root, "Makefile"), "utf-8")).toBe(makefile);
    expect(await readFile(join(root, "notes.txt"), "utf-8")).toBe("keep me\n");
  });

  it("never overwrites an existing snapshot", async () => {
    const { output } = createBufferedOutput();
    const first = await createSnapshot(root, { name: "base", output, now: FIXED_NOW });
    const second = await createSnapshot(root, { name: "base", output, now: FIXED_NOW });

    expect(second.name).toBe(`${first.name}_2`);
    expect((await listSnapshots(root)).map((s) => s.name)).toEqual([`${first.name}_2`, first.name]);
  });

  it("tags the snapshot in a git repository", async () => {
    const git = fakeGit({ repository: true });
    const { output } = createBufferedOutput();
    const snapshot = await createSnapshot(root, { name: "v1", gitTag: true, gitClient: git, output, now: FIXED_NOW });

    expect(snapshot.gitTag).toBe(`snapshot-v1-${FIXED_STAMP}`);
    expect(git.calls).toEqual([`tag snapshot-v1-${FIXED_STAMP}`]);
  });

  it("warns instead of tagging outside a git repository", async () => {
    const { output, errors } = createBufferedOutput();
    const snapshot = await createSnapshot(root, { name: "v1", gitTag: true, gitClient: fakeGit(), output });

    expect(snapshot.gitTag).toBeNull();
    expect(errors).toEqual(["⚠️  Not a git repository; snapshot was not tagged"]);
  });

  it("restores the latest backup when no name is given", async () => {
    const { output } = createBufferedOutput();
    const original = await readFile(join(root, "GEMINI.md"), "utf-8");
    await createBackup(root, ".gemini", "pre_upgrade", ["GEMINI.md"], new Date(2025, 0, 1));
    await writeFile(join(root, "GEMINI.md"), "older\n");
    await createBackup(root, ".gemini", "pre_upgrade", ["GEMINI.md"], new Date(2025, 5, 1));
    await writeFile(join(root, "GEMINI.md"), "latest edit\n");

    const result = await rollbackWorkspace(root, { yes: true, output });

    expect(result.source?.name).toBe("pre_upgrade_20250601_000000");
    expect(result.source?.kind).toBe("backup");
    expect(await readFile(join(root, "GEMINI.md"), "utf-8")).toBe("older\n");
    expect(original).not.toBe("older\n");
  });

  it("explains what is available when nothing matches", async () => {
    const { output } = createBufferedOutput();
    await expect(rollbackWorkspace(root, { yes: true, output })).rejects.toThrow(
      `No backups directory found at ${join(root, ".gemini/backups")}`,
    );

    await createSnapshot(root, { name: "base", output, now: FIXED_NOW });
    await expect(rollbackWorkspace(root, { yes: true, output })).rejects.toThrow(
      `No backups directory found. Available snapshots: snapshot-base-${FIXED_STAMP}. Pass a snapshot name to restore it.`,
    );
    await expect(rollbackWorkspace(root, { backup: "zzz", yes: true, output })).rejects.toThrow(
      `Backup not found: zzz. Available backups: snapshot-base-${FIXED_STAMP}`,
    );

    await mkdir(join(root, ".gemini/backups"));
    await expect(resolveRestoreSource(root, ".gemini")).rejects.toThrow(
      `No backups found in ${join(root, ".gemini/backups")}`,
    );
  });

  it("rejects an empty backup directory", async () => {
    await mkdir(join(root, ".gemini/backups/pre_upgrade_20250101_000000"), { recursive: true });
    const { output } = createBufferedOutput();
    await expect(rollbackWorkspace(root, { yes: true, output })).rejects.toThrow(
      `Backup directory is empty: ${join(root, ".gemini/backups/pre_upgrade_20250101_000000")}`,
    );
  });

  it("asks before restoring and stops when declined", async () => {
    const { output } = createBufferedOutput();
    await createSnapshot(root, { name: "base", output, now: FIXED_NOW });
    await writeFile(join(root, "Makefile"), "changed\n");
    const confirm = vi.fn(async () => false);

    const result = await rollbackWorkspace(root, { backup: "base", confirm, output });

    expect(confirm).toHaveBeenCalledWith(`Restore ${root} from snapshot-base-${FIXED_STAMP}?`);
    expect(result.restored).toBe(false);
    expect(await readFile(join(root, "Makefile"), "utf-8")).toBe("changed\n");
  });

  it("refuses archives with members outside the workspace", async () => {
    const name = "snapshot-evil-20260101_000000";
    await mkdir(join(root, ".snapshots"), { recursive: true });
    await writeFile(join(root, ".snapshots", `${name}.tar.gz`), tarGzWithMember("../evil.txt", "pwned\n"));
    const { output } = createBufferedOutput();

    const attempt = rollbackWorkspace(root, { backup: name, yes: true, output });

    await expect(attempt).rejects.toThrow(RollbackError);
    await expect(attempt).rejects.toThrow("Unsafe archive member: ../evil.txt");
    expect(await pathExists(join(cwd, "evil.txt"))).toBe(false);
    expect(await fileExists(join(root, "GEMINI.md"))).toBe(true);
  });

  it("reports unreadable archives as rollback failures", async () => {
    const { output } = createBufferedOutput();
    const snapshot = await createSnapshot(root, { name: "base", output, now: FIXED_NOW });
    const archive = await readFile(snapshot.path);
    await writeFile(join(root, ".snapshots/snapshot-junk-20260101_000000.tar.gz"), "not a gzip stream\n");
    await writeFile(
      join(root, ".snapshots/snapshot-cut-20260101_000000.tar.gz"),
      archive.subarray(0, Math.floor(archive.length / 2)),
    );
    const makefile = await readFile(join(root, "Makefile"), "utf-8");

    for (const name of ["snapshot-junk-20260101_000000", "snapshot-cut-20260101_000000"]) {
      const attempt = rollbackWorkspace(root, { backup: name, yes: true, output });
      await expect(attempt).rejects.toThrow(RollbackError);
      await expect(attempt).rejects.toThrow(/^Failed to restore from snapshot: /);
    }
    expect(await readFile(join(root, "Makefile"), "utf-8")).toBe(makefile);
    expect(await pathExists(join(root, ".gemini/operation.lock"))).toBe(false);
  });

  describe("with a linked shared agent directory", () => {
    let shared: string;
    let linked: string;

    beforeEach(async () => {
      shared = join(cwd, "team-agent");
      await mkdir(join(shared, "skills"), { recursive: true });
      await writeFile(join(shared, "skills/team.md"), "# Team v1\n");
      const { output } = createBufferedOutput();
      const created = await createWorkspace({
        tier: "2",
        name: "linked",
        cwd,
        sharedAgentPath: shared,
        output,
        now: FIXED_NOW,
      });
      linked = created.path;
    });

    it("leaves the link out of directory snapshots", async () => {
      const { output, errors } = createBufferedOutput();
      const snapshot = await createSnapshot(linked, { name: "base", format: "directory", output, now: FIXED_NOW });

      expect(snapshot.files.some((file) => file.startsWith(".agent/"))).toBe(false);
      expect(snapshot.warnings).toEqual(["Skipped symbolic link: .agent"]);
      expect(errors).toEqual(["⚠️  Skipped symbolic link: .agent"]);

      await writeFile(join(shared, "skills/team.md"), "# Team v2\n");
      await rollbackWorkspace(linked, { backup: "base", yes: true, output });

      expect(await readFile(join(shared, "skills/team.md"), "utf-8")).toBe("# Team v2\n");
    });

    it("never restores through a symbolic link", async () => {
      const name = "snapshot-old-20250101_000000";
      const dir = join(linked, ".snapshots", name);
      await mkdir(join(dir, ".agent/skills"), { recursive: true });
      await writeFile(join(dir, ".agent/skills/team.md"), "# Team v1\n");
      await writeFile(join(dir, "Makefile"), "restored\n");
      await writeFile(join(shared, "skills/team.md"), "# Team v2\n");
      const { output } = createBufferedOutput();

      const result = await rollbackWorkspace(linked, { backup: name, yes: true, output });

      expect(result.filesRestored).toEqual(["Makefile"]);
      expect(result.warnings).toEqual(["Skipped .agent/skills/team.md: .agent is a symbolic link"]);
      expect(await readFile(join(linked, "Makefile"), "utf-8")).toBe("restored\n");
      expect(await readFile(join(shared, "skills/team.md"), "utf-8")).toBe("# Team v2\n");
    });

    it("does not write through a symlinked file", async () => {
      const outside = join(cwd, "outside.txt");
      await writeFile(outside, "untouched\n");
      await rm(join(linked, "README.md"));
      await symlink(outside, join(linked, "README.md"));
      const name = "snapshot-readme-20250101_000000";
      await mkdir(join(linked, ".snapshots", name), { recursive: true });
      await writeFile(join(linked, ".snapshots", name, "README.md"), "# overwritten\n");
      const { output } = createBufferedOutput();

      const result = await rollbackWorkspace(linked, { backup: name, yes: true, output });

      expect(result.filesRestored).toEqual([]);
      expect(result.warnings).toEqual(["Skipped README.md: README.md is a symbolic link"]);
      expect(await readFile(outside, "utf-8")).toBe("untouched\n");
    });
  });
});
