import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { lockPath, withWorkspaceLock } from "../lock.js";
import { fileExists } from "../fs-utils.js";
import { WorkspaceError } from "../../errors/index.js";
import { makeTempDir } from "./fixtures.js";

describe("withWorkspaceLock", () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir("lock");
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("holds the lock while the operation runs and releases it afterwards", async () => {
    const path = lockPath(root, ".gemini");
    const seen = await withWorkspaceLock(root, ".gemini", "upgrade", async () => {
      const info: unknown = JSON.parse(await readFile(path, "utf-8"));
      return info;
    });

    expect(seen).toMatchObject({ pid: process.pid, operation: "upgrade" });
    expect(await fileExists(path)).toBe(false);
  });

  it("releases the lock when the operation throws", async () => {
    await expect(
      withWorkspaceLock(root, ".gemini", "rollback", async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    expect(await fileExists(lockPath(root, ".gemini"))).toBe(false);
  });

  it("refuses a second holder and names the first", async () => {
    await mkdir(join(root, ".gemini"), { recursive: true });
    const path = lockPath(root, ".gemini");
    await writeFile(path, JSON.stringify({ pid: 4242, operation: "snapshot", acquired: "2026-01-01T00:00:00Z" }));

    const attempt = withWorkspaceLock(root, ".gemini", "upgrade", async () => "ran");
    await expect(attempt).rejects.toThrow(WorkspaceError);
    await expect(withWorkspaceLock(root, ".gemini", "upgrade", async () => "ran")).rejects.toThrow(
      `Workspace is locked by another operation (snapshot, pid 4242). Remove ${path} if no other process is running.`,
    );
    expect(await fileExists(path)).toBe(true);
  });

  it("reports an unreadable lock without holder details", async () => {
    await mkdir(join(root, ".gemini"), { recursive: true });
    const path = lockPath(root, ".gemini");
    await writeFile(path, "garbage");

    await expect(withWorkspaceLock(root, ".gemini", "upgrade", async () => "ran")).rejects.toThrow(
      `Workspace is locked by another operation. Remove ${path} if no other process is running.`,
    );
  });
});
