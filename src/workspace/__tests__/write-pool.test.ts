import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, readFile, rm, stat } from "node:fs/promises";
import { join } from "node:path";
import { summarizeWriteFailures, writeFilesConcurrently } from "../write-pool.js";
import { makeTempDir } from "./fixtures.js";

describe("writeFilesConcurrently", () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir("pool");
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("writes every file, creating parent directories", async () => {
    const files: Record<string, string> = {};
    for (let i = 0; i < 100; i++) files[`nested/dir${i % 7}/file${i}.txt`] = `content ${i}`;

    const { written, failures } = await writeFilesConcurrently(root, files);

    expect(failures).toEqual([]);
    expect(written).toHaveLength(100);
    expect(written).toEqual([...written].sort());
    expect(await readFile(join(root, "nested/dir3/file10.txt"), "utf-8")).toBe("content 10");
  });

  it("marks selected files executable", async () => {
    await writeFilesConcurrently(
      root,
      { "scripts/run.py": "print()", "README.md": "# x" },
      { isExecutable: (p) => p.endsWith(".py") },
    );
    expect((await stat(join(root, "scripts/run.py"))).mode & 0o111).not.toBe(0);
    expect((await stat(join(root, "README.md"))).mode & 0o111).toBe(0);
  });

  it("collects failures without stopping the other writes", async () => {
    // A directory where a file should go makes that one write fail.
    await mkdir(join(root, "taken.txt"));
    const seen: string[] = [];

    const { written, failures } = await writeFilesConcurrently(
      root,
      { "taken.txt": "x", "ok-a.txt": "a", "ok-b.txt": "b" },
      { concurrency: 2, onWritten: (p) => seen.push(p) },
    );

    expect(written).toEqual(["ok-a.txt", "ok-b.txt"]);
    expect(seen.sort()).toEqual(["ok-a.txt", "ok-b.txt"]);
    expect(failures.map((f) => f.path)).toEqual(["taken.txt"]);
  });
});

describe("summarizeWriteFailures", () => {
  it("lists the first three failures and counts the rest", () => {
    const failures = ["a", "b", "c", "d", "e"].map((path) => ({ path, error: "EACCES" }));
    expect(summarizeWriteFailures(failures)).toBe(
      "Failed to write 5 file(s): a: EACCES; b: EACCES; c: EACCES (+2 more)",
    );
  });

  it("omits the remainder when everything is shown", () => {
    expect(summarizeWriteFailures([{ path: "a", error: "EISDIR" }])).toBe("Failed to write 1 file(s): a: EISDIR");
  });
});
