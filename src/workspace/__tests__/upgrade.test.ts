import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdir, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { upgradeWorkspace } from "../upgrade.js";
import { directoryExists, fileExists, pathExists } from "../fs-utils.js";
import { lockPath } from "../lock.js";
import { createBufferedOutput } from "../../output/output.js";
import { ConfigurationError, UpgradeError, ValidationError, WorkspaceError } from "../../errors/index.js";
import { FIXED_NOW, FIXED_STAMP, createDemo, makeTempDir, readJson } from "./fixtures.js";

describe("upgradeWorkspace", () => {
  let cwd: string;
  let root: string;

  beforeEach(async () => {
    cwd = await makeTempDir("upgrade");
    root = join(cwd, "demo");
  });

  afterEach(async () => {
    await rm(cwd, { recursive: true, force: true });
  });

  it("upgrades Lite to Standard", async () => {
    await createDemo(cwd, "1");
    const originalMakefile = await readFile(join(root, "Makefile"), "utf-8");
    const { output, lines } = createBufferedOutput();

    const result = await upgradeWorkspace(root, { targetTier: "2", yes: true, output, now: FIXED_NOW });

    expect(result.changed).toBe(true);
    expect(result.fromTier).toBe("1");
    expect(result.toTier).toBe("2");
    expect(await readJson(join(root, ".gemini/workspace.json"))).toMatchObject({
      tier: "2",
      previous_tier: "1",
      upgraded: FIXED_NOW.toISOString(),
      name: "demo",
    });
    expect(await directoryExists(join(root, "src/demo"))).toBe(true);
    expect(await fileExists(join(root, "pyproject.toml"))).toBe(true);
    expect(await pathExists(join(root, "requirements.txt"))).toBe(false);
    expect(result.filesRemoved).toEqual(["requirements.txt"]);
    expect(result.filesModified).toEqual([
      "GEMINI.md",
      "Makefile",
      ".gemini/settings.json",
      ".vscode/settings.json",
      ".github/workflows/ci.yml",
    ]);

    const backup = join(root, ".gemini/backups", `pre_upgrade_${FIXED_STAMP}`);
    expect(result.backupPath).toBe(backup);
    expect(await readFile(join(backup, "Makefile"), "utf-8")).toBe(originalMakefile);
    expect(await fileExists(join(backup, "requirements.txt"))).toBe(true);

    expect(await readFile(join(root, "GEMINI.md"), "utf-8")).toContain("(Standard Edition)");
    expect(await pathExists(lockPath(root, ".gemini"))).toBe(false);
    expect(lines.at(-1)).toBe(`✅ Upgraded ${root} from tier 1 (Lite) to tier 2 (Standard)`);
  });

  it("defaults to the next tier", async () => {
    await createDemo(cwd, "2");
    const { output } = createBufferedOutput();
    const result = await upgradeWorkspace(root, { yes: true, output });
    expect(result.toTier).toBe("3");
    expect(await fileExists(join(root, "scripts/shared/shift_report.py"))).toBe(true);
  });

  it("keeps files the user already has", async () => {
    await createDemo(cwd, "1");
    await writeFile(join(root, "docs/roadmap.md"), "# My roadmap\n");
    const { output } = createBufferedOutput();

    const result = await upgradeWorkspace(root, { targetTier: "3", yes: true, output });

    expect(await readFile(join(root, "docs/roadmap.md"), "utf-8")).toBe("# My roadmap\n");
    expect(result.filesAdded).not.toContain("docs/roadmap.md");
    expect(result.filesAdded).toContain("domains/frontend/GEMINI.md");
  });

  it("refuses to downgrade", async () => {
    await createDemo(cwd, "2");
    const { output } = createBufferedOutput();
    const attempt = upgradeWorkspace(root, { targetTier: "1", yes: true, output });
    await expect(attempt).rejects.toThrow(UpgradeError);
    await expect(attempt).rejects.toThrow(
      "Cannot downgrade from tier 2 (Standard) to tier 1 (Lite). Downgrade is not supported.",
    );
  });

  it("does nothing at the highest tier or the same tier", async () => {
    await createDemo(cwd, "3");
    const { output, lines } = createBufferedOutput();

    const top = await upgradeWorkspace(root, { yes: true, output });
    const same = await upgradeWorkspace(root, { targetTier: "3", yes: true, output });

    expect(top.changed).toBe(false);
    expect(same.changed).toBe(false);
    expect(lines).toEqual([
      "ℹ️  Workspace is already at the highest tier (3: Enterprise)",
      "ℹ️  Workspace is already tier 3 (Enterprise); nothing to do",
    ]);
    expect(await pathExists(join(root, ".gemini/backups"))).toBe(false);
  });

  it("stops when the confirmation is declined", async () => {
    await createDemo(cwd, "1");
    const confirm = vi.fn(async () => false);
    const { output } = createBufferedOutput();

    const result = await upgradeWorkspace(root, { confirm, output });

    expect(confirm).toHaveBeenCalledWith(`Upgrade ${root} to tier 2?`);
    expect(result).toMatchObject({ changed: false, fromTier: "1", toTier: "1" });
    expect(await readJson(join(root, ".gemini/workspace.json"))).toHaveProperty("tier", "1");
  });

  it("does not proceed without confirmation or --yes", async () => {
    await createDemo(cwd, "1");
    const { output } = createBufferedOutput();
    const result = await upgradeWorkspace(root, { output });
    expect(result.changed).toBe(false);
  });

  it("reports missing and malformed workspaces", async () => {
    const { output } = createBufferedOutput();
    await expect(upgradeWorkspace(root, { yes: true, output })).rejects.toThrow(ValidationError);

    await mkdir(join(root, ".gemini"), { recursive: true });
    await expect(upgradeWorkspace(root, { yes: true, output })).rejects.toThrow(
      "Not a valid workspace: missing .gemini/workspace.json",
    );

    await writeFile(join(root, ".gemini/workspace.json"), JSON.stringify({ tier: "7" }));
    await expect(upgradeWorkspace(root, { yes: true, output })).rejects.toThrow(ConfigurationError);
  });

  it("fails while another operation holds the lock", async () => {
    await createDemo(cwd, "1");
    await writeFile(lockPath(root, ".gemini"), JSON.stringify({ pid: 99, operation: "rollback", acquired: "x" }));
    const { output } = createBufferedOutput();

    await expect(upgradeWorkspace(root, { yes: true, output })).rejects.toThrow(WorkspaceError);
    expect(await readdir(join(root, ".gemini"))).not.toContain("backups");
    expect(await readJson(join(root, ".gemini/workspace.json"))).toHaveProperty("tier", "1");
  });
});
