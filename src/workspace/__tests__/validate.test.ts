import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdir, rm, utimes, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { ValidationCache, inspectWorkspace, validateWorkspace, type AuditRunner } from "../validate.js";
import type { ProcessResult } from "../process.js";
import { createBufferedOutput } from "../../output/output.js";
import { ValidationError } from "../../errors/index.js";
import { createDemo, makeTempDir } from "./fixtures.js";

function auditResult(exitCode: number, timedOut = false): ProcessResult {
  return { exitCode, timedOut, stdout: "", stderr: "" };
}

describe("workspace validation", () => {
  let cwd: string;
  let root: string;

  beforeEach(async () => {
    cwd = await makeTempDir("validate");
    root = join(cwd, "demo");
  });

  afterEach(async () => {
    await rm(cwd, { recursive: true, force: true });
  });

  it("accepts a fresh workspace whose audit passes", async () => {
    await createDemo(cwd);
    const runAudit = vi.fn<AuditRunner>(async () => auditResult(0));
    const { output, lines } = createBufferedOutput();

    const result = await validateWorkspace(root, { runAudit, output });

    expect(result).toMatchObject({
      valid: true,
      tier: "1",
      tierName: "Lite",
      version: "2026.26",
      provider: "gemini",
      auditScript: "scripts/run_audit.py",
      auditRan: true,
      issues: [],
    });
    expect(runAudit).toHaveBeenCalledWith(join(root, "scripts/run_audit.py"), root);
    expect(lines).toEqual([`✅ Workspace is valid: ${root} (tier 1, Lite)`]);
  });

  it("fails when the audit script exits non-zero", async () => {
    await createDemo(cwd);
    const { output, errors } = createBufferedOutput();

    const attempt = validateWorkspace(root, { runAudit: async () => auditResult(2), output });

    await expect(attempt).rejects.toThrow(ValidationError);
    await expect(attempt).rejects.toThrow("Validation failed: 1 issue(s) found");
    expect(errors).toEqual(["⚠️  Audit script failed with exit code 2"]);
  });

  it("reports audit timeouts and start failures", async () => {
    await createDemo(cwd);
    const timedOut = await inspectWorkspace(root, { runAudit: async () => auditResult(-1, true) });
    expect(timedOut.issues).toEqual(["Audit script timed out after 30s"]);

    const missing = await inspectWorkspace(root, {
      runAudit: async () => {
        throw new Error("spawn python3 ENOENT");
      },
    });
    expect(missing.issues).toEqual(["Audit script could not run: spawn python3 ENOENT"]);
  });

  it("reports a missing workspace", async () => {
    const result = await inspectWorkspace(root);
    expect(result.valid).toBe(false);
    expect(result.issues).toEqual([`Workspace not found: ${root}`]);
  });

  it("reports a regular file as a missing workspace", async () => {
    const file = join(cwd, "file.txt");
    await writeFile(file, "not a workspace\n");
    const { output, errors } = createBufferedOutput();

    expect(await inspectWorkspace(file)).toMatchObject({
      valid: false,
      provider: "gemini",
      issues: [`Workspace not found: ${file}`],
    });
    await expect(validateWorkspace(file, { output })).rejects.toThrow(ValidationError);
    expect(errors).toEqual([`⚠️  Workspace not found: ${file}`]);
  });

  it("reports missing metadata", async () => {
    await mkdir(root);
    const result = await inspectWorkspace(root);
    expect(result.issues).toEqual(["Missing .gemini/workspace.json"]);
  });

  it("reports missing keys and bad JSON", async () => {
    await mkdir(join(root, ".gemini"), { recursive: true });
    await writeFile(join(root, ".gemini/workspace.json"), JSON.stringify({ version: "2026.26" }));
    expect((await inspectWorkspace(root)).issues).toEqual(["Missing 'tier' in workspace.json"]);

    await writeFile(join(root, ".gemini/workspace.json"), JSON.stringify({ version: "2026.26", tier: "9" }));
    expect((await inspectWorkspace(root)).issues).toEqual(['Invalid tier "9" in workspace.json']);

    await writeFile(join(root, ".gemini/workspace.json"), "{");
    const broken = await inspectWorkspace(root);
    expect(broken.issues).toHaveLength(1);
    expect(broken.issues[0]).toMatch(/^Invalid JSON in workspace\.json: /);
  });

  it("serves repeat validations from the cache until workspace.json changes", async () => {
    await createDemo(cwd);
    const cache = new ValidationCache();
    const runAudit = vi.fn<AuditRunner>(async () => auditResult(0));

    const first = await inspectWorkspace(root, { cache, runAudit });
    const second = await inspectWorkspace(root, { cache, runAudit });

    expect(first.cached).toBe(false);
    expect(second.cached).toBe(true);
    expect(runAudit).toHaveBeenCalledTimes(1);

    const later = new Date(Date.now() + 60_000);
    await utimes(join(root, ".gemini/workspace.json"), later, later);
    const third = await inspectWorkspace(root, { cache, runAudit });

    expect(third.cached).toBe(false);
    expect(runAudit).toHaveBeenCalledTimes(2);
    expect(cache.size).toBe(2);
  });
});
