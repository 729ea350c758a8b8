import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { readFile, rm, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { updateScripts } from "../update-scripts.js";
import { createBufferedOutput } from "../../output/output.js";
import { ValidationError } from "../../errors/index.js";
import { FIXED_NOW, FIXED_STAMP, createDemo, makeTempDir, readJson } from "./fixtures.js";

const LITE_SCRIPTS = [
  "scripts/check_status.py",
  "scripts/index_docs.py",
  "scripts/list_skills.py",
  "scripts/manage_session.py",
  "scripts/run_audit.py",
];

describe("updateScripts", () => {
  let cwd: string;
  let root: string;

  beforeEach(async () => {
    cwd = await makeTempDir("scripts");
    root = join(cwd, "demo");
    await createDemo(cwd, "1");
  });

  afterEach(async () => {
    await rm(cwd, { recursive: true, force: true });
  });

  it("backs up edited scripts and restores the template versions", async () => {
    const original = await readFile(join(root, "scripts/run_audit.py"), "utf-8");
    await writeFile(join(root, "scripts/run_audit.py"), "# local edit\n");
    await rm(join(root, "scripts/index_docs.py"));
    const { output, lines } = createBufferedOutput();

    const result = await updateScripts(root, { output, now: FIXED_NOW });

    const backupPath = join(root, `.gemini/backups/pre_update_${FIXED_STAMP}`);
    expect(result).toEqual({ success: true, path: root, backupPath, scripts: LITE_SCRIPTS });
    expect(await readFile(join(backupPath, "scripts/run_audit.py"), "utf-8")).toBe("# local edit\n");
    expect(await readFile(join(root, "scripts/run_audit.py"), "utf-8")).toBe(original);
    expect((await stat(join(root, "scripts/index_docs.py"))).mode & 0o777).toBe(0o755);
    expect(lines).toEqual([
      `ℹ️  Backed up 4 script(s) to ${backupPath}`,
      "✅ Updated 5 helper script(s)",
    ]);
  });

  it("records the update time in workspace.json", async () => {
    const { output } = createBufferedOutput();
    await updateScripts(root, { output, now: FIXED_NOW });

    expect(await readJson(join(root, ".gemini/workspace.json"))).toMatchObject({
      tier: "1",
      scripts_updated: FIXED_NOW.toISOString(),
    });
  });

  it("requires a workspace", async () => {
    await expect(updateScripts(join(cwd, "missing"))).rejects.toThrow(ValidationError);
  });
});
