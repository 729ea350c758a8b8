import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadBootstrapConfig } from "../bootstrap-config.js";
import { ConfigurationError } from "../../errors/index.js";
import { createBufferedOutput } from "../../output/output.js";

describe("loadBootstrapConfig", () => {
  let cwd: string;

  beforeEach(async () => {
    cwd = await mkdtemp(join(tmpdir(), "tierforge-config-"));
  });

  afterEach(async () => {
    await rm(cwd, { recursive: true, force: true });
  });

  it("returns an empty config when there is no file", async () => {
    expect(await loadBootstrapConfig({ cwd })).toEqual({});
  });

  it("reads the implicit file from the working directory", async () => {
    await writeFile(
      join(cwd, ".gemini-bootstrap.json"),
      JSON.stringify({ default_tier: "2", default_git: true, python_version: "3.12", provider: "claude" }),
    );

    expect(await loadBootstrapConfig({ cwd })).toEqual({
      default_tier: "2",
      default_git: true,
      python_version: "3.12",
      provider: "claude",
    });
  });

  it("warns about and ignores a malformed implicit file", async () => {
    await writeFile(join(cwd, ".gemini-bootstrap.json"), JSON.stringify({ python_version: "2" }));
    const { output, errors } = createBufferedOutput();

    expect(await loadBootstrapConfig({ cwd, output })).toEqual({});
    expect(errors).toEqual([
      `⚠️  Ignoring .gemini-bootstrap.json: Invalid config ${join(cwd, ".gemini-bootstrap.json")}: ` +
        "python_version: must look like 3.X",
    ]);
  });

  it("fails on an explicit file that is missing or invalid", async () => {
    await expect(loadBootstrapConfig({ cwd, explicitPath: "team.json" })).rejects.toThrow(
      `Config file not found: ${join(cwd, "team.json")}`,
    );

    await writeFile(join(cwd, "team.json"), "{ not json");
    const attempt = loadBootstrapConfig({ cwd, explicitPath: "team.json" });
    await expect(attempt).rejects.toThrow(ConfigurationError);
    await expect(attempt).rejects.toThrow(`Invalid JSON in ${join(cwd, "team.json")}`);
  });

  it("loads an explicit file inside the working directory", async () => {
    await mkdir(join(cwd, "config"));
    await writeFile(join(cwd, "config/team.json"), JSON.stringify({ templates_path: "templates" }));

    expect(await loadBootstrapConfig({ cwd, explicitPath: "config/team.json" })).toEqual({
      templates_path: "templates",
    });
  });

  it("rejects an explicit file outside the working directory", async () => {
    const inner = join(cwd, "project");
    await mkdir(inner);
    await writeFile(join(cwd, "outside.json"), "{}");

    await expect(loadBootstrapConfig({ cwd: inner, explicitPath: "../outside.json" })).rejects.toThrow(
      `Config file must be inside the working directory: ${join(cwd, "outside.json")}`,
    );
  });
});
