import { mkdtemp, readFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { Tier } from "../../config/constants.js";
import { createBufferedOutput } from "../../output/output.js";
import { createWorkspace, type CreationResult } from "../create.js";
import type { GitClient } from "../git.js";

export const FIXED_NOW = new Date(2026, 0, 15, 9, 30, 5);
/** `formatTimestamp(FIXED_NOW)` in local time. */
export const FIXED_STAMP = "20260115_093005";

export function makeTempDir(label: string): Promise<string> {
  return mkdtemp(join(tmpdir(), `tierforge-${label}-`));
}

export interface FakeGit extends GitClient {
  calls: string[];
}

export function fakeGit(opts: { repository?: boolean; failInit?: boolean } = {}): FakeGit {
  const calls: string[] = [];
  return {
    calls,
    async init(dir) {
      calls.push(`init ${dir}`);
      if (opts.failInit) throw new Error("git not installed");
    },
    async isRepository() {
      return opts.repository ?? false;
    },
    async tag(_dir, name) {
      calls.push(`tag ${name}`);
    },
  };
}

/** Create a workspace quietly inside `parent`. */
export async function createDemo(
  parent: string,
  tier: Tier = "1",
  name = "demo",
  provider?: string,
): Promise<CreationResult> {
  const { output } = createBufferedOutput();
  return createWorkspace({ tier, name, cwd: parent, output, now: FIXED_NOW, provider });
}

export async function readJson(path: string): Promise<unknown> {
  return JSON.parse(await readFile(path, "utf-8"));
}
