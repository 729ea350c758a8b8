/**
 * Tier upgrade: back up the managed files, add the missing parts of the
 * target tier's layout, regenerate the managed files and advance the tier.
 */

import { chmod, mkdir, rm, writeFile } from "node:fs/promises";
import { basename, dirname, join, resolve } from "node:path";
import { TIERS, type Tier } from "../config/constants.js";
import { Output } from "../output/output.js";
import { isHelperScriptPath } from "../templates/scripts.js";
import { createBackup } from "./backup.js";
import { directoryExists, fileExists, pathExists } from "./fs-utils.js";
import { buildWorkspaceLayout, managedFilePaths } from "./layout.js";
import { withWorkspaceLock } from "./lock.js";
import { METADATA_FILENAME, readWorkspaceMetadata, updateWorkspaceMetadata } from "./metadata.js";
import type { ConfirmFn } from "./types.js";
import { checkTierTransition } from "./validators.js";

export interface UpgradePlan {
  add: string[];
  modify: string[];
  remove: string[];
}

/** Human-readable summary shown before confirmation, per target tier. */
export const UPGRADE_PLANS: Record<Exclude<Tier, "1">, UpgradePlan> = {
  "2": {
    add: [
      "src/<package>/ with __init__.py and main.py",
      "tests/unit/ and tests/integration/ with starter tests",
      "pyproject.toml",
      ".agent/skills/debug.md and .agent/workflows/feature.md",
      "Helper scripts under scripts/workspace/ and scripts/skills/",
    ],
    modify: [
      "Constitution (Standard edition)",
      "Makefile (test, lint, typecheck, snapshot targets)",
      "CI workflow (pytest job)",
      "settings.json (hybrid terminal policy)",
    ],
    remove: ["requirements.txt (replaced by pyproject.toml)"],
  },
  "3": {
    add: [
      "domains/frontend/ and domains/backend/ with sub-agent constitutions",
      "outputs/contracts/",
      "tests/evals/ with a starter evaluation",
      "docs/decisions/ with an ADR template",
      "Helper scripts under scripts/shared/, including shift_report.py",
    ],
    modify: [
      "Constitution (Enterprise edition, multi-agent protocol)",
      "Makefile (eval, shift-report, contracts targets)",
      "CI workflow (eval job)",
      "settings.json (multi-agent)",
    ],
    remove: ["requirements.txt (if still present)"],
  },
};

export interface UpgradeOptions {
  /** Defaults to the next tier. */
  targetTier?: Tier;
  /** Skip confirmation. */
  yes?: boolean;
  confirm?: ConfirmFn;
  pythonVersion?: string;
  output?: Output;
  now?: Date;
}

export interface UpgradeResult {
  success: boolean;
  changed: boolean;
  path: string;
  fromTier: Tier;
  toTier: Tier;
  backupPath?: string;
  directoriesAdded: string[];
  filesAdded: string[];
  filesModified: string[];
  filesRemoved: string[];
  warnings: string[];
}

function nextTier(tier: Tier): Tier | undefined {
  if (tier === "1") return "2";
  if (tier === "2") return "3";
  return undefined;
}

function printPlan(output: Output, from: Tier, to: Tier): void {
  const plan = to === "1" ? undefined : UPGRADE_PLANS[to];
  output.header(`Upgrade: tier ${from} (${TIERS[from].name}) → tier ${to} (${TIERS[to].name})`);
  if (!plan) return;
  const sections: Array<[string, string[]]> = [
    ["Will add:", plan.add],
    ["Will modify:", plan.modify],
    ["Will remove:", plan.remove],
  ];
  for (const [title, items] of sections) {
    output.line(title);
    for (const item of items) output.line(`  - ${item}`);
  }
}

/**
 * Upgrade a workspace to a higher tier.
 *
 * Steps:
 * 1. Load workspace.json and resolve the target tier (downgrades throw).
 * 2. Show the plan and confirm.
 * 3. Back up the files about to change.
 * 4. Create missing directories and files of the target layout.
 * 5. Remove requirements.txt (tier 2+), regenerate managed files.
 * 6. Record the new tier.
 */
export async function upgradeWorkspace(path: string, opts: UpgradeOptions = {}): Promise<UpgradeResult> {
  const output = opts.output ?? new Output();
  const root = resolve(path);

  // Step 1: Load and resolve tiers
  const workspace = await readWorkspaceMetadata(root);
  const from = workspace.tier;
  const result: UpgradeResult = {
    success: true,
    changed: false,
    path: root,
    fromTier: from,
    toTier: from,
    directoriesAdded: [],
    filesAdded: [],
    filesModified: [],
    filesRemoved: [],
    warnings: [],
  };

  const to = opts.targetTier ?? nextTier(from);
  if (to === undefined) {
    output.info(`Workspace is already at the highest tier (${from}: ${TIERS[from].name})`);
    return result;
  }
  if (checkTierTransition(from, to) === "same") {
    output.info(`Workspace is already tier ${from} (${TIERS[from].name}); nothing to do`);
    return result;
  }
  result.toTier = to;

  // Step 2: Plan and confirmation
  printPlan(output, from, to);
  if (!opts.yes) {
    const proceed = opts.confirm ? await opts.confirm(`Upgrade ${root} to tier ${to}?`) : false;
    if (!proceed) {
      output.info("Upgrade cancelled");
      return { ...result, toTier: from };
    }
  }

  const { provider } = workspace;
  const managed = managedFilePaths(provider);
  const metadataRelative = `${provider.configDirname}/${METADATA_FILENAME}`;
  const now = opts.now ?? new Date();

  await withWorkspaceLock(root, provider.configDirname, "upgrade", async () => {
    // Step 3: Backup before any overwrite
    const backup = await createBackup(root, provider.configDirname, "pre_upgrade", [...managed, "requirements.txt"], now);
    result.backupPath = backup.path;
    output.info(`Backup created: ${backup.path} (${backup.files.length} file(s))`);

    const name = workspace.metadata["name"];
    const parentWorkspace = workspace.metadata["parent_workspace"];
    const layout = buildWorkspaceLayout({
      tier: to,
      name: typeof name === "string" ? name : basename(root),
      provider,
      pythonVersion: opts.pythonVersion,
      parentWorkspace: typeof parentWorkspace === "string" ? parentWorkspace : undefined,
      now,
    });

    // Step 4: Missing structure
    for (const dir of layout.directories) {
      if (!(await directoryExists(join(root, dir)))) {
        await mkdir(join(root, dir), { recursive: true });
        result.directoriesAdded.push(dir);
        output.detail(`Added directory: ${dir}/`);
      }
    }

    for (const [relativePath, content] of Object.entries(layout.files)) {
      if (managed.includes(relativePath) || relativePath === metadataRelative) continue;
      const target = join(root, relativePath);
      if (await pathExists(target)) continue;
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, content, "utf-8");
      if (isHelperScriptPath(relativePath)) await chmod(target, 0o755);
      result.filesAdded.push(relativePath);
      output.detail(`Added file: ${relativePath}`);
    }

    // Step 5: Removals and managed files
    const requirements = join(root, "requirements.txt");
    if (TIERS[to].order >= 2 && (await fileExists(requirements))) {
      await rm(requirements);
      result.filesRemoved.push("requirements.txt");
      output.detail("Removed file: requirements.txt");
    }

    for (const relativePath of managed) {
      const content = layout.files[relativePath];
      if (content === undefined) continue;
      const target = join(root, relativePath);
      const existed = await fileExists(target);
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, content, "utf-8");
      (existed ? result.filesModified : result.filesAdded).push(relativePath);
      output.detail(`${existed ? "Updated" : "Added"} file: ${relativePath}`);
    }

    // Step 6: Metadata
    await updateWorkspaceMetadata(workspace, {
      tier: to,
      previous_tier: from,
      upgraded: now.toISOString(),
    });
  });

  result.changed = true;
  result.filesAdded.sort();
  output.success(`Upgraded ${root} from tier ${from} (${TIERS[from].name}) to tier ${to} (${TIERS[to].name})`);
  return result;
}
