/**
 * Makefile generation: tier-specific targets followed by the common set.
 *
 * The `.PHONY` line is derived from the rendered targets so it can never
 * drift from the recipes.
 */

import { TIERS, type Tier } from "../config/constants.js";
import type { WorkspaceProvider } from "../providers/types.js";
import { readAsset, renderTemplate } from "./assets.js";
import { scriptsDir } from "./scripts.js";

const TIER_FRAGMENTS: Record<Tier, string> = {
  "1": "makefile/lite.mk",
  "2": "makefile/standard.mk",
  "3": "makefile/enterprise.mk",
};

const TARGET_LINE = /^([a-z][a-z0-9-]*):(?!=)/gm;

/** Target names in definition order, duplicates removed. */
export function extractTargets(makefileBody: string): string[] {
  const targets: string[] = [];
  for (const match of makefileBody.matchAll(TARGET_LINE)) {
    const name = match[1];
    if (name !== undefined && !targets.includes(name)) targets.push(name);
  }
  return targets;
}

export function getMakefile(tier: Tier, packageName: string, provider: WorkspaceProvider): string {
  const vars = {
    PACKAGE: packageName,
    CONFIG_DIR: provider.configDirname,
    SCRIPTS: scriptsDir(tier, "workspace"),
    SKILL_SCRIPTS: scriptsDir(tier, "skills"),
  };
  const body = renderTemplate(readAsset(TIER_FRAGMENTS[tier]) + readAsset("makefile/common.mk"), vars);
  const header = renderTemplate(readAsset("makefile/header.mk"), {
    TITLE: provider.displayName,
    EDITION: TIERS[tier].name,
    PHONY: extractTargets(body).join(" "),
  });
  return header + body;
}
