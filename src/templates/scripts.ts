/**
 * Helper scripts written into every workspace, and where each tier puts them.
 *
 * - Lite: flat `scripts/<name>.py`
 * - Standard: categorised `scripts/<category>/<name>.py`
 * - Enterprise: shared `scripts/shared/<name>.py`
 */

import { TIERS, type Tier } from "../config/constants.js";
import type { WorkspaceProvider } from "../providers/types.js";
import { renderAsset } from "./assets.js";

export type ScriptCategory = "workspace" | "skills";

export interface HelperScript {
  name: string;
  category: ScriptCategory;
  /** Lowest tier that ships this script. */
  minTier: Tier;
}

export const HELPER_SCRIPTS: readonly HelperScript[] = [
  { name: "run_audit", category: "workspace", minTier: "1" },
  { name: "manage_session", category: "workspace", minTier: "1" },
  { name: "index_docs", category: "workspace", minTier: "1" },
  { name: "check_status", category: "workspace", minTier: "1" },
  { name: "list_skills", category: "skills", minTier: "1" },
  { name: "create_snapshot", category: "workspace", minTier: "2" },
  { name: "manage_skills", category: "skills", minTier: "2" },
  { name: "shift_report", category: "workspace", minTier: "3" },
];

export function scriptsDir(tier: Tier, category: ScriptCategory): string {
  switch (tier) {
    case "1":
      return "scripts";
    case "2":
      return `scripts/${category}`;
    case "3":
      return "scripts/shared";
  }
}

export function scriptsForTier(tier: Tier): HelperScript[] {
  return HELPER_SCRIPTS.filter((script) => TIERS[script.minTier].order <= TIERS[tier].order);
}

export function scriptPath(tier: Tier, script: HelperScript): string {
  return `${scriptsDir(tier, script.category)}/${script.name}.py`;
}

/** Every location an audit script may live at, across tiers and legacy layouts. */
export const AUDIT_SCRIPT_CANDIDATES = [
  "scripts/audit.py",
  "scripts/run_audit.py",
  "scripts/workspace/run_audit.py",
  "scripts/shared/run_audit.py",
] as const;

/**
 * Relative path → rendered content for the helper scripts of a tier.
 */
export function getHelperScripts(tier: Tier, provider: WorkspaceProvider): Record<string, string> {
  const vars = { CONFIG_DIR: provider.configDirname, CONFIG_FILE: provider.configFilename };
  const files: Record<string, string> = {};
  for (const script of scriptsForTier(tier)) {
    files[scriptPath(tier, script)] = renderAsset(`scripts/${script.name}.py`, vars);
  }
  return files;
}

export function isHelperScriptPath(relativePath: string): boolean {
  return relativePath.startsWith("scripts/") && relativePath.endsWith(".py");
}
