/**
 * Result formatting for the CLI: one JSON document in `--json` mode, short
 * human summaries otherwise.
 */

import { TIERS } from "../config/constants.js";
import { WorkspaceError, errorMessage } from "../errors/index.js";
import type { SkillEntry } from "../skills/manager.js";
import type { CatalogEntry } from "../templates/catalog.js";
import type { CreationResult } from "../workspace/create.js";
import type { RollbackResult } from "../workspace/rollback.js";
import type { SnapshotResult } from "../workspace/snapshot.js";
import type { UpgradeResult } from "../workspace/upgrade.js";
import type { ValidationResult } from "../workspace/validate.js";
import type { Output } from "./output.js";

export function toJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

/** JSON document for a failed command. */
export function formatErrorJson(error: unknown): string {
  const body =
    error instanceof WorkspaceError ? error.toJSON() : { name: "Error", message: errorMessage(error) };
  return toJson({ success: false, error: body });
}

export function formatCreation(result: CreationResult): string[] {
  if (result.dryRun) return [];
  const lines = ["", "Next steps:", `  cd ${result.name}`, "  make help"];
  if (result.tier === "1") lines.push("  pip install -r requirements.txt");
  else lines.push("  pip install -e '.[dev]'");
  return lines;
}

export function formatValidation(result: ValidationResult): string[] {
  const lines = [
    `Path:     ${result.path}`,
    `Provider: ${result.provider}`,
    `Tier:     ${result.tier ? `${result.tier} (${result.tierName ?? TIERS[result.tier].name})` : "unknown"}`,
    `Version:  ${result.version ?? "unknown"}`,
    `Audit:    ${result.auditRan ? `ran ${result.auditScript ?? ""}`.trimEnd() : "no audit script"}`,
  ];
  if (result.cached) lines.push("(cached)");
  return lines;
}

export function formatUpgrade(result: UpgradeResult): string[] {
  if (!result.changed) return [];
  const lines: string[] = [];
  const sections: Array<[string, string[]]> = [
    ["Added directories", result.directoriesAdded],
    ["Added files", result.filesAdded],
    ["Updated files", result.filesModified],
    ["Removed files", result.filesRemoved],
  ];
  for (const [title, items] of sections) {
    if (items.length === 0) continue;
    lines.push(`${title} (${items.length}):`);
    for (const item of items) lines.push(`  ${item}`);
  }
  if (result.backupPath) lines.push(`Backup: ${result.backupPath}`);
  return lines;
}

export function formatRollback(result: RollbackResult): string[] {
  if (!result.restored || !result.source) return [];
  return [`Source: ${result.source.name} (${result.source.kind})`];
}

export function formatSnapshot(result: SnapshotResult): string[] {
  const lines = [`Snapshot: ${result.name} (${result.format})`];
  if (result.gitTag) lines.push(`Git tag:  ${result.gitTag}`);
  return lines;
}

export function formatTemplateList(entries: CatalogEntry[]): string[] {
  if (entries.length === 0) return ["No templates available"];
  const width = Math.max(...entries.map((e) => e.name.length));
  return entries.map((entry) => {
    const tier = entry.template.tier ? `tier ${entry.template.tier}` : "any tier";
    const origin = entry.source === "custom" ? " [custom]" : "";
    return `  ${entry.name.padEnd(width)}  ${entry.template.description} (${tier})${origin}`;
  });
}

export function formatSkillList(entries: SkillEntry[]): string[] {
  if (entries.length === 0) return ["No skills or workflows installed"];
  return entries.map((entry) => `  [${entry.kind}] ${entry.name}: ${entry.title}`);
}

/**
 * Print a command result: the JSON document in json mode, otherwise the
 * human lines.
 */
export function emitResult(output: Output, result: unknown, human: string[] = []): void {
  if (output.config.json) {
    output.raw(toJson(result));
    return;
  }
  for (const line of human) output.line(line);
}
