/**
 * Register `upgrade`, `rollback`, `snapshot` and `update-scripts`.
 */

import { InvalidArgumentError, type Command } from "commander";
import { emitResult, formatRollback, formatSnapshot, formatUpgrade } from "../../output/formatter.js";
import { rollbackWorkspace } from "../../workspace/rollback.js";
import { createSnapshot, type SnapshotFormat } from "../../workspace/snapshot.js";
import { updateScripts } from "../../workspace/update-scripts.js";
import { upgradeWorkspace } from "../../workspace/upgrade.js";
import { parseTier } from "../../workspace/validators.js";
import { createContext, resolvePath, type CliDependencies } from "../context.js";

function parseFormat(value: string): SnapshotFormat {
  if (value === "archive" || value === "directory") return value;
  throw new InvalidArgumentError("Expected 'archive' or 'directory'.");
}

export function registerLifecycleCommands(program: Command, deps: CliDependencies): void {
  // --- upgrade ---
  program
    .command("upgrade <path>")
    .description("Upgrade a workspace to a higher tier")
    .option("-t, --tier <tier>", "Target tier (default: next tier)")
    .option("-y, --yes", "Skip confirmation", false)
    .option("--python-version <version>", "Python version for CI")
    .action(async (path: string, opts: { tier?: string; yes: boolean; pythonVersion?: string }) => {
      const ctx = await createContext(program, deps);
      const result = await upgradeWorkspace(resolvePath(ctx, path), {
        targetTier: opts.tier === undefined ? undefined : parseTier(opts.tier),
        yes: opts.yes,
        confirm: ctx.confirm,
        pythonVersion: opts.pythonVersion ?? ctx.config.python_version,
        output: ctx.output,
      });
      emitResult(ctx.output, result, formatUpgrade(result));
    });

  // --- rollback ---
  program
    .command("rollback <path>")
    .description("Restore a workspace from a snapshot or backup")
    .option("--backup <name>", "Snapshot or backup name (default: latest backup)")
    .option("-y, --yes", "Skip confirmation", false)
    .action(async (path: string, opts: { backup?: string; yes: boolean }) => {
      const ctx = await createContext(program, deps);
      const result = await rollbackWorkspace(resolvePath(ctx, path), {
        backup: opts.backup,
        yes: opts.yes,
        confirm: ctx.confirm,
        output: ctx.output,
      });
      emitResult(ctx.output, result, formatRollback(result));
    });

  // --- snapshot ---
  program
    .command("snapshot <path>")
    .description("Capture a snapshot under .snapshots/")
    .requiredOption("--name <name>", "Snapshot label")
    .option("--format <format>", "archive or directory", parseFormat, "archive")
    .option("--git-tag", "Tag HEAD with the snapshot name", false)
    .action(async (path: string, opts: { name: string; format: SnapshotFormat; gitTag: boolean }) => {
      const ctx = await createContext(program, deps);
      const result = await createSnapshot(resolvePath(ctx, path), {
        name: opts.name,
        format: opts.format,
        gitTag: opts.gitTag,
        gitClient: deps.gitClient,
        output: ctx.output,
      });
      emitResult(ctx.output, result, formatSnapshot(result));
    });

  // --- update-scripts ---
  program
    .command("update-scripts <path>")
    .description("Regenerate helper scripts from the current templates")
    .action(async (path: string) => {
      const ctx = await createContext(program, deps);
      const result = await updateScripts(resolvePath(ctx, path), { output: ctx.output });
      emitResult(ctx.output, result);
    });
}
