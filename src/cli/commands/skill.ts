/**
 * Register the `skill` command group.
 */

import type { Command } from "commander";
import { emitResult, formatSkillList } from "../../output/formatter.js";
import { installSkill, listSkills, removeSkill, type SkillKind } from "../../skills/manager.js";
import { createContext, resolvePath, type CliDependencies } from "../context.js";

function kindOf(opts: { workflow: boolean }): SkillKind {
  return opts.workflow ? "workflow" : "skill";
}

export function registerSkillCommands(program: Command, deps: CliDependencies): void {
  const skill = program.command("skill").description("Manage .agent skills and workflows");

  skill
    .command("add <path> <source>")
    .description("Install a skill from an https:// URL or owner/repo[@ref]/path")
    .option("--workflow", "Install into .agent/workflows", false)
    .option("--force", "Overwrite an existing file", false)
    .action(async (path: string, source: string, opts: { workflow: boolean; force: boolean }) => {
      const ctx = await createContext(program, deps);
      const result = await installSkill(resolvePath(ctx, path), source, {
        kind: kindOf(opts),
        force: opts.force,
        fetch: deps.fetch,
        output: ctx.output,
      });
      emitResult(ctx.output, result);
    });

  skill
    .command("remove <path> <name>")
    .description("Remove an installed skill or workflow")
    .option("--workflow", "Remove from .agent/workflows", false)
    .action(async (path: string, name: string, opts: { workflow: boolean }) => {
      const ctx = await createContext(program, deps);
      const removed = await removeSkill(resolvePath(ctx, path), name, kindOf(opts), { output: ctx.output });
      emitResult(ctx.output, { success: true, path: removed });
    });

  skill
    .command("list <path>")
    .description("List installed skills and workflows")
    .action(async (path: string) => {
      const ctx = await createContext(program, deps);
      const entries = await listSkills(resolvePath(ctx, path));
      emitResult(ctx.output, entries, formatSkillList(entries));
    });
}
