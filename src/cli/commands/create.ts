/**
 * Register the `create` command (the default command).
 */

import type { Command } from "commander";
import type { Tier } from "../../config/constants.js";
import { ValidationError, errorMessage } from "../../errors/index.js";
import { emitResult, formatCreation } from "../../output/formatter.js";
import { resolveTemplate } from "../../templates/catalog.js";
import { createWorkspace } from "../../workspace/create.js";
import { parseTier, validateProjectName } from "../../workspace/validators.js";
import { createContext, resolvePath, type CliContext, type CliDependencies } from "../context.js";

interface CreateCommandOptions {
  tier?: string;
  name?: string;
  dryRun: boolean;
  force: boolean;
  git?: boolean;
  sharedAgent?: string;
  parent?: string;
  fromTemplate?: string;
  pythonVersion?: string;
  provider?: string;
}

async function resolveTier(ctx: CliContext, opts: CreateCommandOptions, templatesPath?: string): Promise<Tier> {
  if (opts.tier !== undefined) return parseTier(opts.tier);
  if (opts.fromTemplate) {
    const { template } = await resolveTemplate(opts.fromTemplate, templatesPath);
    if (template.tier) return template.tier;
  }
  if (ctx.config.default_tier) return ctx.config.default_tier;
  if (ctx.interactive) return ctx.prompts.selectTier("Select workspace tier");
  throw new ValidationError("Tier is required. Pass --tier 1, 2 or 3.");
}

async function resolveName(ctx: CliContext, opts: CreateCommandOptions): Promise<string> {
  if (opts.name !== undefined) return opts.name;
  if (ctx.interactive) {
    return ctx.prompts.input("Project name", (value) => {
      try {
        validateProjectName(value);
        return true;
      } catch (error) {
        return errorMessage(error);
      }
    });
  }
  throw new ValidationError("Project name is required. Pass --name NAME.");
}

export function registerCreateCommand(program: Command, deps: CliDependencies): void {
  program
    .command("create", { isDefault: true })
    .description("Create a new workspace")
    .option("-t, --tier <tier>", "Workspace tier: 1 (Lite), 2 (Standard), 3 (Enterprise)")
    .option("-n, --name <name>", "Project name")
    .option("--dry-run", "Preview without writing anything", false)
    .option("--force", "Replace an existing directory", false)
    .option("--git", "Initialize a git repository")
    .option("--shared-agent <path>", "Link a shared .agent/ directory")
    .option("--parent <path>", "Create inside this directory")
    .option("--from-template <name>", "Apply a template from the catalog")
    .option("--python-version <version>", "Python version for CI")
    .option("--provider <name>", "Target assistant: gemini, claude or codex")
    .action(async (opts: CreateCommandOptions) => {
      const ctx = await createContext(program, deps);
      const templatesPath = ctx.config.templates_path ? resolvePath(ctx, ctx.config.templates_path) : undefined;
      const tier = await resolveTier(ctx, opts, templatesPath);
      const name = await resolveName(ctx, opts);
      const sharedAgentPath = opts.sharedAgent ?? ctx.config.shared_agent_path;

      const result = await createWorkspace({
        tier,
        name,
        cwd: ctx.cwd,
        parent: opts.parent,
        dryRun: opts.dryRun,
        force: opts.force,
        git: opts.git ?? ctx.config.default_git ?? false,
        sharedAgentPath,
        template: opts.fromTemplate,
        templatesPath,
        pythonVersion: opts.pythonVersion ?? ctx.config.python_version,
        provider: opts.provider ?? ctx.config.provider,
        output: ctx.output,
        gitClient: deps.gitClient,
      });
      emitResult(ctx.output, result, formatCreation(result));
    });
}
