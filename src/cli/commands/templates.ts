/**
 * Register `list-templates` and `export-template`.
 */

import type { Command } from "commander";
import { emitResult, formatTemplateList } from "../../output/formatter.js";
import { loadTemplateCatalog } from "../../templates/catalog.js";
import { exportTemplate } from "../../workspace/export-template.js";
import { createContext, resolvePath, type CliDependencies } from "../context.js";

export function registerTemplateCommands(program: Command, deps: CliDependencies): void {
  program
    .command("list-templates")
    .description("List built-in and custom templates")
    .action(async () => {
      const ctx = await createContext(program, deps);
      const templatesPath = ctx.config.templates_path ? resolvePath(ctx, ctx.config.templates_path) : undefined;
      const catalog = await loadTemplateCatalog(templatesPath);
      for (const warning of catalog.warnings) ctx.output.warning(warning);
      emitResult(
        ctx.output,
        catalog.entries.map((entry) => ({
          name: entry.name,
          source: entry.source,
          description: entry.template.description,
          tier: entry.template.tier ?? null,
        })),
        formatTemplateList(catalog.entries),
      );
    });

  program
    .command("export-template <path>")
    .description("Export a workspace as a reusable template")
    .requiredOption("--template-name <name>", "Template name (lowercase)")
    .option("--output <dir>", "Directory to write <name>.json (default: the workspace's parent)")
    .option("--description <text>", "Template description")
    .option("--force", "Overwrite an existing template file", false)
    .action(
      async (
        path: string,
        opts: { templateName: string; output?: string; description?: string; force: boolean },
      ) => {
        const ctx = await createContext(program, deps);
        const result = await exportTemplate(resolvePath(ctx, path), {
          templateName: opts.templateName,
          outputDir: opts.output === undefined ? undefined : resolvePath(ctx, opts.output),
          description: opts.description,
          force: opts.force,
          output: ctx.output,
        });
        emitResult(ctx.output, result);
      },
    );
}
