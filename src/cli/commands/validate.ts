/**
 * Register `validate` and `validate-schemas`.
 */

import type { Command } from "commander";
import { emitResult, formatValidation } from "../../output/formatter.js";
import { checkWorkspaceSchemas } from "../../workspace/schema-check.js";
import { validateWorkspace } from "../../workspace/validate.js";
import { createContext, resolvePath, type CliDependencies } from "../context.js";

export function registerValidateCommands(program: Command, deps: CliDependencies): void {
  program
    .command("validate <path>")
    .description("Validate a workspace and run its audit script")
    .action(async (path: string) => {
      const ctx = await createContext(program, deps);
      const result = await validateWorkspace(resolvePath(ctx, path), {
        output: ctx.output,
        runAudit: deps.runAudit,
        cache: deps.validationCache,
      });
      emitResult(ctx.output, result, formatValidation(result));
    });

  program
    .command("validate-schemas <path>")
    .description("Check generated config files against their schemas")
    .action(async (path: string) => {
      const ctx = await createContext(program, deps);
      const result = await checkWorkspaceSchemas(resolvePath(ctx, path), { output: ctx.output });
      emitResult(ctx.output, result);
    });
}
