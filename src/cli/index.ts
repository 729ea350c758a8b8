/**
 * The `tierforge` command-line program.
 *
 * Commands throw; {@link run} catches once, prints the error and returns the
 * exit code for it.
 */

import { Command, CommanderError } from "commander";
import { EXIT_CODES, VERSION } from "../config/constants.js";
import { WorkspaceError, errorMessage, exitCodeFor, isInterrupt } from "../errors/index.js";
import { formatErrorJson } from "../output/formatter.js";
import { registerCreateCommand } from "./commands/create.js";
import { registerLifecycleCommands } from "./commands/lifecycle.js";
import { registerSkillCommands } from "./commands/skill.js";
import { registerTemplateCommands } from "./commands/templates.js";
import { registerValidateCommands } from "./commands/validate.js";
import { outputFor, type CliDependencies } from "./context.js";

export type { CliDependencies } from "./context.js";
export type { Prompts } from "./prompts.js";

export function createProgram(deps: CliDependencies = {}): Command {
  const program = new Command();
  program
    .name("tierforge")
    .description("Scaffold, validate, upgrade and snapshot tiered AI-assistant workspaces")
    .version(VERSION)
    .option("-q, --quiet", "Only print warnings, errors and results", false)
    .option("-v, --verbose", "Print every directory and file", false)
    .option("--no-color", "Disable colored output")
    .option("--json", "Print one JSON document per command", false)
    .option("--config <path>", "Team defaults file (default: ./.gemini-bootstrap.json)")
    .exitOverride();

  if (deps.sink) {
    const sink = deps.sink;
    program.configureOutput({
      writeOut: (text) => sink(text, "stdout"),
      writeErr: (text) => sink(text, "stderr"),
    });
  }

  registerCreateCommand(program, deps);
  registerValidateCommands(program, deps);
  registerLifecycleCommands(program, deps);
  registerTemplateCommands(program, deps);
  registerSkillCommands(program, deps);
  return program;
}

/**
 * Parse and execute `argv`. Returns the process exit code.
 */
export async function run(
  argv: readonly string[],
  deps: CliDependencies = {},
  from: "node" | "user" = "node",
): Promise<number> {
  const program = createProgram(deps);
  try {
    await program.parseAsync([...argv], { from });
    return EXIT_CODES.success;
  } catch (error) {
    // Commander has already printed usage errors, help and the version.
    if (error instanceof CommanderError) return error.exitCode;

    const output = outputFor(program, deps);
    if (output.config.json) {
      output.raw(formatErrorJson(error));
    } else if (isInterrupt(error)) {
      output.error("Operation cancelled");
    } else {
      output.error(errorMessage(error));
      if (!(error instanceof WorkspaceError) && error instanceof Error && error.stack) {
        output.detail(error.stack);
      }
    }
    return exitCodeFor(error);
  }
}
