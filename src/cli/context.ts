/**
 * Per-command context: output, team defaults and injected collaborators.
 */

import { resolve } from "node:path";
import type { Command } from "commander";
import { loadBootstrapConfig } from "../config/bootstrap-config.js";
import { Output, type OutputConfig, type OutputSink } from "../output/output.js";
import type { BootstrapConfig } from "../schemas/config.js";
import type { FetchFn } from "../skills/manager.js";
import type { GitClient } from "../workspace/git.js";
import type { ConfirmFn } from "../workspace/types.js";
import type { AuditRunner, ValidationCache } from "../workspace/validate.js";
import { inquirerPrompts, type Prompts } from "./prompts.js";

/** Collaborators the CLI uses; tests replace them. */
export interface CliDependencies {
  cwd?: string;
  sink?: OutputSink;
  /** Defaults to stdin and stdout both being TTYs. */
  interactive?: boolean;
  prompts?: Prompts;
  gitClient?: GitClient;
  runAudit?: AuditRunner;
  fetch?: FetchFn;
  validationCache?: ValidationCache;
}

export interface GlobalOptions {
  quiet: boolean;
  verbose: boolean;
  color?: boolean;
  json: boolean;
  config?: string;
}

export interface CliContext {
  cwd: string;
  output: Output;
  config: BootstrapConfig;
  interactive: boolean;
  prompts: Prompts;
  /** Undefined when prompting is not possible. */
  confirm?: ConfirmFn;
  deps: CliDependencies;
}

export function readGlobalOptions(program: Command): GlobalOptions {
  const raw = program.opts();
  const config: unknown = raw["config"];
  return {
    quiet: raw["quiet"] === true,
    verbose: raw["verbose"] === true,
    color: raw["color"] === false ? false : undefined,
    json: raw["json"] === true,
    config: typeof config === "string" ? config : undefined,
  };
}

export function outputFor(program: Command, deps: CliDependencies): Output {
  const globals = readGlobalOptions(program);
  const config: Partial<OutputConfig> = { quiet: globals.quiet, verbose: globals.verbose, json: globals.json };
  if (globals.color === false) config.color = false;
  return new Output(config, deps.sink);
}

export async function createContext(program: Command, deps: CliDependencies): Promise<CliContext> {
  const globals = readGlobalOptions(program);
  const output = outputFor(program, deps);
  const cwd = resolve(deps.cwd ?? process.cwd());
  const config = await loadBootstrapConfig({ cwd, explicitPath: globals.config, output });
  const interactive =
    !globals.json && (deps.interactive ?? (Boolean(process.stdin.isTTY) && Boolean(process.stdout.isTTY)));
  const prompts = deps.prompts ?? inquirerPrompts;
  return {
    cwd,
    output,
    config,
    interactive,
    prompts,
    confirm: interactive ? (message) => prompts.confirm(message) : undefined,
    deps,
  };
}

/** Resolve a command path argument against the context's working directory. */
export function resolvePath(ctx: CliContext, path: string): string {
  return resolve(ctx.cwd, path);
}
