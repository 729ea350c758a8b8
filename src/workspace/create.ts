/**
 * Workspace creation.
 *
 * Validates inputs, builds the tier layout in memory, then materializes it:
 * directories sequentially, files through the bounded write pool. Any failure
 * after the target directory exists removes it again.
 */

import { mkdir, rm, rmdir } from "node:fs/promises";
import { isAbsolute, join, resolve } from "node:path";
import { DEFAULT_PYTHON_VERSION, TIERS, type Tier } from "../config/constants.js";
import { CreationError, ValidationError, WorkspaceError, errorMessage, isErrnoException } from "../errors/index.js";
import { Output } from "../output/output.js";
import { getProvider } from "../providers/index.js";
import type { TemplateDefinition } from "../schemas/template.js";
import { resolveTemplate } from "../templates/catalog.js";
import { isHelperScriptPath } from "../templates/scripts.js";
import { directoryExists, pathExists } from "./fs-utils.js";
import { systemGit, type GitClient } from "./git.js";
import { buildWorkspaceLayout } from "./layout.js";
import { linkSharedAgent, type LinkOperations } from "./shared-agent.js";
import { validateProjectName, validatePythonVersion, validateTemplateName } from "./validators.js";
import { summarizeWriteFailures, writeFilesConcurrently } from "./write-pool.js";

export interface CreateWorkspaceOptions {
  tier: Tier;
  name: string;
  /** Directory the workspace is created in (default: cwd). */
  parent?: string;
  /** Base for relative paths (default: process.cwd()). */
  cwd?: string;
  dryRun?: boolean;
  force?: boolean;
  /** Run `git init` after creation. */
  git?: boolean;
  sharedAgentPath?: string;
  /** Template catalog entry to apply. */
  template?: string;
  /** Directory of custom template JSON files. */
  templatesPath?: string;
  pythonVersion?: string;
  provider?: string;
  output?: Output;
  gitClient?: GitClient;
  linkOperations?: LinkOperations;
  now?: Date;
}

export interface CreationResult {
  success: boolean;
  dryRun: boolean;
  path: string;
  name: string;
  tier: Tier;
  tierName: string;
  provider: string;
  template?: string;
  domain?: string;
  directoriesCreated: string[];
  filesCreated: string[];
  warnings: string[];
}

function assertSafeTemplatePaths(name: string, template: TemplateDefinition): void {
  for (const path of Object.keys(template.files)) {
    if (isAbsolute(path) || path.split(/[\\/]/).includes("..")) {
      throw new ValidationError(`Template '${name}' contains an unsafe file path: ${path}`);
    }
  }
}

async function preflight(parentDir: string, scratchName: string): Promise<void> {
  const scratch = join(parentDir, scratchName);
  try {
    await mkdir(scratch);
    await rmdir(scratch);
  } catch (error) {
    throw new CreationError(`Cannot write to ${parentDir}: ${errorMessage(error)}`);
  }
}

/**
 * Create a workspace of the given tier.
 *
 * Steps:
 * 1. Validate name, python version and template (no side effects yet).
 * 2. Resolve the target directory and build the layout.
 * 3. Dry run: print the preview and stop.
 * 4. Preflight the parent directory, handle an existing target.
 * 5. Create directories, then write files concurrently.
 * 6. Link the shared agent directory, initialize git.
 */
export async function createWorkspace(opts: CreateWorkspaceOptions): Promise<CreationResult> {
  const output = opts.output ?? new Output();
  const warnings: string[] = [];
  const warn = (message: string): void => {
    warnings.push(message);
    output.warning(message);
  };

  // Step 1: Validate
  validateProjectName(opts.name);
  const pythonVersion = opts.pythonVersion ?? DEFAULT_PYTHON_VERSION;
  validatePythonVersion(pythonVersion);
  const provider = getProvider(opts.provider);

  let template: TemplateDefinition | undefined;
  if (opts.template) {
    validateTemplateName(opts.template);
    template = (await resolveTemplate(opts.template, opts.templatesPath)).template;
    assertSafeTemplatePaths(opts.template, template);
  }

  // Step 2: Resolve paths and layout
  const cwd = opts.cwd ?? process.cwd();
  const parentDir = resolve(cwd, opts.parent ?? ".");
  const target = join(parentDir, opts.name);
  const layout = buildWorkspaceLayout({
    tier: opts.tier,
    name: opts.name,
    provider,
    pythonVersion,
    template,
    parentWorkspace: opts.parent ? parentDir : undefined,
    now: opts.now,
  });
  const filePaths = Object.keys(layout.files).sort();

  const result: CreationResult = {
    success: false,
    dryRun: Boolean(opts.dryRun),
    path: target,
    name: opts.name,
    tier: opts.tier,
    tierName: TIERS[opts.tier].name,
    provider: provider.name,
    template: opts.template,
    domain: layout.domain,
    directoriesCreated: [],
    filesCreated: [],
    warnings,
  };

  const exists = await pathExists(target);
  if (exists && !opts.force) {
    throw new CreationError(`Directory '${opts.name}' already exists. Use --force to overwrite.`, { path: target });
  }

  // Step 3: Dry run
  if (opts.dryRun) {
    output.header(`[DRY RUN] Would create ${result.tierName} workspace at ${target}`);
    output.line(`Directories (${layout.directories.length}):`);
    for (const dir of layout.directories) output.line(`  ${dir}/`);
    output.line(`Files (${filePaths.length}):`);
    for (const file of filePaths) output.line(`  ${file}`);
    if (exists) output.line(`Existing directory would be replaced: ${target}`);
    return { ...result, success: true, directoriesCreated: layout.directories, filesCreated: filePaths };
  }

  // Step 4: Preflight and existing target
  if (opts.parent) await mkdir(parentDir, { recursive: true });
  await preflight(parentDir, `.${provider.name}_preflight_${opts.name}`);

  if (exists) {
    if (await directoryExists(join(target, ".git"))) {
      warn(`Replacing ${target} discards its git history`);
    }
    output.info(`Removing existing directory: ${target}`);
    await rm(target, { recursive: true, force: true });
  }

  try {
    await mkdir(target);
  } catch (error) {
    if (isErrnoException(error) && error.code === "EEXIST") {
      throw new CreationError(`Directory '${opts.name}' was created by another process`, { path: target });
    }
    throw new CreationError(`Cannot create ${target}: ${errorMessage(error)}`);
  }

  // Step 5: Directories, then files
  try {
    output.header(`Creating ${result.tierName} workspace '${opts.name}'`);
    for (const dir of layout.directories) {
      await mkdir(join(target, dir), { recursive: true });
      output.detail(`Created directory: ${dir}/`);
    }
    result.directoriesCreated = layout.directories;

    const progress = output.progress(filePaths.length, "Writing files");
    const { written, failures } = await writeFilesConcurrently(target, layout.files, {
      isExecutable: isHelperScriptPath,
      onWritten: (path) => {
        progress.tick(path);
        output.detail(`Created file: ${path}`);
      },
    });
    progress.stop();
    if (failures.length > 0) {
      throw new CreationError(summarizeWriteFailures(failures), { failures });
    }
    result.filesCreated = written;

    // Step 6a: Shared agent
    if (opts.sharedAgentPath) {
      const link = await linkSharedAgent(target, resolve(cwd, opts.sharedAgentPath), opts.linkOperations);
      for (const message of link.warnings) warn(message);
      output.detail(`Shared agent linked (${link.mode})`);
    }
  } catch (error) {
    try {
      await rm(target, { recursive: true, force: true });
    } catch (cleanupError) {
      warn(`Cleanup failed, remove ${target} manually: ${errorMessage(cleanupError)}`);
    }
    if (error instanceof WorkspaceError) throw error;
    throw new CreationError(`Failed to create workspace: ${errorMessage(error)}`, { path: target });
  }

  // Step 6b: Git
  if (opts.git) {
    try {
      await (opts.gitClient ?? systemGit).init(target);
      output.detail("Initialized git repository");
    } catch (error) {
      warn(`git init failed: ${errorMessage(error)}`);
    }
  }

  result.success = true;
  output.success(
    `Created ${result.tierName} workspace '${opts.name}' at ${target} ` +
      `(${result.directoriesCreated.length} directories, ${result.filesCreated.length} files)`,
  );
  return result;
}
