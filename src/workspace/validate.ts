/**
 * Workspace validation: metadata presence, required keys and the workspace's
 * own audit script.
 */

import { readFile, stat } from "node:fs/promises";
import { join, resolve } from "node:path";
import { AUDIT_TIMEOUT_MS, TIERS, isTier, type Tier } from "../config/constants.js";
import { ValidationError, errorMessage, isNotFound } from "../errors/index.js";
import { Output } from "../output/output.js";
import { getProvider } from "../providers/index.js";
import { AUDIT_SCRIPT_CANDIDATES } from "../templates/scripts.js";
import { directoryExists, fileExists } from "./fs-utils.js";
import { METADATA_FILENAME, detectProvider, metadataPath } from "./metadata.js";
import { runProcess, type ProcessResult } from "./process.js";

export interface ValidationResult {
  valid: boolean;
  path: string;
  provider: string;
  tier?: Tier;
  tierName?: string;
  version?: string;
  issues: string[];
  /** Relative path of the audit script that ran, if any. */
  auditScript?: string;
  auditRan: boolean;
  /** True when served from a {@link ValidationCache}. */
  cached: boolean;
}

/**
 * Memoized validation results keyed by workspace path and the modification
 * time of its workspace.json. Owned by the caller; unbounded.
 */
export class ValidationCache {
  private readonly entries = new Map<string, ValidationResult>();

  private static key(path: string, mtimeMs: number): string {
    return `${path}\u0000${mtimeMs}`;
  }

  get(path: string, mtimeMs: number): ValidationResult | undefined {
    return this.entries.get(ValidationCache.key(path, mtimeMs));
  }

  set(path: string, mtimeMs: number, result: ValidationResult): void {
    this.entries.set(ValidationCache.key(path, mtimeMs), result);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

/** Runs an audit script with the workspace as working directory. */
export type AuditRunner = (scriptPath: string, cwd: string) => Promise<ProcessResult>;

export const pythonAuditRunner: AuditRunner = (scriptPath, cwd) =>
  runProcess("python3", [scriptPath], { cwd, timeoutMs: AUDIT_TIMEOUT_MS });

export interface ValidateOptions {
  cache?: ValidationCache;
  runAudit?: AuditRunner;
  output?: Output;
}

async function findAuditScript(root: string): Promise<string | undefined> {
  for (const candidate of AUDIT_SCRIPT_CANDIDATES) {
    if (await fileExists(join(root, candidate))) return candidate;
  }
  return undefined;
}

async function runAudit(root: string, script: string, runner: AuditRunner): Promise<string | undefined> {
  let result: ProcessResult;
  try {
    result = await runner(join(root, script), root);
  } catch (error) {
    return `Audit script could not run: ${errorMessage(error)}`;
  }
  if (result.timedOut) return `Audit script timed out after ${AUDIT_TIMEOUT_MS / 1000}s`;
  if (result.exitCode !== 0) return `Audit script failed with exit code ${result.exitCode}`;
  return undefined;
}

/**
 * Inspect a workspace and report every issue found. Never throws for an
 * invalid workspace; see {@link validateWorkspace}.
 */
export async function inspectWorkspace(path: string, opts: ValidateOptions = {}): Promise<ValidationResult> {
  const root = resolve(path);
  const base: ValidationResult = {
    valid: false,
    path: root,
    provider: getProvider().name,
    issues: [],
    auditRan: false,
    cached: false,
  };

  if (!(await directoryExists(root))) {
    return { ...base, issues: [`Workspace not found: ${root}`] };
  }
  const provider = await detectProvider(root);
  base.provider = provider.name;

  const metaPath = metadataPath(root, provider);
  let mtimeMs: number;
  try {
    mtimeMs = (await stat(metaPath)).mtimeMs;
  } catch (error) {
    if (isNotFound(error)) {
      return { ...base, issues: [`Missing ${provider.configDirname}/${METADATA_FILENAME}`] };
    }
    throw error;
  }

  const hit = opts.cache?.get(root, mtimeMs);
  if (hit) return { ...hit, cached: true };

  const result: ValidationResult = { ...base, issues: [] };
  try {
    const parsed: unknown = JSON.parse(await readFile(metaPath, "utf-8"));
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      result.issues.push(`Invalid ${METADATA_FILENAME}: expected a JSON object`);
    } else {
      const metadata: Record<string, unknown> = { ...parsed };
      for (const key of ["tier", "version"]) {
        if (!(key in metadata)) result.issues.push(`Missing '${key}' in ${METADATA_FILENAME}`);
      }
      const tier = metadata["tier"];
      if (isTier(tier)) {
        result.tier = tier;
        result.tierName = TIERS[tier].name;
      } else if (tier !== undefined) {
        result.issues.push(`Invalid tier ${JSON.stringify(tier)} in ${METADATA_FILENAME}`);
      }
      const version = metadata["version"];
      if (typeof version === "string") result.version = version;
    }
  } catch (error) {
    result.issues.push(`Invalid JSON in ${METADATA_FILENAME}: ${errorMessage(error)}`);
  }

  const script = await findAuditScript(root);
  if (script) {
    result.auditScript = script;
    result.auditRan = true;
    const issue = await runAudit(root, script, opts.runAudit ?? pythonAuditRunner);
    if (issue) result.issues.push(issue);
  }

  result.valid = result.issues.length === 0;
  opts.cache?.set(root, mtimeMs, result);
  return result;
}

/**
 * Validate a workspace; throws {@link ValidationError} listing the issues
 * when it is invalid.
 */
export async function validateWorkspace(path: string, opts: ValidateOptions = {}): Promise<ValidationResult> {
  const output = opts.output ?? new Output();
  const result = await inspectWorkspace(path, opts);
  if (!result.valid) {
    for (const issue of result.issues) output.warning(issue);
    throw new ValidationError(`Validation failed: ${result.issues.length} issue(s) found`, {
      path: result.path,
      issues: result.issues,
    });
  }
  output.success(`Workspace is valid: ${result.path} (tier ${result.tier ?? "?"}, ${result.tierName ?? "unknown"})`);
  return result;
}
