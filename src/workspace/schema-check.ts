/**
 * Check generated config files against their schemas.
 */

import { readFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import type { ZodType } from "zod";
import { ValidationError, errorMessage, isNotFound } from "../errors/index.js";
import { Output } from "../output/output.js";
import { McpConfig, WorkspaceSettings } from "../schemas/settings.js";
import { WorkspaceMetadata } from "../schemas/workspace.js";
import { WORKFLOW_PATH } from "./layout.js";
import { detectProvider } from "./metadata.js";

export interface SchemaCheckResult {
  valid: boolean;
  path: string;
  checked: string[];
  issues: string[];
}

async function readOptional(path: string): Promise<string | undefined> {
  try {
    return await readFile(path, "utf-8");
  } catch (error) {
    if (isNotFound(error)) return undefined;
    throw error;
  }
}

function checkJson(relativePath: string, raw: string, schema: ZodType, issues: string[]): void {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    issues.push(`${relativePath}: invalid JSON (${errorMessage(error)})`);
    return;
  }
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      issues.push(`${relativePath}: ${where}: ${issue.message}`);
    }
  }
}

function checkWorkflow(raw: string, issues: string[]): void {
  let doc: unknown;
  try {
    doc = parseYaml(raw);
  } catch (error) {
    issues.push(`${WORKFLOW_PATH}: invalid YAML (${errorMessage(error)})`);
    return;
  }
  const jobs = typeof doc === "object" && doc !== null && "jobs" in doc ? doc.jobs : undefined;
  if (typeof jobs !== "object" || jobs === null || Object.keys(jobs).length === 0) {
    issues.push(`${WORKFLOW_PATH}: missing 'jobs' mapping`);
  }
}

/**
 * Check workspace.json, settings.json, mcp.json and the CI workflow. Missing
 * workspace.json is an issue; the other files are checked when present.
 */
export async function checkWorkspaceSchemas(
  path: string,
  opts: { output?: Output } = {},
): Promise<SchemaCheckResult> {
  const output = opts.output ?? new Output();
  const root = resolve(path);
  const provider = await detectProvider(root);
  const cfg = provider.configDirname;
  const issues: string[] = [];
  const checked: string[] = [];

  const targets: Array<[string, ZodType | "workflow", boolean]> = [
    [`${cfg}/workspace.json`, WorkspaceMetadata, true],
    [`${cfg}/settings.json`, WorkspaceSettings, false],
    [`${cfg}/mcp.json`, McpConfig, false],
    [WORKFLOW_PATH, "workflow", false],
  ];

  for (const [relativePath, schema, required] of targets) {
    const raw = await readOptional(join(root, relativePath));
    if (raw === undefined) {
      if (required) issues.push(`${relativePath}: file not found`);
      continue;
    }
    checked.push(relativePath);
    if (schema === "workflow") checkWorkflow(raw, issues);
    else checkJson(relativePath, raw, schema, issues);
  }

  if (issues.length > 0) {
    for (const issue of issues) output.warning(issue);
    throw new ValidationError(`Schema validation failed: ${issues.length} issue(s) found`, { path: root, issues });
  }
  output.success(`Schemas valid: ${checked.join(", ")}`);
  return { valid: true, path: root, checked, issues };
}
