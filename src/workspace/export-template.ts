/**
 * Export a workspace's sources and docs as a reusable creation template.
 */

import { mkdir, readFile, stat } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import writeFileAtomic from "write-file-atomic";
import { WorkspaceError } from "../errors/index.js";
import { Output } from "../output/output.js";
import { TemplateDefinition } from "../schemas/template.js";
import { directoryExists, fileExists, listFiles } from "./fs-utils.js";
import { readWorkspaceMetadata } from "./metadata.js";
import { validateTemplateName } from "./validators.js";

/** Workspace directories whose files are exported. */
export const EXPORT_ROOTS = ["src", "tests", "docs", ".agent"] as const;

export const MAX_EXPORT_FILE_BYTES = 256 * 1024;

export interface ExportTemplateOptions {
  templateName: string;
  /** Output directory (default: the workspace's parent directory). */
  outputDir?: string;
  description?: string;
  force?: boolean;
  output?: Output;
}

export interface ExportTemplateResult {
  success: boolean;
  path: string;
  templateName: string;
  files: string[];
  dependencies: string[];
  skipped: string[];
}

const decoder = new TextDecoder("utf-8", { fatal: true });

function isExcluded(relativePath: string): boolean {
  return relativePath.endsWith("/.gitkeep") || relativePath.split("/").includes("__pycache__");
}

/** Requirement lines without blanks or comments. */
export function parseRequirements(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}

export async function exportTemplate(path: string, opts: ExportTemplateOptions): Promise<ExportTemplateResult> {
  const output = opts.output ?? new Output();
  validateTemplateName(opts.templateName);
  const root = resolve(path);
  const workspace = await readWorkspaceMetadata(root);

  const outputDir = resolve(opts.outputDir ?? dirname(root));
  const target = join(outputDir, `${opts.templateName}.json`);
  if (!opts.force && (await fileExists(target))) {
    throw new WorkspaceError(`Template already exists: ${target}. Use --force to overwrite.`);
  }

  const files: Record<string, string> = {};
  const skipped: string[] = [];
  for (const dir of EXPORT_ROOTS) {
    if (!(await directoryExists(join(root, dir)))) continue;
    for (const file of await listFiles(join(root, dir))) {
      const relativePath = `${dir}/${file}`;
      if (isExcluded(relativePath)) continue;
      const absolute = join(root, relativePath);
      if ((await stat(absolute)).size > MAX_EXPORT_FILE_BYTES) {
        skipped.push(relativePath);
        continue;
      }
      try {
        files[relativePath] = decoder.decode(await readFile(absolute));
      } catch (error) {
        if (!(error instanceof TypeError)) throw error;
        skipped.push(relativePath);
      }
    }
  }

  const requirementsPath = join(root, "requirements.txt");
  const dependencies = (await fileExists(requirementsPath))
    ? parseRequirements(await readFile(requirementsPath, "utf-8"))
    : [];

  const definition = TemplateDefinition.parse({
    description: opts.description ?? `Exported from ${String(workspace.metadata["name"] ?? root)}`,
    tier: workspace.tier,
    dependencies,
    files,
  });

  await mkdir(outputDir, { recursive: true });
  await writeFileAtomic(target, `${JSON.stringify(definition, null, 2)}\n`);
  for (const file of skipped) output.detail(`Skipped (binary or too large): ${file}`);
  output.success(`Exported template '${opts.templateName}' to ${target} (${Object.keys(files).length} file(s))`);

  return {
    success: true,
    path: target,
    templateName: opts.templateName,
    files: Object.keys(files).sort(),
    dependencies,
    skipped,
  };
}
