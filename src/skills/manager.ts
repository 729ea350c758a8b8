/**
 * Install, list and remove markdown skills and workflows under `.agent/`.
 */

import { mkdir, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import matter from "gray-matter";
import { ValidationError, WorkspaceError, errorMessage, isErrnoException, isNotFound } from "../errors/index.js";
import { Output } from "../output/output.js";
import { readWorkspaceMetadata } from "../workspace/metadata.js";
import { resolveSkillSource } from "./source.js";

export type SkillKind = "skill" | "workflow";

export const SKILL_DIRS: Record<SkillKind, string> = {
  skill: ".agent/skills",
  workflow: ".agent/workflows",
};

/** The subset of the fetch Response used here. */
export interface FetchedResource {
  ok: boolean;
  status: number;
  statusText: string;
  text(): Promise<string>;
}

export type FetchFn = (url: string) => Promise<FetchedResource>;

export interface InstallSkillOptions {
  kind?: SkillKind;
  force?: boolean;
  fetch?: FetchFn;
  output?: Output;
}

export interface InstalledSkill {
  kind: SkillKind;
  name: string;
  url: string;
  path: string;
}

export interface SkillEntry {
  kind: SkillKind;
  name: string;
  title: string;
}

const NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

/**
 * Display title: first `# ` heading, else front-matter `name`, else the stem.
 */
export function skillTitle(content: string, stem: string): string {
  let body = content;
  let name: unknown;
  try {
    const parsed = matter(content);
    body = parsed.content;
    const data: Record<string, unknown> = parsed.data;
    name = data["name"];
  } catch (error) {
    // Malformed front matter: fall back to scanning the raw text.
    if (!(error instanceof Error)) throw error;
  }
  const heading = body.split(/\r?\n/).find((line) => line.startsWith("# "));
  if (heading) return heading.slice(2).trim();
  if (typeof name === "string" && name.trim()) return name.trim();
  return stem;
}

export async function installSkill(
  workspacePath: string,
  source: string,
  opts: InstallSkillOptions = {},
): Promise<InstalledSkill> {
  const output = opts.output ?? new Output();
  const kind = opts.kind ?? "skill";
  const root = resolve(workspacePath);
  await readWorkspaceMetadata(root);
  const { url, stem } = resolveSkillSource(source);
  const fetchFn: FetchFn = opts.fetch ?? ((target) => fetch(target));

  output.info(`Fetching ${kind} from ${url}`);
  let response: FetchedResource;
  try {
    response = await fetchFn(url);
  } catch (error) {
    throw new WorkspaceError(`Failed to fetch ${url}: ${errorMessage(error)}`, { url });
  }
  if (!response.ok) {
    throw new WorkspaceError(`Failed to fetch ${url}: HTTP ${response.status} ${response.statusText}`.trimEnd(), {
      url,
      status: response.status,
    });
  }
  const content = await response.text();

  const dir = join(root, SKILL_DIRS[kind]);
  const target = join(dir, `${stem}.md`);
  await mkdir(dir, { recursive: true });
  try {
    await writeFile(target, content, { encoding: "utf-8", flag: opts.force ? "w" : "wx" });
  } catch (error) {
    if (isErrnoException(error) && error.code === "EEXIST") {
      throw new WorkspaceError(`${SKILL_DIRS[kind]}/${stem}.md already exists. Use --force to overwrite.`);
    }
    throw error;
  }

  output.success(`Installed ${kind} '${stem}' to ${SKILL_DIRS[kind]}/${stem}.md`);
  return { kind, name: stem, url, path: target };
}

async function markdownFiles(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && entry.name.endsWith(".md"))
      .map((entry) => entry.name)
      .sort();
  } catch (error) {
    if (isNotFound(error)) return [];
    throw error;
  }
}

/** Skills, then workflows, each sorted by file name. */
export async function listSkills(workspacePath: string): Promise<SkillEntry[]> {
  const root = resolve(workspacePath);
  const entries: SkillEntry[] = [];
  for (const kind of ["skill", "workflow"] as const) {
    const dir = join(root, SKILL_DIRS[kind]);
    for (const file of await markdownFiles(dir)) {
      const name = file.slice(0, -".md".length);
      const content = await readFile(join(dir, file), "utf-8");
      entries.push({ kind, name, title: skillTitle(content, name) });
    }
  }
  return entries;
}

export async function removeSkill(
  workspacePath: string,
  name: string,
  kind: SkillKind = "skill",
  opts: { output?: Output } = {},
): Promise<string> {
  const output = opts.output ?? new Output();
  const stem = name.replace(/\.md$/i, "");
  if (!NAME_PATTERN.test(stem)) {
    throw new ValidationError(`Invalid ${kind} name: ${name}`);
  }
  const relativePath = `${SKILL_DIRS[kind]}/${stem}.md`;
  const target = join(resolve(workspacePath), relativePath);
  try {
    await rm(target);
  } catch (error) {
    if (isNotFound(error)) throw new WorkspaceError(`${kind === "skill" ? "Skill" : "Workflow"} not found: ${relativePath}`);
    throw error;
  }
  output.success(`Removed ${relativePath}`);
  return target;
}
