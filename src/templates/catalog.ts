/**
 * Template catalog: built-in bundles from `templates/catalog.json` plus custom
 * `*.json` bundles from the configured templates directory.
 */

import { readdir, readFile } from "node:fs/promises";
import { basename, join } from "node:path";
import { TEMPLATE_NAME_PATTERN } from "../config/constants.js";
import { ValidationError, errorMessage, isNotFound } from "../errors/index.js";
import { TemplateCatalog, TemplateDefinition } from "../schemas/template.js";
import { readAsset } from "./assets.js";

export interface CatalogEntry {
  name: string;
  source: "builtin" | "custom";
  template: TemplateDefinition;
}

export interface LoadedCatalog {
  entries: CatalogEntry[];
  warnings: string[];
}

export function loadBuiltinTemplates(): CatalogEntry[] {
  const catalog = TemplateCatalog.parse(JSON.parse(readAsset("catalog.json")));
  return Object.entries(catalog).map(([name, template]): CatalogEntry => ({ name, source: "builtin", template }));
}

async function loadCustomTemplates(dir: string, warnings: string[]): Promise<CatalogEntry[]> {
  let files: string[];
  try {
    files = (await readdir(dir)).filter((f) => f.endsWith(".json")).sort();
  } catch (error) {
    if (isNotFound(error)) {
      warnings.push(`Templates directory not found: ${dir}`);
      return [];
    }
    throw error;
  }

  const entries: CatalogEntry[] = [];
  for (const file of files) {
    const name = basename(file, ".json");
    if (!TEMPLATE_NAME_PATTERN.test(name)) {
      warnings.push(`Skipping template '${file}': name must match ${TEMPLATE_NAME_PATTERN.source}`);
      continue;
    }
    try {
      const parsed = TemplateDefinition.safeParse(JSON.parse(await readFile(join(dir, file), "utf-8")));
      if (!parsed.success) {
        warnings.push(`Skipping template '${file}': ${parsed.error.issues[0]?.message ?? "invalid"}`);
        continue;
      }
      entries.push({ name, source: "custom", template: parsed.data });
    } catch (error) {
      warnings.push(`Skipping template '${file}': ${errorMessage(error)}`);
    }
  }
  return entries;
}

/**
 * Built-in and custom templates sorted by name; a custom template replaces a
 * built-in one with the same name.
 */
export async function loadTemplateCatalog(templatesPath?: string): Promise<LoadedCatalog> {
  const warnings: string[] = [];
  const byName = new Map<string, CatalogEntry>();
  for (const entry of loadBuiltinTemplates()) byName.set(entry.name, entry);
  if (templatesPath) {
    for (const entry of await loadCustomTemplates(templatesPath, warnings)) byName.set(entry.name, entry);
  }
  const entries = [...byName.values()].sort((a, b) => a.name.localeCompare(b.name));
  return { entries, warnings };
}

export async function resolveTemplate(name: string, templatesPath?: string): Promise<CatalogEntry> {
  const { entries } = await loadTemplateCatalog(templatesPath);
  const entry = entries.find((e) => e.name === name);
  if (!entry) {
    const available = entries.map((e) => e.name).join(", ") || "none";
    throw new ValidationError(`Unknown template '${name}'. Available templates: ${available}`);
  }
  return entry;
}
