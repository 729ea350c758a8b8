/**
 * Static template assets shipped in the package's `templates/` directory.
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { join } from "node:path";

/** `templates/` sits two levels above both `src/templates/` and `dist/templates/`. */
export const ASSETS_DIR = fileURLToPath(new URL("../../templates/", import.meta.url));

const cache = new Map<string, string>();

/**
 * Read an asset by its path relative to `templates/`. Contents are cached.
 */
export function readAsset(relativePath: string): string {
  const cached = cache.get(relativePath);
  if (cached !== undefined) return cached;
  const content = readFileSync(join(ASSETS_DIR, relativePath), "utf-8");
  cache.set(relativePath, content);
  return content;
}

/**
 * Substitute `{{KEY}}` placeholders. Throws on a placeholder with no value so
 * a missing variable never reaches a generated file.
 */
export function renderTemplate(template: string, vars: Record<string, string>): string {
  return template.replace(/\{\{([A-Z_]+)\}\}/g, (match, key: string) => {
    const value = vars[key];
    if (value === undefined) {
      throw new Error(`Template variable ${match} has no value`);
    }
    return value;
  });
}

export function renderAsset(relativePath: string, vars: Record<string, string>): string {
  return renderTemplate(readAsset(relativePath), vars);
}
