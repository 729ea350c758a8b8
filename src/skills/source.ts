/**
 * Skill source resolution: `https://` URLs and GitHub shorthand.
 */

import { ValidationError } from "../errors/index.js";

export const GITHUB_RAW_HOST = "raw.githubusercontent.com";
export const DEFAULT_GITHUB_REF = "main";

const STEM_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export interface SkillSource {
  url: string;
  /** File name without `.md`. */
  stem: string;
}

function stemOf(pathname: string, source: string): string {
  const last = pathname.split("/").filter(Boolean).pop() ?? "";
  const stem = decodeURIComponent(last).replace(/\.md$/i, "");
  if (!STEM_PATTERN.test(stem)) {
    throw new ValidationError(`Cannot derive a skill file name from '${source}'`);
  }
  return stem;
}

/**
 * Resolve a source to a fetchable URL.
 *
 * Accepts `https://…` or `owner/repo[@ref]/path/to/skill.md`, which maps to
 * `https://raw.githubusercontent.com/owner/repo/<ref>/path/to/skill.md`.
 */
export function resolveSkillSource(source: string): SkillSource {
  if (/^[a-z][a-z0-9+.-]*:/i.test(source)) {
    let url: URL;
    try {
      url = new URL(source);
    } catch {
      throw new ValidationError(`Invalid skill URL: ${source}`);
    }
    if (url.protocol !== "https:") {
      throw new ValidationError(`Only https:// skill sources are supported: ${source}`);
    }
    return { url: url.toString(), stem: stemOf(url.pathname, source) };
  }

  const parts = source.split("/").filter(Boolean);
  const [owner, repoRef, ...rest] = parts;
  if (!owner || !repoRef || rest.length === 0 || parts.includes("..")) {
    throw new ValidationError(
      `Invalid skill source '${source}'. Use 'owner/repo/path/to/skill.md', 'owner/repo@ref/path' or an https:// URL.`,
    );
  }
  const [repo = "", ref = DEFAULT_GITHUB_REF] = repoRef.split("@", 2);
  if (!repo || !ref) {
    throw new ValidationError(`Invalid repository in skill source '${source}'`);
  }
  const path = rest.join("/");
  return {
    url: `https://${GITHUB_RAW_HOST}/${owner}/${repo}/${ref}/${path}`,
    stem: stemOf(path, source),
  };
}
