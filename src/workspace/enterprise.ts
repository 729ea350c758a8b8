/**
 * Data-domain inference for Enterprise workspaces.
 */

const DOMAIN_KEYWORDS: ReadonlyArray<readonly [string, readonly string[]]> = [
  ["ml", ["ml", "machine-learning", "ai", "model", "training"]],
  ["data", ["data", "etl", "pipeline", "warehouse"]],
  ["api", ["api", "service", "gateway", "rest", "graphql"]],
  ["analytics", ["analytics", "reporting", "dashboard", "bi"]],
];

export const DEFAULT_DOMAIN = "core";

/**
 * Explicit template domain wins; otherwise the first domain with a keyword
 * contained in the lowercased name, else "core".
 */
export function inferEnterpriseDomain(name: string, explicitDomain?: string): string {
  if (explicitDomain) return explicitDomain;
  const lower = name.toLowerCase();
  for (const [domain, keywords] of DOMAIN_KEYWORDS) {
    if (keywords.some((keyword) => lower.includes(keyword))) return domain;
  }
  return DEFAULT_DOMAIN;
}
