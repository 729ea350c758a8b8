/**
 * Markdown docs and small config files generated at creation time.
 */

import { TIERS, type Tier } from "../config/constants.js";
import type { WorkspaceProvider } from "../providers/types.js";

export function getRoadmap(projectName: string): string {
  return [
    `# ${projectName} Roadmap`,
    "",
    "## Now",
    "- [ ] Define the first milestone",
    "",
    "## Next",
    "- [ ] ",
    "",
    "## Done",
    "",
  ].join("\n");
}

export function getGettingStarted(tier: Tier, projectName: string, provider: WorkspaceProvider): string {
  const lines = [
    `# Getting Started with ${projectName}`,
    "",
    `This is a **${TIERS[tier].name}** workspace (${TIERS[tier].description.toLowerCase()}).`,
    "",
    "## Daily loop",
    "",
    "1. `make session-start msg=\"what you are doing\"`",
    "2. Work in `src/`, keep scratch files in `scratchpad/`.",
    "3. `make session-end msg=\"what you did\"`",
    "",
    "## Where things live",
    "",
    `* \`${provider.configFilename}\`: the rules your assistant follows.`,
    `* \`${provider.configDirname}/workspace.json\`: workspace metadata (tier, version).`,
    "* `.agent/skills/` and `.agent/workflows/`: reusable instructions.",
    "* `docs/roadmap.md`: update it every session.",
  ];
  if (tier === "1") {
    lines.push("", "Outgrowing Lite? Run `tierforge upgrade .` to move to Standard.");
  }
  if (tier === "3") {
    lines.push(
      "",
      "## Multi-agent work",
      "",
      "* Each directory under `domains/` has its own constitution.",
      "* Publish interfaces to `outputs/contracts/`.",
      "* Run `make shift-report` before handing off.",
    );
  }
  lines.push("");
  return lines.join("\n");
}

/** Files exported by `make context`, one per line. */
export function getCoreManifest(tier: Tier, provider: WorkspaceProvider): string {
  const files = [provider.configFilename, "docs/roadmap.md", "README.md"];
  if (tier !== "1") files.push("pyproject.toml");
  return `${files.join("\n")}\n`;
}

export function getPrecommitConfig(): string {
  return [
    "# Install: pip install pre-commit && pre-commit install",
    "repos:",
    "  - repo: https://github.com/astral-sh/ruff-pre-commit",
    "    rev: v0.8.0",
    "    hooks:",
    "      - id: ruff",
    "        args: [--fix]",
    "      - id: ruff-format",
    "  - repo: https://github.com/pre-commit/pre-commit-hooks",
    "    rev: v5.0.0",
    "    hooks:",
    "      - id: trailing-whitespace",
    "      - id: end-of-file-fixer",
    "      - id: check-yaml",
    "      - id: check-added-large-files",
    "",
  ].join("\n");
}
