/**
 * Shared constitution text for every provider.
 */

import { VERSION, type Tier } from "../config/constants.js";
import type { McpConfig } from "../schemas/settings.js";
import type { ProviderName } from "../schemas/workspace.js";
import type { WorkspaceProvider } from "./types.js";

interface Edition {
  edition: string;
  philosophy: string;
  role: string;
}

const EDITIONS: Record<Tier, Edition> = {
  "1": { edition: "Lite", philosophy: "Reliable Automation", role: "Automation Specialist" },
  "2": { edition: "Standard", philosophy: "The Modular Monolith", role: "Lead Software Engineer" },
  "3": { edition: "Enterprise", philosophy: "Headless Organization", role: "CTO / Architect" },
};

export abstract class BaseProvider implements WorkspaceProvider {
  abstract readonly name: ProviderName;
  abstract readonly displayName: string;
  abstract readonly configFilename: string;
  abstract readonly configDirname: string;

  getConfigTemplate(tier: Tier, packageName: string): string {
    const { edition, philosophy, role } = EDITIONS[tier];
    const lines = [
      `# ${this.displayName} Native Workspace (${edition} Edition)`,
      `**Philosophy:** "${philosophy}"`,
      `**Role:** ${role}`,
      `**Version:** ${VERSION}`,
      "",
      "## 1. The Cognitive Laws",
      "1.  **Skill Check:** Before asking \"How?\", check `.agent/skills/`.",
      "2.  **Workflow Adherence:** Follow `.agent/workflows/` for complex tasks.",
      "3.  **Pattern Matching:** Code must mimic `.agent/patterns/`.",
      "4.  **Evolution:** Use the \"Gardener Protocol\" to modify rules.",
      "",
      "## 2. The Laws of Physics",
      "1.  **Hygiene:** Write temp files to `scratchpad/`.",
      "2.  **Safety:** **NEVER** print secrets to stdout.",
      "3.  **Continuity:** Update `docs/roadmap.md` every session.",
      "4.  **Interface:** Use `Makefile` targets. Do not run raw shell commands.",
      "5.  **Sessions:** Start with `make session-start`, end with `make session-end`.",
      "",
      "## 3. Architecture",
      ...this.architecture(tier, packageName),
    ];

    if (tier === "3") {
      lines.push(
        "",
        "## 4. Multi-Agent Protocol",
        "* Sub-Agents do NOT inherit Root Context.",
        "* Use `make shift-report` for handoffs.",
        "* Run `make snapshot` before major changes.",
      );
    }

    const extra = this.constitutionAppendix(tier);
    if (extra.length > 0) lines.push("", ...extra);

    return `${lines.join("\n")}\n`;
  }

  getDomainConfigTemplate(domain: string): string {
    return [
      `# ${domain[0]?.toUpperCase() ?? ""}${domain.slice(1)} Domain`,
      "",
      "Sub-agent constitution. Root context is NOT inherited.",
      "",
      "* **Scope:** Only files under this directory.",
      "* **Contracts:** Publish interfaces to `outputs/contracts/`.",
      "* **Handoff:** Finish with `make shift-report`.",
      "",
    ].join("\n");
  }

  getReadmeTemplate(tier: Tier, projectName: string): string {
    return [
      `# ${projectName}`,
      "",
      `Generated ${this.displayName} Workspace (Tier ${tier}: ${EDITIONS[tier].edition})`,
      "",
      "## Quick start",
      "",
      "```bash",
      "make install",
      "make session-start msg=\"first session\"",
      "make help",
      "```",
      "",
      `See \`${this.configFilename}\` for the workspace rules and \`docs/GETTING_STARTED.md\` for a tour.`,
      "",
    ].join("\n");
  }

  getMcpConfig(): McpConfig {
    return { mcpServers: {} };
  }

  getSettings(_tier: Tier): Record<string, unknown> {
    return {};
  }

  getAdditionalFiles(_tier: Tier, _projectName: string): Record<string, string> {
    return {};
  }

  getAdditionalDirectories(_tier: Tier): string[] {
    return [];
  }

  /** Provider-specific lines appended to the constitution. */
  protected constitutionAppendix(_tier: Tier): string[] {
    return [];
  }

  private architecture(tier: Tier, packageName: string): string[] {
    switch (tier) {
      case "1":
        return ["* **Input:** `data/inputs/`", "* **Logic:** `src/main.py`", "* **Output:** `logs/run.log`"];
      case "2":
        return [
          `* **Modules:** \`src/${packageName}/\``,
          "* **Tests:** `tests/unit/`",
          "* **Context:** Shared Global Context.",
        ];
      case "3":
        return [
          "* **Domains:** `domains/` (Strict Isolation)",
          "* **Contracts:** `outputs/contracts/`",
          "* **Evals:** `tests/evals/`",
        ];
    }
  }
}
