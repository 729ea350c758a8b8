import type { Tier } from "../config/constants.js";
import { BaseProvider } from "./base.js";

export class ClaudeProvider extends BaseProvider {
  readonly name = "claude" as const;
  readonly displayName = "Claude";
  readonly configFilename = "CLAUDE.md";
  readonly configDirname = ".claude";

  override getSettings(tier: Tier): Record<string, unknown> {
    return {
      includeCoAuthoredBy: false,
      env: { PYTHONDONTWRITEBYTECODE: "1" },
      ...(tier === "3" ? { subagents: { enabled: true } } : {}),
    };
  }

  /** Slash commands mirroring the Makefile session targets. */
  override getAdditionalFiles(_tier: Tier, _projectName: string): Record<string, string> {
    return {
      ".claude/commands/session-start.md": "Run `make session-start` and summarize `docs/roadmap.md`.\n",
      ".claude/commands/session-end.md": "Run `make session-end` with a one-line summary of this session.\n",
    };
  }

  override getAdditionalDirectories(_tier: Tier): string[] {
    return [".claude/commands"];
  }

  protected override constitutionAppendix(_tier: Tier): string[] {
    return ["## Commands", "* `/session-start` and `/session-end` wrap the Makefile session targets."];
  }
}
