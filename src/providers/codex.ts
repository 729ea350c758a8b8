import type { Tier } from "../config/constants.js";
import { BaseProvider } from "./base.js";

export class CodexProvider extends BaseProvider {
  readonly name = "codex" as const;
  readonly displayName = "Codex";
  readonly configFilename = "AGENTS.md";
  readonly configDirname = ".codex";

  override getSettings(tier: Tier): Record<string, unknown> {
    return {
      approval_policy: tier === "1" ? "on-request" : "on-failure",
      sandbox_mode: "workspace-write",
    };
  }
}
