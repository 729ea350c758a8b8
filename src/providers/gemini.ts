import type { Tier } from "../config/constants.js";
import { BaseProvider } from "./base.js";

export class GeminiProvider extends BaseProvider {
  readonly name = "gemini" as const;
  readonly displayName = "Gemini";
  readonly configFilename = "GEMINI.md";
  readonly configDirname = ".gemini";

  override getSettings(tier: Tier): Record<string, unknown> {
    const settings: Record<string, unknown> = {
      codeExecution: { enabled: true },
      contextWindow: { strategy: "auto" },
    };
    if (tier === "3") {
      settings["multiAgent"] = { enabled: true };
    }
    return settings;
  }
}
