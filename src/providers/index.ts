/**
 * Provider registry.
 */

import { ValidationError } from "../errors/index.js";
import { PROVIDER_NAMES, type ProviderName } from "../schemas/workspace.js";
import { ClaudeProvider } from "./claude.js";
import { CodexProvider } from "./codex.js";
import { GeminiProvider } from "./gemini.js";
import type { WorkspaceProvider } from "./types.js";

export type { WorkspaceProvider } from "./types.js";
export { BaseProvider } from "./base.js";
export { GeminiProvider } from "./gemini.js";
export { ClaudeProvider } from "./claude.js";
export { CodexProvider } from "./codex.js";

export const DEFAULT_PROVIDER: ProviderName = "gemini";

const PROVIDERS: Record<ProviderName, WorkspaceProvider> = {
  gemini: new GeminiProvider(),
  claude: new ClaudeProvider(),
  codex: new CodexProvider(),
};

export function isProviderName(value: unknown): value is ProviderName {
  return PROVIDER_NAMES.some((name) => name === value);
}

/**
 * Resolve a provider by name; throws on unknown names.
 */
export function getProvider(name: string = DEFAULT_PROVIDER): WorkspaceProvider {
  if (!isProviderName(name)) {
    throw new ValidationError(`Unknown provider '${name}'. Available: ${PROVIDER_NAMES.join(", ")}`);
  }
  return PROVIDERS[name];
}

export function listProviders(): WorkspaceProvider[] {
  return PROVIDER_NAMES.map((name) => PROVIDERS[name]);
}
