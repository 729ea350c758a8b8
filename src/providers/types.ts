import type { Tier } from "../config/constants.js";
import type { McpConfig } from "../schemas/settings.js";
import type { ProviderName } from "../schemas/workspace.js";

/**
 * A target coding assistant. Decides the constitution filename, the config
 * directory and the provider-specific settings of a workspace.
 */
export interface WorkspaceProvider {
  readonly name: ProviderName;
  readonly displayName: string;
  /** Constitution file at the workspace root, e.g. `GEMINI.md`. */
  readonly configFilename: string;
  /** Metadata directory at the workspace root, e.g. `.gemini`. */
  readonly configDirname: string;

  getConfigTemplate(tier: Tier, packageName: string): string;
  /** Constitution placed in each enterprise domain directory. */
  getDomainConfigTemplate(domain: string): string;
  getReadmeTemplate(tier: Tier, projectName: string): string;
  getMcpConfig(): McpConfig;
  /** Provider-specific keys merged into `settings.json`. */
  getSettings(tier: Tier): Record<string, unknown>;
  getAdditionalFiles(tier: Tier, projectName: string): Record<string, string>;
  getAdditionalDirectories(tier: Tier): string[];
}
