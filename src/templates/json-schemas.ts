/**
 * JSON Schemas written into `<configDir>/schemas/` for editor autocomplete.
 */

import { BOOTSTRAP_CONFIG_FILENAME, STANDARD_NAME, TIER_IDS } from "../config/constants.js";
import type { WorkspaceProvider } from "../providers/types.js";
import { PROVIDER_NAMES } from "../schemas/workspace.js";

const DRAFT = "http://json-schema.org/draft-07/schema#";

const stringArray = { type: "array", items: { type: "string" } };

function serialize(schema: Record<string, unknown>): string {
  return `${JSON.stringify(schema, null, 2)}\n`;
}

export function getWorkspaceSchema(provider: WorkspaceProvider): string {
  return serialize({
    $schema: DRAFT,
    title: `${provider.displayName} Workspace Metadata`,
    type: "object",
    required: ["version", "tier", "name", "created", "standard"],
    properties: {
      version: { type: "string", pattern: "^\\d{4}\\.\\d+$" },
      tier: { type: "string", enum: [...TIER_IDS], description: "1=Lite, 2=Standard, 3=Enterprise" },
      name: { type: "string", pattern: "^[a-zA-Z][a-zA-Z0-9_-]*$" },
      provider: { type: "string", enum: [...PROVIDER_NAMES] },
      created: { type: "string", format: "date-time" },
      standard: { type: "string", const: STANDARD_NAME },
      parent_workspace: { type: "string", description: "Path to parent workspace (monorepos)" },
      status: { type: "string", enum: ["active", "archived"], default: "active" },
      upgraded: { type: "string", format: "date-time" },
      previous_tier: { type: "string", enum: ["1", "2"] },
      scripts_updated: { type: "string", format: "date-time" },
    },
  });
}

export function getSettingsSchema(provider: WorkspaceProvider): string {
  return serialize({
    $schema: DRAFT,
    title: `${provider.displayName} Workspace Settings`,
    type: "object",
    required: ["permissions"],
    properties: {
      permissions: {
        type: "object",
        properties: {
          filesystem: {
            type: "object",
            properties: { read: stringArray, edit: stringArray, ignore: stringArray },
          },
          terminal: {
            type: "object",
            properties: {
              execution_policy: { type: "string", enum: ["safe-only", "hybrid", "unrestricted"] },
              allowed_commands: stringArray,
            },
          },
        },
      },
      behavior: {
        type: "object",
        properties: { auto_context_refresh: { type: "boolean", default: true } },
      },
      parent_workspace: { type: "string" },
    },
  });
}

export function getBootstrapConfigSchema(): string {
  return serialize({
    $schema: DRAFT,
    title: `Team defaults (${BOOTSTRAP_CONFIG_FILENAME})`,
    type: "object",
    additionalProperties: false,
    properties: {
      default_tier: { type: "string", enum: [...TIER_IDS] },
      shared_agent_path: { type: "string" },
      templates_path: { type: "string" },
      default_git: { type: "boolean", default: false },
      python_version: { type: "string", pattern: "^3\\.\\d+$", default: "3.11" },
      provider: { type: "string", enum: [...PROVIDER_NAMES], default: "gemini" },
    },
  });
}

export function getJsonSchemaFiles(provider: WorkspaceProvider): Record<string, string> {
  const dir = `${provider.configDirname}/schemas`;
  return {
    [`${dir}/workspace.schema.json`]: getWorkspaceSchema(provider),
    [`${dir}/settings.schema.json`]: getSettingsSchema(provider),
    [`${dir}/bootstrap-config.schema.json`]: getBootstrapConfigSchema(),
  };
}
