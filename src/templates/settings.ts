/**
 * `<configDir>/settings.json`, `<configDir>/mcp.json` and `.vscode/settings.json`.
 */

import type { Tier } from "../config/constants.js";
import type { WorkspaceProvider } from "../providers/types.js";
import type { WorkspacePermissions } from "../schemas/settings.js";

function permissionsFor(tier: Tier): WorkspacePermissions {
  const edit = ["src/**", "tests/**", "docs/**", "scratchpad/**", "data/**"];
  if (tier === "3") edit.push("domains/**", "outputs/**", "inputs/**");
  return {
    filesystem: {
      read: ["**/*"],
      edit,
      ignore: [".env", ".env.*", "**/*.key", "**/*.pem", "secrets/**", ".snapshots/**"],
    },
    terminal: {
      execution_policy: tier === "1" ? "safe-only" : "hybrid",
      allowed_commands: ["make", "python3", "pytest", "ruff", "git status", "git diff", "git log"],
    },
  };
}

export function getWorkspaceSettings(
  tier: Tier,
  provider: WorkspaceProvider,
  parentWorkspace?: string,
): Record<string, unknown> {
  return {
    permissions: permissionsFor(tier),
    behavior: { auto_context_refresh: true },
    ...provider.getSettings(tier),
    ...(parentWorkspace ? { parent_workspace: parentWorkspace } : {}),
  };
}

export function getSettingsJson(tier: Tier, provider: WorkspaceProvider, parentWorkspace?: string): string {
  return `${JSON.stringify(getWorkspaceSettings(tier, provider, parentWorkspace), null, 2)}\n`;
}

export function getMcpJson(provider: WorkspaceProvider): string {
  return `${JSON.stringify(provider.getMcpConfig(), null, 2)}\n`;
}

export function getVscodeSettings(tier: Tier): string {
  const settings: Record<string, unknown> = {
    "python.defaultInterpreterPath": ".venv/bin/python",
    "editor.formatOnSave": true,
    "[python]": { "editor.defaultFormatter": "charliermarsh.ruff" },
    "files.exclude": { "**/__pycache__": true, ".snapshots": true },
  };
  if (tier !== "1") {
    settings["python.testing.pytestEnabled"] = true;
    settings["python.testing.pytestArgs"] = ["tests"];
  }
  return `${JSON.stringify(settings, null, 2)}\n`;
}
