/**
 * Provider settings (`<configDir>/settings.json`) and MCP server map
 * (`<configDir>/mcp.json`).
 */

import { z } from "zod";

export const ExecutionPolicy = z.enum(["safe-only", "hybrid", "unrestricted"]);
export type ExecutionPolicy = z.infer<typeof ExecutionPolicy>;

export const WorkspacePermissions = z.object({
  filesystem: z.object({
    read: z.array(z.string()),
    edit: z.array(z.string()),
    ignore: z.array(z.string()),
  }),
  terminal: z.object({
    execution_policy: ExecutionPolicy,
    allowed_commands: z.array(z.string()),
  }),
});
export type WorkspacePermissions = z.infer<typeof WorkspacePermissions>;

export const WorkspaceSettings = z
  .object({
    permissions: WorkspacePermissions,
    behavior: z
      .object({
        auto_context_refresh: z.boolean().default(true),
      })
      .passthrough(),
    parent_workspace: z.string().optional(),
  })
  .passthrough();
export type WorkspaceSettings = z.infer<typeof WorkspaceSettings>;

export const McpServer = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  env: z.record(z.string()).optional(),
});
export type McpServer = z.infer<typeof McpServer>;

export const McpConfig = z.object({
  mcpServers: z.record(McpServer),
});
export type McpConfig = z.infer<typeof McpConfig>;
