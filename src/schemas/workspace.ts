/**
 * Workspace metadata schema for `<configDir>/workspace.json`.
 */

import { z } from "zod";
import { TIER_IDS } from "../config/constants.js";

export const PROVIDER_NAMES = ["gemini", "claude", "codex"] as const;

export const ProviderName = z.enum(PROVIDER_NAMES);
export type ProviderName = z.infer<typeof ProviderName>;

export const TierId = z.enum(TIER_IDS);

export const WorkspaceStatus = z.enum(["active", "archived"]);
export type WorkspaceStatus = z.infer<typeof WorkspaceStatus>;

/** Unknown keys survive a read-modify-write cycle. */
export const WorkspaceMetadata = z
  .object({
    version: z.string().regex(/^\d{4}\.\d+$/, "must look like YYYY.N"),
    tier: TierId,
    name: z.string().regex(/^[a-zA-Z][a-zA-Z0-9_-]*$/),
    provider: ProviderName.default("gemini"),
    created: z.string().datetime({ offset: true }),
    standard: z.string(),
    parent_workspace: z.string().optional(),
    status: WorkspaceStatus.optional(),
    upgraded: z.string().datetime({ offset: true }).optional(),
    previous_tier: TierId.optional(),
    scripts_updated: z.string().datetime({ offset: true }).optional(),
  })
  .passthrough();
export type WorkspaceMetadata = z.infer<typeof WorkspaceMetadata>;
