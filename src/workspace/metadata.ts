/**
 * Read and write `<configDir>/workspace.json`.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import writeFileAtomic from "write-file-atomic";
import { STANDARD_NAME, VERSION, isTier, type Tier } from "../config/constants.js";
import { ConfigurationError, ValidationError, errorMessage, isNotFound } from "../errors/index.js";
import { listProviders, getProvider, type WorkspaceProvider } from "../providers/index.js";
import type { ProviderName } from "../schemas/workspace.js";
import { directoryExists, fileExists } from "./fs-utils.js";

export const METADATA_FILENAME = "workspace.json";

/** Raw metadata object; only `tier` is guaranteed after {@link readWorkspaceMetadata}. */
export type RawMetadata = Record<string, unknown>;

export interface LoadedWorkspace {
  root: string;
  provider: WorkspaceProvider;
  metadataPath: string;
  metadata: RawMetadata;
  tier: Tier;
}

export function metadataPath(root: string, provider: WorkspaceProvider): string {
  return join(root, provider.configDirname, METADATA_FILENAME);
}

/**
 * Provider whose config directory holds a workspace.json, falling back to
 * the default provider when none does.
 */
export async function detectProvider(root: string): Promise<WorkspaceProvider> {
  for (const provider of listProviders()) {
    if (await fileExists(metadataPath(root, provider))) return provider;
  }
  return getProvider();
}

export interface BuildMetadataInput {
  tier: Tier;
  name: string;
  provider: ProviderName;
  parentWorkspace?: string;
  now?: Date;
}

export function buildMetadata(input: BuildMetadataInput): RawMetadata {
  return {
    version: VERSION,
    tier: input.tier,
    name: input.name,
    provider: input.provider,
    created: (input.now ?? new Date()).toISOString(),
    standard: STANDARD_NAME,
    ...(input.parentWorkspace ? { parent_workspace: input.parentWorkspace } : {}),
  };
}

export function serializeMetadata(metadata: RawMetadata): string {
  return `${JSON.stringify(metadata, null, 2)}\n`;
}

/**
 * Load a workspace for modification. Throws ValidationError when the path or
 * metadata file is missing, ConfigurationError when it is malformed.
 */
export async function readWorkspaceMetadata(root: string): Promise<LoadedWorkspace> {
  if (!(await directoryExists(root))) {
    throw new ValidationError(`Workspace not found: ${root}`);
  }
  const provider = await detectProvider(root);
  const path = metadataPath(root, provider);

  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (error) {
    if (isNotFound(error)) {
      throw new ValidationError(`Not a valid workspace: missing ${provider.configDirname}/${METADATA_FILENAME}`, {
        path: root,
      });
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Invalid JSON in ${path}: ${errorMessage(error)}`);
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigurationError(`Invalid ${METADATA_FILENAME}: expected a JSON object`);
  }

  const metadata: RawMetadata = { ...parsed };
  const tier = metadata["tier"];
  if (!isTier(tier)) {
    throw new ConfigurationError(`Invalid tier in ${METADATA_FILENAME}: ${JSON.stringify(tier ?? null)}`);
  }
  return { root, provider, metadataPath: path, metadata, tier };
}

/** Merge `updates` into the metadata and write it atomically. */
export async function updateWorkspaceMetadata(workspace: LoadedWorkspace, updates: RawMetadata): Promise<RawMetadata> {
  const next = { ...workspace.metadata, ...updates };
  await writeFileAtomic(workspace.metadataPath, serializeMetadata(next));
  workspace.metadata = next;
  return next;
}
