/**
 * tierforge: scaffold tiered AI-assistant workspaces and manage their
 * lifecycle (validate, upgrade, snapshot, rollback).
 */

export * from "./config/constants.js";
export { loadBootstrapConfig } from "./config/bootstrap-config.js";
export * from "./errors/index.js";
export * from "./schemas/index.js";
export { Output, createBufferedOutput, resolveOutputConfig } from "./output/output.js";
export type { OutputConfig, OutputSink, ProgressReporter } from "./output/output.js";
export { getProvider, listProviders, isProviderName, DEFAULT_PROVIDER } from "./providers/index.js";
export type { WorkspaceProvider } from "./providers/index.js";
export * from "./templates/index.js";
export * from "./workspace/index.js";
export * from "./skills/index.js";
export { createProgram, run } from "./cli/index.js";
export type { CliDependencies, Prompts } from "./cli/index.js";
