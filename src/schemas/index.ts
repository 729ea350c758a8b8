export { BootstrapConfig } from "./config.js";
export { WorkspaceMetadata, WorkspaceStatus, ProviderName, PROVIDER_NAMES, TierId } from "./workspace.js";
export {
  WorkspaceSettings,
  WorkspacePermissions,
  ExecutionPolicy,
  McpConfig,
  McpServer,
} from "./settings.js";
export { TemplateDefinition, TemplateCatalog } from "./template.js";
export { SnapshotStamp } from "./snapshot.js";
