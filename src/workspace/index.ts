export { createWorkspace } from "./create.js";
export type { CreateWorkspaceOptions, CreationResult } from "./create.js";
export { validateWorkspace, inspectWorkspace, ValidationCache, pythonAuditRunner } from "./validate.js";
export type { ValidationResult, ValidateOptions, AuditRunner } from "./validate.js";
export { upgradeWorkspace, UPGRADE_PLANS } from "./upgrade.js";
export type { UpgradeOptions, UpgradeResult, UpgradePlan } from "./upgrade.js";
export { createSnapshot, listSnapshots, criticalPaths, protectedPaths } from "./snapshot.js";
export type { SnapshotOptions, SnapshotResult, SnapshotEntry, SnapshotFormat } from "./snapshot.js";
export { rollbackWorkspace, resolveRestoreSource } from "./rollback.js";
export type { RollbackOptions, RollbackResult, RestoreSource, RestoreSourceKind } from "./rollback.js";
export { updateScripts } from "./update-scripts.js";
export type { UpdateScriptsOptions, UpdateScriptsResult } from "./update-scripts.js";
export { exportTemplate, parseRequirements } from "./export-template.js";
export type { ExportTemplateOptions, ExportTemplateResult } from "./export-template.js";
export { checkWorkspaceSchemas } from "./schema-check.js";
export type { SchemaCheckResult } from "./schema-check.js";
export { readWorkspaceMetadata, updateWorkspaceMetadata, detectProvider, METADATA_FILENAME } from "./metadata.js";
export type { LoadedWorkspace, RawMetadata } from "./metadata.js";
export { buildWorkspaceLayout, managedFilePaths } from "./layout.js";
export type { WorkspaceLayout, LayoutInput } from "./layout.js";
export {
  validateProjectName,
  validatePythonVersion,
  validateTemplateName,
  validateBackupName,
  parseTier,
  checkTierTransition,
  toPackageName,
} from "./validators.js";
export { withWorkspaceLock } from "./lock.js";
export { systemGit } from "./git.js";
export type { GitClient } from "./git.js";
export type { LinkOperations } from "./shared-agent.js";
export type { ConfirmFn } from "./types.js";
