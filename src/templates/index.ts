export { readAsset, renderAsset, renderTemplate, ASSETS_DIR } from "./assets.js";
export { getMakefile, extractTargets } from "./makefile.js";
export { getGithubWorkflow } from "./github-workflow.js";
export { getJsonSchemaFiles, getWorkspaceSchema, getSettingsSchema, getBootstrapConfigSchema } from "./json-schemas.js";
export { getSettingsJson, getWorkspaceSettings, getMcpJson, getVscodeSettings } from "./settings.js";
export {
  HELPER_SCRIPTS,
  AUDIT_SCRIPT_CANDIDATES,
  getHelperScripts,
  scriptPath,
  scriptsDir,
  scriptsForTier,
  isHelperScriptPath,
} from "./scripts.js";
export type { HelperScript, ScriptCategory } from "./scripts.js";
export * from "./python.js";
export * from "./docs.js";
export { loadTemplateCatalog, resolveTemplate, loadBuiltinTemplates } from "./catalog.js";
export type { CatalogEntry, LoadedCatalog } from "./catalog.js";
