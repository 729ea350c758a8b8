/**
 * Workspace layout: the directory list and the relative-path → content map a
 * tier produces. Creation writes all of it; upgrade writes what is missing
 * and regenerates the managed files.
 */

import { BASE_DIRECTORIES, DEFAULT_PYTHON_VERSION, TIER_DIRECTORIES, type Tier } from "../config/constants.js";
import type { WorkspaceProvider } from "../providers/types.js";
import type { TemplateDefinition } from "../schemas/template.js";
import { readAsset } from "../templates/assets.js";
import { getCoreManifest, getGettingStarted, getPrecommitConfig, getRoadmap } from "../templates/docs.js";
import { getGithubWorkflow } from "../templates/github-workflow.js";
import { getJsonSchemaFiles } from "../templates/json-schemas.js";
import { getMakefile } from "../templates/makefile.js";
import {
  getEvalTest,
  getIntegrationTest,
  getLiteMain,
  getPackageInit,
  getPackageMain,
  getPyproject,
  getRequirements,
  getUnitTest,
} from "../templates/python.js";
import { getHelperScripts, scriptsDir } from "../templates/scripts.js";
import { getMcpJson, getSettingsJson, getVscodeSettings } from "../templates/settings.js";
import { inferEnterpriseDomain } from "./enterprise.js";
import { buildMetadata, serializeMetadata, METADATA_FILENAME } from "./metadata.js";
import { toPackageName } from "./validators.js";

export const WORKFLOW_PATH = ".github/workflows/ci.yml";
export const VSCODE_SETTINGS_PATH = ".vscode/settings.json";

export interface LayoutInput {
  tier: Tier;
  name: string;
  provider: WorkspaceProvider;
  pythonVersion?: string;
  template?: TemplateDefinition;
  parentWorkspace?: string;
  now?: Date;
}

export interface WorkspaceLayout {
  packageName: string;
  /** Enterprise data domain; undefined below tier 3. */
  domain?: string;
  directories: string[];
  files: Record<string, string>;
}

/** Files regenerated on upgrade, in backup order. */
export function managedFilePaths(provider: WorkspaceProvider): string[] {
  return [
    provider.configFilename,
    "Makefile",
    `${provider.configDirname}/settings.json`,
    VSCODE_SETTINGS_PATH,
    WORKFLOW_PATH,
  ];
}

function dataDirectories(tier: Tier, domain: string | undefined): string[] {
  if (tier === "3" && domain) {
    return [`data/${domain}/inputs`, `data/${domain}/outputs`, "data/shared"];
  }
  return ["data/inputs", "data/outputs"];
}

function scriptDirectories(tier: Tier): string[] {
  return [...new Set([scriptsDir(tier, "workspace"), scriptsDir(tier, "skills")])];
}

export function buildWorkspaceLayout(input: LayoutInput): WorkspaceLayout {
  const { tier, name, provider, template } = input;
  const pythonVersion = input.pythonVersion ?? DEFAULT_PYTHON_VERSION;
  const packageName = toPackageName(name);
  const domain = tier === "3" ? inferEnterpriseDomain(name, template?.domain) : undefined;
  const cfg = provider.configDirname;
  const extraDeps = template?.dependencies ?? [];
  const data = dataDirectories(tier, domain);

  const directories = [
    ...BASE_DIRECTORIES,
    ...TIER_DIRECTORIES[tier],
    cfg,
    `${cfg}/schemas`,
    `${cfg}/manifests`,
    ".github/workflows",
    ".vscode",
    ...scriptDirectories(tier),
    ...data,
    ...(tier === "1" ? [] : [`src/${packageName}`]),
    ...provider.getAdditionalDirectories(tier),
  ];

  const files: Record<string, string> = {
    [provider.configFilename]: provider.getConfigTemplate(tier, packageName),
    Makefile: getMakefile(tier, packageName, provider),
    "README.md": provider.getReadmeTemplate(tier, name),
    ".gitignore": readAsset("gitignore.txt"),
    ".env": "",
    [WORKFLOW_PATH]: getGithubWorkflow(tier, pythonVersion),
    [`${cfg}/${METADATA_FILENAME}`]: serializeMetadata(
      buildMetadata({
        tier,
        name,
        provider: provider.name,
        parentWorkspace: input.parentWorkspace,
        now: input.now,
      }),
    ),
    [`${cfg}/settings.json`]: getSettingsJson(tier, provider, input.parentWorkspace),
    [`${cfg}/mcp.json`]: getMcpJson(provider),
    [`${cfg}/manifests/core`]: getCoreManifest(tier, provider),
    ...getJsonSchemaFiles(provider),
    [VSCODE_SETTINGS_PATH]: getVscodeSettings(tier),
    "docs/roadmap.md": getRoadmap(name),
    "docs/GETTING_STARTED.md": getGettingStarted(tier, name, provider),
    ...getHelperScripts(tier, provider),
    "logs/.gitkeep": "",
    "scratchpad/.gitkeep": "",
  };

  for (const dir of data) {
    files[`${dir}/.gitkeep`] = "";
  }

  if (tier === "1") {
    files["src/main.py"] = getLiteMain(name);
    files["requirements.txt"] = getRequirements(tier, extraDeps);
  } else {
    files["pyproject.toml"] = getPyproject(name, packageName, tier, extraDeps, pythonVersion);
    files[`src/${packageName}/__init__.py`] = getPackageInit(name);
    files[`src/${packageName}/main.py`] = getPackageMain(packageName);
    files[`tests/unit/test_${packageName}.py`] = getUnitTest(packageName);
    files["tests/integration/test_integration.py"] = getIntegrationTest(packageName);
    files[".pre-commit-config.yaml"] = getPrecommitConfig();
    files[".agent/skills/debug.md"] = readAsset("agent/debug.md");
    files[".agent/workflows/feature.md"] = readAsset("agent/feature.md");
    files[".agent/workflows/discover_skills.md"] = readAsset("agent/discover_skills.md");
  }

  if (tier === "3") {
    files["tests/evals/test_evals.py"] = getEvalTest(packageName);
    files["docs/decisions/0000-template.md"] = readAsset("docs/adr-template.md");
    files[`domains/frontend/${provider.configFilename}`] = provider.getDomainConfigTemplate("frontend");
    files[`domains/backend/${provider.configFilename}`] = provider.getDomainConfigTemplate("backend");
    files["outputs/contracts/.gitkeep"] = "";
    files["inputs/.gitkeep"] = "";
  }

  Object.assign(files, provider.getAdditionalFiles(tier, name));
  if (template) Object.assign(files, template.files);

  return {
    packageName,
    domain,
    directories: [...new Set<string>(directories)],
    files,
  };
}
