/**
 * Generated Python sources: entry points, packaging and test stubs.
 */

import { DEFAULT_PYTHON_VERSION, DEFAULT_REQUIREMENTS, DEV_REQUIREMENTS, type Tier } from "../config/constants.js";

export function getRequirements(tier: Tier, extra: readonly string[] = []): string {
  return `${[...DEFAULT_REQUIREMENTS[tier], ...extra].join("\n")}\n`;
}

export function getLiteMain(projectName: string): string {
  return [
    '"""Entry point for the workspace automation."""',
    "",
    "import logging",
    "from pathlib import Path",
    "",
    'LOG_FILE = Path("logs/run.log")',
    "",
    "",
    "def main() -> None:",
    "    LOG_FILE.parent.mkdir(exist_ok=True)",
    '    logging.basicConfig(filename=LOG_FILE, level=logging.INFO, format="%(asctime)s %(levelname)s %(message)s")',
    `    logging.info("${projectName} started")`,
    `    print("Hello from ${projectName}")`,
    "",
    "",
    'if __name__ == "__main__":',
    "    main()",
    "",
  ].join("\n");
}

export function getPackageInit(projectName: string): string {
  return `"""${projectName} package."""\n\n__version__ = "0.1.0"\n`;
}

export function getPackageMain(packageName: string): string {
  return [
    `"""Application entry point: python -m src.${packageName}.main"""`,
    "",
    "",
    "def run() -> str:",
    `    return "${packageName} is running"`,
    "",
    "",
    'if __name__ == "__main__":',
    "    print(run())",
    "",
  ].join("\n");
}

export function getPyproject(
  projectName: string,
  packageName: string,
  tier: Tier,
  extra: readonly string[] = [],
  pythonVersion: string = DEFAULT_PYTHON_VERSION,
): string {
  const quote = (dep: string): string => `    "${dep}",`;
  return [
    "[project]",
    `name = "${projectName}"`,
    'version = "0.1.0"',
    `requires-python = ">=${pythonVersion}"`,
    "dependencies = [",
    ...[...DEFAULT_REQUIREMENTS[tier], ...extra].map(quote),
    "]",
    "",
    "[project.optional-dependencies]",
    "dev = [",
    ...DEV_REQUIREMENTS.map(quote),
    "]",
    "",
    "[tool.setuptools.packages.find]",
    'where = ["."]',
    `include = ["src*"]`,
    "",
    "[tool.pytest.ini_options]",
    'testpaths = ["tests"]',
    "",
    "[tool.ruff]",
    "line-length = 100",
    `# package: src/${packageName}`,
    "",
  ].join("\n");
}

export function getUnitTest(packageName: string): string {
  return [
    `from src.${packageName}.main import run`,
    "",
    "",
    "def test_run_reports_status():",
    `    assert run() == "${packageName} is running"`,
    "",
  ].join("\n");
}

export function getIntegrationTest(packageName: string): string {
  return [
    "import subprocess",
    "import sys",
    "",
    "",
    "def test_module_entry_point():",
    "    result = subprocess.run(",
    `        [sys.executable, "-m", "src.${packageName}.main"], capture_output=True, text=True, check=True`,
    "    )",
    `    assert "${packageName}" in result.stdout`,
    "",
  ].join("\n");
}

export function getEvalTest(packageName: string): string {
  return [
    '"""Agent evaluations: each case pins an expected behavior of the system."""',
    "",
    `from src.${packageName}.main import run`,
    "",
    "CASES = [",
    `    ("status", "${packageName} is running"),`,
    "]",
    "",
    "",
    "def test_eval_cases():",
    "    for _name, expected in CASES:",
    "        assert run() == expected",
    "",
  ].join("\n");
}
