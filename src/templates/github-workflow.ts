/**
 * GitHub Actions CI workflow per tier.
 */

import { stringify } from "yaml";
import { DEFAULT_PYTHON_VERSION, type Tier } from "../config/constants.js";
import { scriptsDir } from "./scripts.js";

type Step = Record<string, unknown>;

const checkout: Step = { uses: "actions/checkout@v4" };

function setupPython(version: string, cache = true): Step {
  return {
    uses: "actions/setup-python@v5",
    with: cache ? { "python-version": version, cache: "pip" } : { "python-version": version },
  };
}

export function getGithubWorkflow(tier: Tier, pythonVersion: string = DEFAULT_PYTHON_VERSION): string {
  const jobs: Record<string, unknown> = {
    audit: {
      "runs-on": "ubuntu-latest",
      steps: [
        checkout,
        setupPython(pythonVersion, false),
        { name: "Audit workspace", run: `python ${scriptsDir(tier, "workspace")}/run_audit.py` },
      ],
    },
  };

  const matrixPython = "${{ matrix.python-version }}";

  switch (tier) {
    case "1":
      jobs["run"] = {
        "runs-on": "ubuntu-latest",
        steps: [
          checkout,
          setupPython(pythonVersion),
          { run: "pip install -q -r requirements.txt" },
          { run: "python src/main.py" },
        ],
      };
      break;
    case "2":
      jobs["test"] = {
        "runs-on": "ubuntu-latest",
        strategy: { matrix: { "python-version": [pythonVersion] }, "fail-fast": false },
        steps: [
          checkout,
          setupPython(matrixPython),
          { name: "Install dependencies", run: 'pip install -q -e ".[dev]"' },
          { name: "Run tests", run: "pytest tests/ -q" },
        ],
      };
      break;
    case "3":
      jobs["test"] = {
        "runs-on": "ubuntu-latest",
        strategy: { matrix: { "python-version": [pythonVersion] }, "fail-fast": false },
        steps: [
          checkout,
          setupPython(matrixPython),
          { name: "Install uv", run: "pip install -q uv" },
          { name: "Install dependencies", run: "uv sync --quiet" },
          { name: "Run unit tests", run: "uv run pytest tests/unit/ -q" },
        ],
      };
      jobs["eval"] = {
        "runs-on": "ubuntu-latest",
        needs: "test",
        steps: [
          checkout,
          setupPython(pythonVersion),
          { name: "Install uv", run: "pip install -q uv" },
          { name: "Install dependencies", run: "uv sync --quiet" },
          { name: "Run agent evaluations", run: "uv run pytest tests/evals/ -q" },
        ],
      };
      break;
  }

  const workflow = {
    name: "CI",
    on: {
      push: { branches: ["main"] },
      pull_request: { branches: ["main"] },
    },
    jobs,
  };

  return stringify(workflow, { lineWidth: 0 });
}
