/**
 * Static tables shared by every workspace operation.
 */

/** Tool version stamped into workspace.json. */
export const VERSION = "2026.26";

/** Value of the `standard` field in workspace.json. */
export const STANDARD_NAME = "Multi-LLM Development Framework";

export const DEFAULT_PYTHON_VERSION = "3.11";

/** Name of the optional team-defaults file looked up in the working directory. */
export const BOOTSTRAP_CONFIG_FILENAME = ".gemini-bootstrap.json";

export const TIER_IDS = ["1", "2", "3"] as const;

export type Tier = (typeof TIER_IDS)[number];

export interface TierDefinition {
  id: Tier;
  name: string;
  order: number;
  description: string;
}

export const TIERS: Record<Tier, TierDefinition> = {
  "1": {
    id: "1",
    name: "Lite",
    order: 1,
    description: "Simple automation, scripts, single-purpose tools",
  },
  "2": {
    id: "2",
    name: "Standard",
    order: 2,
    description: "Modular applications, APIs, libraries",
  },
  "3": {
    id: "3",
    name: "Enterprise",
    order: 3,
    description: "Multi-agent systems, complex products, teams",
  },
};

export function isTier(value: unknown): value is Tier {
  return TIER_IDS.some((id) => id === value);
}

export function tierName(tier: Tier): string {
  return TIERS[tier].name;
}

/** Directories present in every tier. */
export const BASE_DIRECTORIES = [
  "src",
  "tests",
  "docs",
  "logs",
  "scratchpad",
  ".agent/skills",
  ".agent/workflows",
] as const;

/** Directories added on top of the base set, per tier. */
export const TIER_DIRECTORIES: Record<Tier, readonly string[]> = {
  "1": [],
  "2": ["docs/architecture", "docs/api", "tests/unit", "tests/integration"],
  "3": [
    "docs/architecture",
    "docs/api",
    "docs/evaluations",
    "docs/decisions",
    "benchmarks",
    "tests/unit",
    "tests/integration",
    "tests/evals",
    "outputs/contracts",
    "inputs",
    "domains/frontend",
    "domains/backend",
  ],
};

/** Names reserved because they collide with workspace layout directories. */
export const RESERVED_NAMES = ["test", "tests", "src", "lib", "bin", "build", "dist"] as const;

export const MAX_NAME_LENGTH = 50;

export const NAME_PATTERN = /^[a-zA-Z][a-zA-Z0-9_-]*$/;
export const PYTHON_VERSION_PATTERN = /^3\.\d+$/;
export const BACKUP_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;
export const TEMPLATE_NAME_PATTERN = /^[a-z][a-z0-9_-]*$/;

/** Upper bound on concurrent file writes during creation. */
export const MAX_WRITE_CONCURRENCY = 32;

export const GIT_TIMEOUT_MS = 10_000;
export const AUDIT_TIMEOUT_MS = 30_000;

export const SNAPSHOTS_DIRNAME = ".snapshots";
export const BACKUPS_DIRNAME = "backups";
export const LOCK_FILENAME = "operation.lock";
export const SNAPSHOT_STAMP_FILENAME = "snapshot.json";

/** Process exit codes per error category. */
export const EXIT_CODES = {
  success: 0,
  validation: 1,
  creation: 2,
  upgrade: 3,
  rollback: 4,
  configuration: 5,
  workspace: 6,
  interrupt: 130,
  unexpected: 255,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/** Default Python requirements per tier (tier 1 writes them to requirements.txt). */
export const DEFAULT_REQUIREMENTS: Record<Tier, readonly string[]> = {
  "1": ["requests>=2.31", "python-dotenv>=1.0"],
  "2": ["requests>=2.31", "python-dotenv>=1.0", "pydantic>=2.5"],
  "3": ["requests>=2.31", "python-dotenv>=1.0", "pydantic>=2.5", "structlog>=24.1"],
};

export const DEV_REQUIREMENTS = ["pytest>=8.0", "ruff>=0.5", "mypy>=1.10"] as const;
