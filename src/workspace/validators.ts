/**
 * Input validation for workspace operations. Runs before any side effect.
 */

import {
  BACKUP_NAME_PATTERN,
  MAX_NAME_LENGTH,
  NAME_PATTERN,
  PYTHON_VERSION_PATTERN,
  RESERVED_NAMES,
  TEMPLATE_NAME_PATTERN,
  TIERS,
  isTier,
  type Tier,
} from "../config/constants.js";
import { UpgradeError, ValidationError } from "../errors/index.js";

export function validateProjectName(name: string): void {
  if (!name || !name.trim()) {
    throw new ValidationError("Project name cannot be empty");
  }
  if (name.length > MAX_NAME_LENGTH) {
    throw new ValidationError(`Project name too long (max ${MAX_NAME_LENGTH} characters): ${name.length}`);
  }
  if (name.includes("..") || name.includes("/") || name.includes("\\")) {
    throw new ValidationError(`Project name cannot contain path separators or '..': ${name}`);
  }
  if (!NAME_PATTERN.test(name)) {
    throw new ValidationError(
      `Invalid project name '${name}'. Must start with a letter and contain only letters, numbers, hyphens, and underscores.`,
    );
  }
  if (RESERVED_NAMES.some((reserved) => reserved === name.toLowerCase())) {
    throw new ValidationError(`'${name}' is a reserved name. Choose a different project name.`);
  }
}

export function validatePythonVersion(version: string): void {
  if (!PYTHON_VERSION_PATTERN.test(version)) {
    throw new ValidationError(`Invalid Python version '${version}'. Expected format: 3.X (e.g. 3.11)`);
  }
}

export function parseTier(value: string): Tier {
  if (!isTier(value)) {
    throw new ValidationError(`Invalid tier '${value}'. Choose 1 (Lite), 2 (Standard) or 3 (Enterprise).`);
  }
  return value;
}

export function validateTemplateName(name: string): void {
  if (!TEMPLATE_NAME_PATTERN.test(name)) {
    throw new ValidationError(
      `Invalid template name '${name}'. Use lowercase letters, numbers, hyphens and underscores, starting with a letter.`,
    );
  }
}

export function validateBackupName(name: string): void {
  if (!BACKUP_NAME_PATTERN.test(name) || name.includes("..")) {
    throw new ValidationError(`Invalid backup name '${name}'. Use letters, numbers, '.', '_' and '-'.`);
  }
}

export type TierTransition = "upgrade" | "same" | "downgrade";

/** Classify a tier change; downgrades raise {@link UpgradeError}. */
export function checkTierTransition(current: Tier, target: Tier): TierTransition {
  const from = TIERS[current];
  const to = TIERS[target];
  if (to.order < from.order) {
    throw new UpgradeError(
      `Cannot downgrade from tier ${current} (${from.name}) to tier ${target} (${to.name}). Downgrade is not supported.`,
    );
  }
  return to.order === from.order ? "same" : "upgrade";
}

/** Package directory name derived from a project name. */
export function toPackageName(name: string): string {
  return name.replace(/[-. ]/g, "_").toLowerCase();
}
