/**
 * Error hierarchy for workspace operations.
 *
 * Operations throw; the CLI catches once and maps the error to an exit code.
 */

import { EXIT_CODES, type ExitCode } from "../config/constants.js";

export type ErrorCode =
  | "WORKSPACE_ERROR"
  | "VALIDATION_ERROR"
  | "CREATION_ERROR"
  | "UPGRADE_ERROR"
  | "ROLLBACK_ERROR"
  | "CONFIGURATION_ERROR";

export class WorkspaceError extends Error {
  readonly code: ErrorCode;
  readonly exitCode: ExitCode;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    details?: Record<string, unknown>,
    code: ErrorCode = "WORKSPACE_ERROR",
    exitCode: ExitCode = EXIT_CODES.workspace,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "WorkspaceError";
    this.code = code;
    this.exitCode = exitCode;
    this.details = details;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.details ? { details: this.details } : {}),
    };
  }
}

export class ValidationError extends WorkspaceError {
  constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(message, details, "VALIDATION_ERROR", EXIT_CODES.validation, options);
    this.name = "ValidationError";
  }
}

export class CreationError extends WorkspaceError {
  constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(message, details, "CREATION_ERROR", EXIT_CODES.creation, options);
    this.name = "CreationError";
  }
}

export class UpgradeError extends WorkspaceError {
  constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(message, details, "UPGRADE_ERROR", EXIT_CODES.upgrade, options);
    this.name = "UpgradeError";
  }
}

export class RollbackError extends WorkspaceError {
  constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(message, details, "ROLLBACK_ERROR", EXIT_CODES.rollback, options);
    this.name = "RollbackError";
  }
}

export class ConfigurationError extends WorkspaceError {
  constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(message, details, "CONFIGURATION_ERROR", EXIT_CODES.configuration, options);
    this.name = "ConfigurationError";
  }
}

/** True when a prompt library or signal handler reports a user interrupt. */
export function isInterrupt(error: unknown): boolean {
  return error instanceof Error && (error.name === "ExitPromptError" || error.name === "AbortError");
}

/**
 * Map any thrown value to the process exit code.
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof WorkspaceError) return error.exitCode;
  if (isInterrupt(error)) return EXIT_CODES.interrupt;
  return EXIT_CODES.unexpected;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/**
 * True for a filesystem "no such file" error, including a path whose parent
 * is a regular file (ENOTDIR).
 */
export function isNotFound(error: unknown): boolean {
  return isErrnoException(error) && (error.code === "ENOENT" || error.code === "ENOTDIR");
}
