/**
 * Bounded subprocess execution for git and audit scripts.
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";

export const execFileAsync = promisify(execFile);

export interface ProcessResult {
  exitCode: number;
  timedOut: boolean;
  stdout: string;
  stderr: string;
}

interface ExecFailure {
  code?: number | string;
  killed?: boolean;
  stdout?: string;
  stderr?: string;
}

function readFailure(error: unknown): ExecFailure {
  if (typeof error !== "object" || error === null) return {};
  const failure: ExecFailure = {};
  if ("code" in error && (typeof error.code === "number" || typeof error.code === "string")) {
    failure.code = error.code;
  }
  if ("killed" in error && typeof error.killed === "boolean") failure.killed = error.killed;
  if ("stdout" in error && typeof error.stdout === "string") failure.stdout = error.stdout;
  if ("stderr" in error && typeof error.stderr === "string") failure.stderr = error.stderr;
  return failure;
}

/**
 * Run a command to completion. Non-zero exits and timeouts are reported in
 * the result; failure to start the command (e.g. ENOENT) is thrown.
 */
export async function runProcess(
  command: string,
  args: readonly string[],
  opts: { cwd: string; timeoutMs: number },
): Promise<ProcessResult> {
  try {
    const { stdout, stderr } = await execFileAsync(command, [...args], {
      cwd: opts.cwd,
      timeout: opts.timeoutMs,
      encoding: "utf-8",
    });
    return { exitCode: 0, timedOut: false, stdout, stderr };
  } catch (error) {
    const failure = readFailure(error);
    if (failure.killed) {
      return { exitCode: -1, timedOut: true, stdout: failure.stdout ?? "", stderr: failure.stderr ?? "" };
    }
    if (typeof failure.code === "number") {
      return { exitCode: failure.code, timedOut: false, stdout: failure.stdout ?? "", stderr: failure.stderr ?? "" };
    }
    throw error;
  }
}
