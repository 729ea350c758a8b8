/**
 * Bounded fan-out for independent file writes.
 *
 * A fixed number of workers pull from one shared queue; failures are
 * collected and reported after the pool drains instead of aborting the
 * other writes.
 */

import { chmod, mkdir, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { MAX_WRITE_CONCURRENCY } from "../config/constants.js";
import { errorMessage } from "../errors/index.js";

export interface WriteFailure {
  path: string;
  error: string;
}

export interface WritePoolOptions {
  /** Worker count; clamped to [1, MAX_WRITE_CONCURRENCY]. */
  concurrency?: number;
  /** Relative paths written with mode 0o755. */
  isExecutable?: (relativePath: string) => boolean;
  /** Called after each successful write. */
  onWritten?: (relativePath: string) => void;
}

export interface WritePoolResult {
  written: string[];
  failures: WriteFailure[];
}

export async function writeFilesConcurrently(
  root: string,
  files: Record<string, string>,
  opts: WritePoolOptions = {},
): Promise<WritePoolResult> {
  const queue = Object.entries(files);
  const written: string[] = [];
  const failures: WriteFailure[] = [];
  const requested = opts.concurrency ?? MAX_WRITE_CONCURRENCY;
  const workers = Math.max(1, Math.min(requested, MAX_WRITE_CONCURRENCY, queue.length));

  async function worker(): Promise<void> {
    for (let next = queue.shift(); next !== undefined; next = queue.shift()) {
      const [relativePath, content] = next;
      const target = join(root, relativePath);
      try {
        await mkdir(dirname(target), { recursive: true });
        await writeFile(target, content, "utf-8");
        if (opts.isExecutable?.(relativePath)) {
          await chmod(target, 0o755);
        }
        written.push(relativePath);
        opts.onWritten?.(relativePath);
      } catch (error) {
        failures.push({ path: relativePath, error: errorMessage(error) });
      }
    }
  }

  await Promise.all(Array.from({ length: workers }, () => worker()));
  written.sort();
  return { written, failures };
}

/**
 * "Failed to write N file(s): a: e; b: e; c: e (+K more)".
 */
export function summarizeWriteFailures(failures: readonly WriteFailure[], shown = 3): string {
  const listed = failures
    .slice(0, shown)
    .map((f) => `${f.path}: ${f.error}`)
    .join("; ");
  const more = failures.length > shown ? ` (+${failures.length - shown} more)` : "";
  return `Failed to write ${failures.length} file(s): ${listed}${more}`;
}
