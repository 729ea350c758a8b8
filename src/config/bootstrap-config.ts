/**
 * Team defaults from `.gemini-bootstrap.json`.
 *
 * The implicit file is looked up in the working directory only; a malformed
 * one is reported and ignored. A file named with `--config` must exist and
 * be valid.
 */

import { readFile, realpath } from "node:fs/promises";
import { isAbsolute, relative, resolve } from "node:path";
import { ConfigurationError, errorMessage, isNotFound } from "../errors/index.js";
import { Output } from "../output/output.js";
import { BootstrapConfig } from "../schemas/config.js";
import { BOOTSTRAP_CONFIG_FILENAME } from "./constants.js";

export interface LoadBootstrapConfigOptions {
  cwd?: string;
  /** Path given with `--config`. */
  explicitPath?: string;
  output?: Output;
}

async function assertInsideCwd(cwd: string, path: string): Promise<void> {
  const [realCwd, realPath] = await Promise.all([realpath(cwd), realpath(path)]);
  const rel = relative(realCwd, realPath);
  if (rel.startsWith("..") || isAbsolute(rel)) {
    throw new ConfigurationError(`Config file must be inside the working directory: ${path}`);
  }
}

function parseConfig(path: string, raw: string): BootstrapConfig {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Invalid JSON in ${path}: ${errorMessage(error)}`);
  }
  const parsed = BootstrapConfig.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ConfigurationError(`Invalid config ${path}: ${issues.join("; ")}`, { issues });
  }
  return parsed.data;
}

/**
 * Load the bootstrap config. Returns `{}` when there is none.
 */
export async function loadBootstrapConfig(opts: LoadBootstrapConfigOptions = {}): Promise<BootstrapConfig> {
  const cwd = resolve(opts.cwd ?? process.cwd());
  const output = opts.output ?? new Output();

  if (opts.explicitPath !== undefined) {
    const path = resolve(cwd, opts.explicitPath);
    let raw: string;
    try {
      raw = await readFile(path, "utf-8");
    } catch (error) {
      if (isNotFound(error)) throw new ConfigurationError(`Config file not found: ${path}`);
      throw new ConfigurationError(`Cannot read config file ${path}: ${errorMessage(error)}`);
    }
    await assertInsideCwd(cwd, path);
    return parseConfig(path, raw);
  }

  const path = resolve(cwd, BOOTSTRAP_CONFIG_FILENAME);
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (error) {
    if (isNotFound(error)) return {};
    throw error;
  }
  try {
    await assertInsideCwd(cwd, path);
    return parseConfig(path, raw);
  } catch (error) {
    if (!(error instanceof ConfigurationError)) throw error;
    output.warning(`Ignoring ${BOOTSTRAP_CONFIG_FILENAME}: ${error.message}`);
    return {};
  }
}
