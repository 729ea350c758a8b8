/**
 * Team defaults schema for `.gemini-bootstrap.json` in the working directory.
 *
 * Every key is optional; command-line flags override whatever is set here.
 */

import { z } from "zod";
import { PYTHON_VERSION_PATTERN, TIER_IDS } from "../config/constants.js";
import { ProviderName } from "./workspace.js";

export const BootstrapConfig = z.object({
  /** Tier used when none is given on the command line. */
  default_tier: z.enum(TIER_IDS).optional(),
  /** Shared `.agent/` directory linked into new workspaces. */
  shared_agent_path: z.string().min(1).optional(),
  /** Directory holding custom template JSON files. */
  templates_path: z.string().min(1).optional(),
  /** Initialize git by default. */
  default_git: z.boolean().optional(),
  /** Python version for generated CI workflows. */
  python_version: z.string().regex(PYTHON_VERSION_PATTERN, "must look like 3.X").optional(),
  /** Provider used when none is given on the command line. */
  provider: ProviderName.optional(),
});
export type BootstrapConfig = z.infer<typeof BootstrapConfig>;
