/**
 * Creation-time template bundles (`templates/catalog.json` and custom
 * `<templates_path>/*.json`).
 */

import { z } from "zod";
import { TierId } from "./workspace.js";

export const TemplateDefinition = z.object({
  description: z.string(),
  /** Tier used when the caller gives none. */
  tier: TierId.optional(),
  /** Python requirement strings appended to the generated dependencies. */
  dependencies: z.array(z.string()).default([]),
  /** Relative path → file content, overriding generated files. */
  files: z.record(z.string()).default({}),
  /** Explicit enterprise data domain. */
  domain: z
    .string()
    .regex(/^[a-z][a-z0-9_-]*$/)
    .optional(),
});
export type TemplateDefinition = z.infer<typeof TemplateDefinition>;

export const TemplateCatalog = z.record(TemplateDefinition);
export type TemplateCatalog = z.infer<typeof TemplateCatalog>;
