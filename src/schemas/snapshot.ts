/**
 * Stamp written into every snapshot as `snapshot.json`.
 */

import { z } from "zod";

export const SnapshotStamp = z.object({
  name: z.string(),
  timestamp: z.string(),
  git_tag: z.string().nullable(),
});
export type SnapshotStamp = z.infer<typeof SnapshotStamp>;
