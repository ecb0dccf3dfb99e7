import { z } from "zod";

export const syncRequestSchema = z
  .object({
    dryRun: z.boolean().optional(),
    syncSet: z.string().min(1, "syncSet must not be empty").optional(),
  })
  .strict();

export type SyncRequest = z.infer<typeof syncRequestSchema>;
