import { z } from "zod";

export const CleanupSessionsInput = z.object({
  max_age_hours: z.number().min(0).optional()
});

export type CleanupSessionsInputT = z.infer<typeof CleanupSessionsInput>;

export const CleanupSessionsOutput = z.object({
  message: z.string(),
  removed: z.number().int().min(0),
  audit_id: z.string()
});

export type CleanupSessionsOutputT = z.infer<typeof CleanupSessionsOutput>;
