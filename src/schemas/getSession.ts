import { z } from "zod";
import { SessionIdInput } from "./common";

export const GetSessionInput = z.object({
  session_id: SessionIdInput
});

export type GetSessionInputT = z.infer<typeof GetSessionInput>;

export const GetSessionOutput = z.object({
  session_id: z.string(),
  description: z.string(),
  row_count: z.number().int(),
  column_count: z.number().int(),
  source: z.string(),
  created_at: z.string(),
  audit_id: z.string()
});

export type GetSessionOutputT = z.infer<typeof GetSessionOutput>;
