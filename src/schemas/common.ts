import { z } from "zod";

export const SessionIdInput = z.string().min(1);

export const LlmOverrides = z
  .object({
    api_base_url: z.string().url().optional(),
    api_key: z.string().min(1).optional(),
    model_name: z.string().min(1).optional()
  })
  .optional();

export type LlmOverridesT = z.infer<typeof LlmOverrides>;

export const SessionSummary = z.object({
  session_id: z.string(),
  description: z.string(),
  row_count: z.number().int(),
  column_count: z.number().int(),
  audit_id: z.string()
});

export type SessionSummaryT = z.infer<typeof SessionSummary>;
