import { z } from "zod";
import { LlmOverrides, SessionIdInput } from "./common";

export const TestHypothesisInput = z.object({
  session_id: SessionIdInput,
  hypothesis: z.string().min(1),
  analysis_prompt: z.string().min(1).optional(),
  llm: LlmOverrides
});

export type TestHypothesisInputT = z.infer<typeof TestHypothesisInput>;

export const TestHypothesisOutput = z.object({
  stage: z.literal("Done"),
  success: z.boolean(),
  p_value: z.number(),
  analysis: z.string(),
  summary: z.string(),
  audit_id: z.string()
});

export type TestHypothesisOutputT = z.infer<typeof TestHypothesisOutput>;
