import { z } from "zod";
import { HypothesisSuggestionSchema } from "./completion";
import { LlmOverrides, SessionIdInput } from "./common";

export const GenerateHypothesesInput = z.object({
  session_id: SessionIdInput,
  system_prompt: z.string().min(1).optional(),
  llm: LlmOverrides
});

export type GenerateHypothesesInputT = z.infer<typeof GenerateHypothesesInput>;

export const GenerateHypothesesOutput = z.object({
  hypotheses: z.array(HypothesisSuggestionSchema),
  audit_id: z.string()
});

export type GenerateHypothesesOutputT = z.infer<typeof GenerateHypothesesOutput>;
