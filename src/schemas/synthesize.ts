import { z } from "zod";
import { LlmOverrides } from "./common";

const HypothesisOutcome = z.object({
  success: z.boolean(),
  p_value: z.number(),
  analysis: z.string().optional(),
  summary: z.string().optional()
});

export const HypothesisRecordInput = z.object({
  title: z.string(),
  benefit: z.string(),
  outcome: z.union([z.string(), HypothesisOutcome]).nullable().optional()
});

export const SynthesizeInput = z.object({
  hypotheses: z.array(HypothesisRecordInput).min(1),
  llm: LlmOverrides
});

export type SynthesizeInputT = z.infer<typeof SynthesizeInput>;

export const SynthesizeOutput = z.object({
  synthesis: z.string(),
  audit_id: z.string()
});

export type SynthesizeOutputT = z.infer<typeof SynthesizeOutput>;
