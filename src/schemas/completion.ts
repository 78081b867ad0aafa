import { z } from 'zod';

/**
 * Wire shapes of an OpenAI-compatible /chat/completions endpoint.
 * Only the fields the gateway reads are declared.
 */
export const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
        }),
      })
    )
    .min(1),
});

export const ChatCompletionChunkSchema = z.object({
  choices: z.array(
    z.object({
      delta: z
        .object({
          content: z.string().nullable().optional(),
        })
        .optional(),
    })
  ),
});

export const HypothesisSuggestionSchema = z.object({
  hypothesis: z.string(),
  benefit: z.string(),
});

export const HypothesesSchema = z.object({
  hypotheses: z.array(HypothesisSuggestionSchema),
});

export type ChatCompletion = z.infer<typeof ChatCompletionSchema>;
export type ChatCompletionChunk = z.infer<typeof ChatCompletionChunkSchema>;
export type Hypotheses = z.infer<typeof HypothesesSchema>;

export const HYPOTHESES_RESPONSE_FORMAT = {
  name: 'HypothesesResponse',
  schema: {
    type: 'object',
    properties: {
      hypotheses: {
        type: 'array',
        items: {
          type: 'object',
          properties: {
            hypothesis: { type: 'string' },
            benefit: { type: 'string' },
          },
          required: ['hypothesis', 'benefit'],
        },
      },
    },
    required: ['hypotheses'],
  },
} as const;
