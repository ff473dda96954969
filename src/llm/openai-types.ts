/**
 * OpenAI API Types
 * Response schemas for the Chat Completions and Embeddings endpoints.
 */

import { z } from 'zod';

/** Token usage statistics */
const usageSchema = z.object({
  prompt_tokens: z.number().optional(),
  completion_tokens: z.number().optional(),
  total_tokens: z.number().optional(),
});

/** Response from the chat completions endpoint */
export const chatCompletionResponseSchema = z.object({
  id: z.string().optional(),
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullish() }).optional(),
        finish_reason: z.string().nullish(),
      })
    )
    .optional(),
  usage: usageSchema.optional(),
});

/** Response from the embeddings endpoint */
export const embeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number().int(),
    })
  ),
  model: z.string().optional(),
  usage: usageSchema.optional(),
});

export type OpenAIChatCompletionResponse = z.infer<typeof chatCompletionResponseSchema>;
export type OpenAIEmbeddingResponse = z.infer<typeof embeddingResponseSchema>;

/** Request message for chat completions */
export interface OpenAIMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}
