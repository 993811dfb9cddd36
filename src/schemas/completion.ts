import { z } from 'zod';

export const ChatMessageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant']),
  content: z.string(),
});

export type ChatMessage = z.infer<typeof ChatMessageSchema>;

export const CompletionRequestSchema = z.object({
  model: z.string().min(1),
  messages: z.array(ChatMessageSchema).min(1),
  stream: z.literal(false),
  max_tokens: z.number().int().positive(),
  temperature: z.number().min(0).max(2),
});

export type CompletionRequest = z.infer<typeof CompletionRequestSchema>;

export const CompletionChoiceSchema = z.object({
  index: z.number().int(),
  message: z.object({
    role: z.string(),
    content: z.string().nullable(),
  }),
  finish_reason: z.string().nullable(),
});

export type CompletionChoice = z.infer<typeof CompletionChoiceSchema>;

export const CompletionResponseSchema = z.object({
  id: z.string(),
  object: z.string(),
  created: z.number().int(),
  model: z.string(),
  choices: z.array(CompletionChoiceSchema),
  usage: z
    .object({
      prompt_tokens: z.number().int(),
      completion_tokens: z.number().int(),
      total_tokens: z.number().int(),
    })
    .nullish(),
});

export type CompletionResponse = z.infer<typeof CompletionResponseSchema>;

// Repeated parameters (`?q=a&q=b`) arrive as an array; the first one wins.
export const AskQuerySchema = z.object({
  q: z.preprocess(
    value => (Array.isArray(value) ? value[0] : value),
    z.string().optional()
  ),
});

export type AskQuery = z.infer<typeof AskQuerySchema>;
