// pattern: Functional Core

import { z } from 'zod';
import { PROVIDER_NAMES } from '../adapter/types.js';

export const ChatMessageSchema = z.object({
  role: z.enum(['user', 'assistant', 'system']),
  content: z.string(),
});

/**
 * A chat request as a front door receives it.
 * `tools` names the registered tools offered to the model; leaving it out
 * offers every registered tool, an empty list offers none.
 */
export const ChatRequestSchema = z.object({
  provider: z.enum(PROVIDER_NAMES),
  model: z.string().min(1),
  messages: z.array(ChatMessageSchema).min(1),
  temperature: z.number().min(0).max(2).default(0.7),
  max_tokens: z.number().int().min(1).max(100000).default(2048),
  top_p: z.number().min(0).max(1).default(1.0),
  stream: z.boolean().default(false),
  tools: z.array(z.string()).optional(),
});

export type ChatRequest = z.infer<typeof ChatRequestSchema>;
export type ChatRequestInput = z.input<typeof ChatRequestSchema>;
