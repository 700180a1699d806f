import { z } from 'zod';

/**
 * Normalized internal request/response shapes used across the service.
 * All provider adapters translate to/from these types.
 */

export const chatMessageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant']),
  content: z.string(),
});

export const chatCompletionRequestSchema = z.object({
  model: z
    .string({ required_error: 'Missing required field: model' })
    .min(1, 'Missing required field: model'),
  messages: z
    .array(chatMessageSchema, { required_error: 'Missing required field: messages' })
    .min(1, 'Missing required field: messages'),
  stream: z.boolean().optional(),
  temperature: z.number().min(0).max(2).optional(),
  max_tokens: z.number().int().positive().optional(),
  top_p: z.number().min(0).max(1).optional(),
  stop: z.union([z.string(), z.array(z.string())]).optional(),
  user: z.string().optional(),
});

export type ChatMessage = z.infer<typeof chatMessageSchema>;
export type ChatRole = ChatMessage['role'];
export type ChatCompletionRequest = z.infer<typeof chatCompletionRequestSchema>;

export type FinishReason = 'stop' | 'length' | 'content_filter' | null;

export interface UsageInfo {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

export interface ChatChoice {
  index: number;
  message: {
    role: 'assistant';
    content: string;
  };
  finish_reason: FinishReason;
}

export interface ChatCompletionResponse {
  id: string;
  object: 'chat.completion';
  created: number;
  model: string;
  choices: ChatChoice[];
  usage?: UsageInfo;
}

export interface ChatStreamDelta {
  index: number;
  delta: {
    role?: 'assistant';
    content?: string;
  };
  finish_reason: FinishReason;
}

/**
 * The uniform incremental record every provider stream is normalized into.
 */
export interface ChatCompletionStreamResponse {
  id: string;
  object: 'chat.completion.chunk';
  created: number;
  model: string;
  choices: ChatStreamDelta[];
  usage?: UsageInfo;
}

/**
 * Text carried by a stream record, empty when the record only signals a finish reason.
 */
export function deltaText(chunk: ChatCompletionStreamResponse): string {
  return chunk.choices[0]?.delta.content ?? '';
}

/**
 * Error thrown by provider adapters when the upstream answers with an error status.
 */
export class ProviderError extends Error {
  constructor(
    public readonly provider: string,
    public readonly status: number,
    message: string,
    public readonly body?: unknown
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}
