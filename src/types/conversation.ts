import { z } from 'zod';
import { chatCompletionRequestSchema, type ChatMessage } from './request.js';

export interface Conversation {
  id: string;
  name: string;
  model: string;
  createdAt: string;
  updatedAt: string;
}

/**
 * One exchange inside a conversation: the messages sent and the assistant's answer.
 */
export interface Message {
  id: string;
  conversationId: string;
  model: string;
  request: ChatMessage[];
  response: string;
  tokenUsage: number;
  createdAt: string;
}

export interface UsageRecord {
  id: string;
  model: string;
  tokenUsage: number;
  user?: string;
  createdAt: string;
}

export const createConversationSchema = z.object({
  name: z.string().max(200).optional(),
  model: z
    .string({ required_error: 'Missing required field: model' })
    .min(1, 'Missing required field: model'),
});

/** A message may omit `model`; the conversation's model is used then. */
export const createMessageSchema = chatCompletionRequestSchema.extend({
  model: z.string().min(1).optional(),
});

export type CreateConversationRequest = z.infer<typeof createConversationSchema>;
export type CreateMessageRequest = z.infer<typeof createMessageSchema>;
