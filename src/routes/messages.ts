import type { FastifyInstance } from 'fastify';
import { type ConversationService } from '../core/ConversationService.js';
import { createMessageSchema } from '../types/conversation.js';
import { writeSSE } from '../streaming/sseWriter.js';
import { clientAbortSignal } from '../middleware/clientAbort.js';

interface MessagesParams {
  conversationId: string;
}

interface MessageParams extends MessagesParams {
  messageId: string;
}

/**
 * Messages inside a conversation. Posting a message runs it against the
 * conversation's history, as JSON or, with `stream: true`, as Server-Sent Events.
 */
export function createMessagesRoutes(service: ConversationService) {
  return async function messagesRoutes(fastify: FastifyInstance): Promise<void> {
    fastify.post<{ Params: MessagesParams }>(
      '/v1/conversations/:conversationId/messages',
      async (request, reply) => {
        const body = createMessageSchema.parse(request.body);
        const { conversationId } = request.params;
        const signal = clientAbortSignal(reply);

        if (body.stream) {
          const stream = await service.createMessageStream(conversationId, body, signal);
          await writeSSE(reply, stream, request.log);
          return reply;
        }

        const message = await service.createMessage(conversationId, body, signal);
        return reply.status(201).send(message);
      }
    );

    fastify.get<{ Params: MessagesParams }>(
      '/v1/conversations/:conversationId/messages',
      async (request, reply) => {
        const data = await service.listMessages(request.params.conversationId);
        return reply.status(200).send({ object: 'list', data });
      }
    );

    fastify.get<{ Params: MessageParams }>(
      '/v1/conversations/:conversationId/messages/:messageId',
      async (request, reply) => {
        const { conversationId, messageId } = request.params;
        return reply.status(200).send(await service.getMessage(conversationId, messageId));
      }
    );

    fastify.delete<{ Params: MessageParams }>(
      '/v1/conversations/:conversationId/messages/:messageId',
      async (request, reply) => {
        const { conversationId, messageId } = request.params;
        await service.deleteMessage(conversationId, messageId);
        return reply.status(200).send({ id: messageId, object: 'message', deleted: true });
      }
    );
  };
}
