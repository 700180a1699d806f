import type { FastifyInstance } from 'fastify';
import { type ConversationService } from '../core/ConversationService.js';
import { createConversationSchema } from '../types/conversation.js';

interface ConversationParams {
  id: string;
}

export function createConversationRoutes(service: ConversationService) {
  return async function conversationRoutes(fastify: FastifyInstance): Promise<void> {
    fastify.post('/v1/conversations', async (request, reply) => {
      const body = createConversationSchema.parse(request.body);
      const conversation = await service.createConversation(body.name, body.model);
      return reply.status(201).send(conversation);
    });

    fastify.get('/v1/conversations', async (_request, reply) => {
      const data = await service.listConversations();
      return reply.status(200).send({ object: 'list', data });
    });

    fastify.get<{ Params: ConversationParams }>('/v1/conversations/:id', async (request, reply) => {
      return reply.status(200).send(await service.getConversation(request.params.id));
    });

    fastify.delete<{ Params: ConversationParams }>('/v1/conversations/:id', async (request, reply) => {
      await service.deleteConversation(request.params.id);
      return reply.status(200).send({ id: request.params.id, object: 'conversation', deleted: true });
    });
  };
}
