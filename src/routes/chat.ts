import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { type ConversationService } from '../core/ConversationService.js';
import { chatCompletionRequestSchema } from '../types/request.js';
import { writeSSE } from '../streaming/sseWriter.js';
import { clientAbortSignal } from '../middleware/clientAbort.js';

/**
 * OpenAI-compatible stateless chat endpoint.
 */
export function createChatRoutes(service: ConversationService) {
  return async function chatRoutes(fastify: FastifyInstance): Promise<void> {
    fastify.post('/v1/chat/completions', async (request: FastifyRequest, reply: FastifyReply) => {
      const body = chatCompletionRequestSchema.parse(request.body);

      // Abort the upstream call when the client disconnects
      const signal = clientAbortSignal(reply);

      if (body.stream) {
        const stream = await service.createChatCompletionStream(body, signal);
        await writeSSE(reply, stream, request.log);
        return reply;
      }

      const response = await service.createChatCompletion(body, signal);
      return reply.status(200).send(response);
    });
  };
}
