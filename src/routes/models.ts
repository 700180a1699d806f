import type { FastifyInstance } from 'fastify';
import { type ModelRegistry } from '../core/ModelRegistry.js';

export function createModelRoutes(registry: ModelRegistry) {
  return async function modelRoutes(fastify: FastifyInstance): Promise<void> {
    fastify.get('/v1/models', async (_request, reply) => {
      const data = await registry.listModels();
      return reply.status(200).send({ object: 'list', data });
    });
  };
}
