import { randomUUID } from 'crypto';
import type { FastifyRequest, FastifyReply } from 'fastify';

export const REQUEST_ID_HEADER = 'x-request-id';

/**
 * onRequest hook: every response carries an x-request-id, the client's own when it
 * sent a non-empty one.
 */
export async function requestIdHook(request: FastifyRequest, reply: FastifyReply): Promise<void> {
  const existing = request.headers[REQUEST_ID_HEADER];
  const requestId = typeof existing === 'string' && existing.length > 0 ? existing : randomUUID();

  request.requestId = requestId;
  void reply.header(REQUEST_ID_HEADER, requestId);
}

declare module 'fastify' {
  interface FastifyRequest {
    requestId: string;
  }
}
