import type { FastifyReply } from 'fastify';
import { type ChatCompletionStreamResponse } from '../types/request.js';
import { type Logger } from '../utils/logger.js';
import { SSE_DONE } from './sse.js';
import { errorBody } from '../utils/errors.js';

/**
 * Relay a normalized stream to the client as Server-Sent Events.
 *
 * Every record becomes a `data:` frame. End-of-stream is announced with
 * `data: [DONE]`; an error is announced with a final `data: {"error": ...}` frame,
 * since the status line has already gone out by then. The response is always ended.
 */
export async function writeSSE(
  reply: FastifyReply,
  stream: AsyncIterable<ChatCompletionStreamResponse>,
  logger: Logger
): Promise<void> {
  reply.hijack();
  const raw = reply.raw;

  for (const [name, value] of Object.entries(reply.getHeaders())) {
    if (value !== undefined) raw.setHeader(name, value);
  }
  raw.setHeader('Content-Type', 'text/event-stream');
  raw.setHeader('Cache-Control', 'no-cache');
  raw.setHeader('Connection', 'keep-alive');
  raw.setHeader('X-Accel-Buffering', 'no'); // Critical for nginx
  raw.statusCode = 200;

  try {
    for await (const chunk of stream) {
      if (raw.destroyed) break;
      raw.write(`data: ${JSON.stringify(chunk)}\n\n`);
    }
    if (!raw.destroyed) raw.write(`data: ${SSE_DONE}\n\n`);
  } catch (err) {
    const { statusCode, body } = errorBody(err);
    logger.error({ err: body.error.message, statusCode }, 'chat stream error');
    if (!raw.destroyed) raw.write(`data: ${JSON.stringify(body)}\n\n`);
  } finally {
    raw.end();
  }
}
