import { ZodError } from 'zod';
import { ProviderError } from '../types/request.js';
import { MalformedFrameError } from '../streaming/sse.js';

export class NotFoundError extends Error {
  constructor(
    public readonly resource: string,
    public readonly id: string
  ) {
    super(`${resource} '${id}' not found`);
    this.name = 'NotFoundError';
  }
}

export class UnknownModelError extends Error {
  constructor(public readonly model: string) {
    super(`Unknown model: ${model}`);
    this.name = 'UnknownModelError';
  }
}

export interface ErrorEnvelope {
  error: {
    message: string;
    type: string;
    code: string;
  };
}

/**
 * Map any thrown value onto an HTTP status and the error envelope clients receive.
 */
export function errorBody(err: unknown): { statusCode: number; body: ErrorEnvelope } {
  const message = err instanceof Error ? err.message : 'Internal server error';

  if (err instanceof Error && err.name === 'AbortError') {
    return envelope(499, 'Request cancelled by client', 'request_cancelled', 'client_closed_request');
  }
  if (err instanceof ZodError) {
    const issue = err.errors[0];
    const detail = issue ? issue.message : 'Invalid request body';
    return envelope(400, detail, 'invalid_request_error', 'invalid_request');
  }
  if (err instanceof NotFoundError) {
    return envelope(404, message, 'invalid_request_error', 'not_found');
  }
  if (err instanceof UnknownModelError) {
    return envelope(400, message, 'invalid_request_error', 'unknown_model');
  }
  if (err instanceof ProviderError) {
    const status = err.status >= 400 ? err.status : 502;
    return envelope(status, message, status >= 500 ? 'api_error' : 'invalid_request_error', 'provider_error');
  }
  if (err instanceof MalformedFrameError) {
    return envelope(502, message, 'api_error', 'malformed_frame');
  }

  // Fastify's own errors (body parsing, content type) carry their status
  const statusCode = statusCodeOf(err);
  if (statusCode !== undefined && statusCode < 500) {
    return envelope(statusCode, message, 'invalid_request_error', 'bad_request');
  }

  return envelope(500, message, 'api_error', 'internal_server_error');
}

function statusCodeOf(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'statusCode' in err && typeof err.statusCode === 'number') {
    return err.statusCode;
  }
  return undefined;
}

function envelope(
  statusCode: number,
  message: string,
  type: string,
  code: string
): { statusCode: number; body: ErrorEnvelope } {
  return { statusCode, body: { error: { message, type, code } } };
}
