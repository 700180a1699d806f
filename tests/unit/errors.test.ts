import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { NotFoundError, UnknownModelError, errorBody } from '../../src/utils/errors.js';
import { ProviderError } from '../../src/types/request.js';
import { MalformedFrameError } from '../../src/streaming/sse.js';

describe('errorBody', () => {
  it('maps NotFoundError to 404', () => {
    expect(errorBody(new NotFoundError('Conversation', 'c1'))).toEqual({
      statusCode: 404,
      body: { error: { message: "Conversation 'c1' not found", type: 'invalid_request_error', code: 'not_found' } },
    });
  });

  it('maps UnknownModelError to 400', () => {
    expect(errorBody(new UnknownModelError('llama')).statusCode).toBe(400);
    expect(errorBody(new UnknownModelError('llama')).body.error.code).toBe('unknown_model');
  });

  it('keeps the upstream status of a ProviderError', () => {
    expect(errorBody(new ProviderError('openai', 429, 'openai API error: 429'))).toEqual({
      statusCode: 429,
      body: { error: { message: 'openai API error: 429', type: 'invalid_request_error', code: 'provider_error' } },
    });
    expect(errorBody(new ProviderError('openai', 503, 'openai API error: 503')).body.error.type).toBe('api_error');
  });

  it('maps an aborted request to 499', () => {
    const abort = new Error('This operation was aborted');
    abort.name = 'AbortError';
    expect(errorBody(abort)).toEqual({
      statusCode: 499,
      body: {
        error: { message: 'Request cancelled by client', type: 'request_cancelled', code: 'client_closed_request' },
      },
    });
  });

  it('maps a malformed frame to 502', () => {
    expect(errorBody(new MalformedFrameError('Malformed stream frame: x', 'x')).statusCode).toBe(502);
  });

  it('reports the first validation issue', () => {
    const result = z.object({ model: z.string({ required_error: 'Missing required field: model' }) }).safeParse({});
    const error = result.success ? null : result.error;

    expect(errorBody(error)).toEqual({
      statusCode: 400,
      body: { error: { message: 'Missing required field: model', type: 'invalid_request_error', code: 'invalid_request' } },
    });
  });

  it('treats anything else as an internal error', () => {
    expect(errorBody(new Error('boom'))).toEqual({
      statusCode: 500,
      body: { error: { message: 'boom', type: 'api_error', code: 'internal_server_error' } },
    });
    expect(errorBody('weird').body.error.message).toBe('Internal server error');
  });
});
