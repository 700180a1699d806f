import { request as undiciRequest, type Dispatcher } from 'undici';
import { ProviderError } from '../types/request.js';

export interface UpstreamRequest {
  method: 'GET' | 'POST' | 'DELETE';
  headers: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

/**
 * Issue an upstream HTTP call. Any status >= 400 is raised as a ProviderError carrying
 * the upstream body (parsed as JSON when possible); the caller owns the body otherwise.
 */
export async function requestUpstream(
  provider: string,
  url: string,
  options: UpstreamRequest
): Promise<Dispatcher.ResponseData> {
  const response = await undiciRequest(url, {
    method: options.method,
    headers: options.headers,
    body: options.body,
    signal: options.signal,
  });

  if (!response.statusCode || response.statusCode >= 400) {
    const text = await response.body.text().catch(() => '');
    throw new ProviderError(
      provider,
      response.statusCode ?? 500,
      `${provider} API error: ${response.statusCode}`,
      parseErrorBody(text)
    );
  }

  return response;
}

function parseErrorBody(text: string): unknown {
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return text;
  }
}
