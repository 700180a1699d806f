import { describe, it, expect, beforeEach, vi } from 'vitest';
import { request } from 'undici';
import { OpenAIAdapter } from '../../src/providers/openai.js';
import { ProviderError, type ChatCompletionStreamResponse } from '../../src/types/request.js';
import { MalformedFrameError } from '../../src/streaming/sse.js';
import {
  mockJsonResponse,
  mockOpenAIChatResponse,
  mockOpenAIStreamChunks,
  mockUpstreamResponse,
} from '../fixtures/mockResponses.js';

vi.mock('undici', () => ({
  request: vi.fn(),
}));

async function collect(stream: AsyncIterable<ChatCompletionStreamResponse>): Promise<ChatCompletionStreamResponse[]> {
  const records: ChatCompletionStreamResponse[] = [];
  for await (const record of stream) records.push(record);
  return records;
}

describe('OpenAIAdapter', () => {
  const adapter = new OpenAIAdapter({ apiKey: 'test-secret' });
  const chatRequest = { model: 'gpt-4', messages: [{ role: 'user' as const, content: 'Hello' }] };

  beforeEach(() => {
    vi.mocked(request).mockReset();
  });

  describe('supportsModel', () => {
    it('accepts listed and gpt-* models only', () => {
      expect(adapter.supportsModel('gpt-4')).toBe(true);
      expect(adapter.supportsModel('gpt-4o-mini')).toBe(true);
      expect(adapter.supportsModel('claude-2')).toBe(false);
    });
  });

  describe('createChatCompletion', () => {
    it('posts the request with stream disabled and a bearer key', async () => {
      vi.mocked(request).mockResolvedValueOnce(mockJsonResponse(mockOpenAIChatResponse));

      await adapter.createChatCompletion({ ...chatRequest, stream: true });

      const [url, options] = vi.mocked(request).mock.calls[0] ?? [];
      expect(url).toBe('https://api.openai.com/v1/chat/completions');
      expect(options?.method).toBe('POST');
      expect(options?.headers).toMatchObject({ Authorization: 'Bearer test-secret' });
      expect(JSON.parse(String(options?.body))).toEqual({ ...chatRequest, stream: false });
    });

    it('translates the response under the requested model name', async () => {
      vi.mocked(request).mockResolvedValueOnce(mockJsonResponse(mockOpenAIChatResponse));

      const response = await adapter.createChatCompletion(chatRequest);

      expect(response.id).toBe('chatcmpl-test123');
      expect(response.model).toBe('gpt-4');
      expect(response.choices[0]?.message.content).toBe('Hello! How can I help you today?');
      expect(response.choices[0]?.finish_reason).toBe('stop');
      expect(response.usage).toEqual({ prompt_tokens: 10, completion_tokens: 9, total_tokens: 19 });
    });

    it('raises upstream errors as ProviderError with the parsed body', async () => {
      vi.mocked(request).mockResolvedValueOnce(mockJsonResponse({ error: { message: 'Rate limit reached' } }, 429));

      const error = await adapter.createChatCompletion(chatRequest).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ProviderError);
      expect(error).toMatchObject({
        provider: 'openai',
        status: 429,
        message: 'openai API error: 429',
        body: { error: { message: 'Rate limit reached' } },
      });
    });

    it('uses a configured base URL', async () => {
      const proxied = new OpenAIAdapter({ apiKey: 'test-secret', baseUrl: 'http://localhost:8080' });
      vi.mocked(request).mockResolvedValueOnce(mockJsonResponse(mockOpenAIChatResponse));

      await proxied.createChatCompletion(chatRequest);

      expect(vi.mocked(request).mock.calls[0]?.[0]).toBe('http://localhost:8080/v1/chat/completions');
    });
  });

  describe('createChatCompletionStream', () => {
    it('emits one record per SSE frame until [DONE]', async () => {
      vi.mocked(request).mockResolvedValueOnce(mockUpstreamResponse(mockOpenAIStreamChunks));

      const records = await collect(adapter.createChatCompletionStream({ ...chatRequest, stream: true }));

      expect(records.map((r) => r.choices[0]?.delta)).toEqual([
        { role: 'assistant', content: '' },
        { content: 'Hello' },
        { content: ' there' },
        {},
      ]);
      expect(records.map((r) => r.choices[0]?.finish_reason)).toEqual([null, null, null, 'stop']);
      expect(records.every((r) => r.object === 'chat.completion.chunk' && r.model === 'gpt-4')).toBe(true);

      const body = JSON.parse(String(vi.mocked(request).mock.calls[0]?.[1]?.body));
      expect(body.stream).toBe(true);
    });

    it('ends with an error when a frame is malformed', async () => {
      vi.mocked(request).mockResolvedValueOnce(
        mockUpstreamResponse(['data: {"id":"x","choices":[{"index":0,"delta":{"content":"a"}}]}\n\n', 'data: {oops\n\n'])
      );

      const channel = adapter.createChatCompletionStream(chatRequest);
      const seen: string[] = [];
      const drained = (async () => {
        for await (const record of channel) seen.push(record.choices[0]?.delta.content ?? '');
      })();

      await expect(drained).rejects.toBeInstanceOf(MalformedFrameError);
      expect(seen).toEqual(['a']);
    });

    it('ends with a ProviderError when the upstream refuses', async () => {
      vi.mocked(request).mockResolvedValueOnce(mockJsonResponse({ error: { message: 'bad key' } }, 401));

      await expect(collect(adapter.createChatCompletionStream(chatRequest))).rejects.toMatchObject({
        status: 401,
      });
    });
  });
});
