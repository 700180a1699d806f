import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  InvokeModelCommand,
  InvokeModelWithResponseStreamCommand,
  type ResponseStream,
} from '@aws-sdk/client-bedrock-runtime';
import { BedrockAdapter } from '../../src/providers/bedrock.js';
import { ProviderError, type ChatCompletionStreamResponse } from '../../src/types/request.js';

const encoder = new TextEncoder();

function chunk(payload: unknown): ResponseStream {
  return { chunk: { bytes: encoder.encode(JSON.stringify(payload)) } };
}

async function* events(items: ResponseStream[]): AsyncGenerator<ResponseStream, void, undefined> {
  for (const item of items) yield item;
}

async function collect(stream: AsyncIterable<ChatCompletionStreamResponse>): Promise<ChatCompletionStreamResponse[]> {
  const records: ChatCompletionStreamResponse[] = [];
  for await (const record of stream) records.push(record);
  return records;
}

describe('BedrockAdapter', () => {
  let send: ReturnType<typeof vi.fn>;
  let adapter: BedrockAdapter;
  const chatRequest = { model: 'anthropic.claude-v2', messages: [{ role: 'user' as const, content: 'Hi' }] };

  beforeEach(() => {
    send = vi.fn();
    adapter = new BedrockAdapter({
      region: 'us-east-1',
      accessKeyId: 'test-key',
      secretAccessKey: 'test-secret',
      client: { send } as never,
    });
  });

  it('serves the Claude text-completion models', async () => {
    expect(adapter.supportsModel('anthropic.claude-instant-v1')).toBe(true);
    expect(adapter.supportsModel('anthropic.claude-3-sonnet')).toBe(false);
    expect(await adapter.listModels()).toEqual([
      'anthropic.claude-v2',
      'anthropic.claude-v1',
      'anthropic.claude-instant-v1',
    ]);
  });

  describe('translateRequest', () => {
    it('renders a Human/Assistant prompt with stop sequences', () => {
      const body = adapter.translateRequest({
        model: 'anthropic.claude-v2',
        messages: [
          { role: 'system', content: 'Be brief.' },
          { role: 'user', content: 'Hi' },
          { role: 'assistant', content: 'Hello' },
          { role: 'user', content: 'Bye' },
        ],
        stop: 'END',
        temperature: 0.5,
      });

      expect(body).toEqual({
        prompt: 'Be brief.\n\nHuman: Hi\n\nAssistant: Hello\n\nHuman: Bye\n\nAssistant:',
        max_tokens_to_sample: 2048,
        stop_sequences: ['\n\nHuman:', 'END'],
        temperature: 0.5,
      });
    });

    it('uses max_tokens and top_p when given', () => {
      const body = adapter.translateRequest({ ...chatRequest, max_tokens: 300, top_p: 0.9, stop: ['a', 'b'] });
      expect(body.max_tokens_to_sample).toBe(300);
      expect(body.top_p).toBe(0.9);
      expect(body.stop_sequences).toEqual(['\n\nHuman:', 'a', 'b']);
    });
  });

  describe('createChatCompletion', () => {
    it('invokes the model and trims the leading space of the completion', async () => {
      send.mockResolvedValueOnce({
        body: encoder.encode(JSON.stringify({ completion: ' Hi there', stop_reason: 'stop_sequence' })),
      });

      const response = await adapter.createChatCompletion(chatRequest);

      const command: unknown = send.mock.calls[0]?.[0];
      expect(command).toBeInstanceOf(InvokeModelCommand);
      expect(command).toMatchObject({ input: { modelId: 'anthropic.claude-v2', contentType: 'application/json' } });
      expect(response.model).toBe('anthropic.claude-v2');
      expect(response.choices[0]?.message.content).toBe('Hi there');
      expect(response.choices[0]?.finish_reason).toBe('stop');
      expect(response.usage).toBeUndefined();
    });

    it('maps max_tokens to a length finish', async () => {
      send.mockResolvedValueOnce({
        body: encoder.encode(JSON.stringify({ completion: 'cut', stop_reason: 'max_tokens' })),
      });

      const response = await adapter.createChatCompletion(chatRequest);
      expect(response.choices[0]?.finish_reason).toBe('length');
    });

    it('passes the abort signal to the SDK', async () => {
      send.mockResolvedValueOnce({ body: encoder.encode(JSON.stringify({ completion: 'ok', stop_reason: null })) });
      const controller = new AbortController();

      await adapter.createChatCompletion(chatRequest, controller.signal);

      expect(send.mock.calls[0]?.[1]).toEqual({ abortSignal: controller.signal });
    });
  });

  describe('createChatCompletionStream', () => {
    it('emits each chunk and reports usage from the invocation metrics', async () => {
      send.mockResolvedValueOnce({
        body: events([
          chunk({ completion: ' Hi', stop_reason: null }),
          chunk({
            completion: '!',
            stop_reason: 'stop_sequence',
            'amazon-bedrock-invocationMetrics': { inputTokenCount: 12, outputTokenCount: 3 },
          }),
        ]),
      });

      const records = await collect(adapter.createChatCompletionStream(chatRequest));

      expect(send.mock.calls[0]?.[0]).toBeInstanceOf(InvokeModelWithResponseStreamCommand);
      expect(records.map((r) => r.choices[0]?.delta.content)).toEqual([' Hi', '!']);
      expect(records.map((r) => r.choices[0]?.finish_reason)).toEqual([null, 'stop']);
      expect(records[0]?.usage).toBeUndefined();
      expect(records[1]?.usage).toEqual({ prompt_tokens: 12, completion_tokens: 3, total_tokens: 15 });
      expect(records[0]?.id).toBe(records[1]?.id);
    });

    it('fails when the response has no stream', async () => {
      send.mockResolvedValueOnce({});

      const error = await collect(adapter.createChatCompletionStream(chatRequest)).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ProviderError);
      expect(error).toMatchObject({ status: 502, message: 'Bedrock returned no response stream' });
    });

    it('fails on an event member it does not know', async () => {
      send.mockResolvedValueOnce({
        body: events([chunk({ completion: 'a', stop_reason: null }), { $unknown: ['heartbeat', {}] }]),
      });

      await expect(collect(adapter.createChatCompletionStream(chatRequest))).rejects.toThrow(
        'unknown event type: heartbeat'
      );
    });
  });
});
