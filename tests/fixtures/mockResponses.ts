import { vi } from 'vitest';
import type { Dispatcher } from 'undici';

/**
 * Mock upstream response fixtures for tests
 */

export const mockOpenAIChatResponse = {
  id: 'chatcmpl-test123',
  object: 'chat.completion',
  created: 1699000000,
  model: 'gpt-4-0613',
  choices: [
    {
      index: 0,
      message: {
        role: 'assistant',
        content: 'Hello! How can I help you today?',
      },
      finish_reason: 'stop',
    },
  ],
  usage: {
    prompt_tokens: 10,
    completion_tokens: 9,
    total_tokens: 19,
  },
};

/** An OpenAI stream split at awkward places, the way a socket delivers it. */
export const mockOpenAIStreamChunks = [
  'data: {"id":"chatcmpl-s1","created":1699000000,"model":"gpt-4-0613","choices":[{"index":0,"delta":{"role":"assistant","content":""},"finish_reason":null}]}\n\n',
  'data: {"id":"chatcmpl-s1","created":1699000000,"model":"gpt-4-0613","choices":[{"index":0,"delta":{"content":"Hel',
  'lo"},"finish_reason":null}]}\n\ndata: {"id":"chatcmpl-s1","created":1699000000,"model":"gpt-4-0613","choices":[{"index":0,"delta":{"content":" there"},"finish_reason":null}]}\n\n',
  'data: {"id":"chatcmpl-s1","created":1699000000,"model":"gpt-4-0613","choices":[{"index":0,"delta":{},"finish_reason":"stop"}]}\n\n',
  'data: [DONE]\n\n',
];

export const mockTogetherResponse = {
  id: 'together-test1',
  choices: [{ text: ' Paris is the capital of France.\n', finish_reason: 'eos' }],
  usage: { prompt_tokens: 12, completion_tokens: 7, total_tokens: 19 },
};

export const mockTogetherStreamChunks = [
  'data: {"id":"together-s1","choices":[{"text":"Par"}]}\n\n',
  'data: {"id":"together-s1","choices":[{"text":"is","finish_reason":"length"}],"usage":{"prompt_tokens":4,"completion_tokens":2,"total_tokens":6}}\n\n',
  'data: [DONE]\n\n',
];

export const mockTogetherModels = [
  { name: 'togethercomputer/llama-2-70b-chat', display_type: 'chat' },
  { name: 'togethercomputer/RedPajama-INCITE-7B-Base', display_type: 'language' },
  { name: 'mistralai/Mistral-7B-Instruct-v0.1', display_type: 'chat' },
];

export const mockClaudeWebStreamChunks = [
  'data: {"completion":" Hello","stop_reason":null,"model":"claude-2.0"}\n',
  '\n',
  'data: {"completion":" world","stop_reason":null,"model":"claude-2.0"}\n',
  'data: {"completion":"","stop_reason":"stop_sequence","model":"claude-2.0"}\n',
];

/** The Bard page fragment holding the two session tokens. */
export const mockBardHomePage =
  '<script>WIZ_global_data = {"SNlM0e":"test-at-token","cfb2h":"boq_assistant-bard-web-server_20231031.09_p7"};</script>';

/** A StreamGenerate body: the answer sits on the fourth line. */
export function mockBardStreamGenerate(content: string): string {
  const answer = JSON.stringify([
    null,
    ['c_test1', 'r_test1'],
    null,
    null,
    [
      ['rc_test1', [content]],
      ['rc_test2', ['Another draft']],
    ],
  ]);
  const envelope = JSON.stringify([['wrb.fr', null, answer]]);
  return `)]}'\n\n${envelope.length}\n${envelope}\n25\n[["e",4,null,null,123]]\n`;
}

/**
 * A stand-in for undici's `request` result. The body can be iterated as bytes or read
 * whole with `json()` / `text()`.
 */
export function mockUpstreamResponse(
  chunks: string[],
  statusCode = 200
): Dispatcher.ResponseData {
  const text = chunks.join('');
  const encoder = new TextEncoder();
  return {
    statusCode,
    headers: {},
    body: {
      async *[Symbol.asyncIterator]() {
        for (const chunk of chunks) yield encoder.encode(chunk);
      },
      json: vi.fn(async () => JSON.parse(text)),
      text: vi.fn(async () => text),
      dump: vi.fn(async () => undefined),
    },
  } as unknown as Dispatcher.ResponseData;
}

export function mockJsonResponse(payload: unknown, statusCode = 200): Dispatcher.ResponseData {
  return mockUpstreamResponse([JSON.stringify(payload)], statusCode);
}
