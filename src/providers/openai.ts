import { Provider, OPENAI_MODELS } from '../types/provider.js';
import {
  type ChatCompletionRequest,
  type ChatCompletionResponse,
  type ChatCompletionStreamResponse,
  type FinishReason,
  type UsageInfo,
} from '../types/request.js';
import { BaseProviderAdapter } from './base.js';
import { requestUpstream } from '../utils/http.js';
import { splitLines } from '../streaming/lines.js';
import { parseSSEJson } from '../streaming/sse.js';
import { type Logger } from '../utils/logger.js';

const OPENAI_BASE_URL = 'https://api.openai.com';

export interface OpenAIChoice {
  index: number;
  message?: { role: string; content: string | null };
  delta?: { role?: string; content?: string | null };
  finish_reason: FinishReason;
}

export interface OpenAIChatResponse {
  id: string;
  created: number;
  model: string;
  choices?: OpenAIChoice[];
  usage?: UsageInfo;
}

export interface OpenAIAdapterOptions {
  apiKey: string;
  baseUrl?: string;
  logger?: Logger;
}

/**
 * OpenAI adapter. Little translation is needed since the internal shapes are OpenAI's.
 * The stream is SSE with JSON deltas, terminated by `[DONE]`.
 */
export class OpenAIAdapter extends BaseProviderAdapter {
  readonly provider = Provider.OpenAI;
  private readonly apiKey: string;
  private readonly baseUrl: string;

  constructor(options: OpenAIAdapterOptions) {
    super(options.logger);
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? OPENAI_BASE_URL;
  }

  supportsModel(model: string): boolean {
    return OPENAI_MODELS.includes(model) || model.startsWith('gpt-');
  }

  async listModels(): Promise<string[]> {
    return [...OPENAI_MODELS];
  }

  protected async complete(
    request: ChatCompletionRequest,
    signal?: AbortSignal
  ): Promise<ChatCompletionResponse> {
    const response = await this.post({ ...request, stream: false }, signal);
    const body = (await response.json()) as OpenAIChatResponse;
    return this.translateResponse(body, request.model);
  }

  protected async *stream(
    request: ChatCompletionRequest,
    signal?: AbortSignal
  ): AsyncGenerator<ChatCompletionStreamResponse, void, undefined> {
    const response = await this.post({ ...request, stream: true }, signal);

    for await (const frame of parseSSEJson(splitLines(response))) {
      yield this.translateChunk(frame as OpenAIChatResponse, request.model);
    }
  }

  translateResponse(body: OpenAIChatResponse, requestedModel: string): ChatCompletionResponse {
    const choice = body.choices?.[0];
    return this.completion(
      body.id,
      requestedModel,
      choice?.message?.content ?? '',
      choice?.finish_reason ?? null,
      body.usage
    );
  }

  translateChunk(frame: OpenAIChatResponse, requestedModel: string): ChatCompletionStreamResponse {
    const choice = frame.choices?.[0];
    const content = choice?.delta?.content ?? undefined;
    const record = this.chunk(frame.id, requestedModel, content, choice?.finish_reason ?? null, frame.usage);
    const first = record.choices[0];
    if (first && choice?.delta?.role === 'assistant') {
      first.delta.role = 'assistant';
    }
    return record;
  }

  private async post(body: ChatCompletionRequest, signal?: AbortSignal) {
    const response = await requestUpstream('openai', `${this.baseUrl}/v1/chat/completions`, {
      method: 'POST',
      headers: {
        'Authorization': `Bearer ${this.apiKey}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(body),
      signal,
    });
    return response.body;
  }
}
