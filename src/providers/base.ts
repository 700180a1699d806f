import { type Provider } from '../types/provider.js';
import {
  type ChatCompletionRequest,
  type ChatCompletionResponse,
  type ChatCompletionStreamResponse,
  type FinishReason,
  type UsageInfo,
} from '../types/request.js';
import { StreamChannel } from '../streaming/channel.js';
import { type Logger, silentLogger } from '../utils/logger.js';

/**
 * Uniform interface over every upstream LLM.
 * Each adapter translates between the internal OpenAI-style shapes and the provider's native API.
 */
export interface ProviderAdapter {
  readonly provider: Provider;

  /** Whether this adapter serves the given model name. */
  supportsModel(model: string): boolean;

  listModels(): Promise<string[]>;

  createChatCompletion(request: ChatCompletionRequest, signal?: AbortSignal): Promise<ChatCompletionResponse>;

  /**
   * Start a streaming completion. The upstream read loop runs as its own task and
   * feeds the returned channel, which always ends with exactly one terminal signal.
   */
  createChatCompletionStream(
    request: ChatCompletionRequest,
    signal?: AbortSignal
  ): StreamChannel<ChatCompletionStreamResponse>;
}

/**
 * Base class with shared utilities for provider adapters
 */
export abstract class BaseProviderAdapter implements ProviderAdapter {
  abstract readonly provider: Provider;

  protected constructor(protected readonly logger: Logger = silentLogger) {}

  abstract supportsModel(model: string): boolean;

  abstract listModels(): Promise<string[]>;

  async createChatCompletion(
    request: ChatCompletionRequest,
    signal?: AbortSignal
  ): Promise<ChatCompletionResponse> {
    this.logger.info({ provider: this.provider, model: request.model, is_stream: false }, 'chat start');
    try {
      const response = await this.complete(request, signal);
      this.logger.info({ provider: this.provider, model: request.model, is_stream: false }, 'chat success');
      return response;
    } catch (err) {
      this.logger.error(
        { provider: this.provider, model: request.model, is_stream: false, err: errorMessage(err) },
        'chat error'
      );
      throw err;
    }
  }

  createChatCompletionStream(
    request: ChatCompletionRequest,
    signal?: AbortSignal
  ): StreamChannel<ChatCompletionStreamResponse> {
    return StreamChannel.from(this.logStream(request, signal));
  }

  /** One complete, non-streaming completion from the upstream. */
  protected abstract complete(
    request: ChatCompletionRequest,
    signal?: AbortSignal
  ): Promise<ChatCompletionResponse>;

  /** The upstream read loop, already translated into uniform records. */
  protected abstract stream(
    request: ChatCompletionRequest,
    signal?: AbortSignal
  ): AsyncIterable<ChatCompletionStreamResponse>;

  private async *logStream(
    request: ChatCompletionRequest,
    signal?: AbortSignal
  ): AsyncGenerator<ChatCompletionStreamResponse, void, undefined> {
    this.logger.info({ provider: this.provider, model: request.model, is_stream: true }, 'chat start');
    try {
      yield* this.stream(request, signal);
    } catch (err) {
      this.logger.error(
        { provider: this.provider, model: request.model, is_stream: true, err: errorMessage(err) },
        'chat error'
      );
      throw err;
    }
    this.logger.info({ provider: this.provider, model: request.model, is_stream: true }, 'chat success');
  }

  protected buildId(prefix: string): string {
    return `${prefix}-${Date.now()}-${Math.random().toString(36).slice(2, 9)}`;
  }

  protected currentTimestamp(): number {
    return Math.floor(Date.now() / 1000);
  }

  protected completion(
    id: string,
    model: string,
    content: string,
    finishReason: FinishReason,
    usage?: UsageInfo
  ): ChatCompletionResponse {
    const response: ChatCompletionResponse = {
      id,
      object: 'chat.completion',
      created: this.currentTimestamp(),
      model,
      choices: [
        {
          index: 0,
          message: { role: 'assistant', content },
          finish_reason: finishReason,
        },
      ],
    };
    if (usage) response.usage = usage;
    return response;
  }

  protected chunk(
    id: string,
    model: string,
    content: string | undefined,
    finishReason: FinishReason,
    usage?: UsageInfo
  ): ChatCompletionStreamResponse {
    const record: ChatCompletionStreamResponse = {
      id,
      object: 'chat.completion.chunk',
      created: this.currentTimestamp(),
      model,
      choices: [
        {
          index: 0,
          delta: content === undefined ? {} : { content },
          finish_reason: finishReason,
        },
      ],
    };
    if (usage) record.usage = usage;
    return record;
  }
}

export function usageFrom(promptTokens: number, completionTokens: number): UsageInfo {
  return {
    prompt_tokens: promptTokens,
    completion_tokens: completionTokens,
    total_tokens: promptTokens + completionTokens,
  };
}

/**
 * Claude-family stop reasons onto OpenAI finish reasons.
 */
export function mapStopReason(reason: string | null | undefined): FinishReason {
  switch (reason) {
    case 'stop_sequence':
    case 'end_turn':
      return 'stop';
    case 'max_tokens':
      return 'length';
    default:
      return null;
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
