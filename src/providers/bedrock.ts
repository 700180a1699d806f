import {
  BedrockRuntimeClient,
  InvokeModelCommand,
  InvokeModelWithResponseStreamCommand,
} from '@aws-sdk/client-bedrock-runtime';
import { Provider, BEDROCK_CLAUDE_MODELS } from '../types/provider.js';
import {
  type ChatCompletionRequest,
  type ChatCompletionResponse,
  type ChatCompletionStreamResponse,
  ProviderError,
} from '../types/request.js';
import { BaseProviderAdapter, mapStopReason, usageFrom } from './base.js';
import { buildClaudePrompt, HUMAN_PROMPT } from './prompt.js';
import { decodeEventStream } from '../streaming/eventStream.js';
import { type Logger } from '../utils/logger.js';

const DEFAULT_MAX_TOKENS_TO_SAMPLE = 2048;

export interface BedrockClaudeRequest {
  prompt: string;
  max_tokens_to_sample: number;
  temperature?: number;
  top_p?: number;
  stop_sequences: string[];
}

export interface BedrockClaudeResponse {
  completion: string;
  stop_reason: string | null;
  stop?: string | null;
  'amazon-bedrock-invocationMetrics'?: {
    inputTokenCount: number;
    outputTokenCount: number;
    invocationLatency?: number;
    firstByteLatency?: number;
  };
}

export interface BedrockAdapterOptions {
  region: string;
  accessKeyId: string;
  secretAccessKey: string;
  logger?: Logger;
  /** Pre-built client, mainly for tests */
  client?: Pick<BedrockRuntimeClient, 'send'>;
}

/**
 * AWS Bedrock adapter for Claude text-completion models.
 * The stream arrives as AWS event-stream chunks, each holding one JSON payload.
 */
export class BedrockAdapter extends BaseProviderAdapter {
  readonly provider = Provider.Bedrock;
  private readonly client: Pick<BedrockRuntimeClient, 'send'>;

  constructor(options: BedrockAdapterOptions) {
    super(options.logger);
    this.client =
      options.client ??
      new BedrockRuntimeClient({
        region: options.region,
        credentials: {
          accessKeyId: options.accessKeyId,
          secretAccessKey: options.secretAccessKey,
        },
      });
  }

  supportsModel(model: string): boolean {
    return BEDROCK_CLAUDE_MODELS.includes(model);
  }

  async listModels(): Promise<string[]> {
    return [...BEDROCK_CLAUDE_MODELS];
  }

  protected async complete(
    request: ChatCompletionRequest,
    signal?: AbortSignal
  ): Promise<ChatCompletionResponse> {
    const output = await this.client.send(
      new InvokeModelCommand({
        modelId: request.model,
        body: JSON.stringify(this.translateRequest(request)),
        accept: 'application/json',
        contentType: 'application/json',
      }),
      { abortSignal: signal }
    );

    const body = JSON.parse(new TextDecoder().decode(output.body)) as BedrockClaudeResponse;
    return this.translateResponse(body, request.model);
  }

  protected async *stream(
    request: ChatCompletionRequest,
    signal?: AbortSignal
  ): AsyncGenerator<ChatCompletionStreamResponse, void, undefined> {
    const output = await this.client.send(
      new InvokeModelWithResponseStreamCommand({
        modelId: request.model,
        body: JSON.stringify(this.translateRequest(request)),
        accept: 'application/json',
        contentType: 'application/json',
      }),
      { abortSignal: signal }
    );

    if (!output.body) {
      throw new ProviderError('bedrock', 502, 'Bedrock returned no response stream');
    }

    const id = this.buildId('bedrock');
    for await (const payload of decodeEventStream(output.body)) {
      yield this.translateChunk(payload as BedrockClaudeResponse, id, request.model);
    }
  }

  /**
   * Translate the internal request into Claude's text-completion body
   */
  translateRequest(request: ChatCompletionRequest): BedrockClaudeRequest {
    const stops = request.stop === undefined ? [] : Array.isArray(request.stop) ? request.stop : [request.stop];

    const body: BedrockClaudeRequest = {
      prompt: buildClaudePrompt(request.messages),
      max_tokens_to_sample: request.max_tokens ?? DEFAULT_MAX_TOKENS_TO_SAMPLE,
      stop_sequences: [HUMAN_PROMPT, ...stops],
    };
    if (request.temperature !== undefined) body.temperature = request.temperature;
    if (request.top_p !== undefined) body.top_p = request.top_p;
    return body;
  }

  translateResponse(body: BedrockClaudeResponse, requestedModel: string): ChatCompletionResponse {
    const metrics = body['amazon-bedrock-invocationMetrics'];
    return this.completion(
      this.buildId('bedrock'),
      requestedModel,
      body.completion.trimStart(),
      mapStopReason(body.stop_reason),
      metrics ? usageFrom(metrics.inputTokenCount, metrics.outputTokenCount) : undefined
    );
  }

  translateChunk(payload: BedrockClaudeResponse, id: string, requestedModel: string): ChatCompletionStreamResponse {
    const metrics = payload['amazon-bedrock-invocationMetrics'];
    return this.chunk(
      id,
      requestedModel,
      payload.completion,
      mapStopReason(payload.stop_reason),
      metrics ? usageFrom(metrics.inputTokenCount, metrics.outputTokenCount) : undefined
    );
  }
}
