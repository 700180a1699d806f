import { readFile, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { Provider } from '../types/provider.js';
import {
  type ChatCompletionRequest,
  type ChatCompletionResponse,
  type ChatCompletionStreamResponse,
  type FinishReason,
  type UsageInfo,
} from '../types/request.js';
import { BaseProviderAdapter } from './base.js';
import { flattenMessages } from './prompt.js';
import { requestUpstream } from '../utils/http.js';
import { splitLines } from '../streaming/lines.js';
import { parseSSEJson } from '../streaming/sse.js';
import { type Logger } from '../utils/logger.js';

const TOGETHER_BASE_URL = 'https://api.together.xyz';
const DEFAULT_MAX_TOKENS = 1024;

const togetherModelsSchema = z.array(
  z
    .object({
      name: z.string(),
      display_name: z.string().nullish(),
      display_type: z.string().nullish(),
      description: z.string().nullish(),
      context_length: z.number().nullish(),
    })
    .passthrough()
);

export type TogetherModel = z.infer<typeof togetherModelsSchema>[number];

export interface TogetherCompletionRequest {
  model: string;
  prompt: string;
  max_tokens: number;
  temperature?: number;
  top_p?: number;
  stop?: string[];
  stream: boolean;
}

export interface TogetherCompletionResponse {
  id?: string;
  model?: string;
  choices?: Array<{ text?: string; finish_reason?: string | null }>;
  usage?: UsageInfo | null;
}

export interface TogetherAdapterOptions {
  apiKey: string;
  baseUrl?: string;
  /** Where the model list is cached between runs */
  modelsCacheFile?: string;
  logger?: Logger;
}

/**
 * Together.xyz adapter over the plain-text `/v1/completions` endpoint.
 * The stream is SSE with JSON deltas, terminated by `[DONE]`.
 */
export class TogetherAdapter extends BaseProviderAdapter {
  readonly provider = Provider.Together;
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly modelsCacheFile: string;

  constructor(options: TogetherAdapterOptions) {
    super(options.logger);
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? TOGETHER_BASE_URL;
    this.modelsCacheFile = options.modelsCacheFile ?? join(tmpdir(), 'together_models.json');
  }

  // Together model ids are namespaced, e.g. `togethercomputer/llama-2-70b-chat`
  supportsModel(model: string): boolean {
    return model.includes('/');
  }

  /**
   * Chat models offered by Together. The raw list is fetched once and cached on disk.
   * A reply that is not a model list yields no models and is not cached.
   */
  async listModels(): Promise<string[]> {
    let models = await this.readModelsCache();
    if (models === null) {
      models = await this.fetchModels();
      if (models === null) return [];
      await writeFile(this.modelsCacheFile, JSON.stringify(models));
    }
    return models.filter((m) => m.display_type === 'chat').map((m) => m.name);
  }

  protected async complete(
    request: ChatCompletionRequest,
    signal?: AbortSignal
  ): Promise<ChatCompletionResponse> {
    const response = await this.post(this.translateRequest(request, false), signal);
    const body = (await response.json()) as TogetherCompletionResponse;
    return this.translateResponse(body, request.model);
  }

  protected async *stream(
    request: ChatCompletionRequest,
    signal?: AbortSignal
  ): AsyncGenerator<ChatCompletionStreamResponse, void, undefined> {
    const response = await this.post(this.translateRequest(request, true), signal);
    const id = this.buildId('together');

    for await (const frame of parseSSEJson(splitLines(response))) {
      yield this.translateChunk(frame as TogetherCompletionResponse, id, request.model);
    }
  }

  translateRequest(request: ChatCompletionRequest, stream: boolean): TogetherCompletionRequest {
    const body: TogetherCompletionRequest = {
      model: request.model,
      prompt: `${flattenMessages(request.messages, { user: '<human>', assistant: '<bot>' })}\n\n<bot>:`,
      max_tokens: request.max_tokens ?? DEFAULT_MAX_TOKENS,
      stream,
    };
    if (request.temperature !== undefined) body.temperature = request.temperature;
    if (request.top_p !== undefined) body.top_p = request.top_p;
    if (request.stop !== undefined) body.stop = Array.isArray(request.stop) ? request.stop : [request.stop];
    return body;
  }

  translateResponse(body: TogetherCompletionResponse, requestedModel: string): ChatCompletionResponse {
    const choice = body.choices?.[0];
    return this.completion(
      body.id ?? this.buildId('together'),
      requestedModel,
      (choice?.text ?? '').trim(),
      toFinishReason(choice?.finish_reason) ?? 'stop',
      body.usage ?? undefined
    );
  }

  translateChunk(frame: TogetherCompletionResponse, id: string, requestedModel: string): ChatCompletionStreamResponse {
    const choice = frame.choices?.[0];
    return this.chunk(
      frame.id ?? id,
      requestedModel,
      choice?.text,
      toFinishReason(choice?.finish_reason),
      frame.usage ?? undefined
    );
  }

  private async post(body: TogetherCompletionRequest, signal?: AbortSignal) {
    const response = await requestUpstream('together', `${this.baseUrl}/v1/completions`, {
      method: 'POST',
      headers: this.headers(),
      body: JSON.stringify(body),
      signal,
    });
    return response.body;
  }

  private async fetchModels(): Promise<TogetherModel[] | null> {
    const response = await requestUpstream('together', `${this.baseUrl}/models/info`, {
      method: 'GET',
      headers: this.headers(),
    });
    const parsed = togetherModelsSchema.safeParse(await response.body.json());
    if (!parsed.success) {
      this.logger.warn({ err: parsed.error.errors[0]?.message }, 'together models reply is not a model list');
      return null;
    }
    return parsed.data;
  }

  private async readModelsCache(): Promise<TogetherModel[] | null> {
    let raw: string;
    try {
      raw = await readFile(this.modelsCacheFile, 'utf-8');
    } catch {
      return null;
    }
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      this.logger.warn({ file: this.modelsCacheFile, err: String(err) }, 'together models cache unreadable');
      return null;
    }
    const parsed = togetherModelsSchema.safeParse(data);
    if (!parsed.success) {
      this.logger.warn({ file: this.modelsCacheFile }, 'together models cache is not a model list');
      return null;
    }
    return parsed.data;
  }

  private headers(): Record<string, string> {
    return {
      'Authorization': `Bearer ${this.apiKey}`,
      'Content-Type': 'application/json',
      'Accept': 'application/json',
      'User-Agent': 'TogetherPythonOfficial/0.2.10',
    };
  }
}

function toFinishReason(reason: string | null | undefined): FinishReason {
  switch (reason) {
    case 'stop':
    case 'eos':
      return 'stop';
    case 'length':
      return 'length';
    default:
      return null;
  }
}
