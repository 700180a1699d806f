import { randomUUID } from 'crypto';
import { Provider, CLAUDE_WEB_MODEL } from '../types/provider.js';
import {
  type ChatCompletionRequest,
  type ChatCompletionResponse,
  type ChatCompletionStreamResponse,
  type FinishReason,
} from '../types/request.js';
import { BaseProviderAdapter, mapStopReason } from './base.js';
import { flattenMessages } from './prompt.js';
import { requestUpstream, type UpstreamRequest } from '../utils/http.js';
import { splitLines } from '../streaming/lines.js';
import { parseJsonLines } from '../streaming/jsonLines.js';
import { type Logger, silentLogger } from '../utils/logger.js';

const CLAUDE_WEB_HOST = 'https://claude.ai';
const DEFAULT_TIMEZONE = 'Asia/Shanghai';
const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; WOW64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/86.0.4240.198 Safari/537.36';

export interface ClaudeWebOrganization {
  uuid: string;
  name: string;
}

export interface ClaudeWebConversation {
  uuid: string;
  name: string;
  summary?: string;
  created_at?: string;
  updated_at?: string;
}

export interface ClaudeWebMessageFrame {
  completion: string;
  stop_reason: string | null;
  model?: string;
  stop?: string | null;
  log_id?: string;
}

export interface ClaudeWebClientOptions {
  sessionKey: string;
  timezone?: string;
  host?: string;
  logger?: Logger;
}

/**
 * Client for the claude.ai web session API, authenticated by the `sessionKey` cookie.
 * The organization id is looked up once, on first use.
 */
export class ClaudeWebClient {
  private readonly sessionKey: string;
  private readonly timezone: string;
  private readonly host: string;
  private readonly logger: Logger;
  private orgId: Promise<string> | null = null;

  constructor(options: ClaudeWebClientOptions) {
    this.sessionKey = options.sessionKey;
    this.timezone = options.timezone ?? DEFAULT_TIMEZONE;
    this.host = options.host ?? CLAUDE_WEB_HOST;
    this.logger = options.logger ?? silentLogger;
  }

  async getOrganizations(): Promise<ClaudeWebOrganization[]> {
    const response = await this.request('/api/organizations', { method: 'GET' });
    return (await response.body.json()) as ClaudeWebOrganization[];
  }

  async listConversations(): Promise<ClaudeWebConversation[]> {
    const orgId = await this.organizationId();
    const response = await this.request(`/api/organizations/${orgId}/chat_conversations`, { method: 'GET' });
    return (await response.body.json()) as ClaudeWebConversation[];
  }

  async createConversation(name: string): Promise<ClaudeWebConversation> {
    const orgId = await this.organizationId();
    const response = await this.request(`/api/organizations/${orgId}/chat_conversations`, {
      method: 'POST',
      body: JSON.stringify({ name, uuid: randomUUID() }),
    });
    const conversation = (await response.body.json()) as ClaudeWebConversation;
    this.logger.debug({ conversation: conversation.uuid }, 'claude web conversation created');
    return conversation;
  }

  async deleteConversation(id: string): Promise<void> {
    const orgId = await this.organizationId();
    const response = await this.request(`/api/organizations/${orgId}/chat_conversations/${id}`, {
      method: 'DELETE',
    });
    await response.body.dump();
  }

  /**
   * Post a prompt into a conversation. The answer streams back as `data: `-prefixed
   * JSON lines whose `completion` fields are successive deltas.
   */
  async *appendMessage(
    conversationId: string,
    prompt: string,
    signal?: AbortSignal
  ): AsyncGenerator<ClaudeWebMessageFrame, void, undefined> {
    const orgId = await this.organizationId();
    const response = await this.request(
      '/api/append_message',
      {
        method: 'POST',
        body: JSON.stringify({
          completion: {
            prompt,
            timezone: this.timezone,
            model: CLAUDE_WEB_MODEL,
          },
          organization_uuid: orgId,
          conversation_uuid: conversationId,
          text: prompt,
          attachments: [],
        }),
        signal,
      },
      'text/event-stream'
    );

    for await (const frame of parseJsonLines(splitLines(response.body), { prefix: 'data: ' })) {
      yield frame as ClaudeWebMessageFrame;
    }
  }

  private organizationId(): Promise<string> {
    if (!this.orgId) {
      this.orgId = this.getOrganizations().then((orgs) => {
        const org = orgs[0];
        if (!org) throw new Error('claude web session has no organization');
        this.logger.info({ org: org.uuid }, 'claude web organization resolved');
        return org.uuid;
      });
      // A failed lookup is retried on the next call
      void this.orgId.catch(() => {
        this.orgId = null;
      });
    }
    return this.orgId;
  }

  private request(path: string, options: Omit<UpstreamRequest, 'headers'>, contentType = 'application/json') {
    return requestUpstream('claudeweb', `${this.host}${path}`, {
      ...options,
      headers: {
        'User-Agent': USER_AGENT,
        'Accept-Language': 'en-US,en;q=0.5',
        'Referer': this.host,
        'Content-Type': contentType,
        'Sec-Fetch-Dest': 'empty',
        'Sec-Fetch-Mode': 'cors',
        'Sec-Fetch-Site': 'same-origin',
        'Cookie': `sessionKey=${this.sessionKey}`,
      },
    });
  }
}

export interface ClaudeWebAdapterOptions extends ClaudeWebClientOptions {
  client?: ClaudeWebClient;
}

/**
 * Adapter over the claude.ai web session. Each completion runs in a fresh upstream
 * conversation named after the start of the prompt.
 */
export class ClaudeWebAdapter extends BaseProviderAdapter {
  readonly provider = Provider.ClaudeWeb;
  private readonly client: ClaudeWebClient;

  constructor(options: ClaudeWebAdapterOptions) {
    super(options.logger);
    this.client = options.client ?? new ClaudeWebClient(options);
  }

  supportsModel(model: string): boolean {
    return model === CLAUDE_WEB_MODEL;
  }

  async listModels(): Promise<string[]> {
    return [CLAUDE_WEB_MODEL];
  }

  protected async complete(
    request: ChatCompletionRequest,
    signal?: AbortSignal
  ): Promise<ChatCompletionResponse> {
    let content = '';
    let finishReason: FinishReason = null;
    for await (const frame of this.frames(request, signal)) {
      content += frame.completion;
      finishReason = mapStopReason(frame.stop_reason) ?? finishReason;
    }
    return this.completion(this.buildId('claudeweb'), request.model, content.trimStart(), finishReason ?? 'stop');
  }

  protected async *stream(
    request: ChatCompletionRequest,
    signal?: AbortSignal
  ): AsyncGenerator<ChatCompletionStreamResponse, void, undefined> {
    const id = this.buildId('claudeweb');
    for await (const frame of this.frames(request, signal)) {
      yield this.chunk(id, request.model, frame.completion, mapStopReason(frame.stop_reason));
    }
  }

  private async *frames(
    request: ChatCompletionRequest,
    signal?: AbortSignal
  ): AsyncGenerator<ClaudeWebMessageFrame, void, undefined> {
    const prompt = flattenMessages(request.messages);
    const conversation = await this.client.createConversation(prompt.slice(0, 30));
    yield* this.client.appendMessage(conversation.uuid, prompt, signal);
  }
}
