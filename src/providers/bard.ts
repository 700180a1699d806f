import { Provider, BARD_MODEL } from '../types/provider.js';
import {
  type ChatCompletionRequest,
  type ChatCompletionResponse,
  type ChatCompletionStreamResponse,
  ProviderError,
} from '../types/request.js';
import { BaseProviderAdapter } from './base.js';
import { flattenMessages } from './prompt.js';
import { requestUpstream } from '../utils/http.js';
import { type Logger } from '../utils/logger.js';

const BARD_HOST = 'https://bard.google.com';
const STREAM_GENERATE_PATH =
  '/_/BardChatUi/data/assistant.lamda.BardFrontendService/StreamGenerate';
const COOKIE_TOKEN_KEY = '__Secure-1PSID';

const BARD_HEADERS: Record<string, string> = {
  'X-Same-Domain': '1',
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; WOW64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/114.0.0.0 Safari/537.36',
  'Content-Type': 'application/x-www-form-urlencoded;charset=utf-8',
  'Origin': 'https://bard.google.com',
  'Referer': 'https://bard.google.com/',
};

export interface BardConversationState {
  conversationId: string;
  responseId: string;
  choiceId: string;
}

export interface BardAnswer extends BardConversationState {
  content: string;
  choices: Array<{ id: string; content: string }>;
}

interface BardMeta {
  snlm0e: string;
  cfb2h: string;
}

export interface BardClientOptions {
  token: string;
  cookies?: Record<string, string>;
  host?: string;
}

/**
 * Client for the Bard web session, authenticated by the `__Secure-1PSID` cookie.
 * The page tokens `SNlM0e` and `cfb2h` are scraped from the home page on first use.
 */
export class BardClient {
  private readonly cookie: string;
  private readonly host: string;
  private meta: Promise<BardMeta> | null = null;

  constructor(options: BardClientOptions) {
    const token = options.token;
    if (!token || !token.endsWith('.') || token.endsWith('..')) {
      throw new Error(`${COOKIE_TOKEN_KEY} value must end with a single dot`);
    }

    const cookies = { [COOKIE_TOKEN_KEY]: token, ...options.cookies };
    this.cookie = Object.entries(cookies)
      .map(([key, value]) => `${key}=${value}`)
      .join('; ');
    this.host = options.host ?? BARD_HOST;
  }

  /**
   * Ask a question, optionally continuing a previous exchange.
   */
  async ask(prompt: string, state?: BardConversationState, signal?: AbortSignal): Promise<BardAnswer> {
    const { snlm0e, cfb2h } = await this.pageMeta();

    const reqId = 100000 + Math.floor(Math.random() * 10000);
    const params = new URLSearchParams({ bl: cfb2h, _reqid: String(reqId), rt: 'c' });

    const inputText = JSON.stringify([
      [prompt],
      null,
      [state?.conversationId ?? '', state?.responseId ?? '', state?.choiceId ?? ''],
    ]);
    const form = new URLSearchParams({
      'f.req': JSON.stringify([null, inputText]),
      'at': snlm0e,
    });

    const response = await requestUpstream('bard', `${this.host}${STREAM_GENERATE_PATH}?${params.toString()}`, {
      method: 'POST',
      headers: this.headers(),
      body: form.toString(),
      signal,
    });

    return parseBardAnswer(await response.body.text());
  }

  private pageMeta(): Promise<BardMeta> {
    if (!this.meta) {
      this.meta = this.fetchMeta();
      void this.meta.catch(() => {
        this.meta = null;
      });
    }
    return this.meta;
  }

  private async fetchMeta(): Promise<BardMeta> {
    const response = await requestUpstream('bard', `${this.host}/`, {
      method: 'GET',
      headers: this.headers(),
    });
    const html = await response.body.text();
    return {
      snlm0e: extractFromHtml(html, 'SNlM0e'),
      cfb2h: extractFromHtml(html, 'cfb2h'),
    };
  }

  private headers(): Record<string, string> {
    return { ...BARD_HEADERS, Cookie: this.cookie };
  }
}

export function extractFromHtml(html: string, name: string): string {
  const match = new RegExp(`${name}":"(.*?)"`).exec(html);
  if (!match?.[1]) {
    throw new ProviderError('bard', 401, `${name} value not found in response. Check ${COOKIE_TOKEN_KEY} value.`);
  }
  return match[1];
}

/**
 * The StreamGenerate body is a chunked envelope; its fourth line is a JSON array whose
 * `[0][2]` holds the answer, itself JSON-encoded.
 */
export function parseBardAnswer(body: string): BardAnswer {
  const line = body.split('\n')[3];
  if (!line) {
    throw new ProviderError('bard', 502, 'Bard response is missing its answer line', body);
  }

  const envelope = parseJson(line, body);
  const raw = at(at(envelope, 0), 2);
  if (typeof raw !== 'string') {
    throw new ProviderError('bard', 502, 'Bard returned no answer', body);
  }

  const data = parseJson(raw, body);
  const choices = asArray(at(data, 4)).map((choice) => ({
    id: String(at(choice, 0) ?? ''),
    content: String(at(at(choice, 1), 0) ?? ''),
  }));

  return {
    content: choices[0]?.content ?? '',
    conversationId: String(at(at(data, 1), 0) ?? ''),
    responseId: String(at(at(data, 1), 1) ?? ''),
    choiceId: choices[0]?.id ?? '',
    choices,
  };
}

function parseJson(text: string, body: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    throw new ProviderError('bard', 502, 'Bard returned a malformed answer', body);
  }
}

function at(value: unknown, index: number): unknown {
  return Array.isArray(value) ? value[index] : undefined;
}

function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

export interface BardAdapterOptions extends BardClientOptions {
  logger?: Logger;
  client?: BardClient;
}

/**
 * Adapter over the Bard web session. Bard answers in one piece, so the stream form
 * emits the whole answer as a single record.
 */
export class BardAdapter extends BaseProviderAdapter {
  readonly provider = Provider.Bard;
  private readonly client: BardClient;

  constructor(options: BardAdapterOptions) {
    super(options.logger);
    this.client = options.client ?? new BardClient(options);
  }

  supportsModel(model: string): boolean {
    return model === BARD_MODEL;
  }

  async listModels(): Promise<string[]> {
    return [BARD_MODEL];
  }

  protected async complete(
    request: ChatCompletionRequest,
    signal?: AbortSignal
  ): Promise<ChatCompletionResponse> {
    const answer = await this.client.ask(flattenMessages(request.messages), undefined, signal);
    return this.completion(this.buildId('bard'), request.model, answer.content, 'stop');
  }

  protected async *stream(
    request: ChatCompletionRequest,
    signal?: AbortSignal
  ): AsyncGenerator<ChatCompletionStreamResponse, void, undefined> {
    const answer = await this.client.ask(flattenMessages(request.messages), undefined, signal);
    yield this.chunk(this.buildId('bard'), request.model, answer.content, 'stop');
  }
}
