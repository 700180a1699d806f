import { randomUUID } from 'crypto';
import { type ModelRegistry } from './ModelRegistry.js';
import { type ConversationStore } from './ConversationStore.js';
import { type UsageRecorder } from './UsageRecorder.js';
import { type ProviderAdapter } from '../providers/base.js';
import {
  type ChatCompletionRequest,
  type ChatCompletionResponse,
  type ChatCompletionStreamResponse,
  type ChatMessage,
  type UsageInfo,
  deltaText,
} from '../types/request.js';
import { type Conversation, type CreateMessageRequest, type Message } from '../types/conversation.js';
import { StreamChannel } from '../streaming/channel.js';
import { NotFoundError } from '../utils/errors.js';
import { type Logger, silentLogger } from '../utils/logger.js';

const DEFAULT_CONVERSATION_NAME = 'New conversation';

export interface ConversationServiceOptions {
  registry: ModelRegistry;
  store: ConversationStore;
  usage: UsageRecorder;
  logger?: Logger;
}

/** An upstream call prepared against a conversation's history. */
interface PreparedExchange {
  conversation: Conversation;
  adapter: ProviderAdapter;
  upstream: ChatCompletionRequest;
  sent: ChatMessage[];
}

/**
 * Conversations and their messages, on top of the model registry and a store.
 * Every completion served, stateless or not, has its token usage recorded.
 */
export class ConversationService {
  private readonly registry: ModelRegistry;
  private readonly store: ConversationStore;
  private readonly usage: UsageRecorder;
  private readonly logger: Logger;

  constructor(options: ConversationServiceOptions) {
    this.registry = options.registry;
    this.store = options.store;
    this.usage = options.usage;
    this.logger = options.logger ?? silentLogger;
  }

  // ── Conversations ──────────────────────────────────────────────────────

  async createConversation(name: string | undefined, model: string): Promise<Conversation> {
    this.registry.resolve(model);

    const now = new Date().toISOString();
    const conversation: Conversation = {
      id: randomUUID(),
      name: name?.trim() || DEFAULT_CONVERSATION_NAME,
      model,
      createdAt: now,
      updatedAt: now,
    };
    await this.store.saveConversation(conversation);
    this.logger.info({ conversation: conversation.id, model }, 'conversation created');
    return conversation;
  }

  listConversations(): Promise<Conversation[]> {
    return this.store.listConversations();
  }

  async getConversation(id: string): Promise<Conversation> {
    const conversation = await this.store.getConversation(id);
    if (!conversation) throw new NotFoundError('Conversation', id);
    return conversation;
  }

  async deleteConversation(id: string): Promise<void> {
    if (!(await this.store.deleteConversation(id))) {
      throw new NotFoundError('Conversation', id);
    }
    this.logger.info({ conversation: id }, 'conversation deleted');
  }

  // ── Messages ───────────────────────────────────────────────────────────

  async createMessage(
    conversationId: string,
    request: CreateMessageRequest,
    signal?: AbortSignal
  ): Promise<Message> {
    const exchange = await this.prepare(conversationId, request);
    const response = await exchange.adapter.createChatCompletion(exchange.upstream, signal);
    const text = response.choices[0]?.message.content ?? '';
    return this.persist(exchange, text, response.usage);
  }

  /**
   * Streaming form of `createMessage`. Records are forwarded as they arrive; the
   * message is stored once the upstream ends, before end-of-stream reaches the
   * consumer. An upstream error, a storage error or an abandoned stream stores nothing.
   */
  async createMessageStream(
    conversationId: string,
    request: CreateMessageRequest,
    signal?: AbortSignal
  ): Promise<StreamChannel<ChatCompletionStreamResponse>> {
    const exchange = await this.prepare(conversationId, request);
    const source = exchange.adapter.createChatCompletionStream(exchange.upstream, signal);
    return StreamChannel.from(
      this.relay(source, async (text, usage) => {
        await this.persist(exchange, text, usage);
      })
    );
  }

  async listMessages(conversationId: string): Promise<Message[]> {
    await this.getConversation(conversationId);
    return this.store.listMessages(conversationId);
  }

  async getMessage(conversationId: string, messageId: string): Promise<Message> {
    const message = await this.store.getMessage(messageId);
    if (!message || message.conversationId !== conversationId) {
      throw new NotFoundError('Message', messageId);
    }
    return message;
  }

  async deleteMessage(conversationId: string, messageId: string): Promise<void> {
    await this.getMessage(conversationId, messageId);
    await this.store.deleteMessage(messageId);
  }

  // ── Stateless chat ─────────────────────────────────────────────────────

  async createChatCompletion(
    request: ChatCompletionRequest,
    signal?: AbortSignal
  ): Promise<ChatCompletionResponse> {
    const adapter = this.registry.resolve(request.model);
    const response = await adapter.createChatCompletion(request, signal);

    const text = response.choices[0]?.message.content ?? '';
    const usage = this.usage.measure(request.messages, text, response.usage);
    await this.usage.record(request.model, usage, request.user);
    return { ...response, usage };
  }

  async createChatCompletionStream(
    request: ChatCompletionRequest,
    signal?: AbortSignal
  ): Promise<StreamChannel<ChatCompletionStreamResponse>> {
    const adapter = this.registry.resolve(request.model);
    const source = adapter.createChatCompletionStream(request, signal);
    return StreamChannel.from(
      this.relay(source, async (text, reported) => {
        const usage = this.usage.measure(request.messages, text, reported);
        await this.usage.record(request.model, usage, request.user);
      })
    );
  }

  // ── Internals ──────────────────────────────────────────────────────────

  private async prepare(conversationId: string, request: CreateMessageRequest): Promise<PreparedExchange> {
    const conversation = await this.getConversation(conversationId);
    const model = request.model ?? conversation.model;
    const adapter = this.registry.resolve(model);

    const history = await this.store.listMessages(conversationId);
    const messages: ChatMessage[] = history.flatMap((m) => [
      ...m.request,
      { role: 'assistant' as const, content: m.response },
    ]);

    return {
      conversation,
      adapter,
      upstream: { ...request, model, messages: [...messages, ...request.messages] },
      sent: request.messages,
    };
  }

  /**
   * Store the exchange, touch its conversation and record usage. When any step after
   * the message write fails, or the conversation was deleted meanwhile, the message
   * is removed again and the error propagates.
   */
  private async persist(exchange: PreparedExchange, text: string, reported?: UsageInfo): Promise<Message> {
    const { conversation, upstream } = exchange;
    const usage = this.usage.measure(upstream.messages, text, reported);
    const now = new Date().toISOString();

    const message: Message = {
      id: randomUUID(),
      conversationId: conversation.id,
      model: upstream.model,
      request: exchange.sent,
      response: text,
      tokenUsage: usage.total_tokens,
      createdAt: now,
    };

    await this.store.addMessage(message);
    try {
      if (!(await this.store.touchConversation(conversation.id, now))) {
        throw new NotFoundError('Conversation', conversation.id);
      }
      await this.usage.record(upstream.model, usage, upstream.user);
    } catch (err) {
      await this.discard(message);
      throw err;
    }

    this.logger.debug({ conversation: conversation.id, message: message.id }, 'message stored');
    return message;
  }

  private async discard(message: Message): Promise<void> {
    try {
      await this.store.deleteMessage(message.id);
    } catch (err) {
      this.logger.error(
        { conversation: message.conversationId, message: message.id, err: err instanceof Error ? err.message : String(err) },
        'discard message error'
      );
    }
  }

  /**
   * Forward every record from `source`, then hand the joined text and the last
   * reported usage to `onEnd` before the stream finishes.
   */
  private async *relay(
    source: AsyncIterable<ChatCompletionStreamResponse>,
    onEnd: (text: string, usage?: UsageInfo) => Promise<void>
  ): AsyncGenerator<ChatCompletionStreamResponse, void, undefined> {
    let text = '';
    let usage: UsageInfo | undefined;

    for await (const record of source) {
      text += deltaText(record);
      if (record.usage) usage = record.usage;
      yield record;
    }

    await onEnd(text, usage);
  }
}
