import { randomUUID } from 'crypto';
import { getEncoding, type Tiktoken } from 'js-tiktoken';
import { type ChatMessage, type UsageInfo } from '../types/request.js';
import { type UsageRecord } from '../types/conversation.js';
import { type ConversationStore } from './ConversationStore.js';
import { usageFrom } from '../providers/base.js';
import { type Logger, silentLogger } from '../utils/logger.js';

export interface TokenCounter {
  count(text: string): number;
}

/**
 * cl100k_base token counts. The encoder is built on first use.
 */
export class TiktokenCounter implements TokenCounter {
  private encoding: Tiktoken | null = null;

  count(text: string): number {
    if (!text) return 0;
    this.encoding ??= getEncoding('cl100k_base');
    return this.encoding.encode(text).length;
  }
}

/**
 * Token accounting for every completion the service serves.
 */
export class UsageRecorder {
  private readonly store: Pick<ConversationStore, 'saveUsage'>;
  private readonly counter: TokenCounter;
  private readonly logger: Logger;

  constructor(
    store: Pick<ConversationStore, 'saveUsage'>,
    counter: TokenCounter = new TiktokenCounter(),
    logger: Logger = silentLogger
  ) {
    this.store = store;
    this.counter = counter;
    this.logger = logger;
  }

  /**
   * The provider's own count when it reported one, otherwise a local count of the
   * prompt messages and the completion text.
   */
  measure(messages: ChatMessage[], completion: string, reported?: UsageInfo): UsageInfo {
    if (reported) return reported;
    const promptTokens = messages.reduce((sum, m) => sum + this.counter.count(m.content), 0);
    return usageFrom(promptTokens, this.counter.count(completion));
  }

  async record(model: string, usage: UsageInfo, user?: string): Promise<UsageRecord> {
    const record: UsageRecord = {
      id: randomUUID(),
      model,
      tokenUsage: usage.total_tokens,
      createdAt: new Date().toISOString(),
    };
    if (user) record.user = user;

    try {
      await this.store.saveUsage(record);
    } catch (err) {
      this.logger.error({ model, err: err instanceof Error ? err.message : String(err) }, 'save llm token usage error');
      throw err;
    }
    this.logger.info({ model, token: record.tokenUsage }, 'save llm token usage');
    return record;
  }
}
