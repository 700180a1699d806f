import { Bot } from 'grammy';
import { type ConversationService } from '../core/ConversationService.js';
import { NotFoundError } from '../utils/errors.js';
import { type Logger } from '../utils/logger.js';

/** Telegram rejects messages longer than this. */
export const TELEGRAM_MESSAGE_LIMIT = 4096;

export const APOLOGY = 'Sorry, something went wrong. Please try again later.';

export interface TelegramTextMessage {
  chatId: number;
  userId?: number;
  text: string;
}

export interface TelegramRelayOptions {
  service: ConversationService;
  model: string;
  allowedUsers?: string[];
  logger: Logger;
}

/**
 * Relays text messages into conversations, one conversation per chat.
 */
export class TelegramRelay {
  private readonly service: ConversationService;
  private readonly model: string;
  private readonly allowedUsers: Set<string>;
  private readonly logger: Logger;
  private readonly conversations = new Map<number, Promise<string>>();

  constructor(options: TelegramRelayOptions) {
    this.service = options.service;
    this.model = options.model;
    this.allowedUsers = new Set(options.allowedUsers ?? []);
    this.logger = options.logger;
  }

  isAllowed(userId: number | undefined): boolean {
    if (this.allowedUsers.size === 0) return true;
    return userId !== undefined && this.allowedUsers.has(String(userId));
  }

  /**
   * The reply for one incoming message, split to fit Telegram's size limit.
   * Nothing is returned for users outside the allow list.
   */
  async handle(message: TelegramTextMessage): Promise<string[]> {
    if (!this.isAllowed(message.userId)) {
      this.logger.warn({ chat: message.chatId, user: message.userId }, 'telegram user not allowed');
      return [];
    }

    try {
      const answer = await this.ask(message);
      return splitMessage(answer || '(empty response)');
    } catch (err) {
      this.logger.error(
        { chat: message.chatId, err: err instanceof Error ? err.message : String(err) },
        'telegram relay failed'
      );
      return [APOLOGY];
    }
  }

  private async ask(message: TelegramTextMessage): Promise<string> {
    const request = { messages: [{ role: 'user' as const, content: message.text }] };
    const conversationId = await this.conversationFor(message.chatId);

    try {
      return (await this.service.createMessage(conversationId, request)).response;
    } catch (err) {
      if (!(err instanceof NotFoundError)) throw err;
      // The conversation was deleted elsewhere; start over
      this.conversations.delete(message.chatId);
      const fresh = await this.conversationFor(message.chatId);
      return (await this.service.createMessage(fresh, request)).response;
    }
  }

  /** Messages arriving together in a new chat share one pending creation. */
  private conversationFor(chatId: number): Promise<string> {
    const existing = this.conversations.get(chatId);
    if (existing) return existing;

    const pending = this.createConversation(chatId);
    this.conversations.set(chatId, pending);
    return pending;
  }

  private async createConversation(chatId: number): Promise<string> {
    try {
      return (await this.service.createConversation(`telegram ${chatId}`, this.model)).id;
    } catch (err) {
      // Let the next message try again
      this.conversations.delete(chatId);
      throw err;
    }
  }
}

export function splitMessage(text: string, limit = TELEGRAM_MESSAGE_LIMIT): string[] {
  const pieces: string[] = [];
  for (let i = 0; i < text.length; i += limit) {
    pieces.push(text.slice(i, i + limit));
  }
  return pieces;
}

export function createTelegramBot(token: string, relay: TelegramRelay, logger: Logger): Bot {
  const bot = new Bot(token);

  bot.on('message:text', async (ctx) => {
    const replies = await relay.handle({
      chatId: ctx.chat.id,
      userId: ctx.from?.id,
      text: ctx.message.text,
    });
    for (const reply of replies) {
      await ctx.reply(reply);
    }
  });

  bot.catch((err) => {
    logger.error({ update: err.ctx.update.update_id, err: err.message }, 'telegram bot error');
  });

  return bot;
}
