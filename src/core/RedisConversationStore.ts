import { type Conversation, type Message, type UsageRecord } from '../types/conversation.js';
import { type ConversationStore } from './ConversationStore.js';
import type { ChainableCommander } from 'ioredis';
import { type Redis, REDIS_PREFIX } from './redis.js';

const CONVERSATIONS_KEY = `${REDIS_PREFIX}conversations`;
const USAGE_KEY = `${REDIS_PREFIX}usage`;
const CONVERSATION_KEY = (id: string) => `${REDIS_PREFIX}conversation:${id}`;
const MESSAGES_KEY = (conversationId: string) => `${REDIS_PREFIX}conversation:${conversationId}:messages`;
const MESSAGE_KEY = (id: string) => `${REDIS_PREFIX}message:${id}`;

/**
 * Conversation store backed by Redis.
 *
 * Records are JSON strings under their own keys. Conversations are indexed in a sorted
 * set scored by their update time; each conversation keeps a list of its message ids
 * in creation order. Usage records are appended to a single list.
 */
export class RedisConversationStore implements ConversationStore {
  private readonly redis: Redis;

  constructor(redis: Redis) {
    this.redis = redis;
  }

  async saveConversation(conversation: Conversation): Promise<void> {
    await exec(
      this.redis
        .multi()
        .set(CONVERSATION_KEY(conversation.id), JSON.stringify(conversation))
        .zadd(CONVERSATIONS_KEY, Date.parse(conversation.updatedAt), conversation.id)
    );
  }

  async getConversation(id: string): Promise<Conversation | null> {
    return parseRecord<Conversation>(await this.redis.get(CONVERSATION_KEY(id)));
  }

  async touchConversation(id: string, updatedAt: string): Promise<boolean> {
    const conversation = await this.getConversation(id);
    if (!conversation) return false;
    // XX: a conversation deleted in the meantime stays deleted
    const [stored] = await exec(
      this.redis
        .multi()
        .set(CONVERSATION_KEY(id), JSON.stringify({ ...conversation, updatedAt }), 'XX')
        .zadd(CONVERSATIONS_KEY, 'XX', Date.parse(updatedAt), id)
    );
    return stored === 'OK';
  }

  async listConversations(): Promise<Conversation[]> {
    const ids = await this.redis.zrevrange(CONVERSATIONS_KEY, 0, -1);
    if (ids.length === 0) return [];
    const raws = await this.redis.mget(ids.map(CONVERSATION_KEY));
    return compact(raws.map((raw) => parseRecord<Conversation>(raw)));
  }

  async deleteConversation(id: string): Promise<boolean> {
    const messageIds = await this.redis.lrange(MESSAGES_KEY(id), 0, -1);
    const removed = await this.redis.del(CONVERSATION_KEY(id));
    await exec(
      this.redis
        .multi()
        .zrem(CONVERSATIONS_KEY, id)
        .del(MESSAGES_KEY(id), ...messageIds.map(MESSAGE_KEY))
    );
    return removed > 0;
  }

  async addMessage(message: Message): Promise<void> {
    await exec(
      this.redis
        .multi()
        .set(MESSAGE_KEY(message.id), JSON.stringify(message))
        .rpush(MESSAGES_KEY(message.conversationId), message.id)
    );
  }

  async getMessage(id: string): Promise<Message | null> {
    return parseRecord<Message>(await this.redis.get(MESSAGE_KEY(id)));
  }

  async listMessages(conversationId: string): Promise<Message[]> {
    const ids = await this.redis.lrange(MESSAGES_KEY(conversationId), 0, -1);
    if (ids.length === 0) return [];
    const raws = await this.redis.mget(ids.map(MESSAGE_KEY));
    return compact(raws.map((raw) => parseRecord<Message>(raw)));
  }

  async deleteMessage(id: string): Promise<boolean> {
    const message = await this.getMessage(id);
    if (!message) return false;
    await exec(
      this.redis
        .multi()
        .del(MESSAGE_KEY(id))
        .lrem(MESSAGES_KEY(message.conversationId), 0, id)
    );
    return true;
  }

  async saveUsage(usage: UsageRecord): Promise<void> {
    await this.redis.rpush(USAGE_KEY, JSON.stringify(usage));
  }

  async listUsage(): Promise<UsageRecord[]> {
    const raws = await this.redis.lrange(USAGE_KEY, 0, -1);
    return compact(raws.map((raw) => parseRecord<UsageRecord>(raw)));
  }
}

/** Run a MULTI block; a failed command inside it fails the whole call. */
async function exec(pipeline: ChainableCommander): Promise<unknown[]> {
  const results = await pipeline.exec();
  return (results ?? []).map(([err, value]) => {
    if (err) throw err;
    return value;
  });
}

function parseRecord<T>(raw: string | null): T | null {
  if (!raw) return null;
  return JSON.parse(raw) as T;
}

function compact<T>(values: Array<T | null>): T[] {
  return values.filter((v): v is T => v !== null);
}
