import { type Conversation, type Message, type UsageRecord } from '../types/conversation.js';

/**
 * Persistence for conversations, their messages and token usage.
 */
export interface ConversationStore {
  saveConversation(conversation: Conversation): Promise<void>;
  getConversation(id: string): Promise<Conversation | null>;
  /** Sets `updatedAt` on an existing conversation; false when it no longer exists */
  touchConversation(id: string, updatedAt: string): Promise<boolean>;
  /** Most recently updated first */
  listConversations(): Promise<Conversation[]>;
  /** Deletes the conversation and its messages; false when it did not exist */
  deleteConversation(id: string): Promise<boolean>;

  addMessage(message: Message): Promise<void>;
  getMessage(id: string): Promise<Message | null>;
  /** Oldest first */
  listMessages(conversationId: string): Promise<Message[]>;
  deleteMessage(id: string): Promise<boolean>;

  saveUsage(usage: UsageRecord): Promise<void>;
  listUsage(): Promise<UsageRecord[]>;
}

export class MemoryConversationStore implements ConversationStore {
  protected readonly conversations = new Map<string, Conversation>();
  protected readonly messages = new Map<string, Message>();
  protected readonly usage: UsageRecord[] = [];

  async saveConversation(conversation: Conversation): Promise<void> {
    this.conversations.set(conversation.id, { ...conversation });
  }

  async getConversation(id: string): Promise<Conversation | null> {
    const conversation = this.conversations.get(id);
    return conversation ? { ...conversation } : null;
  }

  async touchConversation(id: string, updatedAt: string): Promise<boolean> {
    const conversation = this.conversations.get(id);
    if (!conversation) return false;
    this.conversations.set(id, { ...conversation, updatedAt });
    return true;
  }

  async listConversations(): Promise<Conversation[]> {
    return [...this.conversations.values()]
      .map((c) => ({ ...c }))
      .sort((a, b) => b.updatedAt.localeCompare(a.updatedAt));
  }

  async deleteConversation(id: string): Promise<boolean> {
    if (!this.conversations.delete(id)) return false;
    for (const [messageId, message] of this.messages) {
      if (message.conversationId === id) this.messages.delete(messageId);
    }
    return true;
  }

  async addMessage(message: Message): Promise<void> {
    this.messages.set(message.id, message);
  }

  async getMessage(id: string): Promise<Message | null> {
    return this.messages.get(id) ?? null;
  }

  async listMessages(conversationId: string): Promise<Message[]> {
    // Map iteration follows insertion order, which is creation order
    return [...this.messages.values()].filter((m) => m.conversationId === conversationId);
  }

  async deleteMessage(id: string): Promise<boolean> {
    return this.messages.delete(id);
  }

  async saveUsage(usage: UsageRecord): Promise<void> {
    this.usage.push(usage);
  }

  async listUsage(): Promise<UsageRecord[]> {
    return [...this.usage];
  }
}
