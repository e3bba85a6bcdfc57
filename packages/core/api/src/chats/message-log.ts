/**
 * Message log: append, fetch and cursor pagination
 */

import type {
  ChatMessage,
  ChatMessageRequest,
  ChatMessageStore,
  MessagePage,
} from '@agentchat/types';
import { newId, systemClock, type Clock, type IdGenerator } from '@agentchat/utils';
import { authorize, ownsMessage } from '../access-guard.js';
import type { ChatManager } from './chat-manager.js';

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

export interface PageRequest {
  /** Exclusive upper bound: only messages with a smaller id are returned. Empty means none. */
  cursor?: string;
  limit?: number;
}

/**
 * Turn an over-fetched window (up to `limit + 1` rows, id descending) into
 * a page. The extra row only signals that more data exists; the cursor is
 * the id of the last row actually returned.
 */
export function toPage(rows: ChatMessage[], limit: number): MessagePage {
  const hasMore = rows.length > limit;
  const data = hasMore ? rows.slice(0, limit) : rows;
  return {
    data,
    has_more: hasMore,
    next_cursor: hasMore ? (data.at(-1)?.id ?? null) : null,
  };
}

export interface MessageLogOptions {
  idGenerator?: IdGenerator;
  clock?: Clock;
}

export class MessageLog {
  private readonly idGenerator: IdGenerator;
  private readonly clock: Clock;

  constructor(
    private readonly store: ChatMessageStore,
    private readonly chats: ChatManager,
    options: MessageLogOptions = {}
  ) {
    this.idGenerator = options.idGenerator ?? newId;
    this.clock = options.clock ?? systemClock;
  }

  async listMessages(
    agentId: string,
    chatId: string,
    userId: string,
    page: PageRequest = {}
  ): Promise<MessagePage> {
    await this.chats.getThread(agentId, chatId, userId);

    const limit = Math.min(Math.max(page.limit ?? DEFAULT_PAGE_SIZE, 1), MAX_PAGE_SIZE);
    const rows = await this.store.listMessages({
      agentId,
      chatId,
      before: page.cursor || undefined,
      limit: limit + 1,
    });
    return toPage(rows, limit);
  }

  getMessage(messageId: string, userId: string): Promise<ChatMessage> {
    return authorize(() => this.store.getMessage(messageId), ownsMessage(userId), `Message ${messageId} not found`);
  }

  /**
   * Persist a caller-authored message on a thread the caller owns.
   * Resolves only after the store has committed the row.
   */
  async appendUserMessage(
    agentId: string,
    chatId: string,
    userId: string,
    request: ChatMessageRequest
  ): Promise<ChatMessage> {
    await this.chats.getThread(agentId, chatId, userId);

    return this.store.appendMessage({
      id: this.idGenerator(),
      chat_id: chatId,
      agent_id: agentId,
      user_id: userId,
      author_id: userId,
      author_type: 'api',
      thread_type: 'api',
      message: request.message,
      attachments: request.attachments ?? null,
      model: null,
      reply_to: null,
      skill_calls: null,
      input_tokens: 0,
      output_tokens: 0,
      time_cost: 0,
      credit_event_id: null,
      credit_cost: null,
      cold_start_cost: 0,
      app_id: request.app_id ?? null,
      search_mode: request.search_mode ?? null,
      super_mode: request.super_mode ?? null,
      created_at: this.clock().toISOString(),
    });
  }
}
