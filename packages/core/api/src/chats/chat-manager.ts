/**
 * Chat thread lifecycle scoped to one agent and one user
 */

import { createInternalError, type Chat, type ChatStore, type ChatUpdateRequest } from '@agentchat/types';
import { newId, systemClock, type Clock, type IdGenerator } from '@agentchat/utils';
import { authorize, ownsChat } from '../access-guard.js';
import type { AgentService } from '../agents/agent-service.js';

export interface ChatManagerOptions {
  idGenerator?: IdGenerator;
  clock?: Clock;
}

export class ChatManager {
  private readonly idGenerator: IdGenerator;
  private readonly clock: Clock;

  constructor(
    private readonly store: ChatStore,
    private readonly agents: AgentService,
    options: ChatManagerOptions = {}
  ) {
    this.idGenerator = options.idGenerator ?? newId;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Open a thread on an agent the caller owns. The stored row is read back
   * so the response carries whatever defaults the store applied.
   */
  async createThread(agentId: string, userId: string): Promise<Chat> {
    await this.agents.get(agentId, userId);

    const now = this.clock().toISOString();
    const id = this.idGenerator();
    await this.store.createChat({
      id,
      agent_id: agentId,
      user_id: userId,
      summary: '',
      rounds: 0,
      created_at: now,
      updated_at: now,
    });

    const created = await this.store.getChat(id);
    if (!created) {
      throw createInternalError(`Chat ${id} was not persisted`, { component: 'chats' });
    }
    return created;
  }

  listThreads(agentId: string, userId: string): Promise<Chat[]> {
    return this.store.listChats(agentId, userId);
  }

  getThread(agentId: string, chatId: string, userId: string): Promise<Chat> {
    return authorize(() => this.store.getChat(chatId), ownsChat(agentId, userId), `Chat ${chatId} not found`);
  }

  async updateThread(agentId: string, chatId: string, userId: string, patch: ChatUpdateRequest): Promise<Chat> {
    const chat = await this.getThread(agentId, chatId, userId);
    if (patch.summary === undefined) {
      return chat;
    }

    return authorize(
      () => this.store.updateChat(chatId, { summary: patch.summary }),
      ownsChat(agentId, userId),
      `Chat ${chatId} not found`
    );
  }

  async deleteThread(agentId: string, chatId: string, userId: string): Promise<void> {
    await this.getThread(agentId, chatId, userId);
    await this.store.deleteChat(chatId);
  }
}
