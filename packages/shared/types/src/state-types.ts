/**
 * Persistence and execution contracts shared by the API server and the engine.
 */

import type { Agent, Chat, ChatMessage } from './schemas.js';

export interface AgentStore {
  createAgent(agent: Agent): Promise<void>;
  getAgent(id: string): Promise<Agent | null>;
}

export interface ChatPatch {
  summary?: string;
}

export interface ChatStore {
  createChat(chat: Chat): Promise<void>;
  getChat(id: string): Promise<Chat | null>;
  /** Threads for one agent and user, most recently active first */
  listChats(agentId: string, userId: string): Promise<Chat[]>;
  updateChat(id: string, patch: ChatPatch): Promise<Chat | null>;
  /** Removes the thread and its messages; false when nothing was deleted */
  deleteChat(id: string): Promise<boolean>;
  incrementRounds(id: string): Promise<void>;
}

export interface MessageListQuery {
  agentId: string;
  chatId: string;
  /** Exclusive upper bound on message id */
  before?: string;
  limit: number;
}

export interface ChatMessageStore {
  /** Persists the message and touches the owning thread's updated_at */
  appendMessage(message: ChatMessage): Promise<ChatMessage>;
  getMessage(id: string): Promise<ChatMessage | null>;
  /** Messages ordered by id descending */
  listMessages(query: MessageListQuery): Promise<ChatMessage[]>;
}

export interface Store extends AgentStore, ChatStore, ChatMessageStore {
  /** Cheap liveness probe used by the health endpoint */
  ping(): Promise<boolean>;
  close(): Promise<void>;
}

/**
 * A streamed unit of agent output. Each chunk is a complete message record.
 */
export type ExecutionChunk = ChatMessage;

export interface ExecutionOptions {
  /** Aborted when the caller no longer wants results */
  signal?: AbortSignal;
}

/**
 * The agent execution engine as seen by the dispatch pipeline
 */
export interface ExecutionBackend {
  executeSync(message: ChatMessage, options?: ExecutionOptions): Promise<ChatMessage[]>;
  executeStreamed(message: ChatMessage, options?: ExecutionOptions): AsyncIterable<ExecutionChunk>;
}
