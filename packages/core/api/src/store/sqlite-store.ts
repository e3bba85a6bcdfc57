/**
 * SQLite storage for agents, chat threads and messages
 */
import Database from 'better-sqlite3';
import {
  AttachmentSchema,
  SkillCallSchema,
  type Agent,
  type AuthorType,
  type Chat,
  type ChatMessage,
  type ChatPatch,
  type MessageListQuery,
  type Store,
} from '@agentchat/types';
import { Type } from '@sinclair/typebox';
import { systemClock, type Clock } from '@agentchat/utils';
import { decodeJsonColumn, encodeJsonColumn } from './columns.js';

/**
 * Schema initialization SQL
 */
const INIT_SCHEMA = `
  CREATE TABLE IF NOT EXISTS agents (
    id TEXT PRIMARY KEY,
    owner TEXT NOT NULL,
    name TEXT NOT NULL,
    description TEXT,
    model TEXT,
    prompt TEXT,
    temperature REAL,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS chats (
    id TEXT PRIMARY KEY,
    agent_id TEXT NOT NULL,
    user_id TEXT NOT NULL,
    summary TEXT NOT NULL DEFAULT '',
    rounds INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS chat_messages (
    id TEXT PRIMARY KEY,
    chat_id TEXT NOT NULL,
    agent_id TEXT NOT NULL,
    user_id TEXT,
    author_id TEXT NOT NULL,
    author_type TEXT NOT NULL,
    thread_type TEXT,
    message TEXT NOT NULL,
    attachments TEXT,
    model TEXT,
    reply_to TEXT,
    skill_calls TEXT,
    input_tokens INTEGER NOT NULL DEFAULT 0,
    output_tokens INTEGER NOT NULL DEFAULT 0,
    time_cost REAL NOT NULL DEFAULT 0,
    credit_event_id TEXT,
    credit_cost REAL,
    cold_start_cost REAL NOT NULL DEFAULT 0,
    app_id TEXT,
    search_mode INTEGER,
    super_mode INTEGER,
    created_at TEXT NOT NULL,
    FOREIGN KEY (chat_id) REFERENCES chats(id)
  );

  CREATE INDEX IF NOT EXISTS idx_chats_agent_user ON chats(agent_id, user_id);
  CREATE INDEX IF NOT EXISTS idx_chat_messages_chat ON chat_messages(agent_id, chat_id, id);
`;

const AttachmentsColumn = Type.Array(AttachmentSchema);
const SkillCallsColumn = Type.Array(SkillCallSchema);

/**
 * Row type for message queries; JSON and boolean columns arrive encoded
 */
interface ChatMessageRow {
  id: string;
  chat_id: string;
  agent_id: string;
  user_id: string | null;
  author_id: string;
  author_type: AuthorType;
  thread_type: AuthorType | null;
  message: string;
  attachments: string | null;
  model: string | null;
  reply_to: string | null;
  skill_calls: string | null;
  input_tokens: number;
  output_tokens: number;
  time_cost: number;
  credit_event_id: string | null;
  credit_cost: number | null;
  cold_start_cost: number;
  app_id: string | null;
  search_mode: number | null;
  super_mode: number | null;
  created_at: string;
}

function toFlag(value: boolean | null): number | null {
  return value === null ? null : value ? 1 : 0;
}

function fromFlag(value: number | null): boolean | null {
  return value === null ? null : value !== 0;
}

export interface SqliteStoreOptions {
  clock?: Clock;
}

export class SqliteStore implements Store {
  private db: Database.Database;
  private readonly clock: Clock;

  constructor(dbPath: string = ':memory:', options: SqliteStoreOptions = {}) {
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.exec(INIT_SCHEMA);
    this.clock = options.clock ?? systemClock;
  }

  private rowToMessage(row: ChatMessageRow): ChatMessage {
    return {
      ...row,
      attachments: decodeJsonColumn(AttachmentsColumn, row.attachments, 'attachments'),
      skill_calls: decodeJsonColumn(SkillCallsColumn, row.skill_calls, 'skill_calls'),
      search_mode: fromFlag(row.search_mode),
      super_mode: fromFlag(row.super_mode),
    };
  }

  async createAgent(agent: Agent): Promise<void> {
    this.db
      .prepare(
        `INSERT INTO agents (id, owner, name, description, model, prompt, temperature, created_at, updated_at)
         VALUES (@id, @owner, @name, @description, @model, @prompt, @temperature, @created_at, @updated_at)`
      )
      .run(agent);
  }

  async getAgent(id: string): Promise<Agent | null> {
    const row = this.db.prepare<[string], Agent>('SELECT * FROM agents WHERE id = ?').get(id);
    return row ?? null;
  }

  async createChat(chat: Chat): Promise<void> {
    this.db
      .prepare(
        `INSERT INTO chats (id, agent_id, user_id, summary, rounds, created_at, updated_at)
         VALUES (@id, @agent_id, @user_id, @summary, @rounds, @created_at, @updated_at)`
      )
      .run(chat);
  }

  async getChat(id: string): Promise<Chat | null> {
    const row = this.db.prepare<[string], Chat>('SELECT * FROM chats WHERE id = ?').get(id);
    return row ?? null;
  }

  async listChats(agentId: string, userId: string): Promise<Chat[]> {
    return this.db
      .prepare<[string, string], Chat>(
        'SELECT * FROM chats WHERE agent_id = ? AND user_id = ? ORDER BY updated_at DESC, id DESC'
      )
      .all(agentId, userId);
  }

  async updateChat(id: string, patch: ChatPatch): Promise<Chat | null> {
    if (patch.summary !== undefined) {
      this.db
        .prepare('UPDATE chats SET summary = ?, updated_at = ? WHERE id = ?')
        .run(patch.summary, this.clock().toISOString(), id);
    }
    return this.getChat(id);
  }

  /**
   * Delete a chat and its messages
   */
  async deleteChat(id: string): Promise<boolean> {
    const deleteMessages = this.db.prepare('DELETE FROM chat_messages WHERE chat_id = ?');
    const deleteChat = this.db.prepare('DELETE FROM chats WHERE id = ?');

    const transaction = this.db.transaction(() => {
      deleteMessages.run(id);
      return deleteChat.run(id).changes > 0;
    });

    return transaction();
  }

  async incrementRounds(id: string): Promise<void> {
    this.db
      .prepare('UPDATE chats SET rounds = rounds + 1, updated_at = ? WHERE id = ?')
      .run(this.clock().toISOString(), id);
  }

  async appendMessage(message: ChatMessage): Promise<ChatMessage> {
    const insert = this.db.prepare(`
      INSERT INTO chat_messages (
        id, chat_id, agent_id, user_id, author_id, author_type, thread_type, message,
        attachments, model, reply_to, skill_calls, input_tokens, output_tokens, time_cost,
        credit_event_id, credit_cost, cold_start_cost, app_id, search_mode, super_mode, created_at
      ) VALUES (
        @id, @chat_id, @agent_id, @user_id, @author_id, @author_type, @thread_type, @message,
        @attachments, @model, @reply_to, @skill_calls, @input_tokens, @output_tokens, @time_cost,
        @credit_event_id, @credit_cost, @cold_start_cost, @app_id, @search_mode, @super_mode, @created_at
      )
    `);
    const touchChat = this.db.prepare('UPDATE chats SET updated_at = ? WHERE id = ?');

    const transaction = this.db.transaction(() => {
      insert.run({
        ...message,
        attachments: encodeJsonColumn(message.attachments),
        skill_calls: encodeJsonColumn(message.skill_calls),
        search_mode: toFlag(message.search_mode),
        super_mode: toFlag(message.super_mode),
      });
      touchChat.run(message.created_at, message.chat_id);
    });
    transaction();

    return message;
  }

  async getMessage(id: string): Promise<ChatMessage | null> {
    const row = this.db
      .prepare<[string], ChatMessageRow>('SELECT * FROM chat_messages WHERE id = ?')
      .get(id);
    return row ? this.rowToMessage(row) : null;
  }

  async listMessages(query: MessageListQuery): Promise<ChatMessage[]> {
    const conditions = ['agent_id = ?', 'chat_id = ?'];
    const values: string[] = [query.agentId, query.chatId];

    if (query.before !== undefined) {
      conditions.push('id < ?');
      values.push(query.before);
    }

    const rows = this.db
      .prepare<Array<string | number>, ChatMessageRow>(
        `SELECT * FROM chat_messages WHERE ${conditions.join(' AND ')} ORDER BY id DESC LIMIT ?`
      )
      .all(...values, query.limit);
    return rows.map((row) => this.rowToMessage(row));
  }

  async ping(): Promise<boolean> {
    return this.db.prepare<[], { ok: number }>('SELECT 1 AS ok').get()?.ok === 1;
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
