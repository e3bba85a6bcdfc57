/**
 * Postgres Store implementation.
 */

import type { Pool } from 'pg';
import { Type } from '@sinclair/typebox';
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
import { systemClock, type Clock } from '@agentchat/utils';
import { decodeJsonColumn, encodeJsonColumn } from './columns.js';

const AttachmentsColumn = Type.Array(AttachmentSchema);
const SkillCallsColumn = Type.Array(SkillCallSchema);

const MESSAGE_COLUMNS = [
  'id',
  'chat_id',
  'agent_id',
  'user_id',
  'author_id',
  'author_type',
  'thread_type',
  'message',
  'attachments',
  'model',
  'reply_to',
  'skill_calls',
  'input_tokens',
  'output_tokens',
  'time_cost',
  'credit_event_id',
  'credit_cost',
  'cold_start_cost',
  'app_id',
  'search_mode',
  'super_mode',
  'created_at',
] as const;

type ChatMessageRow = Omit<ChatMessage, 'attachments' | 'skill_calls' | 'author_type' | 'thread_type'> & {
  author_type: AuthorType;
  thread_type: AuthorType | null;
  attachments: unknown;
  skill_calls: unknown;
};

export class PostgresStore implements Store {
  private schemaReady: Promise<void> | null = null;
  private schema: string;
  private readonly clock: Clock;

  constructor(
    private pool: Pool,
    schema?: string,
    clock?: Clock
  ) {
    this.schema = schema ?? 'public';
    this.clock = clock ?? systemClock;
  }

  async createAgent(agent: Agent): Promise<void> {
    await this.ensureSchema();
    await this.pool.query(
      `INSERT INTO ${this.qualified('agents')} (
        id, owner, name, description, model, prompt, temperature, created_at, updated_at
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)`,
      [
        agent.id,
        agent.owner,
        agent.name,
        agent.description,
        agent.model,
        agent.prompt,
        agent.temperature,
        agent.created_at,
        agent.updated_at,
      ]
    );
  }

  async getAgent(id: string): Promise<Agent | null> {
    await this.ensureSchema();
    const result = await this.pool.query<Agent>(
      `SELECT id, owner, name, description, model, prompt, temperature, created_at, updated_at
       FROM ${this.qualified('agents')} WHERE id = $1`,
      [id]
    );
    return result.rows[0] ?? null;
  }

  async createChat(chat: Chat): Promise<void> {
    await this.ensureSchema();
    await this.pool.query(
      `INSERT INTO ${this.qualified('chats')} (id, agent_id, user_id, summary, rounds, created_at, updated_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7)`,
      [chat.id, chat.agent_id, chat.user_id, chat.summary, chat.rounds, chat.created_at, chat.updated_at]
    );
  }

  async getChat(id: string): Promise<Chat | null> {
    await this.ensureSchema();
    const result = await this.pool.query<Chat>(
      `SELECT id, agent_id, user_id, summary, rounds, created_at, updated_at
       FROM ${this.qualified('chats')} WHERE id = $1`,
      [id]
    );
    return result.rows[0] ?? null;
  }

  async listChats(agentId: string, userId: string): Promise<Chat[]> {
    await this.ensureSchema();
    const result = await this.pool.query<Chat>(
      `SELECT id, agent_id, user_id, summary, rounds, created_at, updated_at
       FROM ${this.qualified('chats')}
       WHERE agent_id = $1 AND user_id = $2
       ORDER BY updated_at DESC, id DESC`,
      [agentId, userId]
    );
    return result.rows;
  }

  async updateChat(id: string, patch: ChatPatch): Promise<Chat | null> {
    await this.ensureSchema();
    if (patch.summary === undefined) {
      return this.getChat(id);
    }
    const result = await this.pool.query<Chat>(
      `UPDATE ${this.qualified('chats')} SET summary = $1, updated_at = $2 WHERE id = $3
       RETURNING id, agent_id, user_id, summary, rounds, created_at, updated_at`,
      [patch.summary, this.clock().toISOString(), id]
    );
    return result.rows[0] ?? null;
  }

  async deleteChat(id: string): Promise<boolean> {
    await this.ensureSchema();
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      await client.query(`DELETE FROM ${this.qualified('chat_messages')} WHERE chat_id = $1`, [id]);
      const result = await client.query(`DELETE FROM ${this.qualified('chats')} WHERE id = $1`, [id]);
      await client.query('COMMIT');
      return (result.rowCount ?? 0) > 0;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  async incrementRounds(id: string): Promise<void> {
    await this.ensureSchema();
    await this.pool.query(
      `UPDATE ${this.qualified('chats')} SET rounds = rounds + 1, updated_at = $1 WHERE id = $2`,
      [this.clock().toISOString(), id]
    );
  }

  async appendMessage(message: ChatMessage): Promise<ChatMessage> {
    await this.ensureSchema();
    const values = MESSAGE_COLUMNS.map((column) => {
      if (column === 'attachments' || column === 'skill_calls') {
        return encodeJsonColumn(message[column]);
      }
      return message[column];
    });
    const placeholders = MESSAGE_COLUMNS.map((_, index) => `$${index + 1}`).join(', ');

    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      await client.query(
        `INSERT INTO ${this.qualified('chat_messages')} (${MESSAGE_COLUMNS.join(', ')}) VALUES (${placeholders})`,
        values
      );
      await client.query(`UPDATE ${this.qualified('chats')} SET updated_at = $1 WHERE id = $2`, [
        message.created_at,
        message.chat_id,
      ]);
      await client.query('COMMIT');
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
    return message;
  }

  async getMessage(id: string): Promise<ChatMessage | null> {
    await this.ensureSchema();
    const result = await this.pool.query<ChatMessageRow>(
      `SELECT ${MESSAGE_COLUMNS.join(', ')} FROM ${this.qualified('chat_messages')} WHERE id = $1`,
      [id]
    );
    const row = result.rows[0];
    return row ? this.rowToMessage(row) : null;
  }

  async listMessages(query: MessageListQuery): Promise<ChatMessage[]> {
    await this.ensureSchema();
    const where: string[] = ['agent_id = $1', 'chat_id = $2'];
    const values: Array<unknown> = [query.agentId, query.chatId];

    if (query.before !== undefined) {
      values.push(query.before);
      where.push(`id < $${values.length}`);
    }

    values.push(query.limit);
    const result = await this.pool.query<ChatMessageRow>(
      `SELECT ${MESSAGE_COLUMNS.join(', ')}
       FROM ${this.qualified('chat_messages')}
       WHERE ${where.join(' AND ')}
       ORDER BY id DESC
       LIMIT $${values.length}`,
      values
    );
    return result.rows.map((row) => this.rowToMessage(row));
  }

  async ping(): Promise<boolean> {
    const result = await this.pool.query<{ ok: number }>('SELECT 1 AS ok');
    return result.rows[0]?.ok === 1;
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private rowToMessage(row: ChatMessageRow): ChatMessage {
    return {
      ...row,
      attachments: decodeJsonColumn(AttachmentsColumn, row.attachments, 'attachments'),
      skill_calls: decodeJsonColumn(SkillCallsColumn, row.skill_calls, 'skill_calls'),
    };
  }

  private qualified(table: string): string {
    return `"${this.schema}".${table}`;
  }

  /** Runs the DDL once; concurrent first callers share the same attempt */
  private ensureSchema(): Promise<void> {
    if (!this.schemaReady) {
      this.schemaReady = this.createSchema().catch((error: unknown) => {
        this.schemaReady = null;
        throw error;
      });
    }
    return this.schemaReady;
  }

  private async createSchema(): Promise<void> {
    await this.pool.query(`CREATE SCHEMA IF NOT EXISTS "${this.schema}"`);

    await this.pool.query(
      `CREATE TABLE IF NOT EXISTS ${this.qualified('agents')} (
        id TEXT COLLATE "C" PRIMARY KEY,
        owner TEXT NOT NULL,
        name TEXT NOT NULL,
        description TEXT,
        model TEXT,
        prompt TEXT,
        temperature DOUBLE PRECISION,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      )`
    );

    await this.pool.query(
      `CREATE TABLE IF NOT EXISTS ${this.qualified('chats')} (
        id TEXT COLLATE "C" PRIMARY KEY,
        agent_id TEXT NOT NULL,
        user_id TEXT NOT NULL,
        summary TEXT NOT NULL DEFAULT '',
        rounds INTEGER NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      )`
    );

    await this.pool.query(
      `CREATE INDEX IF NOT EXISTS chats_agent_user_idx ON ${this.qualified('chats')}(agent_id, user_id)`
    );

    await this.pool.query(
      `CREATE TABLE IF NOT EXISTS ${this.qualified('chat_messages')} (
        id TEXT COLLATE "C" PRIMARY KEY,
        chat_id TEXT NOT NULL,
        agent_id TEXT NOT NULL,
        user_id TEXT,
        author_id TEXT NOT NULL,
        author_type TEXT NOT NULL,
        thread_type TEXT,
        message TEXT NOT NULL,
        attachments JSONB,
        model TEXT,
        reply_to TEXT,
        skill_calls JSONB,
        input_tokens INTEGER NOT NULL DEFAULT 0,
        output_tokens INTEGER NOT NULL DEFAULT 0,
        time_cost DOUBLE PRECISION NOT NULL DEFAULT 0,
        credit_event_id TEXT,
        credit_cost DOUBLE PRECISION,
        cold_start_cost DOUBLE PRECISION NOT NULL DEFAULT 0,
        app_id TEXT,
        search_mode BOOLEAN,
        super_mode BOOLEAN,
        created_at TEXT NOT NULL
      )`
    );

    await this.pool.query(
      `CREATE INDEX IF NOT EXISTS chat_messages_thread_idx ON ${this.qualified('chat_messages')}(agent_id, chat_id, id)`
    );
  }
}
