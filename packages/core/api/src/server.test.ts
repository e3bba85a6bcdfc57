import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { SignJWT } from 'jose';
import { AgentChatErrorCodes, type Agent, type Chat, type ChatMessage, type ExecutionBackend } from '@agentchat/types';
import { LocalSecretVerifier } from './auth/verifier.js';
import { SqliteStore } from './store/sqlite-store.js';
import { createServer } from './server.js';

const key = new TextEncoder().encode('test-secret');

function sign(subject: string, secret: Uint8Array = key): Promise<string> {
  return new SignJWT({}).setProtectedHeader({ alg: 'HS256' }).setSubject(subject).sign(secret);
}

function replyTo(message: ChatMessage, suffix: string): ChatMessage {
  return {
    ...message,
    id: `${message.id}-${suffix}`,
    author_id: message.agent_id,
    author_type: 'agent',
    message: `echo ${suffix}: ${message.message}`,
    reply_to: message.id,
  };
}

class EchoBackend implements ExecutionBackend {
  failStream = false;
  failAfterFirst = false;

  async executeSync(message: ChatMessage): Promise<ChatMessage[]> {
    return [replyTo(message, 'sync')];
  }

  async *executeStreamed(message: ChatMessage): AsyncGenerator<ChatMessage> {
    if (this.failStream) {
      throw new Error('provider unavailable');
    }
    yield replyTo(message, 'a');
    if (this.failAfterFirst) {
      throw new Error('connection reset');
    }
    yield replyTo(message, 'b');
  }
}

describe('HTTP API', () => {
  let store: SqliteStore;
  let backend: EchoBackend;
  let app: FastifyInstance;
  let auth: { authorization: string };
  let otherAuth: { authorization: string };

  beforeEach(async () => {
    store = new SqliteStore(':memory:');
    backend = new EchoBackend();
    app = createServer({
      service: { name: 'agentchat-api', release: '0.1.0' },
      store,
      verifier: new LocalSecretVerifier('test-secret'),
      backend,
    });
    await app.ready();
    auth = { authorization: `Bearer ${await sign('u1')}` };
    otherAuth = { authorization: `Bearer ${await sign('u2')}` };
  });

  afterEach(async () => {
    await app.close();
    await store.close();
  });

  async function createAgent(name = 'Writer', headers = auth): Promise<Agent> {
    const response = await app.inject({ method: 'POST', url: '/agents', headers, payload: { name } });
    expect(response.statusCode).toBe(200);
    return response.json<Agent>();
  }

  async function createChat(agentId: string, headers = auth): Promise<Chat> {
    const response = await app.inject({ method: 'POST', url: `/agents/${agentId}/chats`, headers });
    expect(response.statusCode).toBe(200);
    return response.json<Chat>();
  }

  describe('authentication', () => {
    it('should reject a request without credentials', async () => {
      const response = await app.inject({ method: 'GET', url: '/agents/anything' });

      expect(response.statusCode).toBe(401);
      expect(response.headers['www-authenticate']).toBe('Bearer');
      expect(response.json()).toEqual({
        error: { code: AgentChatErrorCodes.MISSING_CREDENTIAL, message: expect.any(String) },
      });
    });

    it('should reject a token signed with another secret', async () => {
      const forged = await sign('u1', new TextEncoder().encode('other-secret'));
      const response = await app.inject({
        method: 'GET',
        url: '/agents/anything',
        headers: { authorization: `Bearer ${forged}` },
      });

      expect(response.statusCode).toBe(401);
      expect(response.headers['www-authenticate']).toBe('Bearer');
      expect(response.json<{ error: { code: string } }>().error.code).toBe(AgentChatErrorCodes.INVALID_CREDENTIAL);
    });

    it('should serve health without credentials', async () => {
      const response = await app.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({
        status: 'healthy',
        service: 'agentchat-api',
        version: '0.1.0',
        checks: { store: 'ok' },
      });
    });
  });

  describe('agents', () => {
    it('should create an agent owned by the caller and read it back', async () => {
      const created = await createAgent();
      expect(created).toMatchObject({ owner: 'u1', name: 'Writer', description: null, model: null });

      const fetched = await app.inject({ method: 'GET', url: `/agents/${created.id}`, headers: auth });
      expect(fetched.statusCode).toBe(200);
      expect(fetched.json()).toEqual(created);
    });

    it('should return the same payload for repeated reads', async () => {
      const created = await createAgent();
      const first = await app.inject({ method: 'GET', url: `/agents/${created.id}`, headers: auth });
      const second = await app.inject({ method: 'GET', url: `/agents/${created.id}`, headers: auth });
      expect(second.body).toBe(first.body);
    });

    it('should answer not found for an unknown id', async () => {
      const response = await app.inject({ method: 'GET', url: '/agents/no-such-agent', headers: auth });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({
        error: { code: AgentChatErrorCodes.NOT_FOUND, message: 'Agent no-such-agent not found' },
      });
    });

    it("should hide another user's agent behind the same not found", async () => {
      const created = await createAgent();
      const response = await app.inject({ method: 'GET', url: `/agents/${created.id}`, headers: otherAuth });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({
        error: { code: AgentChatErrorCodes.NOT_FOUND, message: `Agent ${created.id} not found` },
      });
    });

    it('should reject an agent without a name', async () => {
      const response = await app.inject({ method: 'POST', url: '/agents', headers: auth, payload: {} });

      expect(response.statusCode).toBe(422);
      expect(response.json<{ error: { code: string } }>().error.code).toBe(AgentChatErrorCodes.VALIDATION);
    });

    it('should reject a malformed JSON body as a validation error', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/agents',
        headers: { ...auth, 'content-type': 'application/json' },
        payload: '{"name":',
      });

      expect(response.statusCode).toBe(422);
      expect(response.json<{ error: { code: string } }>().error.code).toBe(AgentChatErrorCodes.VALIDATION);
    });
  });

  describe('chats', () => {
    it('should open a thread with zero rounds', async () => {
      const agent = await createAgent();
      const chat = await createChat(agent.id);

      expect(chat).toMatchObject({ agent_id: agent.id, user_id: 'u1', rounds: 0, summary: '' });
    });

    it('should not open a thread on an agent the caller does not own', async () => {
      const agent = await createAgent();
      const response = await app.inject({ method: 'POST', url: `/agents/${agent.id}/chats`, headers: otherAuth });
      expect(response.statusCode).toBe(404);
    });

    it('should list only the threads of the requested agent', async () => {
      const first = await createAgent('First');
      const second = await createAgent('Second');
      const firstChat = await createChat(first.id);
      const secondChat = await createChat(second.id);

      const listFirst = await app.inject({ method: 'GET', url: `/agents/${first.id}/chats`, headers: auth });
      const listSecond = await app.inject({ method: 'GET', url: `/agents/${second.id}/chats`, headers: auth });

      expect(listFirst.json<Chat[]>().map((c) => c.id)).toEqual([firstChat.id]);
      expect(listSecond.json<Chat[]>().map((c) => c.id)).toEqual([secondChat.id]);
    });

    it('should persist a summary and echo the thread for an empty patch', async () => {
      const agent = await createAgent();
      const chat = await createChat(agent.id);
      const url = `/agents/${agent.id}/chats/${chat.id}`;

      const patched = await app.inject({ method: 'PATCH', url, headers: auth, payload: { summary: 'cats' } });
      expect(patched.statusCode).toBe(200);
      expect(patched.json<Chat>().summary).toBe('cats');

      const empty = await app.inject({ method: 'PATCH', url, headers: auth, payload: {} });
      expect(empty.json()).toEqual(patched.json());

      const fetched = await app.inject({ method: 'GET', url, headers: auth });
      expect(fetched.json<Chat>().summary).toBe('cats');
    });

    it('should delete a thread and then report it missing', async () => {
      const agent = await createAgent();
      const chat = await createChat(agent.id);
      const url = `/agents/${agent.id}/chats/${chat.id}`;

      const deleted = await app.inject({ method: 'DELETE', url, headers: auth });
      expect(deleted.statusCode).toBe(204);
      expect(deleted.body).toBe('');

      const fetched = await app.inject({ method: 'GET', url, headers: auth });
      expect(fetched.statusCode).toBe(404);
      expect(fetched.json()).toEqual({
        error: { code: AgentChatErrorCodes.NOT_FOUND, message: `Chat ${chat.id} not found` },
      });
    });

    it('should not find a thread through a different agent', async () => {
      const first = await createAgent('First');
      const second = await createAgent('Second');
      const chat = await createChat(first.id);

      const response = await app.inject({
        method: 'GET',
        url: `/agents/${second.id}/chats/${chat.id}`,
        headers: auth,
      });
      expect(response.statusCode).toBe(404);
    });
  });

  describe('messages', () => {
    let agent: Agent;
    let chat: Chat;
    let messagesUrl: string;

    beforeEach(async () => {
      agent = await createAgent();
      chat = await createChat(agent.id);
      messagesUrl = `/agents/${agent.id}/chats/${chat.id}/messages`;
    });

    it('should store the message and return the buffered replies', async () => {
      const response = await app.inject({
        method: 'POST',
        url: messagesUrl,
        headers: auth,
        payload: { user_id: 'u1', message: 'hello', stream: false },
      });

      expect(response.statusCode).toBe(200);
      const replies = response.json<ChatMessage[]>();
      expect(replies).toHaveLength(1);
      expect(replies[0]).toMatchObject({ author_type: 'agent', message: 'echo sync: hello', chat_id: chat.id });

      const listed = await app.inject({ method: 'GET', url: messagesUrl, headers: auth });
      const page = listed.json<{ data: ChatMessage[]; has_more: boolean; next_cursor: string | null }>();
      expect(page.has_more).toBe(false);
      expect(page.next_cursor).toBeNull();
      expect(page.data.map((m) => [m.id, m.message, m.author_type])).toEqual([[replies[0]?.reply_to, 'hello', 'api']]);
    });

    it('should stream one NDJSON line per chunk', async () => {
      const response = await app.inject({
        method: 'POST',
        url: messagesUrl,
        headers: auth,
        payload: { user_id: 'u1', message: 'hello', stream: true },
      });

      expect(response.statusCode).toBe(200);
      expect(response.headers['content-type']).toBe('application/x-ndjson');

      const lines = response.body.split('\n');
      expect(lines.at(-1)).toBe('');
      const chunks: ChatMessage[] = lines.slice(0, -1).map((line) => JSON.parse(line));
      expect(chunks.map((c) => c.message)).toEqual(['echo a: hello', 'echo b: hello']);
    });

    it('should keep the user message when the stream fails before its first chunk', async () => {
      backend.failStream = true;
      const response = await app.inject({
        method: 'POST',
        url: messagesUrl,
        headers: auth,
        payload: { user_id: 'u1', message: 'still here', stream: true },
      });

      expect(response.statusCode).toBe(500);
      expect(response.json()).toEqual({
        error: { code: AgentChatErrorCodes.EXECUTION_FAILED, message: 'Agent execution failed' },
      });

      const listed = await app.inject({ method: 'GET', url: messagesUrl, headers: auth });
      expect(listed.json<{ data: ChatMessage[] }>().data.map((m) => m.message)).toEqual(['still here']);
    });

    it('should reject an empty message', async () => {
      const response = await app.inject({
        method: 'POST',
        url: messagesUrl,
        headers: auth,
        payload: { user_id: 'u1', message: '' },
      });
      expect(response.statusCode).toBe(422);
    });

    it('should refuse to post into a thread the caller does not own', async () => {
      const response = await app.inject({
        method: 'POST',
        url: messagesUrl,
        headers: otherAuth,
        payload: { user_id: 'u2', message: 'hello' },
      });
      expect(response.statusCode).toBe(404);
    });

    it('should end the stream after the lines already sent when the backend fails mid-stream', async () => {
      backend.failAfterFirst = true;
      const response = await app.inject({
        method: 'POST',
        url: messagesUrl,
        headers: auth,
        payload: { user_id: 'u1', message: 'hello', stream: true },
      });

      expect(response.statusCode).toBe(200);
      expect(response.headers['content-type']).toBe('application/x-ndjson');
      const lines = response.body.split('\n');
      expect(lines).toHaveLength(2);
      expect(lines[1]).toBe('');
      const sent: ChatMessage = JSON.parse(lines[0] ?? '');
      expect(sent.message).toBe('echo a: hello');
    });

    it('should treat an empty cursor as the first page', async () => {
      for (const text of ['one', 'two']) {
        await app.inject({ method: 'POST', url: messagesUrl, headers: auth, payload: { user_id: 'u1', message: text } });
      }

      const response = await app.inject({ method: 'GET', url: `${messagesUrl}?cursor=&limit=5`, headers: auth });

      expect(response.statusCode).toBe(200);
      const page = response.json<{ data: ChatMessage[]; has_more: boolean; next_cursor: string | null }>();
      expect(page.data.map((m) => m.message)).toEqual(['two', 'one']);
      expect(page).toMatchObject({ has_more: false, next_cursor: null });
    });

    it('should page through stored messages with a cursor', async () => {
      for (const text of ['one', 'two', 'three']) {
        await app.inject({ method: 'POST', url: messagesUrl, headers: auth, payload: { user_id: 'u1', message: text } });
      }

      const first = await app.inject({ method: 'GET', url: `${messagesUrl}?limit=2`, headers: auth });
      const firstPage = first.json<{ data: ChatMessage[]; has_more: boolean; next_cursor: string | null }>();
      expect(firstPage.data.map((m) => m.message)).toEqual(['three', 'two']);
      expect(firstPage.has_more).toBe(true);

      const second = await app.inject({
        method: 'GET',
        url: `${messagesUrl}?limit=2&cursor=${firstPage.next_cursor ?? ''}`,
        headers: auth,
      });
      const secondPage = second.json<{ data: ChatMessage[]; has_more: boolean; next_cursor: string | null }>();
      expect(secondPage).toMatchObject({ has_more: false, next_cursor: null });
      expect(secondPage.data.map((m) => m.message)).toEqual(['one']);
    });

    it('should reject a limit outside the allowed range', async () => {
      const response = await app.inject({ method: 'GET', url: `${messagesUrl}?limit=0`, headers: auth });
      expect(response.statusCode).toBe(422);
    });

    it('should fetch a single message for its owner only', async () => {
      await app.inject({ method: 'POST', url: messagesUrl, headers: auth, payload: { user_id: 'u1', message: 'hi' } });
      const listed = await app.inject({ method: 'GET', url: messagesUrl, headers: auth });
      const [stored] = listed.json<{ data: ChatMessage[] }>().data;

      const mine = await app.inject({ method: 'GET', url: `/messages/${stored?.id ?? ''}`, headers: auth });
      expect(mine.statusCode).toBe(200);
      expect(mine.json()).toEqual(stored);

      const theirs = await app.inject({ method: 'GET', url: `/messages/${stored?.id ?? ''}`, headers: otherAuth });
      expect(theirs.statusCode).toBe(404);
    });

    it('should answer retry as not implemented', async () => {
      const response = await app.inject({ method: 'POST', url: `${messagesUrl}/retry`, headers: auth });

      expect(response.statusCode).toBe(501);
      expect(response.json<{ error: { code: string } }>().error.code).toBe(AgentChatErrorCodes.NOT_IMPLEMENTED);
    });
  });

  it('should report an unknown route as not found', async () => {
    const response = await app.inject({ method: 'GET', url: '/nowhere', headers: auth });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({
      error: { code: AgentChatErrorCodes.NOT_FOUND, message: 'Route GET /nowhere not found' },
    });
  });

  it('should report unhealthy when the store stops answering', async () => {
    vi.spyOn(store, 'ping').mockResolvedValue(false);
    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(503);
    expect(response.json()).toMatchObject({ status: 'unhealthy', checks: { store: 'error' } });
  });
});
