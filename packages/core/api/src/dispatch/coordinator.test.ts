import { describe, it, expect, vi } from 'vitest';
import { AgentChatErrorCodes, type ChatMessage, type ExecutionBackend } from '@agentchat/types';
import type { Logger } from '@agentchat/utils';
import { DispatchCoordinator, toNdjsonLine } from './coordinator.js';

function chatMessage(id: string, text = `text ${id}`): ChatMessage {
  return {
    id,
    chat_id: 'chat-1',
    agent_id: 'agent-1',
    user_id: 'u1',
    author_id: 'agent-1',
    author_type: 'agent',
    thread_type: 'api',
    message: text,
    attachments: null,
    model: 'gpt-4o-mini',
    reply_to: 'm0',
    skill_calls: null,
    input_tokens: 3,
    output_tokens: 4,
    time_cost: 0.5,
    credit_event_id: null,
    credit_cost: null,
    cold_start_cost: 0,
    app_id: null,
    search_mode: null,
    super_mode: null,
    created_at: '2026-03-01T00:00:00.000Z',
  };
}

const userMessage = { ...chatMessage('m0', 'hi'), author_id: 'u1', author_type: 'api' as const, reply_to: null };

function spyLogger(): Logger {
  const logger: Logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => logger,
  };
  return logger;
}

function backendFrom(stream: () => AsyncGenerator<ChatMessage>, sync?: () => Promise<ChatMessage[]>): ExecutionBackend {
  return {
    executeSync: sync ?? (async () => []),
    executeStreamed: () => stream(),
  };
}

async function collect(lines: AsyncGenerator<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const line of lines) {
    out.push(line);
  }
  return out;
}

describe('toNdjsonLine', () => {
  it('should write one JSON document terminated by a newline', () => {
    const line = toNdjsonLine(chatMessage('m1'));
    expect(line.endsWith('\n')).toBe(true);
    expect(line.indexOf('\n')).toBe(line.length - 1);
    expect(JSON.parse(line)).toEqual(chatMessage('m1'));
  });
});

describe('DispatchCoordinator', () => {
  describe('dispatchBuffered', () => {
    it('should return every message the backend produced', async () => {
      const replies = [chatMessage('m1'), chatMessage('m2')];
      const coordinator = new DispatchCoordinator(
        backendFrom(async function* () {}, async () => replies)
      );

      await expect(coordinator.dispatchBuffered(userMessage)).resolves.toEqual(replies);
    });

    it('should report a backend failure as an execution error', async () => {
      const logger = spyLogger();
      const coordinator = new DispatchCoordinator(
        backendFrom(async function* () {}, async () => {
          throw new Error('provider down');
        }),
        logger
      );

      await expect(coordinator.dispatchBuffered(userMessage)).rejects.toMatchObject({
        code: AgentChatErrorCodes.EXECUTION_FAILED,
        message: 'Agent execution failed',
      });
      expect(logger.error).toHaveBeenCalledTimes(1);
    });
  });

  describe('startStream', () => {
    it('should forward chunks in order, one line each', async () => {
      const coordinator = new DispatchCoordinator(
        backendFrom(async function* () {
          yield chatMessage('m1');
          yield chatMessage('m2');
        })
      );

      const lines = await collect(await coordinator.startStream(userMessage));
      expect(lines).toEqual([toNdjsonLine(chatMessage('m1')), toNdjsonLine(chatMessage('m2'))]);
    });

    it('should produce no lines for an empty stream', async () => {
      const coordinator = new DispatchCoordinator(backendFrom(async function* () {}));
      expect(await collect(await coordinator.startStream(userMessage))).toEqual([]);
    });

    it('should reject before any line when the first chunk fails', async () => {
      const coordinator = new DispatchCoordinator(
        backendFrom(async function* () {
          throw new Error('no capacity');
        })
      );

      await expect(coordinator.startStream(userMessage)).rejects.toMatchObject({
        code: AgentChatErrorCodes.EXECUTION_FAILED,
      });
    });

    it('should end after the lines already sent when the backend fails mid-stream', async () => {
      const logger = spyLogger();
      const coordinator = new DispatchCoordinator(
        backendFrom(async function* () {
          yield chatMessage('m1');
          throw new Error('connection reset');
        }),
        logger
      );

      const lines = await collect(await coordinator.startStream(userMessage));
      expect(lines).toEqual([toNdjsonLine(chatMessage('m1'))]);
      expect(logger.error).toHaveBeenCalledWith(
        'Stream ended early',
        expect.objectContaining({ messageId: 'm0', sent: 1 })
      );
    });

    it('should stop pulling and close the backend once the signal aborts', async () => {
      let pulled = 0;
      let closed = false;
      const coordinator = new DispatchCoordinator(
        backendFrom(async function* () {
          try {
            for (;;) {
              pulled += 1;
              yield chatMessage(`m${pulled}`);
            }
          } finally {
            closed = true;
          }
        })
      );
      const controller = new AbortController();

      const lines = await coordinator.startStream(userMessage, controller.signal);
      await lines.next();
      controller.abort();

      await expect(lines.next()).resolves.toEqual({ done: true, value: undefined });
      expect(pulled).toBe(1);
      expect(closed).toBe(true);
    });

    it('should close the backend when the consumer stops early', async () => {
      let closed = false;
      const coordinator = new DispatchCoordinator(
        backendFrom(async function* () {
          try {
            yield chatMessage('m1');
            yield chatMessage('m2');
          } finally {
            closed = true;
          }
        })
      );

      const lines = await coordinator.startStream(userMessage);
      await lines.next();
      await lines.return(undefined);

      expect(closed).toBe(true);
    });
  });
});
