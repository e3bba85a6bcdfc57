/**
 * Dispatch Coordinator
 *
 * Hands a stored user message to the execution backend, either collecting
 * every produced message (buffered) or forwarding each chunk as one NDJSON
 * line as soon as the backend yields it (streamed).
 */

import {
  createExecutionFailedError,
  extractErrorInfo,
  type ChatMessage,
  type ExecutionBackend,
  type ExecutionChunk,
} from '@agentchat/types';
import { noopLogger, type Logger } from '@agentchat/utils';

export const NDJSON_CONTENT_TYPE = 'application/x-ndjson';

export function toNdjsonLine(chunk: ExecutionChunk): string {
  return `${JSON.stringify(chunk)}\n`;
}

function executionFailed(error: unknown) {
  return createExecutionFailedError('Agent execution failed', {
    component: 'dispatch',
    cause: error instanceof Error ? error : undefined,
  });
}

export class DispatchCoordinator {
  constructor(
    private readonly backend: ExecutionBackend,
    private readonly logger: Logger = noopLogger
  ) {}

  /**
   * Run the backend to completion. Any failure surfaces as one execution
   * error; partial output is never returned.
   */
  async dispatchBuffered(message: ChatMessage, signal?: AbortSignal): Promise<ChatMessage[]> {
    try {
      return await this.backend.executeSync(message, { signal });
    } catch (error) {
      this.logger.error('Buffered dispatch failed', { messageId: message.id, ...extractErrorInfo(error) });
      throw executionFailed(error);
    }
  }

  /**
   * Start a streamed dispatch.
   *
   * The first chunk is pulled before this resolves, so a backend that fails
   * immediately still produces an error response. After that, chunks are
   * pulled one at a time, only when the consumer asks for the next line.
   * A later backend error ends the stream; lines already sent stay sent.
   */
  async startStream(message: ChatMessage, signal?: AbortSignal): Promise<AsyncGenerator<string>> {
    const iterator = this.backend.executeStreamed(message, { signal })[Symbol.asyncIterator]();

    let first: IteratorResult<ExecutionChunk>;
    try {
      first = await iterator.next();
    } catch (error) {
      this.logger.error('Streamed dispatch failed to start', { messageId: message.id, ...extractErrorInfo(error) });
      throw executionFailed(error);
    }

    return this.forward(message, iterator, first, signal);
  }

  private async *forward(
    message: ChatMessage,
    iterator: AsyncIterator<ExecutionChunk>,
    first: IteratorResult<ExecutionChunk>,
    signal?: AbortSignal
  ): AsyncGenerator<string> {
    let current = first;
    let sent = 0;
    try {
      while (!current.done) {
        yield toNdjsonLine(current.value);
        sent += 1;
        if (signal?.aborted) {
          this.logger.debug('Client went away; stream stopped', { messageId: message.id, sent });
          return;
        }
        current = await iterator.next();
      }
    } catch (error) {
      this.logger.error('Stream ended early', { messageId: message.id, sent, ...extractErrorInfo(error) });
    } finally {
      if (!current.done) {
        await iterator.return?.();
      }
    }
  }
}
