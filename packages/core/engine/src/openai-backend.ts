import OpenAI from 'openai';
import type {
  Agent,
  ChatMessage,
  ExecutionBackend,
  ExecutionChunk,
  ExecutionOptions,
  Store,
} from '@agentchat/types';
import { newId, noopLogger, systemClock, type Clock, type IdGenerator, type Logger } from '@agentchat/utils';
import { ProviderError, isRetryableProviderError, mapProviderError } from './errors.js';
import { buildPrompt } from './prompt.js';
import { getRetryConfig, retryWithBackoff, type RetryConfig } from './retry.js';

/**
 * The slice of the store the engine reads and writes
 */
export type ExecutionStore = Pick<Store, 'getAgent' | 'listMessages' | 'appendMessage' | 'incrementRounds'>;

export interface OpenAIBackendOptions {
  store: ExecutionStore;
  model: string;
  apiKey?: string;
  baseUrl?: string;
  maxTokens?: number;
  temperature?: number;
  /** Prior thread messages sent with each turn; 0 sends none */
  historyLimit: number;
  retry?: Partial<RetryConfig>;
  idGenerator?: IdGenerator;
  clock?: Clock;
  logger?: Logger;
}

interface Usage {
  prompt_tokens: number;
  completion_tokens: number;
}

interface PreparedTurn {
  agent: Agent | null;
  model: string;
  temperature?: number;
  messages: OpenAI.ChatCompletionMessageParam[];
}

/**
 * Execution backend that answers each user message with one chat completion
 */
export class OpenAIExecutionBackend implements ExecutionBackend {
  private client: OpenAI | null = null;
  private readonly retryConfig: RetryConfig;
  private readonly idGenerator: IdGenerator;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(private readonly options: OpenAIBackendOptions) {
    this.retryConfig = getRetryConfig(options.retry);
    this.idGenerator = options.idGenerator ?? newId;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? noopLogger;
  }

  async executeSync(message: ChatMessage, options?: ExecutionOptions): Promise<ChatMessage[]> {
    const started = this.clock().getTime();
    const turn = await this.prepare(message);
    const client = this.getClient();

    const response = await this.callProvider(
      () =>
        client.chat.completions.create(
          {
            model: turn.model,
            messages: turn.messages,
            temperature: turn.temperature,
            max_tokens: this.options.maxTokens,
            stream: false,
          },
          { signal: options?.signal }
        ),
      options?.signal
    );

    const choice = response.choices[0];
    if (!choice) {
      throw new ProviderError('No completion choice returned', 'unknown');
    }

    const reply = await this.persistReply(
      message,
      choice.message.content ?? '',
      response.model || turn.model,
      response.usage,
      started
    );
    return [reply];
  }

  async *executeStreamed(message: ChatMessage, options?: ExecutionOptions): AsyncGenerator<ExecutionChunk> {
    const started = this.clock().getTime();
    const turn = await this.prepare(message);
    const client = this.getClient();

    const stream = await this.callProvider(
      () =>
        client.chat.completions.create(
          {
            model: turn.model,
            messages: turn.messages,
            temperature: turn.temperature,
            max_tokens: this.options.maxTokens,
            stream: true,
            stream_options: { include_usage: true },
          },
          { signal: options?.signal }
        ),
      options?.signal
    );

    let content = '';
    let usage: Usage | undefined;
    let model = turn.model;
    try {
      for await (const chunk of stream) {
        if (options?.signal?.aborted) {
          this.logger.debug('Stream abandoned by caller', { messageId: message.id });
          return;
        }
        content += chunk.choices[0]?.delta?.content ?? '';
        if (chunk.usage) {
          usage = chunk.usage;
        }
        if (chunk.model) {
          model = chunk.model;
        }
      }
    } catch (error) {
      throw mapProviderError(error);
    }

    yield await this.persistReply(message, content, model, usage, started);
  }

  private getClient(): OpenAI {
    if (!this.options.apiKey) {
      throw new ProviderError('OpenAI API key missing', 'auth');
    }
    if (!this.client) {
      this.client = new OpenAI({ apiKey: this.options.apiKey, baseURL: this.options.baseUrl });
    }
    return this.client;
  }

  private async callProvider<T>(call: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    return retryWithBackoff(
      async (attempt) => {
        try {
          return await call();
        } catch (error) {
          const mapped = mapProviderError(error);
          this.logger.warn(`Provider call failed (attempt ${attempt}): ${mapped.kind}`);
          throw mapped;
        }
      },
      this.retryConfig,
      isRetryableProviderError,
      signal
    );
  }

  private async prepare(message: ChatMessage): Promise<PreparedTurn> {
    const agent = await this.options.store.getAgent(message.agent_id);
    const history =
      this.options.historyLimit > 0
        ? await this.options.store.listMessages({
            agentId: message.agent_id,
            chatId: message.chat_id,
            before: message.id,
            limit: this.options.historyLimit,
          })
        : [];

    return {
      agent,
      model: agent?.model ?? this.options.model,
      temperature: agent?.temperature ?? this.options.temperature,
      messages: buildPrompt(agent, history, message),
    };
  }

  private async persistReply(
    message: ChatMessage,
    content: string,
    model: string,
    usage: Usage | undefined | null,
    started: number
  ): Promise<ChatMessage> {
    const now = this.clock();
    const reply: ChatMessage = {
      id: this.idGenerator(),
      chat_id: message.chat_id,
      agent_id: message.agent_id,
      user_id: message.user_id,
      author_id: message.agent_id,
      author_type: 'agent',
      thread_type: message.thread_type,
      message: content,
      attachments: null,
      model,
      reply_to: message.id,
      skill_calls: null,
      input_tokens: usage?.prompt_tokens ?? 0,
      output_tokens: usage?.completion_tokens ?? 0,
      time_cost: Math.max(0, now.getTime() - started) / 1000,
      credit_event_id: null,
      credit_cost: null,
      cold_start_cost: 0,
      app_id: message.app_id,
      search_mode: message.search_mode,
      super_mode: message.super_mode,
      created_at: now.toISOString(),
    };

    const stored = await this.options.store.appendMessage(reply);
    await this.options.store.incrementRounds(message.chat_id);
    this.logger.debug('Agent reply stored', { messageId: stored.id, chatId: stored.chat_id });
    return stored;
  }
}
