import type OpenAI from 'openai';
import type { Agent, ChatMessage } from '@agentchat/types';

function withAttachments(message: ChatMessage): string {
  if (!message.attachments || message.attachments.length === 0) {
    return message.message;
  }
  const lines = message.attachments.map((attachment) =>
    attachment.name
      ? `[${attachment.type}] ${attachment.name}: ${attachment.url}`
      : `[${attachment.type}] ${attachment.url}`
  );
  return `${message.message}\n\n${lines.join('\n')}`;
}

function toParam(message: ChatMessage): OpenAI.ChatCompletionMessageParam {
  if (message.author_type === 'agent') {
    return { role: 'assistant', content: message.message };
  }
  if (message.author_type === 'system') {
    return { role: 'system', content: message.message };
  }
  return { role: 'user', content: withAttachments(message) };
}

/**
 * Build the completion request messages for one turn.
 *
 * @param history prior messages of the thread, newest first as the message log returns them
 */
export function buildPrompt(
  agent: Agent | null,
  history: ChatMessage[],
  message: ChatMessage
): OpenAI.ChatCompletionMessageParam[] {
  const messages: OpenAI.ChatCompletionMessageParam[] = [];

  if (agent?.prompt) {
    messages.push({ role: 'system', content: agent.prompt });
  }

  for (const previous of [...history].reverse()) {
    messages.push(toParam(previous));
  }

  messages.push(toParam(message));
  return messages;
}
