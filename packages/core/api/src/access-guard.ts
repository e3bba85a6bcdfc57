/**
 * Ownership checks for scoped entities.
 *
 * A missing entity and an entity owned by someone else produce the same
 * not-found error, so callers cannot probe for ids they do not own.
 */

import { createNotFoundError, type Agent, type Chat, type ChatMessage } from '@agentchat/types';

export type EntityLoader<T> = () => Promise<T | null>;
export type OwnershipPredicate<T> = (entity: T) => boolean;

export async function authorize<T>(
  load: EntityLoader<T>,
  predicate: OwnershipPredicate<T>,
  notFoundMessage: string
): Promise<T> {
  const entity = await load();
  if (entity === null || !predicate(entity)) {
    throw createNotFoundError(notFoundMessage, { component: 'access' });
  }
  return entity;
}

export const ownsAgent =
  (identity: string): OwnershipPredicate<Agent> =>
  (agent) =>
    agent.owner === identity;

export const ownsChat =
  (agentId: string, identity: string): OwnershipPredicate<Chat> =>
  (chat) =>
    chat.agent_id === agentId && chat.user_id === identity;

export const ownsMessage =
  (identity: string): OwnershipPredicate<ChatMessage> =>
  (message) =>
    message.user_id === identity;
