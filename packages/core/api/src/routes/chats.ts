import type { FastifyInstance } from 'fastify';
import { ChatUpdateRequestSchema, validateOrThrow } from '@agentchat/types';
import { requireIdentity } from '../http/auth-hook.js';
import type { AgentParams, ApiServices, ChatParams } from './types.js';

export function registerChatRoutes(app: FastifyInstance, services: ApiServices): void {
  app.post<{ Params: AgentParams }>('/agents/:aid/chats', async (request) => {
    return services.chats.createThread(request.params.aid, requireIdentity(request));
  });

  app.get<{ Params: AgentParams }>('/agents/:aid/chats', async (request) => {
    return services.chats.listThreads(request.params.aid, requireIdentity(request));
  });

  app.get<{ Params: ChatParams }>('/agents/:aid/chats/:cid', async (request) => {
    const { aid, cid } = request.params;
    return services.chats.getThread(aid, cid, requireIdentity(request));
  });

  app.patch<{ Params: ChatParams }>('/agents/:aid/chats/:cid', async (request) => {
    const identity = requireIdentity(request);
    const patch = validateOrThrow(ChatUpdateRequestSchema, request.body ?? {}, { component: 'chats' });
    const { aid, cid } = request.params;
    return services.chats.updateThread(aid, cid, identity, patch);
  });

  app.delete<{ Params: ChatParams }>('/agents/:aid/chats/:cid', async (request, reply) => {
    const { aid, cid } = request.params;
    await services.chats.deleteThread(aid, cid, requireIdentity(request));
    return reply.status(204).send();
  });
}
