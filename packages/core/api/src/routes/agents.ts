import type { FastifyInstance } from 'fastify';
import { AgentCreateRequestSchema, validateOrThrow } from '@agentchat/types';
import { requireIdentity } from '../http/auth-hook.js';
import type { AgentParams, ApiServices } from './types.js';

export function registerAgentRoutes(app: FastifyInstance, services: ApiServices): void {
  app.post('/agents', async (request) => {
    const identity = requireIdentity(request);
    const body = validateOrThrow(AgentCreateRequestSchema, request.body, { component: 'agents' });
    return services.agents.create(identity, body);
  });

  app.get<{ Params: AgentParams }>('/agents/:aid', async (request) => {
    return services.agents.get(request.params.aid, requireIdentity(request));
  });
}
