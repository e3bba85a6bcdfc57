/**
 * HTTP server assembly
 */
import Fastify, { type FastifyInstance } from 'fastify';
import type { ExecutionBackend, Store } from '@agentchat/types';
import { noopLogger, systemClock, type Clock, type IdGenerator, type Logger } from '@agentchat/utils';
import { AgentService } from './agents/agent-service.js';
import type { CredentialVerifier } from './auth/verifier.js';
import { ChatManager } from './chats/chat-manager.js';
import { MessageLog } from './chats/message-log.js';
import { DispatchCoordinator } from './dispatch/coordinator.js';
import { registerAuthentication } from './http/auth-hook.js';
import { registerErrorHandling } from './http/errors.js';
import { registerAgentRoutes } from './routes/agents.js';
import { registerChatRoutes } from './routes/chats.js';
import { registerHealthRoutes } from './routes/health.js';
import { registerMessageRoutes } from './routes/messages.js';
import type { ApiServices } from './routes/types.js';

export interface ServerDeps {
  service: { name: string; release: string };
  store: Store;
  verifier: CredentialVerifier;
  backend: ExecutionBackend;
  logger?: Logger;
  idGenerator?: IdGenerator;
  clock?: Clock;
}

export function createServices(deps: ServerDeps, logger: Logger): ApiServices {
  const options = { idGenerator: deps.idGenerator, clock: deps.clock };
  const agents = new AgentService(deps.store, options);
  const chats = new ChatManager(deps.store, agents, options);
  return {
    agents,
    chats,
    messages: new MessageLog(deps.store, chats, options),
    dispatch: new DispatchCoordinator(deps.backend, logger.child('dispatch')),
  };
}

export function createServer(deps: ServerDeps): FastifyInstance {
  const logger = deps.logger ?? noopLogger;
  const clock = deps.clock ?? systemClock;
  const services = createServices(deps, logger);

  const app = Fastify({ logger: false });

  app.addHook('onRequest', async (request) => {
    request.receivedAtMs = clock().getTime();
  });

  registerAuthentication(app, deps.verifier);
  registerErrorHandling(app, logger);

  app.addHook('onResponse', async (request, reply) => {
    const durationMs = Math.max(clock().getTime() - (request.receivedAtMs ?? clock().getTime()), 0);
    logger.info(`${request.method} ${request.url} ${reply.statusCode} ${durationMs}ms`);
  });

  registerHealthRoutes(app, {
    service: deps.service.name,
    version: deps.service.release,
    startedAt: clock().getTime(),
    checkStore: () => deps.store.ping(),
    now: () => clock().getTime(),
  });
  registerAgentRoutes(app, services);
  registerChatRoutes(app, services);
  registerMessageRoutes(app, services);

  return app;
}
