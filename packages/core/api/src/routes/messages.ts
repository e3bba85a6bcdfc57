import { Readable } from 'node:stream';
import type { FastifyInstance } from 'fastify';
import {
  ChatMessageRequestSchema,
  ListMessagesQuerySchema,
  createNotImplementedError,
  validateOrThrow,
} from '@agentchat/types';
import { requireIdentity } from '../http/auth-hook.js';
import { NDJSON_CONTENT_TYPE } from '../dispatch/coordinator.js';
import type { ApiServices, ChatParams, MessageParams } from './types.js';

export function registerMessageRoutes(app: FastifyInstance, services: ApiServices): void {
  app.get<{ Params: ChatParams }>('/agents/:aid/chats/:cid/messages', async (request) => {
    const identity = requireIdentity(request);
    const query = validateOrThrow(ListMessagesQuerySchema, request.query, {
      component: 'messages',
      convert: true,
    });
    const { aid, cid } = request.params;
    return services.messages.listMessages(aid, cid, identity, query);
  });

  app.post<{ Params: ChatParams }>('/agents/:aid/chats/:cid/messages', async (request, reply) => {
    const identity = requireIdentity(request);
    const body = validateOrThrow(ChatMessageRequestSchema, request.body, { component: 'messages' });
    const { aid, cid } = request.params;

    await services.agents.get(aid, identity);
    // Committed before dispatch so a backend failure never loses the text
    const message = await services.messages.appendUserMessage(aid, cid, identity, body);

    const controller = new AbortController();
    reply.raw.on('close', () => {
      if (!reply.raw.writableFinished) {
        controller.abort();
      }
    });

    if (!body.stream) {
      return services.dispatch.dispatchBuffered(message, controller.signal);
    }

    const lines = await services.dispatch.startStream(message, controller.signal);
    return reply.header('Content-Type', NDJSON_CONTENT_TYPE).send(Readable.from(lines));
  });

  app.post<{ Params: ChatParams }>('/agents/:aid/chats/:cid/messages/retry', async (request) => {
    requireIdentity(request);
    throw createNotImplementedError({ component: 'messages' });
  });

  app.get<{ Params: MessageParams }>('/messages/:mid', async (request) => {
    return services.messages.getMessage(request.params.mid, requireIdentity(request));
  });
}
