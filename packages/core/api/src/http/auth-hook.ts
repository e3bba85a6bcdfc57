import type { FastifyInstance, FastifyRequest } from 'fastify';
import { createMissingCredentialError } from '@agentchat/types';
import { extractBearerToken } from '../auth/bearer.js';
import type { CredentialVerifier } from '../auth/verifier.js';

declare module 'fastify' {
  interface FastifyRequest {
    identity?: string;
    receivedAtMs?: number;
  }
}

const PUBLIC_PATHS = new Set(['/health']);

/**
 * Authenticate every request outside the public paths before routing
 */
export function registerAuthentication(app: FastifyInstance, verifier: CredentialVerifier): void {
  app.addHook('onRequest', async (request) => {
    const path = request.url.split('?', 1)[0] ?? request.url;
    if (PUBLIC_PATHS.has(path)) {
      return;
    }

    const token = extractBearerToken(request.headers.authorization);
    request.identity = await verifier.verify(token);
  });
}

export function requireIdentity(request: FastifyRequest): string {
  if (!request.identity) {
    throw createMissingCredentialError({ component: 'auth' });
  }
  return request.identity;
}
