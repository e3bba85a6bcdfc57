import type { FastifyInstance } from 'fastify';
import { healthStatusCode, performHealthCheck, type HealthCheckDeps } from '../health.js';

export function registerHealthRoutes(app: FastifyInstance, deps: HealthCheckDeps): void {
  app.get('/health', async (_request, reply) => {
    const health = await performHealthCheck(deps);
    return reply.status(healthStatusCode(health)).send(health);
  });
}
