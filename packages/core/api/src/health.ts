/**
 * Health check for the API server
 */
import type { HealthCheck, HealthStatus } from '@agentchat/types';

/**
 * Health check dependencies
 */
export interface HealthCheckDeps {
  service: string;
  version: string;
  /** Epoch milliseconds the process started serving */
  startedAt: number;
  checkStore?: () => Promise<boolean>;
  now?: () => number;
}

/**
 * Perform health checks and return status
 */
export async function performHealthCheck(deps: HealthCheckDeps): Promise<HealthCheck> {
  const checks: Record<string, 'ok' | 'error'> = {};
  let overallStatus: HealthStatus = 'healthy';

  if (deps.checkStore) {
    try {
      checks['store'] = (await deps.checkStore()) ? 'ok' : 'error';
    } catch {
      checks['store'] = 'error';
    }
  } else {
    checks['store'] = 'ok';
  }

  // The store is the only dependency every route needs
  if (Object.values(checks).some((status) => status === 'error')) {
    overallStatus = 'unhealthy';
  }

  const now = deps.now ?? Date.now;
  return {
    status: overallStatus,
    version: deps.version,
    service: deps.service,
    uptime: Math.max(0, Math.floor((now() - deps.startedAt) / 1000)),
    checks,
  };
}

export function healthStatusCode(health: HealthCheck): number {
  return health.status === 'healthy' ? 200 : 503;
}
