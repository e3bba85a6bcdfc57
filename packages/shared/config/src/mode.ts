/**
 * Deployment mode resolution
 */

import type { AgentChatConfig, DeploymentMode } from './schema.js';
import { ConfigValidationError } from './validation.js';

/**
 * Decide how bearer credentials are verified.
 *
 * Precedence is external provider, then local secret, then open. A half
 * configured provider is rejected here as well, so open mode is unreachable
 * whenever any secret is present.
 */
export function resolveDeploymentMode(config: AgentChatConfig): DeploymentMode {
  const { privy_app_id, privy_app_secret, jwt_secret } = config.auth;

  if (privy_app_id && privy_app_secret) {
    return { kind: 'external-provider', appId: privy_app_id, appSecret: privy_app_secret };
  }

  if (privy_app_id || privy_app_secret) {
    throw new ConfigValidationError('Incomplete identity provider configuration', [
      'auth.privy_app_id and auth.privy_app_secret must be set together',
    ]);
  }

  if (jwt_secret) {
    return { kind: 'local-secret', secret: jwt_secret };
  }

  return { kind: 'open-test' };
}
