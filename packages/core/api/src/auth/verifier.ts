/**
 * Bearer credential verification.
 *
 * One implementation per deployment mode. The mode is chosen once from
 * configuration; requests never influence which verifier runs.
 */

import { jwtVerify } from 'jose';
import type { DeploymentMode } from '@agentchat/config';
import { createInvalidCredentialError, createMissingCredentialError } from '@agentchat/types';
import { noopLogger, type Logger } from '@agentchat/utils';
import { PrivyIdentityProvider, type IdentityProvider } from './identity-provider.js';

export const TEST_USER_ID = 'test_user_id';

export interface CredentialVerifier {
  readonly mode: DeploymentMode['kind'];
  /** Resolve the caller identity or throw a credential error */
  verify(token: string): Promise<string>;
}

function requireToken(token: string): void {
  if (!token) {
    throw createMissingCredentialError({ component: 'auth' });
  }
}

function invalidCredential(error: unknown) {
  return createInvalidCredentialError({
    component: 'auth',
    cause: error instanceof Error ? error : undefined,
  });
}

export class ExternalProviderVerifier implements CredentialVerifier {
  readonly mode = 'external-provider';

  constructor(
    private readonly provider: IdentityProvider,
    private readonly logger: Logger = noopLogger
  ) {}

  async verify(token: string): Promise<string> {
    requireToken(token);
    try {
      const userId = await this.provider.verifyAccessToken(token);
      const user = await this.provider.getUser(userId);
      if (!user) {
        throw new Error(`Provider has no user ${userId}`);
      }
      return user.id;
    } catch (error) {
      this.logger.debug('Provider rejected credential', error instanceof Error ? error.message : error);
      throw invalidCredential(error);
    }
  }
}

export class LocalSecretVerifier implements CredentialVerifier {
  readonly mode = 'local-secret';
  private readonly key: Uint8Array;

  constructor(
    secret: string,
    private readonly logger: Logger = noopLogger
  ) {
    this.key = new TextEncoder().encode(secret);
  }

  async verify(token: string): Promise<string> {
    requireToken(token);
    try {
      const { payload } = await jwtVerify(token, this.key, { algorithms: ['HS256'] });
      if (typeof payload.sub !== 'string' || payload.sub.length === 0) {
        throw new Error('Token has no subject');
      }
      return payload.sub;
    } catch (error) {
      this.logger.debug('JWT rejected', error instanceof Error ? error.message : error);
      throw invalidCredential(error);
    }
  }
}

/**
 * Development mode: any non-empty token maps to the fixed test identity
 */
export class OpenTestVerifier implements CredentialVerifier {
  readonly mode = 'open-test';

  async verify(token: string): Promise<string> {
    requireToken(token);
    return TEST_USER_ID;
  }
}

export interface VerifierDeps {
  /** Overrides the Privy client in external-provider mode */
  identityProvider?: IdentityProvider;
  logger?: Logger;
}

export function createCredentialVerifier(mode: DeploymentMode, deps: VerifierDeps = {}): CredentialVerifier {
  switch (mode.kind) {
    case 'external-provider':
      return new ExternalProviderVerifier(
        deps.identityProvider ?? new PrivyIdentityProvider(mode.appId, mode.appSecret),
        deps.logger
      );
    case 'local-secret':
      return new LocalSecretVerifier(mode.secret, deps.logger);
    case 'open-test':
      return new OpenTestVerifier();
  }
}
