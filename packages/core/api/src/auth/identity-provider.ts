import { PrivyClient } from '@privy-io/server-auth';

export interface ProviderUser {
  id: string;
}

/**
 * External identity service consulted in external-provider mode
 */
export interface IdentityProvider {
  /** Validate an access token and return the provider's user id */
  verifyAccessToken(token: string): Promise<string>;
  /** Look a user up by id; null when the provider no longer knows them */
  getUser(userId: string): Promise<ProviderUser | null>;
}

export class PrivyIdentityProvider implements IdentityProvider {
  private readonly client: PrivyClient;

  constructor(appId: string, appSecret: string) {
    this.client = new PrivyClient(appId, appSecret);
  }

  async verifyAccessToken(token: string): Promise<string> {
    const claims = await this.client.verifyAuthToken(token);
    return claims.userId;
  }

  async getUser(userId: string): Promise<ProviderUser | null> {
    const user = await this.client.getUser(userId);
    return user ? { id: user.id } : null;
  }
}
