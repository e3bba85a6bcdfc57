import { createMissingCredentialError } from '@agentchat/types';

const BEARER_PATTERN = /^Bearer\s+(.*)$/i;

/**
 * Pull the token out of an `Authorization: Bearer <token>` header.
 * An absent header, another scheme or a blank token all count as missing.
 */
export function extractBearerToken(header: string | undefined): string {
  const match = header ? BEARER_PATTERN.exec(header.trim()) : null;
  const token = match?.[1]?.trim();
  if (!token) {
    throw createMissingCredentialError({ component: 'auth' });
  }
  return token;
}
