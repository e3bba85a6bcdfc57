import type { TSchema, Static } from '@sinclair/typebox';
import { createInternalError, isValid } from '@agentchat/types';

/**
 * Decode a JSON column. SQLite hands back text, Postgres JSONB an already
 * parsed value; both are checked against the schema before use.
 */
export function decodeJsonColumn<T extends TSchema>(
  schema: T,
  value: unknown,
  column: string
): Static<T> | null {
  if (value === null || value === undefined) {
    return null;
  }

  const parsed: unknown = typeof value === 'string' ? JSON.parse(value) : value;
  if (!isValid(schema, parsed)) {
    throw createInternalError(`Stored ${column} value does not match its schema`, {
      component: 'store',
    });
  }
  return parsed;
}

export function encodeJsonColumn(value: unknown): string | null {
  return value === null || value === undefined ? null : JSON.stringify(value);
}
