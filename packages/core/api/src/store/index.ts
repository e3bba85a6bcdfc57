import pg from 'pg';
import type { DatabaseConfig } from '@agentchat/config';
import type { Store } from '@agentchat/types';
import type { Logger } from '@agentchat/utils';
import { PostgresStore } from './postgres-store.js';
import { SqliteStore } from './sqlite-store.js';

export { PostgresStore } from './postgres-store.js';
export { SqliteStore, type SqliteStoreOptions } from './sqlite-store.js';

/**
 * Postgres when a connection url is configured, SQLite otherwise
 */
export function createStore(database: DatabaseConfig, logger: Logger): Store {
  if (database.url) {
    logger.info(`Using Postgres storage (schema "${database.schema}")`);
    return new PostgresStore(new pg.Pool({ connectionString: database.url }), database.schema);
  }

  logger.info(`Using SQLite storage at ${database.sqlite_path}`);
  return new SqliteStore(database.sqlite_path);
}
