/**
 * Environment Variable Overlay
 *
 * Allows environment variables to override TOML configuration values
 */

import type { ConfigTree } from './schema.js';

/**
 * Mapping of environment variables to configuration paths
 */
const ENV_VAR_MAPPINGS: Record<string, string> = {
  // Service identity
  AGENTCHAT_NAME: 'service.name',
  AGENTCHAT_RELEASE: 'service.release',
  AGENTCHAT_ENV: 'service.env',

  // HTTP server
  HOST: 'server.host',
  PORT: 'server.port',

  // Credential verification
  PRIVY_APP_ID: 'auth.privy_app_id',
  PRIVY_APP_SECRET: 'auth.privy_app_secret',
  JWT_SECRET: 'auth.jwt_secret',

  // Storage
  DATABASE_URL: 'database.url',
  DB_SCHEMA: 'database.schema',
  SQLITE_PATH: 'database.sqlite_path',

  // Execution backend
  LLM_MODEL: 'llm.model',
  OPENAI_API_KEY: 'llm.api_key',
  LLM_BASE_URL: 'llm.base_url',
  LLM_MAX_TOKENS: 'llm.max_tokens',
  LLM_TEMPERATURE: 'llm.temperature',
  LLM_HISTORY_LIMIT: 'llm.history_limit',

  // Runtime
  LOG_LEVEL: 'runtime.log_level',
};

const NUMERIC_PATHS = new Set([
  'server.port',
  'llm.max_tokens',
  'llm.temperature',
  'llm.history_limit',
]);

function parseEnvValue(value: string, configPath: string): string | number {
  if (NUMERIC_PATHS.has(configPath)) {
    const num = Number(value);
    if (!Number.isNaN(num)) return num;
  }
  return value;
}

/**
 * Check if a key is safe to use (not a prototype pollution vector)
 */
function isSafeKey(key: string): boolean {
  return key !== '__proto__' && key !== 'constructor' && key !== 'prototype';
}

function isTree(value: unknown): value is ConfigTree {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function setNestedProperty(obj: ConfigTree, dottedPath: string, value: unknown): void {
  const parts = dottedPath.split('.');
  let current = obj;

  for (const part of parts.slice(0, -1)) {
    if (!isSafeKey(part)) return;
    const next = current[part];
    if (isTree(next)) {
      current = next;
    } else {
      const created: ConfigTree = {};
      current[part] = created;
      current = created;
    }
  }

  const lastPart = parts[parts.length - 1];
  if (lastPart && isSafeKey(lastPart)) {
    current[lastPart] = value;
  }
}

/**
 * Create configuration overlay from environment variables
 */
export function createEnvOverlay(env: NodeJS.ProcessEnv = process.env): ConfigTree {
  const overlay: ConfigTree = {};

  for (const [envVar, configPath] of Object.entries(ENV_VAR_MAPPINGS)) {
    const value = env[envVar];
    if (value !== undefined && value !== '') {
      setNestedProperty(overlay, configPath, parseEnvValue(value, configPath));
    }
  }

  return overlay;
}

/**
 * Deep merge two trees, with source taking precedence
 * Protected against prototype pollution
 */
export function deepMerge(target: ConfigTree, source: ConfigTree): ConfigTree {
  const result: ConfigTree = { ...target };

  for (const key of Object.keys(source)) {
    if (!isSafeKey(key)) {
      continue;
    }

    const sourceValue = source[key];
    const targetValue = result[key];

    if (sourceValue === undefined) {
      continue;
    }

    result[key] =
      isTree(sourceValue) && isTree(targetValue) ? deepMerge(targetValue, sourceValue) : sourceValue;
  }

  return result;
}

/**
 * Apply environment variable overlay to a configuration tree
 */
export function applyEnvOverlay(config: ConfigTree, env: NodeJS.ProcessEnv = process.env): ConfigTree {
  return deepMerge(config, createEnvOverlay(env));
}
