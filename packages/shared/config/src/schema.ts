/**
 * AgentChat Configuration Schema
 *
 * Shape of agentchat.toml after defaults and environment overlays are merged.
 */

import { Type, type Static } from '@sinclair/typebox';

export const LogLevelSchema = Type.Union([
  Type.Literal('debug'),
  Type.Literal('info'),
  Type.Literal('warn'),
  Type.Literal('error'),
]);

export const ServiceConfigSchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  release: Type.String({ minLength: 1 }),
  /** Deployment environment label, e.g. "local", "testnet-dev", "mainnet-prod" */
  env: Type.String({ minLength: 1 }),
});

export const ServerConfigSchema = Type.Object({
  host: Type.String({ minLength: 1 }),
  port: Type.Integer({ minimum: 1, maximum: 65535 }),
});

export const AuthConfigSchema = Type.Object({
  privy_app_id: Type.Optional(Type.String()),
  privy_app_secret: Type.Optional(Type.String()),
  jwt_secret: Type.Optional(Type.String()),
});

export const DatabaseConfigSchema = Type.Object({
  /** Postgres connection string; SQLite is used when absent */
  url: Type.Optional(Type.String()),
  schema: Type.String({ pattern: '^[A-Za-z_][A-Za-z0-9_]*$' }),
  sqlite_path: Type.String({ minLength: 1 }),
});

export const LLMConfigSchema = Type.Object({
  provider: Type.Literal('openai'),
  model: Type.String({ minLength: 1 }),
  api_key: Type.Optional(Type.String()),
  base_url: Type.Optional(Type.String()),
  max_tokens: Type.Optional(Type.Integer({ minimum: 1, maximum: 1000000 })),
  temperature: Type.Optional(Type.Number({ minimum: 0, maximum: 2 })),
  /** Prior thread messages sent to the model with each request */
  history_limit: Type.Integer({ minimum: 0, maximum: 200 }),
});

export const RuntimeConfigSchema = Type.Object({
  log_level: LogLevelSchema,
});

export const AgentChatConfigSchema = Type.Object({
  service: ServiceConfigSchema,
  server: ServerConfigSchema,
  auth: AuthConfigSchema,
  database: DatabaseConfigSchema,
  llm: LLMConfigSchema,
  runtime: RuntimeConfigSchema,
});

export type LogLevel = Static<typeof LogLevelSchema>;
export type ServiceConfig = Static<typeof ServiceConfigSchema>;
export type ServerConfig = Static<typeof ServerConfigSchema>;
export type AuthConfig = Static<typeof AuthConfigSchema>;
export type DatabaseConfig = Static<typeof DatabaseConfigSchema>;
export type LLMConfig = Static<typeof LLMConfigSchema>;
export type RuntimeConfig = Static<typeof RuntimeConfigSchema>;
export type AgentChatConfig = Static<typeof AgentChatConfigSchema>;

/**
 * Untyped configuration tree as read from TOML or the environment
 */
export type ConfigTree = { [key: string]: unknown };

/**
 * How bearer credentials are verified. Resolved once at startup.
 */
export type DeploymentMode =
  | { kind: 'external-provider'; appId: string; appSecret: string }
  | { kind: 'local-secret'; secret: string }
  | { kind: 'open-test' };

export const DEFAULT_CONFIG: AgentChatConfig = {
  service: {
    name: 'AgentChat API',
    release: '0.1.0',
    env: 'local',
  },
  server: {
    host: '0.0.0.0',
    port: 8000,
  },
  auth: {},
  database: {
    schema: 'public',
    sqlite_path: 'agentchat.db',
  },
  llm: {
    provider: 'openai',
    model: 'gpt-4o-mini',
    history_limit: 20,
  },
  runtime: {
    log_level: 'info',
  },
};
