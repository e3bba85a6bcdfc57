/**
 * Configuration Validation
 *
 * Structural checks come from the TypeBox schema; the rules below cover what
 * a schema cannot express.
 */

import { validate } from '@agentchat/types';
import { AgentChatConfigSchema, type AgentChatConfig } from './schema.js';

export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly errors: string[] = []
  ) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}

export type ValidationResult =
  | { valid: true; config: AgentChatConfig; errors: string[]; warnings: string[] }
  | { valid: false; errors: string[]; warnings: string[] };

function isProductionEnv(env: string): boolean {
  return env === 'prod' || env.endsWith('-prod') || env.endsWith('production');
}

function validateAuthConfig(config: AgentChatConfig, errors: string[], warnings: string[]): void {
  const { privy_app_id, privy_app_secret, jwt_secret } = config.auth;

  if (Boolean(privy_app_id) !== Boolean(privy_app_secret)) {
    errors.push('auth.privy_app_id and auth.privy_app_secret must be set together');
  }

  const anyCredential = Boolean(privy_app_id || privy_app_secret || jwt_secret);
  if (!anyCredential) {
    if (isProductionEnv(config.service.env)) {
      errors.push(
        `service.env = "${config.service.env}" requires auth.privy_* or auth.jwt_secret; open authentication is for development only`
      );
    } else {
      warnings.push('No credential verifier configured: every request is served as the test user');
    }
  }

  if (jwt_secret !== undefined && jwt_secret.length > 0 && jwt_secret.length < 8) {
    warnings.push('auth.jwt_secret is shorter than 8 characters');
  }
}

function validateDatabaseConfig(config: AgentChatConfig, errors: string[]): void {
  const url = config.database.url;
  if (url !== undefined && !/^postgres(ql)?:\/\//.test(url)) {
    errors.push('database.url must be a postgres:// or postgresql:// connection string');
  }
}

function validateLLMConfig(config: AgentChatConfig, _errors: string[], warnings: string[]): void {
  if (!config.llm.api_key) {
    warnings.push('llm.api_key is not set; message dispatch will fail until it is configured');
  }
}

/**
 * Validate a merged configuration tree
 */
export function validateConfig(tree: unknown): ValidationResult {
  const structural = validate(AgentChatConfigSchema, tree);
  if (!structural.success) {
    return {
      valid: false,
      errors: structural.errors.map((e) => `${e.path}: ${e.message}`),
      warnings: [],
    };
  }

  const config = structural.data;
  const errors: string[] = [];
  const warnings: string[] = [];

  validateAuthConfig(config, errors, warnings);
  validateDatabaseConfig(config, errors);
  validateLLMConfig(config, errors, warnings);

  if (errors.length > 0) {
    return { valid: false, errors, warnings };
  }
  return { valid: true, config, errors, warnings };
}

/**
 * Validate configuration and throw if invalid
 */
export function validateConfigOrThrow(
  tree: unknown,
  onWarning: (warning: string) => void = (warning) => console.warn(`Configuration warning: ${warning}`)
): AgentChatConfig {
  const result = validateConfig(tree);

  if (!result.valid) {
    throw new ConfigValidationError(
      `Configuration validation failed:\n${result.errors.join('\n')}`,
      result.errors
    );
  }

  for (const warning of result.warnings) {
    onWarning(warning);
  }

  return result.config;
}
