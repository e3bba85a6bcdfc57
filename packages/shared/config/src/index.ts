/**
 * @agentchat/config - Configuration System
 *
 * TOML parsing, environment variable overlays, validation and deployment-mode
 * resolution for the AgentChat services.
 */

export {
  AgentChatConfigSchema,
  DEFAULT_CONFIG,
  type AgentChatConfig,
  type ServiceConfig,
  type ServerConfig,
  type AuthConfig,
  type DatabaseConfig,
  type LLMConfig,
  type RuntimeConfig,
  type LogLevel,
  type ConfigTree,
  type DeploymentMode,
} from './schema.js';

export {
  loadConfigFile,
  loadTomlFile,
  parseToml,
  findConfigFile,
  getConfigSearchPaths,
  ConfigLoadError,
} from './loader.js';

export { createEnvOverlay, applyEnvOverlay, deepMerge } from './env.js';

export {
  validateConfig,
  validateConfigOrThrow,
  ConfigValidationError,
  type ValidationResult,
} from './validation.js';

export { resolveDeploymentMode } from './mode.js';

export { loadAndValidateConfig, type LoadConfigOptions } from './main.js';
