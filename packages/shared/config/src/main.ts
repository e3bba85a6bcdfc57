/**
 * Main Configuration Loading
 *
 * Convenience function that combines loading, overlay, and validation
 */

import { DEFAULT_CONFIG, type AgentChatConfig } from './schema.js';
import { loadConfigFile } from './loader.js';
import { applyEnvOverlay, deepMerge } from './env.js';
import { validateConfigOrThrow } from './validation.js';

export interface LoadConfigOptions {
  /** Custom path to agentchat.toml (optional) */
  configPath?: string;
  /** Environment to overlay; defaults to process.env */
  env?: NodeJS.ProcessEnv;
  /** Whether to apply environment variable overlays (default: true) */
  applyEnv?: boolean;
  /** Receives validation warnings; defaults to console.warn */
  onWarning?: (warning: string) => void;
}

/**
 * Load defaults, the TOML file and the environment, then validate.
 *
 * Call once at process start and pass the result down.
 *
 * @throws ConfigLoadError if the file cannot be read or parsed
 * @throws ConfigValidationError if the merged configuration is invalid
 */
export function loadAndValidateConfig(options: LoadConfigOptions = {}): AgentChatConfig {
  const { configPath, env = process.env, applyEnv = true, onWarning } = options;

  let tree = deepMerge(structuredClone(DEFAULT_CONFIG), loadConfigFile(configPath));

  if (applyEnv) {
    tree = applyEnvOverlay(tree, env);
  }

  return validateConfigOrThrow(tree, onWarning);
}
