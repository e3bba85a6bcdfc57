/**
 * TOML Configuration Loader
 *
 * Loads and parses agentchat.toml configuration files
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as TOML from '@iarna/toml';
import type { ConfigTree } from './schema.js';

export class ConfigLoadError extends Error {
  public override readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigLoadError';
    this.cause = cause;
  }
}

/**
 * Search paths for agentchat.toml in order of precedence
 */
export function getConfigSearchPaths(env: NodeJS.ProcessEnv = process.env): string[] {
  const paths: string[] = [path.join(process.cwd(), 'agentchat.toml')];

  const homeDir = env.HOME || env.USERPROFILE;
  if (homeDir) {
    paths.push(path.join(homeDir, '.agentchat', 'agentchat.toml'));
  }

  return paths;
}

export function findConfigFile(searchPaths: string[] = getConfigSearchPaths()): string | null {
  for (const configPath of searchPaths) {
    if (fs.existsSync(configPath)) {
      return configPath;
    }
  }
  return null;
}

export function parseToml(content: string): ConfigTree {
  try {
    return TOML.parse(content);
  } catch (error) {
    if (error instanceof Error) {
      throw new ConfigLoadError(`Failed to parse TOML: ${error.message}`, error);
    }
    throw new ConfigLoadError('Failed to parse TOML');
  }
}

export function loadTomlFile(filePath: string): ConfigTree {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error) {
      throw new ConfigLoadError(`Failed to load config from ${filePath}: ${error.message}`, error);
    }
    throw new ConfigLoadError(`Failed to load config from ${filePath}`);
  }
  return parseToml(content);
}

/**
 * Load the configuration file, if any.
 *
 * An explicit path must exist. Without one the search paths are tried and an
 * empty tree is returned when none of them has a file, so defaults apply.
 */
export function loadConfigFile(customPath?: string): ConfigTree {
  if (customPath) {
    if (!fs.existsSync(customPath)) {
      throw new ConfigLoadError(`Configuration file not found: ${customPath}`);
    }
    return loadTomlFile(customPath);
  }

  const found = findConfigFile();
  return found ? loadTomlFile(found) : {};
}
