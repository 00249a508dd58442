/**
 * Configuration utilities
 * Handles reading ~/.config/authkey/config.yml
 */

import { readFileSync, existsSync } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { parse as parseYaml } from 'yaml';
import {
  CONFIG_ENV_VAR,
  DEFAULT_CONFIG_PATH,
  DEFAULT_CONNECT_TIMEOUT,
  DEFAULT_PUBLIC_KEY_PATH,
  DEFAULT_SSH_PORT,
} from '../constants';
import type { AuthkeyConfig } from '../schemas';
import { validateConfig, formatValidationErrors } from '../schemas';
import { ConfigError } from './errors';

/**
 * Config values with defaults applied
 */
export interface ResolvedConfig {
  port: number;
  publicKeyPath: string;
  connectTimeout: number;
  useCopyId: boolean;
}

/**
 * Expand a leading ~ to the home directory
 */
export function expandHome(filePath: string, homeDir: string = os.homedir()): string {
  if (filePath === '~') {
    return homeDir;
  }
  if (filePath.startsWith('~/')) {
    return path.join(homeDir, filePath.slice(2));
  }
  return filePath;
}

/**
 * Config file location: $AUTHKEY_CONFIG, else the default path
 */
export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const fromEnv = env[CONFIG_ENV_VAR];
  return fromEnv ? expandHome(fromEnv) : DEFAULT_CONFIG_PATH;
}

/**
 * Load and validate the config file. A missing file means no overrides.
 */
export function loadConfig(configPath: string = getConfigPath()): AuthkeyConfig {
  if (!existsSync(configPath)) {
    return {};
  }

  let data: unknown;
  try {
    const content = readFileSync(configPath, 'utf-8');
    data = parseYaml(content);
  } catch (error) {
    throw new ConfigError(
      `Error reading ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
      'Fix the YAML syntax or remove the file.'
    );
  }

  // An empty file parses to null
  const result = validateConfig(data ?? {});
  if (!result.success) {
    throw new ConfigError(formatValidationErrors(result.error, configPath));
  }

  return result.data;
}

/**
 * Apply defaults to a loaded config
 */
export function resolveConfig(config: AuthkeyConfig): ResolvedConfig {
  return {
    port: config.port ?? DEFAULT_SSH_PORT,
    publicKeyPath: config.public_key ? expandHome(config.public_key) : DEFAULT_PUBLIC_KEY_PATH,
    connectTimeout: config.connect_timeout ?? DEFAULT_CONNECT_TIMEOUT,
    useCopyId: config.use_copy_id ?? true,
  };
}
