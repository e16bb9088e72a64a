/**
 * Settings file loader
 * Reads the dotenv-format settings file without touching process.env
 */

import { parse } from 'dotenv';
import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { ConfigError } from '../errors.js';

/**
 * Directory holding awrap's own files
 *
 * Priority (highest to lowest):
 * 1. AWRAP_HOME
 * 2. ~/.awrap
 */
export function getAwrapHome(
  env: NodeJS.ProcessEnv = process.env,
  homeDir: string = homedir()
): string {
  return env.AWRAP_HOME || join(homeDir, '.awrap');
}

/**
 * Path of the settings file
 */
export function getSettingsFilePath(
  env: NodeJS.ProcessEnv = process.env,
  homeDir: string = homedir()
): string {
  return join(getAwrapHome(env, homeDir), 'config.env');
}

/**
 * Read variables from a settings file
 *
 * A missing file yields no variables.
 *
 * @example
 * ```ts
 * // ~/.awrap/config.env
 * // AWRAP_CACHE=1
 * // AWRAP_REQUEST_TIMEOUT_MS=10000
 * const vars = loadSettingsFile('/home/me/.awrap/config.env');
 * // { AWRAP_CACHE: '1', AWRAP_REQUEST_TIMEOUT_MS: '10000' }
 * ```
 */
export function loadSettingsFile(filePath: string): Record<string, string> {
  if (!existsSync(filePath)) {
    return {};
  }

  try {
    return parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(
      `Failed to read settings file: ${filePath}`,
      'Check the file permissions',
      { cause: error }
    );
  }
}
