/**
 * Settings entry point
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import type { LoadSettingsOptions, Settings } from '../../types/settings.js';
import { ConfigError } from '../errors.js';
import { getAwrapHome, getSettingsFilePath, loadSettingsFile } from './env-loader.js';
import { validateSettingsEnvSafe } from './schema.js';

/**
 * Load and validate awrap settings
 *
 * Priority (highest to lowest):
 * 1. Process environment
 * 2. Settings file (~/.awrap/config.env)
 * 3. Built-in defaults
 *
 * @example
 * ```ts
 * const settings = loadSettings();
 * const ciSettings = loadSettings({ ...process.env, AWRAP_NO_INTERACTIVE: '1' });
 * ```
 */
export function loadSettings(
  env: NodeJS.ProcessEnv = process.env,
  options: LoadSettingsOptions = {}
): Settings {
  const homeDir = options.homeDir ?? homedir();
  const settingsFile = options.settingsFile ?? getSettingsFilePath(env, homeDir);

  const merged: Record<string, string | undefined> = {
    ...loadSettingsFile(settingsFile),
    ...env,
  };

  const result = validateSettingsEnvSafe(merged);
  if (!result.success) {
    // Only variable names are reported; values may be secrets
    const names = result.error.issues.map(
      (issue) => `  - ${issue.path.join('.')}: ${issue.message}`
    );
    throw new ConfigError(`Invalid settings:\n${names.join('\n')}`);
  }

  const vars = result.data;
  const awsDir = join(homeDir, '.aws');

  return {
    defaultProfile: vars.AWS_PROFILE,
    environmentRegion: vars.AWS_REGION ?? vars.AWS_DEFAULT_REGION,
    configFile: vars.AWS_CONFIG_FILE ?? join(awsDir, 'config'),
    credentialsFile: vars.AWS_SHARED_CREDENTIALS_FILE ?? join(awsDir, 'credentials'),
    noInteractive: vars.AWRAP_NO_INTERACTIVE,
    cacheEnabled: vars.AWRAP_CACHE,
    cacheStatic: vars.AWRAP_CACHE_STATIC,
    cachePassphrase: vars.AWRAP_CACHE_PASSPHRASE,
    cacheDir: vars.AWRAP_CACHE_DIR ?? join(getAwrapHome(env, homeDir), 'cache'),
    connectTimeoutMs: vars.AWRAP_CONNECT_TIMEOUT_MS,
    requestTimeoutMs: vars.AWRAP_REQUEST_TIMEOUT_MS,
    sessionDurationSeconds: vars.AWRAP_SESSION_DURATION,
    awsCli: vars.AWRAP_AWS_CLI ?? 'aws',
  };
}

export { getAwrapHome, getSettingsFilePath, loadSettingsFile } from './env-loader.js';
