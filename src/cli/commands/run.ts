/**
 * Main command: resolve credentials and run the wrapped AWS CLI command
 */

import chalk from 'chalk';
import { loadSettings } from '../../core/config/index.js';
import { AuthCancelledError, EXIT_CODES } from '../../core/errors.js';
import { ensureExecutable, launch } from '../../core/launcher/launcher.js';
import { ProfileStore, resolveProfileName } from '../../core/profile/store.js';
import { findRegionArgument } from '../../core/resolver/region.js';
import type { Resolution } from '../../types/credentials.js';
import type { Settings } from '../../types/settings.js';
import { createResolver, createSessionCache } from '../runtime.js';
import * as logger from '../utils/logger.js';
import { InquirerPrompter, selectProfile } from '../utils/prompt.js';
import { clearCache } from './clear-cache.js';
import { printProfiles } from './config.js';

/**
 * Command-line options
 */
export interface RunOptions {
  profile?: string;
  config?: boolean;
  /** false with -n / --no-interactive */
  interactive?: boolean;
  clearCache?: string | boolean;
  verbose?: boolean;
}

/**
 * Whether prompts may be shown
 */
export function isInteractive(
  options: RunOptions,
  settings: Settings,
  stdinIsTTY: boolean = process.stdin.isTTY === true
): boolean {
  return options.interactive !== false && !settings.noInteractive && stdinIsTTY;
}

/**
 * Run the wrapper
 *
 * @returns Exit status for the process
 */
export async function runCommand(awsArgs: string[], options: RunOptions): Promise<number> {
  logger.setVerbose(options.verbose === true);

  const settings = loadSettings();
  const interactive = isInteractive(options, settings);
  const prompter = new InquirerPrompter();

  // Interrupts during authentication cancel it; the child is never started
  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.on('SIGINT', onInterrupt);

  let resolution: Resolution;
  let profileName: string;
  try {
    const cache = createSessionCache(settings, interactive, prompter, controller.signal);

    if (options.clearCache !== undefined) {
      await clearCache(cache, options.clearCache);
      return EXIT_CODES.SUCCESS;
    }

    const store = await ProfileStore.load(settings);
    for (const warning of store.warnings) {
      logger.warn(`Skipping profile '${warning.profile}': ${warning.issues.join('; ')}`);
    }

    if (options.config) {
      printProfiles(store);
      return EXIT_CODES.SUCCESS;
    }

    ensureExecutable(settings.awsCli);

    profileName = await pickProfile(options, settings, store, interactive, controller.signal);
    logger.verbose(`Using profile '${profileName}'`);

    const resolver = createResolver(settings, store, cache, prompter, interactive);
    resolution = await resolver.resolve({
      profileName,
      interactive,
      commandRegion: findRegionArgument(awsArgs),
      environmentRegion: settings.environmentRegion,
      signal: controller.signal,
    });
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }

  if (controller.signal.aborted) {
    throw new AuthCancelledError();
  }

  if (awsArgs.length === 0) {
    reportResolution(resolution);
    return EXIT_CODES.SUCCESS;
  }

  return launch(
    {
      command: settings.awsCli,
      args: awsArgs,
      credentials: resolution.credentials,
      region: resolution.region,
      profileName,
    },
    {
      onSignal: (signal) => logger.verbose(`Forwarding ${signal} to ${settings.awsCli}`),
    }
  );
}

/**
 * Explicit option > AWS_PROFILE > picker (interactive) > `default`
 */
async function pickProfile(
  options: RunOptions,
  settings: Settings,
  store: ProfileStore,
  interactive: boolean,
  signal: AbortSignal
): Promise<string> {
  if (!options.profile && !settings.defaultProfile && interactive && store.size > 1) {
    return selectProfile(store, signal);
  }
  return resolveProfileName(options.profile, settings.defaultProfile);
}

function reportResolution(resolution: Resolution): void {
  logger.success(
    `Credentials resolved for profile ${chalk.cyan(resolution.profileName)} (${resolution.flow})`
  );
  const { expiration } = resolution.credentials;
  logger.keyValue('Expires', expiration ? expiration.toISOString() : 'never');
  if (resolution.region) {
    logger.keyValue('Region', `${resolution.region.value} (${resolution.region.source})`);
  }
  logger.info('No AWS command specified. Pass AWS CLI arguments after --');
}
