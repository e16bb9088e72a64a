/**
 * Profile listing (--config)
 */

import chalk from 'chalk';
import { formatBadges } from '../../core/profile/classify.js';
import type { ProfileStore } from '../../core/profile/store.js';
import * as logger from '../utils/logger.js';

/**
 * Lines listing every profile with its capability badges
 */
export function formatProfiles(store: ProfileStore): string[] {
  return store.list().map((profile) => {
    const region = profile.region ? chalk.gray(` (${profile.region})`) : '';
    return `  ${chalk.bold(profile.name)} ${formatBadges(profile)}${region}`;
  });
}

/**
 * Print discovered profiles
 */
export function printProfiles(store: ProfileStore): void {
  logger.section('Discovered profiles');
  for (const line of formatProfiles(store)) {
    console.error(line);
  }
}
