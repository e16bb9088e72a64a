/**
 * Cache clearing (--clear-cache)
 */

import { CLEAR_ALL, type SessionCache } from '../../core/cache/session-cache.js';
import * as logger from '../utils/logger.js';

/**
 * Normalize the option value: a bare flag means every profile
 */
export function clearCacheTarget(value: string | boolean): string {
  const target = typeof value === 'string' ? value.trim() : '';
  return target === '' || target === '*' ? CLEAR_ALL : target;
}

/**
 * Clear cached credentials from every backend
 */
export async function clearCache(cache: SessionCache, value: string | boolean): Promise<void> {
  const target = clearCacheTarget(value);
  await cache.clear(target);

  logger.success(
    target === CLEAR_ALL
      ? 'Cleared cached credentials for all profiles'
      : `Cleared cached credentials for profile '${target}'`
  );
}
