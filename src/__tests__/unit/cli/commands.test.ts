import { describe, it, expect, jest, beforeAll, afterAll } from '@jest/globals';
import chalk from 'chalk';
import { clearCache, clearCacheTarget } from '../../../cli/commands/clear-cache.js';
import { formatProfiles, printProfiles } from '../../../cli/commands/config.js';
import { isInteractive } from '../../../cli/commands/run.js';
import { SessionCache } from '../../../core/cache/session-cache.js';
import { loadSettings } from '../../../core/config/index.js';
import { ProfileStore } from '../../../core/profile/store.js';

describe('CLI commands', () => {
  const level = chalk.level;
  let stderr: jest.SpiedFunction<typeof console.error>;

  beforeAll(() => {
    chalk.level = 0;
    stderr = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterAll(() => {
    chalk.level = level;
    jest.restoreAllMocks();
  });

  describe('--config', () => {
    it('should list profiles with badges and regions', () => {
      const store = ProfileStore.fromProfiles([
        { name: 'default', region: 'us-east-1', accessKeyId: 'AKIDEXAMPLE', secretAccessKey: 'test-secret' },
        { name: 'corp', ssoSession: 'corp-sso' },
        { name: 'admin', roleArn: 'arn:aws:iam::123456789012:role/Admin', sourceProfile: 'default' },
      ]);

      expect(formatProfiles(store)).toEqual([
        '  admin [ROLE]',
        '  corp [SSO]',
        '  default [default][STATIC] (us-east-1)',
      ]);
    });

    it('should print the listing under a section header', () => {
      stderr.mockClear();
      const store = ProfileStore.fromProfiles([
        { name: 'dev', accessKeyId: 'AKIDEXAMPLE', secretAccessKey: 'test-secret' },
      ]);

      printProfiles(store);

      expect(stderr.mock.calls).toEqual([[], ['━━━ Discovered profiles ━━━'], [], ['  dev [STATIC]']]);
    });
  });

  describe('--clear-cache', () => {
    it('should treat a bare flag as all profiles', () => {
      expect(clearCacheTarget(true)).toBe('all');
      expect(clearCacheTarget('*')).toBe('all');
      expect(clearCacheTarget(' dev ')).toBe('dev');
    });

    it('should clear only the named profile', async () => {
      const cache = new SessionCache({ enabled: false });
      const credentials = { accessKeyId: 'AKIDEXAMPLE', secretAccessKey: 'test-secret' };
      await cache.put('dev', credentials);
      await cache.put('prod', credentials);

      await clearCache(cache, 'dev');

      await expect(cache.get('dev')).resolves.toBeUndefined();
      await expect(cache.get('prod')).resolves.toBeDefined();
    });
  });

  describe('isInteractive', () => {
    const settings = loadSettings({}, { homeDir: '/home/alice', settingsFile: '/nonexistent/config.env' });

    it('should prompt only on a terminal', () => {
      expect(isInteractive({}, settings, true)).toBe(true);
      expect(isInteractive({}, settings, false)).toBe(false);
    });

    it('should honour --no-interactive', () => {
      expect(isInteractive({ interactive: false }, settings, true)).toBe(false);
    });

    it('should honour AWRAP_NO_INTERACTIVE', () => {
      expect(isInteractive({}, { ...settings, noInteractive: true }, true)).toBe(false);
    });
  });
});
