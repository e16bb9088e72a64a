/**
 * Settings loading and validation tests
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { existsSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { loadSettings } from '../../../core/config/index.js';
import { validateSettingsEnvSafe } from '../../../core/config/schema.js';
import { ConfigError } from '../../../core/errors.js';

describe('Settings', () => {
  let testDir: string;
  let settingsFile: string;

  beforeEach(() => {
    testDir = join(tmpdir(), `awrap-test-${Date.now()}-${Math.random().toString(36).substring(7)}`);
    mkdirSync(testDir, { recursive: true });
    settingsFile = join(testDir, 'config.env');
  });

  afterEach(() => {
    if (existsSync(testDir)) {
      rmSync(testDir, { recursive: true, force: true });
    }
  });

  describe('validateSettingsEnvSafe', () => {
    it.each(['1', 'true', 'YES', ' on '])('should read %p as true', (value) => {
      const result = validateSettingsEnvSafe({ AWRAP_CACHE: value });
      expect(result.success && result.data.AWRAP_CACHE).toBe(true);
    });

    it.each(['0', 'false', 'no', 'off', ''])('should read %p as false', (value) => {
      const result = validateSettingsEnvSafe({ AWRAP_CACHE_STATIC: value });
      expect(result.success && result.data.AWRAP_CACHE_STATIC).toBe(false);
    });

    it('should reject zero timeouts', () => {
      expect(validateSettingsEnvSafe({ AWRAP_CONNECT_TIMEOUT_MS: '0' }).success).toBe(false);
    });
  });

  describe('loadSettings', () => {
    it('should apply defaults', () => {
      const settings = loadSettings({}, { homeDir: '/home/alice', settingsFile });

      expect(settings).toEqual({
        configFile: '/home/alice/.aws/config',
        credentialsFile: '/home/alice/.aws/credentials',
        noInteractive: false,
        cacheEnabled: false,
        cacheStatic: true,
        cacheDir: '/home/alice/.awrap/cache',
        connectTimeoutMs: 5000,
        requestTimeoutMs: 30000,
        sessionDurationSeconds: 3600,
        awsCli: 'aws',
      });
    });

    it('should read AWS variables', () => {
      const settings = loadSettings(
        {
          AWS_PROFILE: 'dev',
          AWS_DEFAULT_REGION: 'eu-west-1',
          AWS_CONFIG_FILE: '/etc/aws/config',
          AWS_SHARED_CREDENTIALS_FILE: '/etc/aws/credentials',
        },
        { homeDir: '/home/alice', settingsFile }
      );

      expect(settings.defaultProfile).toBe('dev');
      expect(settings.environmentRegion).toBe('eu-west-1');
      expect(settings.configFile).toBe('/etc/aws/config');
      expect(settings.credentialsFile).toBe('/etc/aws/credentials');
    });

    it('should prefer AWS_REGION over AWS_DEFAULT_REGION', () => {
      const settings = loadSettings(
        { AWS_REGION: 'us-west-2', AWS_DEFAULT_REGION: 'eu-west-1' },
        { homeDir: '/home/alice', settingsFile }
      );

      expect(settings.environmentRegion).toBe('us-west-2');
    });

    it('should let the environment override the settings file', () => {
      writeFileSync(settingsFile, 'AWRAP_CACHE=1\nAWRAP_SESSION_DURATION=7200\nAWRAP_AWS_CLI=aws2\n');

      const settings = loadSettings({ AWRAP_AWS_CLI: 'aws3' }, { homeDir: '/home/alice', settingsFile });

      expect(settings.cacheEnabled).toBe(true);
      expect(settings.sessionDurationSeconds).toBe(7200);
      expect(settings.awsCli).toBe('aws3');
    });

    it('should place the cache under AWRAP_HOME', () => {
      const settings = loadSettings({ AWRAP_HOME: '/opt/awrap' }, { homeDir: '/home/alice', settingsFile });

      expect(settings.cacheDir).toBe('/opt/awrap/cache');
    });

    it('should reject session durations STS would refuse', () => {
      expect(() =>
        loadSettings({ AWRAP_SESSION_DURATION: '899' }, { homeDir: '/home/alice', settingsFile })
      ).toThrow('  - AWRAP_SESSION_DURATION: Must be an integer between 900 and 43200');
      expect(
        loadSettings({ AWRAP_SESSION_DURATION: '900' }, { homeDir: '/home/alice', settingsFile })
          .sessionDurationSeconds
      ).toBe(900);
    });

    it('should report invalid variables by name only', () => {
      const env = {
        AWRAP_CACHE: 'maybe',
        AWRAP_CACHE_PASSPHRASE: 'test-secret',
        AWRAP_SESSION_DURATION: '99999',
      };

      expect(() => loadSettings(env, { homeDir: '/home/alice', settingsFile })).toThrow(
        new ConfigError(
          'Invalid settings:\n' +
            '  - AWRAP_CACHE: Must be one of 1/0, true/false, yes/no, on/off\n' +
            '  - AWRAP_SESSION_DURATION: Must be an integer between 900 and 43200'
        )
      );
    });
  });
});
