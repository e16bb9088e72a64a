/**
 * Wiring of core services for a CLI invocation
 */

import { AwsSsoGateway } from '../core/aws/sso.js';
import { AwsStsGateway } from '../core/aws/sts.js';
import { EncryptedFileBackend } from '../core/cache/encrypted-file-backend.js';
import { createKeychainBackend } from '../core/cache/keychain-backend.js';
import { SessionCache } from '../core/cache/session-cache.js';
import type { ProfileStore } from '../core/profile/store.js';
import { CredentialResolver } from '../core/resolver/resolver.js';
import type { CacheBackend } from '../types/cache.js';
import type { Settings } from '../types/settings.js';
import * as logger from './utils/logger.js';
import type { InquirerPrompter } from './utils/prompt.js';

/**
 * Build the session cache: keychain first, encrypted file second
 *
 * The passphrase comes from settings, else from a prompt when interactive.
 * Without either the file backend is unavailable and nothing is stored
 * on disk.
 */
export function createSessionCache(
  settings: Settings,
  interactive: boolean,
  prompter: InquirerPrompter,
  signal?: AbortSignal
): SessionCache {
  let passphrase: Promise<string | undefined> | undefined;
  const getPassphrase = (): Promise<string | undefined> => {
    passphrase ??= settings.cachePassphrase !== undefined
      ? Promise.resolve(settings.cachePassphrase)
      : interactive
        ? prompter.passphrase(signal)
        : Promise.resolve(undefined);
    return passphrase;
  };

  const backends: CacheBackend[] = [];
  const keychain = createKeychainBackend();
  if (keychain) {
    backends.push(keychain);
  }
  backends.push(
    new EncryptedFileBackend({
      directory: settings.cacheDir,
      passphrase: getPassphrase,
    })
  );

  return new SessionCache({
    enabled: settings.cacheEnabled,
    cacheStatic: settings.cacheStatic,
    backends,
    onNote: (message) => logger.verbose(message),
  });
}

/**
 * Build the credential resolver
 */
export function createResolver(
  settings: Settings,
  profiles: ProfileStore,
  cache: SessionCache,
  prompter: InquirerPrompter,
  showProgress: boolean
): CredentialResolver {
  return new CredentialResolver({
    profiles,
    cache,
    prompter,
    settings,
    sts: new AwsStsGateway({
      connectTimeoutMs: settings.connectTimeoutMs,
      requestTimeoutMs: settings.requestTimeoutMs,
    }),
    sso: new AwsSsoGateway({
      awsCli: settings.awsCli,
      configFile: settings.configFile,
      credentialsFile: settings.credentialsFile,
    }),
    logger: {
      info: logger.info,
      warn: logger.warn,
      verbose: (message) => logger.verbose(message),
    },
    showProgress,
  });
}
