/**
 * Session cache exports
 */

export { SessionCache, CLEAR_ALL, type SessionCacheOptions } from "./session-cache.js";
export { MemoryBackend } from "./memory-backend.js";
export {
  EncryptedFileBackend,
  cacheFileName,
  DEFAULT_SCRYPT_PARAMS,
  type EncryptedFileBackendOptions,
  type PassphraseProvider,
  type ScryptParams,
} from "./encrypted-file-backend.js";
export {
  MacKeychainBackend,
  SecretToolBackend,
  createKeychainBackend,
  KEYCHAIN_SERVICE,
  type KeychainDeps,
  type CommandRunner,
} from "./keychain-backend.js";
export { encodeEntry, decodeEntry, CACHE_FORMAT_VERSION, type CachedCredentials } from "./codec.js";
