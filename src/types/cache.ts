/**
 * Session cache type definitions
 */

import type { CredentialSet } from "./credentials.js";

/**
 * Storage backend identifiers
 */
export type CacheLocation = "memory" | "keychain" | "encrypted-file";

/**
 * Cached credentials for one profile
 */
export interface CacheEntry {
  profileName: string;
  credentials: CredentialSet;
  expiration?: Date;
  location: CacheLocation;
}

/**
 * A place cache entries can be kept
 *
 * `read` returns the raw serialized entry; decoding and expiry checks
 * happen in the session cache.
 */
export interface CacheBackend {
  readonly location: CacheLocation;

  isAvailable(): Promise<boolean>;

  read(profileName: string): Promise<string | undefined>;

  write(profileName: string, payload: string): Promise<void>;

  remove(profileName: string): Promise<void>;

  removeAll(): Promise<void>;
}
