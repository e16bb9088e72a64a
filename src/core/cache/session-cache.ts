/**
 * Session cache
 *
 * Off by default: entries then live in memory and vanish with the process.
 * When enabled, the first available persistent backend is used.
 * Concurrent invocations for one profile are not coordinated; the last
 * write wins and every read re-checks expiry.
 */

import type { CacheBackend, CacheEntry } from "../../types/cache.js";
import type { CredentialSet } from "../../types/credentials.js";
import { isUnexpired } from "../aws/credentials.js";
import { CacheCorruptionError } from "../errors.js";
import { decodeEntry, encodeEntry } from "./codec.js";
import { MemoryBackend } from "./memory-backend.js";

/**
 * Wildcard accepted by `clear`
 */
export const CLEAR_ALL = "all";

/**
 * Options for the session cache
 */
export interface SessionCacheOptions {
  /** Persist entries; off keeps them in memory only */
  enabled: boolean;

  /** Persistent backends in priority order */
  backends?: CacheBackend[];

  /** Whether non-expiring credentials may be stored */
  cacheStatic?: boolean;

  now?: () => Date;

  /** Informational notes (discarded entries, backend fallbacks) */
  onNote?: (message: string) => void;
}

export class SessionCache {
  private readonly memory = new MemoryBackend();
  private readonly backends: CacheBackend[];
  private readonly now: () => Date;
  private readonly note: (message: string) => void;
  private selected: Promise<CacheBackend | undefined> | undefined;

  constructor(private readonly options: SessionCacheOptions) {
    this.backends = options.backends ?? [];
    this.now = options.now ?? (() => new Date());
    this.note = options.onNote ?? (() => undefined);
  }

  get enabled(): boolean {
    return this.options.enabled;
  }

  /**
   * Look up a valid entry for a profile
   *
   * Expired and corrupt entries are removed and reported as a miss.
   */
  async get(profileName: string): Promise<CacheEntry | undefined> {
    const backend = await this.backend();
    if (!backend) {
      return undefined;
    }

    let payload: string | undefined;
    try {
      payload = await backend.read(profileName);
    } catch (error) {
      if (!(error instanceof CacheCorruptionError)) {
        this.note(`Cache read failed for '${profileName}', ignoring cache`);
        return undefined;
      }
      await this.discard(backend, profileName, error);
      return undefined;
    }

    if (payload === undefined) {
      return undefined;
    }

    let credentials: CredentialSet;
    try {
      credentials = decodeEntry(profileName, payload).credentials;
    } catch (error) {
      if (!(error instanceof CacheCorruptionError)) {
        throw error;
      }
      await this.discard(backend, profileName, error);
      return undefined;
    }

    if (!isUnexpired(credentials, this.now())) {
      await this.evict(backend, profileName);
      return undefined;
    }

    return {
      profileName,
      credentials,
      expiration: credentials.expiration,
      location: backend.location,
    };
  }

  /**
   * Store freshly resolved credentials
   *
   * @returns The stored entry, or undefined when nothing was stored
   */
  async put(profileName: string, credentials: CredentialSet): Promise<CacheEntry | undefined> {
    if (credentials.expiration === undefined && this.options.cacheStatic === false) {
      return undefined;
    }
    if (!isUnexpired(credentials, this.now())) {
      return undefined;
    }

    const backend = await this.backend();
    if (!backend) {
      return undefined;
    }

    const payload = encodeEntry(profileName, credentials, this.now());
    try {
      await backend.write(profileName, payload);
    } catch {
      this.note(`Could not write ${backend.location} cache for '${profileName}'`);
      return undefined;
    }

    return {
      profileName,
      credentials,
      expiration: credentials.expiration,
      location: backend.location,
    };
  }

  /**
   * Remove one profile's entry, or every entry for `all`, from every backend
   */
  async clear(target: string): Promise<void> {
    const backends = [this.memory, ...this.backends];

    for (const backend of backends) {
      if (target === CLEAR_ALL || target === "*") {
        await backend.removeAll();
      } else {
        await backend.remove(target);
      }
    }
  }

  /**
   * Backend in use: memory when disabled, else the first available one
   */
  private backend(): Promise<CacheBackend | undefined> {
    if (!this.options.enabled) {
      return Promise.resolve(this.memory);
    }

    this.selected ??= this.selectBackend();
    return this.selected;
  }

  private async selectBackend(): Promise<CacheBackend | undefined> {
    for (const backend of this.backends) {
      if (await backend.isAvailable()) {
        return backend;
      }
    }
    this.note("No cache backend available, credentials will not be cached");
    return undefined;
  }

  private async discard(
    backend: CacheBackend,
    profileName: string,
    error: CacheCorruptionError
  ): Promise<void> {
    this.note(`${error.message}; discarded`);
    await this.evict(backend, profileName);
  }

  /**
   * Remove a stale entry; a failed removal still leaves a miss
   */
  private async evict(backend: CacheBackend, profileName: string): Promise<void> {
    try {
      await backend.remove(profileName);
    } catch (error) {
      const reason = error instanceof Error ? error.name : "unknown error";
      this.note(`Could not remove stale ${backend.location} cache entry for '${profileName}' (${reason})`);
    }
  }
}
