/**
 * In-process cache backend
 */

import type { CacheBackend } from "../../types/cache.js";

/**
 * Keeps entries for the lifetime of the process only
 */
export class MemoryBackend implements CacheBackend {
  readonly location = "memory" as const;
  private readonly entries = new Map<string, string>();

  async isAvailable(): Promise<boolean> {
    return true;
  }

  async read(profileName: string): Promise<string | undefined> {
    return this.entries.get(profileName);
  }

  async write(profileName: string, payload: string): Promise<void> {
    this.entries.set(profileName, payload);
  }

  async remove(profileName: string): Promise<void> {
    this.entries.delete(profileName);
  }

  async removeAll(): Promise<void> {
    this.entries.clear();
  }
}
