/**
 * Profile store
 */

import type {
  CapabilityTag,
  Profile,
  ProfileMap,
  ProfileSources,
} from "../../types/profile.js";
import { ConfigError, ProfileNotFoundError } from "../errors.js";
import { resolveChain } from "./chain.js";
import { classify } from "./classify.js";
import { loadProfiles, type ProfileWarning } from "./loader.js";

/**
 * Fallback profile name
 */
export const DEFAULT_PROFILE_NAME = "default";

/**
 * Pick the profile name to use
 *
 * Priority: explicit request > environment default > `default`
 */
export function resolveProfileName(
  explicit?: string,
  environmentDefault?: string
): string {
  return explicit || environmentDefault || DEFAULT_PROFILE_NAME;
}

/**
 * Read-only view of the parsed profiles for the process lifetime
 */
export class ProfileStore {
  private constructor(
    private readonly profiles: ProfileMap,
    readonly warnings: readonly ProfileWarning[]
  ) {}

  /**
   * Load profiles from the shared config and credentials files
   *
   * @throws ConfigError if a source is unreadable or malformed, or if no
   * profile is found at all
   */
  static async load(sources: ProfileSources): Promise<ProfileStore> {
    const { profiles, warnings } = await loadProfiles(sources);

    if (profiles.size === 0 && warnings.length === 0) {
      throw new ConfigError(
        `No AWS profiles found in ${sources.configFile} or ${sources.credentialsFile}`,
        "Run 'aws configure' or 'aws configure sso' to create one"
      );
    }

    return new ProfileStore(profiles, warnings);
  }

  /**
   * Build a store from profiles already in memory
   */
  static fromProfiles(profiles: Profile[]): ProfileStore {
    return new ProfileStore(new Map(profiles.map((p) => [p.name, p])), []);
  }

  get size(): number {
    return this.profiles.size;
  }

  has(name: string): boolean {
    return this.profiles.has(name);
  }

  /**
   * Get a profile by name
   *
   * @throws ProfileNotFoundError
   */
  get(name: string): Profile {
    const profile = this.profiles.get(name);
    if (!profile) {
      throw new ProfileNotFoundError(name, this.names());
    }
    return profile;
  }

  /**
   * Profile names, sorted
   */
  names(): string[] {
    return [...this.profiles.keys()].sort();
  }

  /**
   * All profiles, sorted by name
   */
  list(): Profile[] {
    return this.names().map((name) => this.get(name));
  }

  classify(name: string): Set<CapabilityTag> {
    return classify(this.get(name));
  }

  /**
   * Profiles from base to requested along `source_profile` links
   */
  resolveChain(name: string): Profile[] {
    return resolveChain(this.profiles, name);
  }
}
