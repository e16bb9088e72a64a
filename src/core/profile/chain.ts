/**
 * Source-profile chain resolution
 */

import type { Profile, ProfileMap } from "../../types/profile.js";
import {
  CircularReferenceError,
  MissingSourceProfileError,
  ProfileNotFoundError,
} from "../errors.js";

/**
 * Walk `source_profile` links from a profile down to its base
 *
 * Only profiles with a `role_arn` follow their `source_profile`; the walk
 * stops at the first profile that authenticates on its own.
 *
 * @returns Profiles ordered from base to requested
 * @throws CircularReferenceError if a profile reappears in its own ancestry
 * @throws MissingSourceProfileError if a referenced profile is absent
 */
export function resolveChain(profiles: ProfileMap, name: string): Profile[] {
  const requested = profiles.get(name);
  if (!requested) {
    throw new ProfileNotFoundError(name, [...profiles.keys()].sort());
  }

  const chain: Profile[] = [requested];
  const visited = new Set<string>([requested.name]);
  let current = requested;

  while (current.roleArn) {
    const sourceName = current.sourceProfile;
    if (!sourceName) {
      break;
    }

    if (visited.has(sourceName)) {
      throw new CircularReferenceError([...chain.map((p) => p.name), sourceName]);
    }

    const source = profiles.get(sourceName);
    if (!source) {
      throw new MissingSourceProfileError(current.name, sourceName);
    }

    visited.add(sourceName);
    chain.push(source);
    current = source;
  }

  return chain.reverse();
}
