/**
 * Profile classification
 */

import type { CapabilityTag, Profile } from "../../types/profile.js";

/**
 * Derive capability tags from the attributes present on a profile
 *
 * `STATIC` needs both halves of the key pair; a lone access key id is
 * not a usable credential.
 */
export function classify(profile: Profile): Set<CapabilityTag> {
  const tags = new Set<CapabilityTag>();

  if (profile.ssoStartUrl || profile.ssoRegion || profile.ssoSession) {
    tags.add("SSO");
  }
  if (profile.roleArn) {
    tags.add("ASSUME_ROLE");
  }
  if (profile.mfaSerial) {
    tags.add("MFA");
  }
  if (profile.accessKeyId && profile.secretAccessKey) {
    tags.add("STATIC");
  }

  return tags;
}

const BADGES: ReadonlyArray<[CapabilityTag, string]> = [
  ["SSO", "SSO"],
  ["ASSUME_ROLE", "ROLE"],
  ["MFA", "MFA"],
  ["STATIC", "STATIC"],
];

/**
 * Badge labels shown next to a profile name
 */
export function getBadges(profile: Profile): string[] {
  const tags = classify(profile);
  const badges = profile.name === "default" ? ["default"] : [];

  for (const [tag, label] of BADGES) {
    if (tags.has(tag)) {
      badges.push(label);
    }
  }

  return badges;
}

/**
 * Format badges for display, e.g. `[default][SSO]`
 */
export function formatBadges(profile: Profile): string {
  return getBadges(profile)
    .map((badge) => `[${badge}]`)
    .join("");
}
