/**
 * Profile loader for the shared AWS config and credentials files
 */

import { loadSharedConfigFiles } from "@smithy/shared-ini-file-loader";
import { accessSync, constants, existsSync, readFileSync, statSync } from "node:fs";
import type { Profile, ProfileSources } from "../../types/profile.js";
import { ConfigError } from "../errors.js";
import { parseProfile } from "./schema.js";

const SECTION_LINE = /^\[[^\]]+\]\s*([#;].*)?$/;
const KEY_VALUE_LINE = /^[^=\s][^=]*=.*$/;
const SSO_SESSION_PREFIX = "sso-session.";

/**
 * Warning emitted for a profile that was skipped
 */
export interface ProfileWarning {
  profile: string;
  issues: string[];
}

/**
 * Loader output
 */
export interface LoadedProfiles {
  profiles: Map<string, Profile>;
  warnings: ProfileWarning[];
}

/**
 * Check a shared INI file line by line
 *
 * Accepts blank lines, comments, section headers, `key = value` pairs and
 * indented continuation lines under a key.
 *
 * @throws ConfigError naming the first offending line
 */
export function assertWellFormedIni(content: string, filePath: string): void {
  const lines = content.split(/\r?\n/);
  let inKey = false;

  lines.forEach((rawLine, index) => {
    const line = rawLine.trim();

    if (line === "" || line.startsWith("#") || line.startsWith(";")) {
      return;
    }
    if (SECTION_LINE.test(line)) {
      inKey = false;
      return;
    }
    if (/^\s/.test(rawLine) && inKey) {
      return;
    }
    if (KEY_VALUE_LINE.test(line)) {
      inKey = true;
      return;
    }

    throw new ConfigError(
      `Malformed line ${index + 1} in ${filePath}`,
      "Expected a [section] header or a key = value pair"
    );
  });
}

/**
 * Verify a config source is readable and well formed
 *
 * Missing files are fine; the AWS CLI treats them as empty.
 */
function checkSource(filePath: string): void {
  if (!existsSync(filePath)) {
    return;
  }

  let content: string;
  try {
    if (!statSync(filePath).isFile()) {
      throw new Error("not a regular file");
    }
    accessSync(filePath, constants.R_OK);
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigError(
      `Cannot read ${filePath}`,
      "Check that the file exists and is readable by the current user",
      { cause: error }
    );
  }

  assertWellFormedIni(content, filePath);
}

/**
 * Load profiles from the config and credentials files
 *
 * Attributes from both files merge per profile, with the credentials file
 * winning. Profiles that fail validation are skipped and reported in
 * `warnings`.
 */
export async function loadProfiles(sources: ProfileSources): Promise<LoadedProfiles> {
  checkSource(sources.configFile);
  checkSource(sources.credentialsFile);

  const { configFile, credentialsFile } = await loadSharedConfigFiles({
    configFilepath: sources.configFile,
    filepath: sources.credentialsFile,
    ignoreCache: true,
  });

  const ssoSessions = new Map<string, Record<string, string | undefined>>();
  const rawProfiles = new Map<string, Record<string, string | undefined>>();

  for (const [section, values] of Object.entries(configFile)) {
    if (section.startsWith(SSO_SESSION_PREFIX)) {
      ssoSessions.set(section.slice(SSO_SESSION_PREFIX.length), values);
      continue;
    }
    // Other typed sections (services.*) are not profiles
    if (section.includes(".")) {
      continue;
    }
    rawProfiles.set(section, { ...values });
  }

  for (const [section, values] of Object.entries(credentialsFile)) {
    rawProfiles.set(section, { ...rawProfiles.get(section), ...values });
  }

  const profiles = new Map<string, Profile>();
  const warnings: ProfileWarning[] = [];

  for (const [name, raw] of rawProfiles) {
    const session = raw.sso_session ? ssoSessions.get(raw.sso_session) : undefined;
    const merged = session
      ? {
          ...raw,
          sso_start_url: raw.sso_start_url ?? session.sso_start_url,
          sso_region: raw.sso_region ?? session.sso_region,
        }
      : raw;

    const result = parseProfile(name, merged);
    if (result.success) {
      profiles.set(name, result.profile);
    } else {
      warnings.push({ profile: name, issues: result.issues });
    }
  }

  return { profiles, warnings };
}
