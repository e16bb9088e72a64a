/**
 * Cache entry serialization
 */

import { z } from "zod";
import type { CredentialSet } from "../../types/credentials.js";
import { CacheCorruptionError } from "../errors.js";

export const CACHE_FORMAT_VERSION = 1;

const isoDate = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

const cachedCredentialsSchema = z.object({
  version: z.literal(CACHE_FORMAT_VERSION),
  profileName: z.string().min(1),
  storedAt: isoDate,
  credentials: z.object({
    accessKeyId: z.string().min(1),
    secretAccessKey: z.string().min(1),
    sessionToken: z.string().min(1).optional(),
    expiration: isoDate.optional(),
    region: z.string().min(1).optional(),
  }),
});

/**
 * Decoded cache payload
 */
export interface CachedCredentials {
  profileName: string;
  storedAt: Date;
  credentials: CredentialSet;
}

/**
 * Serialize credentials for a backend
 */
export function encodeEntry(
  profileName: string,
  credentials: CredentialSet,
  storedAt: Date
): string {
  return JSON.stringify({
    version: CACHE_FORMAT_VERSION,
    profileName,
    storedAt: storedAt.toISOString(),
    credentials: {
      accessKeyId: credentials.accessKeyId,
      secretAccessKey: credentials.secretAccessKey,
      sessionToken: credentials.sessionToken,
      expiration: credentials.expiration?.toISOString(),
      region: credentials.region,
    },
  });
}

/**
 * Parse a payload read from a backend
 *
 * @throws CacheCorruptionError if the payload is not a valid entry for
 * `profileName`
 */
export function decodeEntry(profileName: string, payload: string): CachedCredentials {
  let json: unknown;
  try {
    json = JSON.parse(payload);
  } catch (error) {
    throw new CacheCorruptionError(`Cache entry for '${profileName}' is not valid JSON`, undefined, {
      cause: error,
    });
  }

  const result = cachedCredentialsSchema.safeParse(json);
  if (!result.success) {
    throw new CacheCorruptionError(`Cache entry for '${profileName}' has an unexpected shape`);
  }
  if (result.data.profileName !== profileName) {
    throw new CacheCorruptionError(`Cache entry for '${profileName}' belongs to another profile`);
  }

  const { credentials } = result.data;
  return {
    profileName: result.data.profileName,
    storedAt: result.data.storedAt,
    credentials: {
      accessKeyId: credentials.accessKeyId,
      secretAccessKey: credentials.secretAccessKey,
      ...(credentials.sessionToken !== undefined && { sessionToken: credentials.sessionToken }),
      ...(credentials.expiration !== undefined && { expiration: credentials.expiration }),
      ...(credentials.region !== undefined && { region: credentials.region }),
    },
  };
}
