/**
 * Conversions into CredentialSet
 */

import type { Credentials } from '@aws-sdk/client-sts';
import type { AwsCredentialIdentity } from '@aws-sdk/types';
import type { CredentialSet } from '../../types/credentials.js';
import type { Profile } from '../../types/profile.js';
import { IncompleteProfileError } from '../errors.js';

/**
 * Convert STS temporary credentials
 *
 * @throws Error if the response lacks any field; STS-issued credentials
 * always carry a session token and an expiry
 */
export function fromStsCredentials(credentials: Credentials | undefined): CredentialSet {
  if (
    !credentials?.AccessKeyId ||
    !credentials.SecretAccessKey ||
    !credentials.SessionToken ||
    !credentials.Expiration
  ) {
    throw new Error('Invalid STS response: missing required credential fields');
  }

  return {
    accessKeyId: credentials.AccessKeyId,
    secretAccessKey: credentials.SecretAccessKey,
    sessionToken: credentials.SessionToken,
    expiration: new Date(credentials.Expiration),
  };
}

/**
 * Convert credentials produced by an SDK credential provider
 */
export function fromIdentity(identity: AwsCredentialIdentity): CredentialSet {
  return {
    accessKeyId: identity.accessKeyId,
    secretAccessKey: identity.secretAccessKey,
    sessionToken: identity.sessionToken,
    expiration: identity.expiration ? new Date(identity.expiration) : undefined,
  };
}

/**
 * Static credentials stored on a profile
 *
 * @throws IncompleteProfileError if either half of the key pair is missing
 */
export function fromStaticProfile(profile: Profile): CredentialSet {
  if (!profile.accessKeyId || !profile.secretAccessKey) {
    const missing = !profile.accessKeyId ? 'aws_access_key_id' : 'aws_secret_access_key';
    throw new IncompleteProfileError(
      `Profile '${profile.name}' has no ${missing}`,
      `Add ${missing} to [${profile.name}] in ~/.aws/credentials`
    );
  }

  return {
    accessKeyId: profile.accessKeyId,
    secretAccessKey: profile.secretAccessKey,
    sessionToken: profile.sessionToken,
  };
}

/**
 * Check if credentials are still usable at `now`
 *
 * Credentials without an expiry never expire. Expiry is compared strictly:
 * credentials expiring exactly at `now` are expired.
 */
export function isUnexpired(credentials: CredentialSet, now: Date = new Date()): boolean {
  return credentials.expiration === undefined || credentials.expiration.getTime() > now.getTime();
}
