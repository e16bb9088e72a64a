/**
 * AWS client creation helpers
 */

import { STSClient } from '@aws-sdk/client-sts';
import type { CredentialSet } from '../../types/credentials.js';

/**
 * Region used for STS when nothing else is configured
 */
export const DEFAULT_STS_REGION = 'us-east-1';

/**
 * Client configuration options
 */
export interface ClientOptions {
  /** AWS region override */
  region?: string;

  /** Socket connect timeout in milliseconds */
  connectionTimeout?: number;

  /** Request timeout in milliseconds */
  requestTimeout?: number;
}

/**
 * Create STS client for the given credentials
 *
 * SDK-level retries are off; callers retry transient failures themselves.
 */
export function createSTSClient(
  credentials: CredentialSet,
  options: ClientOptions = {}
): STSClient {
  return new STSClient({
    region: options.region ?? DEFAULT_STS_REGION,
    credentials: {
      accessKeyId: credentials.accessKeyId,
      secretAccessKey: credentials.secretAccessKey,
      sessionToken: credentials.sessionToken,
    },
    requestHandler: {
      connectionTimeout: options.connectionTimeout,
      requestTimeout: options.requestTimeout,
    },
    maxAttempts: 1,
  });
}
