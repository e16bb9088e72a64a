/**
 * Child environment construction
 */

import type { CredentialSet, ResolvedRegion } from "../../types/credentials.js";

/**
 * Inputs for the child environment
 */
export interface ChildEnvOptions {
  credentials: CredentialSet;
  region?: ResolvedRegion;
  profileName: string;
  /** Wrapped command arguments */
  args: readonly string[];
}

/**
 * Check if wrapped arguments select a profile themselves
 */
export function hasProfileArgument(args: readonly string[]): boolean {
  return args.some((arg) => arg === "--profile" || arg.startsWith("--profile="));
}

/**
 * Build the environment for the wrapped command
 *
 * Returns a new object; the parent environment is never modified. The
 * region is only injected when it came from the profile, so a region the
 * user set on the command line or in the environment stays in charge.
 */
export function buildChildEnv(
  parent: NodeJS.ProcessEnv,
  options: ChildEnvOptions
): NodeJS.ProcessEnv {
  const { credentials, region, profileName, args } = options;
  const env: NodeJS.ProcessEnv = { ...parent };

  env.AWS_ACCESS_KEY_ID = credentials.accessKeyId;
  env.AWS_SECRET_ACCESS_KEY = credentials.secretAccessKey;

  // A leftover token from the parent would not match the injected keys
  delete env.AWS_SESSION_TOKEN;
  delete env.AWS_SECURITY_TOKEN;
  delete env.AWS_CREDENTIAL_EXPIRATION;
  if (credentials.sessionToken) {
    env.AWS_SESSION_TOKEN = credentials.sessionToken;
  }
  if (credentials.expiration) {
    env.AWS_CREDENTIAL_EXPIRATION = credentials.expiration.toISOString();
  }

  if (region?.source === "profile") {
    env.AWS_REGION = region.value;
    env.AWS_DEFAULT_REGION = region.value;
  }

  if (!hasProfileArgument(args)) {
    env.AWS_PROFILE = profileName;
  }

  return env;
}
