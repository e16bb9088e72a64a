/**
 * Credential type definitions
 */

/**
 * Resolved credentials handed to the launcher
 */
export interface CredentialSet {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken?: string;

  /** Absent for static credentials, which never expire */
  expiration?: Date;

  region?: string;
}

/**
 * Where a resolved region came from
 */
export type RegionSource = "command" | "environment" | "profile";

/**
 * Region with its provenance
 */
export interface ResolvedRegion {
  value: string;
  source: RegionSource;
}

/**
 * Authentication path taken for a profile
 */
export type AuthFlow = "cache" | "sso" | "mfa" | "assume-role" | "static";

/**
 * Per-invocation resolution state, never persisted
 */
export interface ResolutionContext {
  /** Requested profile name */
  profileName: string;

  /** Whether prompts and logins may be started */
  interactive: boolean;

  /** Region given on the wrapped command line (`--region`) */
  commandRegion?: string;

  /** Region from AWS_REGION / AWS_DEFAULT_REGION */
  environmentRegion?: string;

  /** Aborted when the user interrupts a prompt or login */
  signal?: AbortSignal;
}

/**
 * Resolver output
 */
export interface Resolution {
  profileName: string;
  credentials: CredentialSet;
  region?: ResolvedRegion;
  flow: AuthFlow;
}

/**
 * Identity returned by get-caller-identity
 */
export interface CallerIdentity {
  accountId: string;
  arn: string;
  userId: string;
}
