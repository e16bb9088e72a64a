/**
 * Profile type definitions
 */

/**
 * Authentication capabilities a profile exposes
 */
export type CapabilityTag = "SSO" | "ASSUME_ROLE" | "MFA" | "STATIC";

/**
 * A named bundle of authentication attributes from ~/.aws/config and
 * ~/.aws/credentials
 */
export interface Profile {
  /** Profile name (`[profile NAME]` / `[NAME]`) */
  name: string;

  /** Region configured for the profile */
  region?: string;

  /** SSO portal URL */
  ssoStartUrl?: string;

  /** Region of the SSO portal */
  ssoRegion?: string;

  /** Name of the `[sso-session]` block the profile uses */
  ssoSession?: string;

  /** IAM role to assume */
  roleArn?: string;

  /** Profile providing the base credentials for `roleArn` */
  sourceProfile?: string;

  /** MFA device serial number or ARN */
  mfaSerial?: string;

  /** Long-lived access key id */
  accessKeyId?: string;

  /** Long-lived secret access key */
  secretAccessKey?: string;

  /** Session token stored alongside static keys */
  sessionToken?: string;

  /** Requested session duration in seconds */
  durationSeconds?: number;

  /** External id passed to assume-role */
  externalId?: string;

  /** Fixed role session name */
  roleSessionName?: string;
}

/**
 * Profiles keyed by name
 */
export type ProfileMap = ReadonlyMap<string, Profile>;

/**
 * Where the configuration sources live
 */
export interface ProfileSources {
  /** Path to the shared config file */
  configFile: string;

  /** Path to the shared credentials file */
  credentialsFile: string;
}
