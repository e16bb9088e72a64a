/**
 * Runtime settings type definitions
 */

/**
 * Settings merged from defaults, the settings file and the environment
 */
export interface Settings {
  /** Profile from AWS_PROFILE */
  defaultProfile?: string;

  /** Region from AWS_REGION / AWS_DEFAULT_REGION */
  environmentRegion?: string;

  /** Shared config file path */
  configFile: string;

  /** Shared credentials file path */
  credentialsFile: string;

  /** Prompts and logins disabled */
  noInteractive: boolean;

  /** Session cache opt-in */
  cacheEnabled: boolean;

  /** Whether non-expiring credentials may be cached */
  cacheStatic: boolean;

  /** Passphrase for the encrypted-file cache */
  cachePassphrase?: string;

  /** Directory holding encrypted cache files */
  cacheDir: string;

  /** Bound for the SSO session probe */
  connectTimeoutMs: number;

  /** Bound for STS calls */
  requestTimeoutMs: number;

  /** Default session duration in seconds */
  sessionDurationSeconds: number;

  /** Wrapped executable */
  awsCli: string;
}

/**
 * Options for settings loading
 */
export interface LoadSettingsOptions {
  /** Home directory override (tests) */
  homeDir?: string;

  /** Settings file override */
  settingsFile?: string;
}
