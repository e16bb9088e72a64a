/**
 * Error taxonomy
 *
 * Every failure that reaches the user is one of these, each with a stable
 * exit code and an optional remediation hint.
 */

/**
 * Process exit codes
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  INTERNAL: 1,
  AUTH_REQUIRED: 2,
  MFA_EXHAUSTED: 3,
  CANCELLED: 4,
  NOT_FOUND: 127,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Base class for errors with an exit code
 */
export abstract class AwrapError extends Error {
  abstract readonly exitCode: ExitCode;

  constructor(
    message: string,
    readonly hint?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InternalError extends AwrapError {
  readonly exitCode = EXIT_CODES.INTERNAL;
}

/**
 * Unreadable or malformed configuration
 */
export class ConfigError extends AwrapError {
  readonly exitCode = EXIT_CODES.INTERNAL;
}

export class ProfileNotFoundError extends AwrapError {
  readonly exitCode = EXIT_CODES.AUTH_REQUIRED;

  constructor(readonly profileName: string, known: string[]) {
    super(
      `Profile '${profileName}' not found`,
      known.length > 0
        ? `Known profiles: ${known.join(", ")}`
        : "Add the profile to ~/.aws/config or ~/.aws/credentials"
    );
  }
}

export class MissingSourceProfileError extends AwrapError {
  readonly exitCode = EXIT_CODES.AUTH_REQUIRED;

  constructor(readonly profileName: string, readonly sourceProfile: string) {
    super(
      `source_profile '${sourceProfile}' referenced by profile '${profileName}' not found`,
      `Define [profile ${sourceProfile}] or fix source_profile in '${profileName}'`
    );
  }
}

export class CircularReferenceError extends AwrapError {
  readonly exitCode = EXIT_CODES.AUTH_REQUIRED;

  constructor(readonly cycle: string[]) {
    super(
      `Circular source_profile reference: ${cycle.join(" -> ")}`,
      "Break the cycle so one profile in the chain carries its own credentials"
    );
  }
}

/**
 * An interactive step is needed but prompts are disabled
 */
export class AuthRequiredError extends AwrapError {
  readonly exitCode = EXIT_CODES.AUTH_REQUIRED;

  constructor(message: string, readonly command: string) {
    super(message, `Run: ${command}`);
  }
}

export class IncompleteProfileError extends AwrapError {
  readonly exitCode = EXIT_CODES.AUTH_REQUIRED;
}

export class MfaSerialMismatchError extends AwrapError {
  readonly exitCode = EXIT_CODES.AUTH_REQUIRED;
}

export class MfaExhaustedError extends AwrapError {
  readonly exitCode = EXIT_CODES.MFA_EXHAUSTED;

  constructor(readonly profileName: string, readonly attempts: number) {
    super(
      `MFA failed ${attempts} times for profile '${profileName}'`,
      "Check the device clock and that mfa_serial matches the device"
    );
  }
}

/**
 * An external call was rejected (access denied, bad credentials, invalid ARN)
 */
export class AuthenticationFailedError extends AwrapError {
  readonly exitCode = EXIT_CODES.INTERNAL;
}

/**
 * Network failure that persisted through every retry
 */
export class TransientNetworkError extends AwrapError {
  readonly exitCode = EXIT_CODES.INTERNAL;
}

/**
 * Cache entry that cannot be decrypted or decoded; never surfaced
 */
export class CacheCorruptionError extends AwrapError {
  readonly exitCode = EXIT_CODES.INTERNAL;
}

export class ExternalCommandError extends AwrapError {
  readonly exitCode = EXIT_CODES.INTERNAL;
}

export class AuthCancelledError extends AwrapError {
  readonly exitCode = EXIT_CODES.CANCELLED;

  constructor() {
    super("Authentication cancelled");
  }
}

export class ExecutableNotFoundError extends AwrapError {
  readonly exitCode = EXIT_CODES.NOT_FOUND;

  constructor(readonly executable: string) {
    super(
      `${executable} binary not found`,
      executable === "aws"
        ? "Install AWS CLI v2 and make sure 'aws' is on PATH"
        : `Make sure '${executable}' is on PATH`
    );
  }
}

/**
 * Wrap anything thrown into an AwrapError
 */
export function toAwrapError(error: unknown): AwrapError {
  if (error instanceof AwrapError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new InternalError(`Unexpected error: ${message}`, undefined, {
    cause: error,
  });
}
