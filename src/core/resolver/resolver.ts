/**
 * Credential resolver
 *
 * Start → Classify → {SSO | MFA | AssumeRole | Static} → Resolved | Failed.
 * Role chains are walked from the base profile: the base authenticates on
 * its own, then each role profile above it is assumed in turn.
 */

import chalk from "chalk";
import ora, { type Ora } from "ora";
import type {
  AuthFlow,
  CredentialSet,
  Resolution,
  ResolutionContext,
} from "../../types/credentials.js";
import type { Profile } from "../../types/profile.js";
import type { Settings } from "../../types/settings.js";
import type { SessionCache } from "../cache/session-cache.js";
import { fromStaticProfile } from "../aws/credentials.js";
import { DEFAULT_STS_REGION } from "../aws/client.js";
import { ssoLoginCommand, type SsoGateway } from "../aws/sso.js";
import type { StsGateway } from "../aws/sts.js";
import {
  AuthCancelledError,
  AuthenticationFailedError,
  AuthRequiredError,
  AwrapError,
  IncompleteProfileError,
  MfaExhaustedError,
  MfaSerialMismatchError,
  TransientNetworkError,
} from "../errors.js";
import { classify } from "../profile/classify.js";
import type { ProfileStore } from "../profile/store.js";
import { extractAccountFromArn, maskArn } from "../utils/mask.js";
import { isTransientError, withRetry, type RetryOptions } from "../utils/retry.js";
import type { Prompter } from "./prompter.js";
import { resolveRegion } from "./region.js";

/**
 * Attempts allowed for an MFA code
 */
export const MFA_MAX_ATTEMPTS = 3;

const MFA_CODE_PATTERN = /^\d{6}$/;

/**
 * Messages the resolver emits along the way
 */
export interface ResolverLogger {
  info(message: string): void;
  warn(message: string): void;
  verbose(message: string): void;
}

/**
 * Collaborators of the resolver
 */
export interface ResolverDeps {
  profiles: ProfileStore;
  sts: StsGateway;
  sso: SsoGateway;
  cache: SessionCache;
  prompter: Prompter;
  settings: Pick<Settings, "connectTimeoutMs" | "sessionDurationSeconds" | "awsCli">;
  logger?: ResolverLogger;
  retry?: Partial<RetryOptions>;
  now?: () => Date;
  /** Show spinners around external calls */
  showProgress?: boolean;
}

const silentLogger: ResolverLogger = {
  info: () => undefined,
  warn: () => undefined,
  verbose: () => undefined,
};

/**
 * Role session name unique to this invocation
 */
export function createSessionName(now: Date, pid: number = process.pid): string {
  return `awrap-${Math.floor(now.getTime() / 1000)}-${pid}`;
}

/**
 * Command a user can run to obtain MFA session credentials manually
 */
export function mfaRemediationCommand(profile: Profile, awsCli: string = "aws"): string {
  const serial = profile.mfaSerial ? maskArn(profile.mfaSerial) : "<mfa_serial>";
  return `${awsCli} sts get-session-token --profile ${profile.name} --serial-number ${serial} --token-code <code>`;
}

export class CredentialResolver {
  private readonly logger: ResolverLogger;
  private readonly now: () => Date;

  constructor(private readonly deps: ResolverDeps) {
    this.logger = deps.logger ?? silentLogger;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Resolve credentials for the requested profile
   */
  async resolve(context: ResolutionContext): Promise<Resolution> {
    const { profiles, cache } = this.deps;

    // Profile graph defects surface before any external call
    const chain = profiles.resolveChain(context.profileName);
    const requested = chain[chain.length - 1];
    const region = resolveRegion(context, requested);

    const cached = await cache.get(context.profileName);
    if (cached) {
      this.logger.verbose(
        `Using cached credentials for '${context.profileName}' (${cached.location})`
      );
      return {
        profileName: context.profileName,
        credentials: { ...cached.credentials, region: region?.value },
        region,
        flow: "cache",
      };
    }

    const [base, ...roles] = chain;
    let flow: AuthFlow;
    let credentials: CredentialSet;

    ({ flow, credentials } = await this.resolveBase(base, context));

    // Sessions from an MFA code already carry that device's MFA context
    let mfaSerial = flow === "mfa" ? base.mfaSerial : undefined;
    let source = base;
    for (const role of roles) {
      credentials = await this.assumeRole(role, source, credentials, context, mfaSerial);
      if (role.mfaSerial) {
        mfaSerial = role.mfaSerial;
      }
      flow = "assume-role";
      source = role;
    }

    const stored = await cache.put(context.profileName, credentials);
    if (stored) {
      this.logger.verbose(`Cached credentials for '${context.profileName}' (${stored.location})`);
    }

    return {
      profileName: context.profileName,
      credentials: { ...credentials, region: region?.value },
      region,
      flow,
    };
  }

  /**
   * Authenticate a profile that does not assume a role
   */
  private async resolveBase(
    profile: Profile,
    context: ResolutionContext
  ): Promise<{ flow: AuthFlow; credentials: CredentialSet }> {
    const tags = classify(profile);

    if (tags.has("ASSUME_ROLE")) {
      throw new IncompleteProfileError(
        `Profile '${profile.name}' has role_arn but no source_profile`,
        `Add source_profile to [profile ${profile.name}]`
      );
    }
    if (tags.has("SSO")) {
      return { flow: "sso", credentials: await this.ssoFlow(profile, context) };
    }
    if (tags.has("MFA") && tags.has("STATIC")) {
      return { flow: "mfa", credentials: await this.mfaFlow(profile, context) };
    }
    if (tags.has("STATIC")) {
      this.logger.verbose(`Using static credentials of '${profile.name}'`);
      return { flow: "static", credentials: fromStaticProfile(profile) };
    }
    if (profile.accessKeyId || profile.secretAccessKey) {
      // Throws naming the missing half of the key pair
      fromStaticProfile(profile);
    }

    throw new IncompleteProfileError(
      tags.has("MFA")
        ? `Profile '${profile.name}' has mfa_serial but no static credentials`
        : `Profile '${profile.name}' has no credentials configured`,
      "Add aws_access_key_id/aws_secret_access_key, SSO settings, or role_arn with source_profile"
    );
  }

  private async ssoFlow(profile: Profile, context: ResolutionContext): Promise<CredentialSet> {
    const command = ssoLoginCommand(profile.name, this.deps.settings.awsCli);

    const existing = await this.probeSso(profile, context);
    if (existing) {
      return existing;
    }

    if (!context.interactive) {
      throw new AuthRequiredError(`SSO login required for profile "${profile.name}"`, command);
    }

    this.logger.info(`SSO session is not valid. Running: ${chalk.cyan(command)}`);
    await this.deps.sso.login(profile.name, context.signal);
    this.throwIfCancelled(context);

    const renewed = await this.probeSso(profile, context);
    if (!renewed) {
      throw new AuthRequiredError(
        `SSO session for profile "${profile.name}" is still not valid after login`,
        command
      );
    }
    return renewed;
  }

  /**
   * Load the cached SSO session and confirm it with get-caller-identity
   *
   * @returns undefined when the session is missing, expired or rejected
   * @throws TransientNetworkError when the probe keeps failing on the network
   */
  private async probeSso(
    profile: Profile,
    context: ResolutionContext
  ): Promise<CredentialSet | undefined> {
    const { sso, sts, settings } = this.deps;
    const timeoutMs = settings.connectTimeoutMs;
    const signal = context.signal;

    try {
      return await this.step(
        `Checking SSO session for ${profile.name}...`,
        () =>
          withRetry(async () => {
            const credentials = await sso.loadSession(profile.name, timeoutMs);
            await sts.getCallerIdentity({
              credentials,
              region: profile.ssoRegion ?? profile.region,
              timeoutMs,
              signal,
            });
            return credentials;
          }, { ...this.deps.retry, signal }),
        signal
      );
    } catch (error) {
      this.throwIfCancelled(context);
      if (error instanceof Error && isTransientError(error)) {
        throw new TransientNetworkError(
          `Could not reach AWS to check the SSO session for profile '${profile.name}'`,
          "Check your network connection and try again",
          { cause: error }
        );
      }
      this.logger.verbose(
        `SSO session for '${profile.name}' is not valid (${errorName(error)})`
      );
      return undefined;
    }
  }

  private async mfaFlow(profile: Profile, context: ResolutionContext): Promise<CredentialSet> {
    const serial = this.requireInteractiveMfa(profile, context);
    const base = fromStaticProfile(profile);
    await this.verifyMfaAccount(profile, serial, base, context);

    return this.withMfaCode(profile, serial, context, (tokenCode) =>
      this.callSts(`get-session-token for profile '${profile.name}'`, context, () =>
        this.deps.sts.getSessionToken({
          credentials: base,
          serialNumber: serial,
          tokenCode,
          durationSeconds: this.durationFor(profile),
          region: this.stsRegion(profile),
          signal: context.signal,
        })
      )
    );
  }

  private async assumeRole(
    role: Profile,
    source: Profile,
    base: CredentialSet,
    context: ResolutionContext,
    satisfiedMfaSerial?: string
  ): Promise<CredentialSet> {
    const roleArn = role.roleArn;
    if (!roleArn) {
      throw new IncompleteProfileError(`Profile '${role.name}' has no role_arn`);
    }

    const request = {
      credentials: base,
      roleArn,
      sessionName: role.roleSessionName ?? createSessionName(this.now()),
      durationSeconds: this.durationFor(role),
      externalId: role.externalId,
      region: this.stsRegion(role),
      signal: context.signal,
    };
    const label = `assume-role ${maskArn(roleArn)} for profile '${role.name}'`;

    this.logger.verbose(`Assuming ${maskArn(roleArn)} with credentials of '${source.name}'`);

    if (role.mfaSerial && role.mfaSerial === satisfiedMfaSerial) {
      this.logger.verbose(`MFA for '${role.name}' already satisfied by '${source.name}'`);
    } else if (role.mfaSerial) {
      const serial = this.requireInteractiveMfa(role, context);
      await this.verifyMfaAccount(role, serial, base, context);
      return this.withMfaCode(role, serial, context, (tokenCode) =>
        this.callSts(label, context, () =>
          this.deps.sts.assumeRole({ ...request, serialNumber: serial, tokenCode })
        )
      );
    }

    try {
      return await this.callSts(label, context, () => this.deps.sts.assumeRole(request));
    } catch (error) {
      throw this.classifyFailure(label, error);
    }
  }

  private requireInteractiveMfa(profile: Profile, context: ResolutionContext): string {
    const serial = profile.mfaSerial;
    if (!serial) {
      throw new IncompleteProfileError(`Profile '${profile.name}' has no mfa_serial`);
    }
    if (!context.interactive) {
      throw new AuthRequiredError(
        `MFA code required for profile "${profile.name}"`,
        mfaRemediationCommand(profile, this.deps.settings.awsCli)
      );
    }
    return serial;
  }

  /**
   * Check the MFA device belongs to the account of the base credentials
   *
   * Only ARN serials carry an account id; failing to look up the caller's
   * account is a warning, not an error.
   */
  private async verifyMfaAccount(
    profile: Profile,
    serial: string,
    base: CredentialSet,
    context: ResolutionContext
  ): Promise<void> {
    const deviceAccount = extractAccountFromArn(serial);
    if (!deviceAccount) {
      return;
    }

    let callerAccount: string;
    try {
      const label = `get-caller-identity for profile '${profile.name}'`;
      const identity = await this.callSts(label, context, () =>
        this.deps.sts.getCallerIdentity({
          credentials: base,
          region: this.stsRegion(profile),
          timeoutMs: this.deps.settings.connectTimeoutMs,
          signal: context.signal,
        })
      );
      callerAccount = identity.accountId;
    } catch (error) {
      this.throwIfCancelled(context);
      this.logger.warn(
        `Could not determine the account of profile '${profile.name}' (${errorName(error)})`
      );
      return;
    }

    if (callerAccount !== deviceAccount) {
      throw new MfaSerialMismatchError(
        `MFA device ${maskArn(serial)} belongs to another account than profile '${profile.name}' (${maskArn(callerAccount)})`,
        `Update mfa_serial in profile '${profile.name}', or use credentials for the device's account`
      );
    }
  }

  /**
   * Prompt for a code and run `call` with it, up to MFA_MAX_ATTEMPTS times
   *
   * A malformed code or a rejected call consumes one attempt.
   */
  private async withMfaCode(
    profile: Profile,
    serial: string,
    context: ResolutionContext,
    call: (tokenCode: string) => Promise<CredentialSet>
  ): Promise<CredentialSet> {
    for (let attempt = 1; attempt <= MFA_MAX_ATTEMPTS; attempt++) {
      const code = (
        await this.deps.prompter.mfaCode({
          profileName: profile.name,
          serial: maskArn(serial),
          attempt,
          maxAttempts: MFA_MAX_ATTEMPTS,
          signal: context.signal,
        })
      ).trim();
      this.throwIfCancelled(context);

      if (!MFA_CODE_PATTERN.test(code)) {
        this.logger.warn(
          `Invalid code format, expected 6 digits (attempt ${attempt}/${MFA_MAX_ATTEMPTS})`
        );
        continue;
      }

      try {
        return await call(code);
      } catch (error) {
        if (error instanceof AwrapError) {
          throw error;
        }
        this.logger.warn(
          `MFA attempt ${attempt}/${MFA_MAX_ATTEMPTS} failed for profile '${profile.name}' (${errorName(error)})`
        );
      }
    }

    throw new MfaExhaustedError(profile.name, MFA_MAX_ATTEMPTS);
  }

  /**
   * Run an STS call with retries for transient failures
   *
   * @throws TransientNetworkError once retries are exhausted; other errors
   * pass through unchanged
   */
  private async callSts<T>(
    label: string,
    context: ResolutionContext,
    operation: () => Promise<T>
  ): Promise<T> {
    const signal = context.signal;

    try {
      return await this.step(
        `Running ${label}...`,
        () =>
          withRetry(operation, { ...this.deps.retry, signal }, (attempt, error, delayMs) => {
            this.logger.verbose(
              `${label}: attempt ${attempt} failed (${errorName(error)}), retrying in ${delayMs}ms`
            );
          }),
        signal
      );
    } catch (error) {
      this.throwIfCancelled(context);
      if (error instanceof Error && isTransientError(error)) {
        throw new TransientNetworkError(
          `${label} failed: network unavailable`,
          "Check your network connection and try again",
          { cause: error }
        );
      }
      throw error;
    }
  }

  private classifyFailure(label: string, error: unknown): AwrapError {
    if (error instanceof AwrapError) {
      return error;
    }
    return new AuthenticationFailedError(`${label} was rejected (${errorName(error)})`, undefined, {
      cause: error,
    });
  }

  private async step<T>(
    text: string,
    operation: () => Promise<T>,
    signal?: AbortSignal
  ): Promise<T> {
    let spinner: Ora | null = null;
    if (this.deps.showProgress) {
      spinner = ora({ text, stream: process.stderr }).start();
    }

    try {
      const result = await untilAborted(operation(), signal);
      spinner?.stop();
      return result;
    } catch (error) {
      spinner?.stop();
      throw error;
    }
  }

  private durationFor(profile: Profile): number {
    return profile.durationSeconds ?? this.deps.settings.sessionDurationSeconds;
  }

  private stsRegion(profile: Profile): string {
    return profile.region ?? DEFAULT_STS_REGION;
  }

  private throwIfCancelled(context: ResolutionContext): void {
    if (context.signal?.aborted) {
      throw new AuthCancelledError();
    }
  }
}

/**
 * Settle with `operation`, or reject with AuthCancelledError as soon as
 * `signal` aborts
 */
function untilAborted<T>(operation: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return operation;
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new AuthCancelledError());
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }

    void operation.then(resolve, reject).finally(() => {
      signal.removeEventListener("abort", onAbort);
    });
  });
}

/**
 * Error name safe to show; messages may carry identifiers
 */
function errorName(error: unknown): string {
  return error instanceof Error ? error.name : "unknown error";
}
