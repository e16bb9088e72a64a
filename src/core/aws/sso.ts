/**
 * SSO session access through the AWS CLI's own token cache
 */

import { fromSSO } from '@aws-sdk/credential-providers';
import type { CredentialSet } from '../../types/credentials.js';
import { AuthCancelledError, ExternalCommandError } from '../errors.js';
import { runInteractive } from '../utils/process.js';
import { fromIdentity } from './credentials.js';

/**
 * External SSO operations, as the resolver sees them
 */
export interface SsoGateway {
  /**
   * Credentials for the profile from the cached SSO session
   *
   * @throws if the session is missing or expired
   */
  loadSession(profileName: string, timeoutMs: number): Promise<CredentialSet>;

  /**
   * Run the interactive SSO login
   */
  login(profileName: string, signal?: AbortSignal): Promise<void>;
}

/**
 * Command a user runs to log in manually
 */
export function ssoLoginCommand(profileName: string, awsCli: string = 'aws'): string {
  return `${awsCli} sso login --profile ${profileName}`;
}

/**
 * Options for the CLI-backed gateway
 */
export interface AwsSsoGatewayOptions {
  awsCli: string;
  configFile: string;
  credentialsFile: string;
}

/**
 * SsoGateway using the SDK's SSO provider and `aws sso login`
 *
 * Tokens are never read or written here; the SDK reads the cache the AWS
 * CLI maintains under ~/.aws/sso/cache.
 */
export class AwsSsoGateway implements SsoGateway {
  constructor(private readonly options: AwsSsoGatewayOptions) {}

  async loadSession(profileName: string, timeoutMs: number): Promise<CredentialSet> {
    const provider = fromSSO({
      profile: profileName,
      configFilepath: this.options.configFile,
      filepath: this.options.credentialsFile,
      clientConfig: {
        requestHandler: {
          connectionTimeout: timeoutMs,
          requestTimeout: timeoutMs,
        },
        maxAttempts: 1,
      },
    });

    return fromIdentity(await provider());
  }

  async login(profileName: string, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new AuthCancelledError();
    }

    const args = ['sso', 'login', '--profile', profileName];
    const exitCode = await runInteractive(this.options.awsCli, args, { signal });

    if (signal?.aborted) {
      throw new AuthCancelledError();
    }

    if (exitCode !== 0) {
      throw new ExternalCommandError(
        `${this.options.awsCli} sso login failed with exit code ${exitCode}`,
        `Run: ${ssoLoginCommand(profileName, this.options.awsCli)}`
      );
    }
  }
}
