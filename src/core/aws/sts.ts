/**
 * STS operations used by the authentication flows
 */

import {
  AssumeRoleCommand,
  GetCallerIdentityCommand,
  GetSessionTokenCommand,
} from '@aws-sdk/client-sts';
import type { CallerIdentity, CredentialSet } from '../../types/credentials.js';
import { createSTSClient } from './client.js';
import { fromStsCredentials } from './credentials.js';

/**
 * Options shared by every STS request
 */
export interface StsRequestBase {
  /** Credentials the request is signed with */
  credentials: CredentialSet;

  region?: string;

  /** Abandons the request when aborted */
  signal?: AbortSignal;
}

export interface GetSessionTokenRequest extends StsRequestBase {
  serialNumber: string;
  tokenCode: string;
  durationSeconds: number;
}

export interface AssumeRoleRequest extends StsRequestBase {
  roleArn: string;
  sessionName: string;
  durationSeconds: number;
  externalId?: string;
  serialNumber?: string;
  tokenCode?: string;
}

/**
 * External STS calls, as the resolver sees them
 */
export interface StsGateway {
  getCallerIdentity(request: StsRequestBase & { timeoutMs?: number }): Promise<CallerIdentity>;

  getSessionToken(request: GetSessionTokenRequest): Promise<CredentialSet>;

  assumeRole(request: AssumeRoleRequest): Promise<CredentialSet>;
}

/**
 * Options for the SDK-backed gateway
 */
export interface AwsStsGatewayOptions {
  /** Bound for each STS request in milliseconds */
  requestTimeoutMs: number;

  /** Socket connect bound in milliseconds */
  connectTimeoutMs: number;
}

/**
 * StsGateway backed by @aws-sdk/client-sts
 */
export class AwsStsGateway implements StsGateway {
  constructor(private readonly options: AwsStsGatewayOptions) {}

  async getCallerIdentity(
    request: StsRequestBase & { timeoutMs?: number }
  ): Promise<CallerIdentity> {
    const client = createSTSClient(request.credentials, {
      region: request.region,
      connectionTimeout: this.options.connectTimeoutMs,
      requestTimeout: request.timeoutMs ?? this.options.requestTimeoutMs,
    });

    const response = await client.send(new GetCallerIdentityCommand({}), {
      abortSignal: request.signal,
    });

    if (!response.Account || !response.Arn || !response.UserId) {
      throw new Error('Invalid STS response: missing required fields');
    }

    return {
      accountId: response.Account,
      arn: response.Arn,
      userId: response.UserId,
    };
  }

  async getSessionToken(request: GetSessionTokenRequest): Promise<CredentialSet> {
    const client = this.client(request);

    const response = await client.send(
      new GetSessionTokenCommand({
        SerialNumber: request.serialNumber,
        TokenCode: request.tokenCode,
        DurationSeconds: request.durationSeconds,
      }),
      { abortSignal: request.signal }
    );

    return fromStsCredentials(response.Credentials);
  }

  async assumeRole(request: AssumeRoleRequest): Promise<CredentialSet> {
    const client = this.client(request);

    const response = await client.send(
      new AssumeRoleCommand({
        RoleArn: request.roleArn,
        RoleSessionName: request.sessionName,
        DurationSeconds: request.durationSeconds,
        ExternalId: request.externalId,
        SerialNumber: request.serialNumber,
        TokenCode: request.tokenCode,
      }),
      { abortSignal: request.signal }
    );

    return fromStsCredentials(response.Credentials);
  }

  private client(request: StsRequestBase) {
    return createSTSClient(request.credentials, {
      region: request.region,
      connectionTimeout: this.options.connectTimeoutMs,
      requestTimeout: this.options.requestTimeoutMs,
    });
  }
}
