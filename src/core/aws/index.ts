/**
 * AWS integration exports
 */

export { createSTSClient, DEFAULT_STS_REGION, type ClientOptions } from './client.js';
export {
  fromStsCredentials,
  fromIdentity,
  fromStaticProfile,
  isUnexpired,
} from './credentials.js';
export {
  AwsStsGateway,
  type StsGateway,
  type StsRequestBase,
  type GetSessionTokenRequest,
  type AssumeRoleRequest,
  type AwsStsGatewayOptions,
} from './sts.js';
export {
  AwsSsoGateway,
  ssoLoginCommand,
  type SsoGateway,
  type AwsSsoGatewayOptions,
} from './sso.js';
