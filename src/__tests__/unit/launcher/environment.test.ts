import { describe, it, expect } from '@jest/globals';
import { buildChildEnv, hasProfileArgument } from '../../../core/launcher/environment.js';
import type { CredentialSet } from '../../../types/credentials.js';

describe('Child environment', () => {
  const session: CredentialSet = {
    accessKeyId: 'ASIAEXAMPLE',
    secretAccessKey: 'test-secret',
    sessionToken: 'test-token',
    expiration: new Date('2026-05-01T09:00:00.000Z'),
  };

  it('should inject session credentials and the profile name', () => {
    const env = buildChildEnv({ PATH: '/usr/bin' }, { credentials: session, profileName: 'dev', args: ['s3', 'ls'] });

    expect(env).toEqual({
      PATH: '/usr/bin',
      AWS_ACCESS_KEY_ID: 'ASIAEXAMPLE',
      AWS_SECRET_ACCESS_KEY: 'test-secret',
      AWS_SESSION_TOKEN: 'test-token',
      AWS_CREDENTIAL_EXPIRATION: '2026-05-01T09:00:00.000Z',
      AWS_PROFILE: 'dev',
    });
  });

  it('should drop a stale session token for static keys', () => {
    const env = buildChildEnv(
      { AWS_SESSION_TOKEN: 'stale', AWS_SECURITY_TOKEN: 'stale' },
      { credentials: { accessKeyId: 'AKIDEXAMPLE', secretAccessKey: 'test-secret' }, profileName: 'base', args: [] }
    );

    expect(env.AWS_SESSION_TOKEN).toBeUndefined();
    expect(env.AWS_SECURITY_TOKEN).toBeUndefined();
  });

  it('should not modify the parent environment', () => {
    const parent = { AWS_SESSION_TOKEN: 'stale' };
    buildChildEnv(parent, { credentials: session, profileName: 'dev', args: [] });

    expect(parent).toEqual({ AWS_SESSION_TOKEN: 'stale' });
  });

  it('should inject a region that came from the profile', () => {
    const env = buildChildEnv({}, {
      credentials: session,
      region: { value: 'us-west-2', source: 'profile' },
      profileName: 'dev',
      args: [],
    });

    expect(env.AWS_REGION).toBe('us-west-2');
    expect(env.AWS_DEFAULT_REGION).toBe('us-west-2');
  });

  it('should leave a region from the environment alone', () => {
    const env = buildChildEnv({ AWS_DEFAULT_REGION: 'eu-west-1' }, {
      credentials: session,
      region: { value: 'eu-west-1', source: 'environment' },
      profileName: 'dev',
      args: [],
    });

    expect(env.AWS_REGION).toBeUndefined();
    expect(env.AWS_DEFAULT_REGION).toBe('eu-west-1');
  });

  it('should not set AWS_PROFILE when the command picks a profile', () => {
    const env = buildChildEnv({}, { credentials: session, profileName: 'dev', args: ['s3', 'ls', '--profile=other'] });

    expect(env.AWS_PROFILE).toBeUndefined();
  });

  it('should detect both profile flag forms', () => {
    expect(hasProfileArgument(['--profile', 'x'])).toBe(true);
    expect(hasProfileArgument(['--profile=x'])).toBe(true);
    expect(hasProfileArgument(['--profiles'])).toBe(false);
  });
});
