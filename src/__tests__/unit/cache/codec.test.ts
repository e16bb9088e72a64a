import { describe, it, expect } from '@jest/globals';
import { decodeEntry, encodeEntry } from '../../../core/cache/codec.js';
import { CacheCorruptionError } from '../../../core/errors.js';

describe('Cache codec', () => {
  const storedAt = new Date('2026-01-01T00:00:00.000Z');
  const expiration = new Date('2026-01-01T01:00:00.000Z');

  it('should restore session credentials with their expiry', () => {
    const payload = encodeEntry(
      'dev',
      { accessKeyId: 'ASIAEXAMPLE', secretAccessKey: 'test-secret', sessionToken: 'test-token', expiration },
      storedAt
    );

    expect(decodeEntry('dev', payload)).toEqual({
      profileName: 'dev',
      storedAt,
      credentials: {
        accessKeyId: 'ASIAEXAMPLE',
        secretAccessKey: 'test-secret',
        sessionToken: 'test-token',
        expiration,
      },
    });
  });

  it('should leave absent fields out', () => {
    const payload = encodeEntry('base', { accessKeyId: 'AKIDEXAMPLE', secretAccessKey: 'test-secret' }, storedAt);

    expect(decodeEntry('base', payload).credentials).toEqual({
      accessKeyId: 'AKIDEXAMPLE',
      secretAccessKey: 'test-secret',
    });
  });

  it('should reject invalid JSON', () => {
    expect(() => decodeEntry('dev', '{not json')).toThrow(CacheCorruptionError);
    expect(() => decodeEntry('dev', '{not json')).toThrow("Cache entry for 'dev' is not valid JSON");
  });

  it('should reject an unknown version', () => {
    const payload = JSON.stringify({ version: 2, profileName: 'dev' });

    expect(() => decodeEntry('dev', payload)).toThrow("Cache entry for 'dev' has an unexpected shape");
  });

  it('should reject an entry stored for another profile', () => {
    const payload = encodeEntry('prod', { accessKeyId: 'AKIDEXAMPLE', secretAccessKey: 'test-secret' }, storedAt);

    expect(() => decodeEntry('dev', payload)).toThrow("Cache entry for 'dev' belongs to another profile");
  });
});
