/**
 * Sheets Client Credential Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { getSheetsClient, loadServiceAccountKey, resetSheetsClient } from '../sheets-client.js';
import { ConfigurationError } from '../../errors.js';

function encodeKey(key: Record<string, string>): string {
  return Buffer.from(JSON.stringify(key), 'utf-8').toString('base64');
}

describe('loadServiceAccountKey', () => {
  it('decodes a base64 service account key', () => {
    const env = {
      GOOGLE_SERVICE_ACCOUNT_KEY: encodeKey({ client_email: 'bot@test.iam', private_key: 'test-key' }),
    };
    expect(loadServiceAccountKey(env)).toEqual({ client_email: 'bot@test.iam', private_key: 'test-key' });
  });

  it('throws ConfigurationError when no credentials are set', () => {
    expect(() => loadServiceAccountKey({})).toThrow(ConfigurationError);
  });

  it('throws ConfigurationError for a key that is not JSON', () => {
    const env = { GOOGLE_SERVICE_ACCOUNT_KEY: Buffer.from('not json').toString('base64') };
    expect(() => loadServiceAccountKey(env)).toThrow(/GOOGLE_SERVICE_ACCOUNT_KEY is malformed/);
  });

  it.each(['null', '42', '"text"'])('throws ConfigurationError for a key that decodes to %s', (json) => {
    const env = { GOOGLE_SERVICE_ACCOUNT_KEY: Buffer.from(json).toString('base64') };
    expect(() => loadServiceAccountKey(env)).toThrow(ConfigurationError);
    expect(() => loadServiceAccountKey(env)).toThrow(/must decode to a JSON object/);
  });

  it('throws ConfigurationError when fields are missing', () => {
    const env = { GOOGLE_SERVICE_ACCOUNT_KEY: encodeKey({ client_email: 'bot@test.iam' }) };
    expect(() => loadServiceAccountKey(env)).toThrow(/missing client_email or private_key/);
  });
});

describe('getSheetsClient', () => {
  beforeEach(() => {
    resetSheetsClient();
  });

  it('requires the OAuth2 client id and secret alongside a refresh token', () => {
    expect(() => getSheetsClient({ GOOGLE_REFRESH_TOKEN: 'test-refresh-token' })).toThrow(ConfigurationError);
  });

  it('caches the client', () => {
    const env = {
      GOOGLE_CLIENT_ID: 'test-client-id',
      GOOGLE_CLIENT_SECRET: 'test-secret',
      GOOGLE_REFRESH_TOKEN: 'test-refresh-token',
    };
    expect(getSheetsClient(env)).toBe(getSheetsClient(env));
  });
});
