/**
 * OAuth Consent Helpers
 *
 * Pieces of the one-time consent flow that yields GOOGLE_REFRESH_TOKEN for
 * a personal Google account. The interactive part lives in
 * src/sheets/setup/get-refresh-token.ts.
 */

import { OAuth2Client } from 'google-auth-library';
import { ConfigurationError } from '../errors.js';
import { SHEETS_SCOPE } from './sheets-client.js';

type Env = Record<string, string | undefined>;

export const CONSENT_REDIRECT_PORT = 3333;
export const CONSENT_REDIRECT_URI = `http://localhost:${CONSENT_REDIRECT_PORT}`;

export type ConsentRedirect =
  | { kind: 'code'; code: string }
  | { kind: 'denied'; error: string }
  | { kind: 'unrelated' };

export function createConsentClient(env: Env = process.env): OAuth2Client {
  const clientId = env.GOOGLE_CLIENT_ID;
  const clientSecret = env.GOOGLE_CLIENT_SECRET;
  if (!clientId || !clientSecret) {
    throw new ConfigurationError(['GOOGLE_CLIENT_ID and GOOGLE_CLIENT_SECRET must be set to request consent']);
  }
  return new OAuth2Client(clientId, clientSecret, CONSENT_REDIRECT_URI);
}

/**
 * Consent URL for offline access to spreadsheets. `prompt: consent` makes
 * Google return a refresh token even when the app was authorized before.
 */
export function consentUrl(client: OAuth2Client): string {
  return client.generateAuthUrl({
    access_type: 'offline',
    scope: [SHEETS_SCOPE],
    prompt: 'consent',
  });
}

/**
 * Classifies a request that reached the local redirect listener.
 * Browsers also ask for /favicon.ico, which is neither a code nor an error.
 */
export function readConsentRedirect(requestUrl: string | undefined): ConsentRedirect {
  const url = new URL(requestUrl ?? '/', CONSENT_REDIRECT_URI);
  const error = url.searchParams.get('error');
  if (error) return { kind: 'denied', error };

  const code = url.searchParams.get('code');
  if (code) return { kind: 'code', code };

  return { kind: 'unrelated' };
}
