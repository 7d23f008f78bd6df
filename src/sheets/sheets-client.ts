/**
 * Google Sheets API Client
 *
 * Supports two authentication modes:
 * 1. OAuth2 refresh token (personal account): GOOGLE_CLIENT_ID + GOOGLE_CLIENT_SECRET + GOOGLE_REFRESH_TOKEN
 * 2. Service account (spreadsheet shared with the account's email): GOOGLE_SERVICE_ACCOUNT_KEY
 *
 * OAuth2 is checked first, then service account.
 * The refresh token is obtained once with src/sheets/setup/get-refresh-token.ts.
 */

import { google } from 'googleapis';
import { JWT, OAuth2Client } from 'google-auth-library';
import { ConfigurationError } from '../errors.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type SheetsClient = ReturnType<typeof google.sheets>;

type Env = Record<string, string | undefined>;

export const SHEETS_SCOPE = 'https://www.googleapis.com/auth/spreadsheets';

// ---------------------------------------------------------------------------
// Service Account Key Loading
// ---------------------------------------------------------------------------

/**
 * Decodes the base64 service account key from GOOGLE_SERVICE_ACCOUNT_KEY.
 */
export function loadServiceAccountKey(env: Env = process.env): { client_email: string; private_key: string } {
  const encoded = env.GOOGLE_SERVICE_ACCOUNT_KEY;
  if (!encoded) {
    throw new ConfigurationError([
      'No Sheets credentials found. Set either GOOGLE_CLIENT_ID + GOOGLE_CLIENT_SECRET + ' +
        'GOOGLE_REFRESH_TOKEN (OAuth2), or GOOGLE_SERVICE_ACCOUNT_KEY (service account)',
    ]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(encoded, 'base64').toString('utf-8'));
  } catch (err) {
    throw new ConfigurationError([
      `GOOGLE_SERVICE_ACCOUNT_KEY is malformed: ${err instanceof Error ? err.message : String(err)}. ` +
        'Ensure it is a base64-encoded JSON service account key file.',
    ]);
  }

  if (typeof parsed !== 'object' || parsed === null) {
    throw new ConfigurationError(['GOOGLE_SERVICE_ACCOUNT_KEY must decode to a JSON object']);
  }
  if (!('client_email' in parsed) || !('private_key' in parsed)) {
    throw new ConfigurationError(['GOOGLE_SERVICE_ACCOUNT_KEY is missing client_email or private_key']);
  }

  const { client_email, private_key } = parsed;
  if (typeof client_email !== 'string' || typeof private_key !== 'string') {
    throw new ConfigurationError(['GOOGLE_SERVICE_ACCOUNT_KEY is missing client_email or private_key']);
  }

  return { client_email, private_key };
}

// ---------------------------------------------------------------------------
// Sheets Client Singleton
// ---------------------------------------------------------------------------

let _sheetsClient: SheetsClient | null = null;

/**
 * Returns an authenticated Google Sheets API v4 client.
 * Client is lazily initialized and cached for reuse.
 */
export function getSheetsClient(env: Env = process.env): SheetsClient {
  if (_sheetsClient) return _sheetsClient;

  let auth: OAuth2Client | JWT;

  if (env.GOOGLE_REFRESH_TOKEN) {
    const clientId = env.GOOGLE_CLIENT_ID;
    const clientSecret = env.GOOGLE_CLIENT_SECRET;

    if (!clientId || !clientSecret) {
      throw new ConfigurationError([
        'OAuth2 credentials incomplete. Set GOOGLE_CLIENT_ID and GOOGLE_CLIENT_SECRET alongside GOOGLE_REFRESH_TOKEN',
      ]);
    }

    const oauth2Client = new OAuth2Client(clientId, clientSecret);
    oauth2Client.setCredentials({ refresh_token: env.GOOGLE_REFRESH_TOKEN });
    auth = oauth2Client;
  } else {
    const key = loadServiceAccountKey(env);
    auth = new JWT({
      email: key.client_email,
      key: key.private_key,
      scopes: [SHEETS_SCOPE],
    });
  }

  _sheetsClient = google.sheets({ version: 'v4', auth });
  return _sheetsClient;
}

/**
 * Resets the cached Sheets client. Used in tests to clear singleton state.
 */
export function resetSheetsClient(): void {
  _sheetsClient = null;
}
