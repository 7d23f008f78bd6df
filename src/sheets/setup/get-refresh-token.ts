/**
 * One-time setup script: obtain GOOGLE_REFRESH_TOKEN for the Sheets API.
 *
 * Run with: npm run setup:google-token
 *
 * Opens the Google consent page; sign in with the account that owns the
 * budget spreadsheet. The redirect lands on a short-lived local listener
 * and the script prints the .env line to copy.
 */

import 'dotenv/config';
import * as http from 'node:http';
import open from 'open';
import {
  CONSENT_REDIRECT_PORT,
  consentUrl,
  createConsentClient,
  readConsentRedirect,
} from '../oauth-consent.js';

const CONSENT_TIMEOUT_MS = 120_000;

function waitForCode(authUrl: string): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    const server = http.createServer((req, res) => {
      const redirect = readConsentRedirect(req.url);
      if (redirect.kind === 'unrelated') {
        res.writeHead(404).end();
        return;
      }

      res.writeHead(200, { 'Content-Type': 'text/plain; charset=utf-8' });
      res.end(redirect.kind === 'code'
        ? 'Authorized. Return to the terminal.'
        : 'Authorization was declined. Return to the terminal.');
      clearTimeout(timer);
      server.close();

      if (redirect.kind === 'code') resolve(redirect.code);
      else reject(new Error(`Consent declined: ${redirect.error}`));
    });

    const timer = setTimeout(() => {
      server.close();
      reject(new Error(`No consent received within ${CONSENT_TIMEOUT_MS / 1000}s`));
    }, CONSENT_TIMEOUT_MS);

    server.listen(CONSENT_REDIRECT_PORT, () => {
      console.log('[setup] Waiting for Google consent...');
      open(authUrl).catch((err: unknown) => {
        console.warn('[setup] Could not open a browser', {
          error: err instanceof Error ? err.message : String(err),
        });
        console.log(`[setup] Open this URL by hand:\n${authUrl}`);
      });
    });
  });
}

async function main(): Promise<void> {
  const client = createConsentClient();
  const code = await waitForCode(consentUrl(client));
  const { tokens } = await client.getToken(code);

  if (!tokens.refresh_token) {
    throw new Error('Google returned no refresh token; revoke the app at https://myaccount.google.com/permissions and retry');
  }

  console.log('\nAdd to .env:\n');
  console.log(`GOOGLE_REFRESH_TOKEN=${tokens.refresh_token}\n`);
}

main().catch((err: unknown) => {
  console.error('[setup] Failed:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
