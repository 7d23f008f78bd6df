/**
 * Setup script: Register the Telegram webhook without starting the server.
 *
 * Run with: npx tsx src/bot/setup/set-webhook.ts https://bot.example.com
 *
 * Uses TELEGRAM_BOT_TOKEN and TELEGRAM_WEBHOOK_SECRET from .env. The URL
 * argument falls back to TELEGRAM_WEBHOOK_URL.
 */

import 'dotenv/config';
import { TelegramClient, DEFAULT_TELEGRAM_API_BASE } from '../telegram-client.js';
import { WEBHOOK_PATH } from '../types.js';

async function main(): Promise<void> {
  const token = process.env.TELEGRAM_BOT_TOKEN;
  const baseUrl = process.argv[2] ?? process.env.TELEGRAM_WEBHOOK_URL;

  if (!token || !baseUrl) {
    console.error('ERROR: TELEGRAM_BOT_TOKEN and a webhook base URL (argument or TELEGRAM_WEBHOOK_URL) are required');
    process.exit(1);
  }

  const client = new TelegramClient(token, process.env.TELEGRAM_API_BASE ?? DEFAULT_TELEGRAM_API_BASE);
  const url = new URL(WEBHOOK_PATH, baseUrl).toString();

  await client.setWebhook(url, process.env.TELEGRAM_WEBHOOK_SECRET || undefined);
  console.log(`Webhook registered: ${url}`);
}

main().catch((err: unknown) => {
  console.error('Script failed:', err instanceof Error ? err.message : err);
  process.exit(1);
});
