/**
 * Shared Application Configuration
 *
 * Centralizes environment variable access for the bot process.
 * Spreadsheet settings live in src/sheets/config.ts.
 *
 * Environment variables:
 * - TELEGRAM_BOT_TOKEN: Required Bot API token
 * - TELEGRAM_API_BASE: Bot API base URL (defaults to https://api.telegram.org)
 * - TELEGRAM_WEBHOOK_SECRET: Optional secret Telegram echoes in X-Telegram-Bot-Api-Secret-Token
 * - TELEGRAM_WEBHOOK_URL: Optional public URL; when set the webhook is registered at startup
 * - DEFAULT_LOCALE: Reply language for users who never ran /lang (default ru)
 * - BOT_KILL_SWITCH: Set to 'true' to stop handling updates
 * - PORT: HTTP server port (default 3000)
 */

import 'dotenv/config';
import { ConfigurationError } from './errors.js';
import { isLocale, type Locale } from './i18n/types.js';

export interface AppConfig {
  isDev: boolean;
  killSwitch: boolean;
  defaultLocale: Locale;
  telegram: {
    botToken: string;
    apiBase: string;
    webhookSecret: string | undefined;
    webhookUrl: string | undefined;
  };
  server: {
    port: number;
  };
}

type Env = Record<string, string | undefined>;

/**
 * Builds the application configuration from the environment.
 * Every problem is collected and thrown at once as a ConfigurationError.
 */
export function loadAppConfig(env: Env = process.env): AppConfig {
  const problems: string[] = [];

  const botToken = env.TELEGRAM_BOT_TOKEN;
  if (!botToken) {
    problems.push(
      'Missing required environment variable: TELEGRAM_BOT_TOKEN. ' +
      'Copy .env.example to .env and fill in the required values.',
    );
  }

  const defaultLocaleRaw = (env.DEFAULT_LOCALE ?? 'ru').trim().toLowerCase();
  let defaultLocale: Locale = 'ru';
  if (isLocale(defaultLocaleRaw)) {
    defaultLocale = defaultLocaleRaw;
  } else {
    problems.push(`DEFAULT_LOCALE "${defaultLocaleRaw}" is not one of en, ru`);
  }

  const port = parseInt(env.PORT ?? '3000', 10);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    problems.push(`PORT "${env.PORT}" is not a valid port`);
  }

  if (problems.length > 0 || !botToken) {
    throw new ConfigurationError(problems);
  }

  return {
    isDev: (env.APP_ENV ?? 'development') !== 'production',
    killSwitch: env.BOT_KILL_SWITCH === 'true',
    defaultLocale,
    telegram: {
      botToken,
      apiBase: env.TELEGRAM_API_BASE ?? 'https://api.telegram.org',
      webhookSecret: env.TELEGRAM_WEBHOOK_SECRET || undefined,
      webhookUrl: env.TELEGRAM_WEBHOOK_URL || undefined,
    },
    server: { port },
  };
}

/**
 * Built on first import. src/index.ts imports this module inside main()
 * so a ConfigurationError here is reported like any other startup failure.
 */
export const appConfig: AppConfig = loadAppConfig();
