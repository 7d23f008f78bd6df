/**
 * Application Entry Point
 *
 * Wires the spreadsheet, the expense services and the Telegram webhook
 * into a single process.
 *
 * Startup:
 * 1. Load and validate configuration and the message catalog
 * 2. Build the Sheets cell store, recorder and budget reader
 * 3. Start Express server on configured port
 * 4. Register the Telegram webhook when TELEGRAM_WEBHOOK_URL is set
 *
 * Shutdown (SIGTERM/SIGINT):
 * 1. Stop accepting new HTTP connections
 * 2. Exit process once in-flight requests are done
 *
 * Usage:
 *   Production: node dist/index.js
 *   Development: npx tsx src/index.ts
 */

import { startupFailureMessage } from './errors.js';
import type { AddressingOptions } from './sheets/index.js';

async function main() {
  // Loaded here rather than at the top so a bad environment, which fails
  // while config.js is evaluated, ends up in the catch below
  const { appConfig } = await import('./config.js');
  const { loadMessages } = await import('./i18n/index.js');
  const { GoogleSheetsCellStore, KeyedMutex, getSheetsClient, loadSheetsConfig } = await import('./sheets/index.js');
  const { BudgetReader, ExpenseRecorder } = await import('./expenses/index.js');
  const { CommandDispatcher, InMemoryLocaleStore, TelegramClient, WEBHOOK_PATH, createApp } = await import('./bot/index.js');

  console.log('[startup] Sheets expense bot starting...');
  console.log('[startup] Environment:', appConfig.isDev ? 'development' : 'production');
  console.log('[startup] Kill switch:', appConfig.killSwitch ? 'ACTIVE' : 'inactive');

  const sheetsConfig = loadSheetsConfig();
  const messages = loadMessages();

  // Fail fast on missing Google credentials
  getSheetsClient();

  const addressing: AddressingOptions = {
    layout: sheetsConfig.layout,
    sheetLocale: sheetsConfig.sheetLocale,
    timeZone: sheetsConfig.timeZone,
  };
  console.log('[startup] Spreadsheet layout', {
    ...sheetsConfig.layout,
    sheetLocale: sheetsConfig.sheetLocale,
    timeZone: sheetsConfig.timeZone,
  });

  const store = new GoogleSheetsCellStore(sheetsConfig.spreadsheetId);
  const telegram = new TelegramClient(appConfig.telegram.botToken, appConfig.telegram.apiBase);

  const dispatcher = new CommandDispatcher({
    recorder: new ExpenseRecorder({ store, lock: new KeyedMutex(), addressing }),
    budgetReader: new BudgetReader({ store, addressing }),
    localeStore: new InMemoryLocaleStore(),
    transport: telegram,
    messages,
    defaultLocale: appConfig.defaultLocale,
    now: () => new Date(),
  });

  // Start Express server
  const app = createApp({ dispatcher });
  const server = app.listen(appConfig.server.port, () => {
    console.log(`[startup] Server listening on port ${appConfig.server.port}`);
  });

  if (appConfig.telegram.webhookUrl) {
    const url = new URL(WEBHOOK_PATH, appConfig.telegram.webhookUrl).toString();
    await telegram.setWebhook(url, appConfig.telegram.webhookSecret);
    console.log('[startup] Telegram webhook registered', { path: WEBHOOK_PATH });
  }

  // Graceful shutdown
  const shutdown = (signal: string) => {
    console.log(`[shutdown] Received ${signal}, shutting down gracefully...`);
    server.close(() => {
      console.log('[shutdown] HTTP server closed');
      process.exit(0);
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((err: unknown) => {
  console.error(`[startup] ${startupFailureMessage(err)}`);
  process.exit(1);
});
