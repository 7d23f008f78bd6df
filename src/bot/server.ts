/**
 * Express Webhook Server
 *
 * HTTP layer for receiving Telegram updates. Routes:
 * - POST /telegram/webhook: Validate the update and hand it to the dispatcher
 * - GET /health: Kill switch state, uptime and webhook setup
 *
 * The webhook endpoint:
 * 1. Checks the secret token header when a secret is configured (401 otherwise)
 * 2. Checks kill switch (returns 503 so Telegram redelivers later)
 * 3. Validates the update shape (400 on malformed bodies)
 * 4. Dispatches and returns 200
 *
 * A dispatch failure still answers 200: a redelivered /add would append
 * the same expense a second time.
 */

import express from 'express';
import type { Request, Response, NextFunction } from 'express';
import { appConfig } from '../config.js';
import { createHealthHandler } from './health.js';
import { TelegramUpdateSchema, WEBHOOK_PATH, type TelegramUpdate } from './types.js';

export { WEBHOOK_PATH };
export const SECRET_HEADER = 'x-telegram-bot-api-secret-token';

export interface ServerDeps {
  dispatcher: { handleUpdate(update: TelegramUpdate): Promise<void> };
}

/**
 * Create the Express application with all routes configured.
 *
 * Exported as a factory function so tests can create fresh app instances
 * without shared state between test cases.
 */
export function createApp(deps: ServerDeps) {
  const app = express();
  app.use(express.json());

  app.get('/health', createHealthHandler());

  app.post(WEBHOOK_PATH, async (req: Request, res: Response) => {
    const secret = appConfig.telegram.webhookSecret;
    if (secret && req.get(SECRET_HEADER) !== secret) {
      console.warn('[webhook] Rejected update with invalid secret token');
      res.status(401).json({ error: 'Invalid secret token' });
      return;
    }

    if (appConfig.killSwitch) {
      console.log('[webhook] Kill switch active: rejecting update');
      res.status(503).json({ message: 'Bot disabled' });
      return;
    }

    const parsed = TelegramUpdateSchema.safeParse(req.body);
    if (!parsed.success) {
      console.warn('[webhook] Malformed update', { issues: parsed.error.issues.length });
      res.status(400).json({ error: 'Malformed update' });
      return;
    }

    const update = parsed.data;
    try {
      await deps.dispatcher.handleUpdate(update);
    } catch (err) {
      console.error('[webhook] Dispatch failed', {
        updateId: update.update_id,
        error: err instanceof Error ? err.message : String(err),
      });
    }

    res.status(200).json({ ok: true });
  });

  // Global error handler
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    console.error('[server] Unhandled error:', err.message);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
