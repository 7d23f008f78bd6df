/**
 * Health Check Endpoint
 *
 * Reports whether updates are being handled and how the webhook is set up.
 * No spreadsheet call is made, so a Sheets outage does not fail the check.
 */

import type { Request, Response } from 'express';
import { appConfig } from '../config.js';

export function createHealthHandler(startedAt: Date = new Date()) {
  return (_req: Request, res: Response): void => {
    res.json({
      status: appConfig.killSwitch ? 'disabled' : 'ok',
      timestamp: new Date().toISOString(),
      uptimeSeconds: Math.floor((Date.now() - startedAt.getTime()) / 1000),
      killSwitch: appConfig.killSwitch,
      webhookSecured: appConfig.telegram.webhookSecret !== undefined,
      version: process.env.npm_package_version ?? 'dev',
    });
  };
}
