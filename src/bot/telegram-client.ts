/**
 * Telegram Bot API Client
 *
 * Thin fetch wrapper for the three Bot API methods the bot calls.
 * The token is part of the request URL, so URLs are never logged.
 */

import { TransportError } from '../errors.js';
import { TelegramResponseSchema, type ChatTransport, type SendOptions } from './types.js';

export const DEFAULT_TELEGRAM_API_BASE = 'https://api.telegram.org';

export class TelegramClient implements ChatTransport {
  constructor(
    private readonly botToken: string,
    private readonly apiBase: string = DEFAULT_TELEGRAM_API_BASE,
  ) {}

  async sendMessage(chatId: number, text: string, options: SendOptions = {}): Promise<void> {
    const replyMarkup = options.inlineKeyboard
      ? {
          inline_keyboard: options.inlineKeyboard.map(row =>
            row.map(button => ({ text: button.text, callback_data: button.callbackData })),
          ),
        }
      : undefined;

    await this.call('sendMessage', { chat_id: chatId, text, reply_markup: replyMarkup });
  }

  async answerCallbackQuery(callbackQueryId: string): Promise<void> {
    await this.call('answerCallbackQuery', { callback_query_id: callbackQueryId });
  }

  /**
   * Points Telegram at the webhook endpoint. With a secret, Telegram sends it
   * back in X-Telegram-Bot-Api-Secret-Token on every update.
   */
  async setWebhook(url: string, secretToken?: string): Promise<void> {
    await this.call('setWebhook', {
      url,
      secret_token: secretToken,
      allowed_updates: ['message', 'callback_query'],
    });
  }

  private async call(method: string, body: Record<string, unknown>): Promise<unknown> {
    const response = await fetch(`${this.apiBase}/bot${this.botToken}/${method}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (err) {
      throw new TransportError(
        method,
        response.status,
        `unreadable response: ${err instanceof Error ? err.message : String(err)}`,
      );
    }

    const parsed = TelegramResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new TransportError(method, response.status, 'unexpected response shape');
    }
    if (!response.ok || !parsed.data.ok) {
      throw new TransportError(method, response.status, parsed.data.description ?? 'no description');
    }
    return parsed.data.result;
  }
}
