/**
 * Telegram Bot API Client Tests
 *
 * fetch is stubbed globally; no request leaves the process.
 */

import { vi, describe, it, expect, beforeEach, afterEach } from 'vitest';
import { TelegramClient } from '../telegram-client.js';
import { TransportError } from '../../errors.js';

const mockFetch = vi.fn();

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function sentRequest(index = 0): { url: unknown; body: unknown } {
  const [url, init] = mockFetch.mock.calls[index];
  return { url, body: JSON.parse(String(init.body)) };
}

describe('TelegramClient', () => {
  const client = new TelegramClient('test-token', 'https://api.test');

  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('sends a plain message', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ ok: true, result: { message_id: 1 } }));

    await client.sendMessage(100, 'hi');

    expect(sentRequest()).toEqual({
      url: 'https://api.test/bottest-token/sendMessage',
      body: { chat_id: 100, text: 'hi' },
    });
    expect(mockFetch.mock.calls[0][1].method).toBe('POST');
  });

  it('renders an inline keyboard as reply markup', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ ok: true, result: {} }));

    await client.sendMessage(100, 'pick', { inlineKeyboard: [[{ text: 'A', callbackData: 'a' }]] });

    expect(sentRequest().body).toEqual({
      chat_id: 100,
      text: 'pick',
      reply_markup: { inline_keyboard: [[{ text: 'A', callback_data: 'a' }]] },
    });
  });

  it('answers callback queries', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ ok: true, result: true }));

    await client.answerCallbackQuery('cb-1');

    expect(sentRequest()).toEqual({
      url: 'https://api.test/bottest-token/answerCallbackQuery',
      body: { callback_query_id: 'cb-1' },
    });
  });

  it('registers the webhook for messages and callbacks', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ ok: true, result: true }));

    await client.setWebhook('https://bot.test/telegram/webhook', 'test-secret');

    expect(sentRequest().body).toEqual({
      url: 'https://bot.test/telegram/webhook',
      secret_token: 'test-secret',
      allowed_updates: ['message', 'callback_query'],
    });
  });

  it('throws TransportError with the API description', async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse({ ok: false, error_code: 400, description: 'Bad Request: chat not found' }, 400),
    );

    await expect(client.sendMessage(100, 'hi')).rejects.toThrow(
      'Telegram sendMessage failed (400): Bad Request: chat not found',
    );
  });

  it('throws TransportError for a body that is not JSON', async () => {
    mockFetch.mockResolvedValueOnce(new Response('<html>Bad Gateway</html>', { status: 502 }));

    await expect(client.answerCallbackQuery('cb-1')).rejects.toThrow(TransportError);
  });

  it('throws TransportError for an unexpected envelope', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ result: true }));

    await expect(client.sendMessage(100, 'hi')).rejects.toThrow(
      'Telegram sendMessage failed (200): unexpected response shape',
    );
  });
});
