/**
 * Telegram Bot Module: Public API
 *
 * Exports the dispatcher, the webhook server and the Bot API client.
 */

export { CommandDispatcher, HELP_CALLBACKS } from './dispatcher.js';
export type { DispatcherDeps } from './dispatcher.js';
export { createApp, WEBHOOK_PATH, SECRET_HEADER } from './server.js';
export type { ServerDeps } from './server.js';
export { TelegramClient, DEFAULT_TELEGRAM_API_BASE } from './telegram-client.js';
export { InMemoryLocaleStore } from './locale-store.js';
export type { LocaleStore } from './locale-store.js';
export { parseCommand, parseAddArguments, parseAmount } from './command-parser.js';
export type { AddRequest, ParsedCommand, CommandName } from './command-parser.js';
export { TelegramUpdateSchema } from './types.js';
export type { TelegramUpdate, ChatTransport, SendOptions, InlineButton } from './types.js';
