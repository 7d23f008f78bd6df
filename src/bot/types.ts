/**
 * Telegram Type Definitions
 *
 * Only the parts of the Bot API update the dispatcher reads are validated;
 * every other field passes through untouched.
 */

import { z } from 'zod';

/** Route Telegram posts updates to */
export const WEBHOOK_PATH = '/telegram/webhook';

const UserSchema = z.object({
  id: z.number().int(),
  language_code: z.string().optional(),
}).passthrough();

const ChatSchema = z.object({
  id: z.number().int(),
}).passthrough();

export const TelegramMessageSchema = z.object({
  message_id: z.number().int(),
  from: UserSchema.optional(),
  chat: ChatSchema,
  text: z.string().optional(),
}).passthrough();

export const TelegramCallbackQuerySchema = z.object({
  id: z.string(),
  from: UserSchema,
  message: TelegramMessageSchema.optional(),
  data: z.string().optional(),
}).passthrough();

export const TelegramUpdateSchema = z.object({
  update_id: z.number().int(),
  message: TelegramMessageSchema.optional(),
  callback_query: TelegramCallbackQuerySchema.optional(),
}).passthrough();

export type TelegramMessage = z.infer<typeof TelegramMessageSchema>;
export type TelegramCallbackQuery = z.infer<typeof TelegramCallbackQuerySchema>;
export type TelegramUpdate = z.infer<typeof TelegramUpdateSchema>;

/** Envelope of every Bot API response */
export const TelegramResponseSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional(),
  error_code: z.number().optional(),
});

export interface InlineButton {
  text: string;
  callbackData: string;
}

export interface SendOptions {
  /** Rows of buttons shown under the message */
  inlineKeyboard?: InlineButton[][];
}

/** Outbound side of the chat platform */
export interface ChatTransport {
  sendMessage(chatId: number, text: string, options?: SendOptions): Promise<void>;
  answerCallbackQuery(callbackQueryId: string): Promise<void>;
}
