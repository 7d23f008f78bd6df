/**
 * Command Dispatcher
 *
 * Handles one Telegram update at a time:
 * - /start        → greeting
 * - /add a p c    → ExpenseRecorder, reply with the booked amount
 * - /budget       → BudgetReader, reply with today's budget to two decimals
 * - /lang en|ru   → LocaleStore
 * - /help         → language picker; the help_* callbacks send the help text
 * - other command → "unknown command"; plain text → greeting
 *
 * Every failure ends in a localized reply. Replies that Telegram rejects
 * are logged and dropped; nothing else is left to tell the user.
 */

import {
  CategoryNotFoundError,
  ExpenseBotError,
  InvalidInputError,
  type InvalidInputReason,
} from '../errors.js';
import { formatBudget } from '../expenses/budget-reader.js';
import type { ExpenseEntry, RecordResult } from '../expenses/types.js';
import { formatMessage, type MessageKey, type Messages } from '../i18n/messages.js';
import { isLocale, type Locale } from '../i18n/types.js';
import { isKnownCommand, parseAddArguments, parseCommand } from './command-parser.js';
import type { LocaleStore } from './locale-store.js';
import type {
  ChatTransport,
  InlineButton,
  SendOptions,
  TelegramCallbackQuery,
  TelegramMessage,
  TelegramUpdate,
} from './types.js';

export interface DispatcherDeps {
  recorder: { recordExpense(entry: ExpenseEntry): Promise<RecordResult> };
  budgetReader: { getDailyBudget(at: Date): Promise<number> };
  localeStore: LocaleStore;
  transport: ChatTransport;
  messages: Messages;
  defaultLocale: Locale;
  now: () => Date;
}

export const HELP_CALLBACKS: ReadonlyMap<string, Locale> = new Map<string, Locale>([
  ['help_ru', 'ru'],
  ['help_en', 'en'],
]);

const HELP_KEYBOARD: InlineButton[][] = [[
  { text: '🇷🇺 Русский', callbackData: 'help_ru' },
  { text: '🇬🇧 English', callbackData: 'help_en' },
]];

const INVALID_INPUT_MESSAGES: Record<InvalidInputReason, MessageKey> = {
  usage: 'addUsage',
  amount: 'invalidAmount',
  paymentMethod: 'invalidPaymentMethod',
};

export class CommandDispatcher {
  constructor(private readonly deps: DispatcherDeps) {}

  async handleUpdate(update: TelegramUpdate): Promise<void> {
    if (update.message) {
      await this.handleMessage(update.message);
    } else if (update.callback_query) {
      await this.handleCallbackQuery(update.callback_query);
    }
  }

  // -------------------------------------------------------------------------
  // Messages
  // -------------------------------------------------------------------------

  private async handleMessage(message: TelegramMessage): Promise<void> {
    const chatId = message.chat.id;
    const userId = message.from?.id ?? chatId;
    const locale = this.localeFor(userId);

    const command = message.text !== undefined ? parseCommand(message.text) : null;
    if (!command) {
      await this.reply(chatId, this.text(locale, 'start'));
      return;
    }

    if (!isKnownCommand(command.name)) {
      await this.reply(chatId, this.text(locale, 'unknownCommand'));
      return;
    }

    switch (command.name) {
      case 'start':
        await this.reply(chatId, this.text(locale, 'start'));
        return;
      case 'add':
        await this.handleAdd(chatId, command.args, locale);
        return;
      case 'budget':
        await this.handleBudget(chatId, locale);
        return;
      case 'lang':
        await this.handleLang(chatId, userId, command.args, locale);
        return;
      case 'help':
        await this.reply(chatId, this.text(locale, 'helpPrompt'), { inlineKeyboard: HELP_KEYBOARD });
        return;
    }
  }

  private async handleAdd(chatId: number, args: string, locale: Locale): Promise<void> {
    try {
      const request = parseAddArguments(args);
      await this.deps.recorder.recordExpense({ ...request, at: this.deps.now() });

      await this.reply(chatId, this.text(locale, 'expenseAdded', {
        amount: request.amount.toFixed(2),
        category: request.category,
        paymentMethod: this.text(locale, request.paymentMethod === 'card' ? 'paymentCard' : 'paymentCash'),
      }));
    } catch (err) {
      await this.replyWithError(chatId, locale, 'add', err);
    }
  }

  private async handleBudget(chatId: number, locale: Locale): Promise<void> {
    try {
      const budget = await this.deps.budgetReader.getDailyBudget(this.deps.now());
      await this.reply(chatId, this.text(locale, 'dailyBudget', { budget: formatBudget(budget) }));
    } catch (err) {
      await this.replyWithError(chatId, locale, 'budget', err);
    }
  }

  private async handleLang(chatId: number, userId: number, args: string, locale: Locale): Promise<void> {
    const requested = args.trim().toLowerCase();
    if (!isLocale(requested)) {
      await this.reply(chatId, this.text(locale, 'selectLanguage'));
      return;
    }

    this.deps.localeStore.set(userId, requested);
    await this.reply(chatId, this.text(requested, 'languageSet', { language: requested }));
  }

  // -------------------------------------------------------------------------
  // Callback queries
  // -------------------------------------------------------------------------

  private async handleCallbackQuery(query: TelegramCallbackQuery): Promise<void> {
    const helpLocale = query.data !== undefined ? HELP_CALLBACKS.get(query.data) : undefined;
    if (helpLocale) {
      const chatId = query.message?.chat.id ?? query.from.id;
      await this.reply(chatId, this.text(helpLocale, 'helpMessage'));
    }

    try {
      await this.deps.transport.answerCallbackQuery(query.id);
    } catch (err) {
      console.error('[dispatcher] Failed to answer callback query', {
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  private localeFor(userId: number): Locale {
    return this.deps.localeStore.get(userId) ?? this.deps.defaultLocale;
  }

  private text(locale: Locale, key: MessageKey, params?: Record<string, string | number>): string {
    return formatMessage(this.deps.messages[locale][key], params);
  }

  private async replyWithError(chatId: number, locale: Locale, command: string, err: unknown): Promise<void> {
    if (err instanceof CategoryNotFoundError) {
      await this.reply(chatId, this.text(locale, 'categoryNotFound', { category: err.category }));
      return;
    }

    if (err instanceof InvalidInputError) {
      await this.reply(chatId, this.text(locale, INVALID_INPUT_MESSAGES[err.reason]));
      return;
    }

    const detail = err instanceof Error ? err.message : String(err);
    console.error(`[dispatcher] /${command} failed`, {
      errorType: err instanceof ExpenseBotError ? err.name : 'UnexpectedError',
      error: detail,
    });
    await this.reply(chatId, this.text(locale, 'errorOccurred', { error: detail }));
  }

  private async reply(chatId: number, text: string, options?: SendOptions): Promise<void> {
    try {
      await this.deps.transport.sendMessage(chatId, text, options);
    } catch (err) {
      console.error('[dispatcher] Failed to send message', {
        chatId,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
