/**
 * Localization Module: Public API
 */

export { loadMessages, formatMessage, MessageCatalogSchema } from './messages.js';
export type { Messages, MessageCatalog, MessageKey } from './messages.js';
export { MONTH_NAMES, PAYMENT_TOKENS, monthName, parsePaymentToken } from './vocabulary.js';
export { LOCALES, isLocale } from './types.js';
export type { Locale } from './types.js';
