/**
 * Control Vocabulary
 *
 * Words the bot parses or uses to address sheets. Kept apart from the
 * display catalog in locales/*.json so editing a reply text can never
 * change which sheet tab is written or which payment token is accepted.
 */

import type { PaymentMethod } from '../sheets/types.js';
import type { Locale } from './types.js';

/** Month names as used in sheet tab titles, January first */
export const MONTH_NAMES: Readonly<Record<Locale, readonly string[]>> = {
  en: [
    'January', 'February', 'March', 'April', 'May', 'June',
    'July', 'August', 'September', 'October', 'November', 'December',
  ],
  ru: [
    'Январь', 'Февраль', 'Март', 'Апрель', 'Май', 'Июнь',
    'Июль', 'Август', 'Сентябрь', 'Октябрь', 'Ноябрь', 'Декабрь',
  ],
};

/** Payment-method tokens accepted after the amount in /add */
export const PAYMENT_TOKENS: Readonly<Record<Locale, Readonly<Record<PaymentMethod, string>>>> = {
  en: { card: 'card', cash: 'cash' },
  ru: { card: 'карта', cash: 'нал' },
};

/**
 * Returns the month name for a 1-based month number.
 */
export function monthName(locale: Locale, month: number): string {
  const name = MONTH_NAMES[locale][month - 1];
  if (name === undefined) {
    throw new RangeError(`Month out of range: ${month}`);
  }
  return name;
}

/**
 * Maps a payment token from any supported locale to its payment method.
 * Matching ignores case and surrounding whitespace.
 */
export function parsePaymentToken(token: string): PaymentMethod | undefined {
  const needle = token.trim().toLowerCase();
  for (const tokens of Object.values(PAYMENT_TOKENS)) {
    if (tokens.card === needle) return 'card';
    if (tokens.cash === needle) return 'cash';
  }
  return undefined;
}
