/**
 * Command Parser
 *
 * Turns "/add@SomeBot 250,50 card Food court" into structured requests.
 * Parsing never touches the spreadsheet, so a rejected command has no effect.
 */

import { InvalidInputError } from '../errors.js';
import { parsePaymentToken } from '../i18n/vocabulary.js';
import type { PaymentMethod } from '../sheets/types.js';

export type CommandName = 'start' | 'add' | 'budget' | 'lang' | 'help';

export interface ParsedCommand {
  /** Lower-cased command without the slash or @mention */
  name: string;
  /** Everything after the command, trimmed */
  args: string;
}

export interface AddRequest {
  amount: number;
  paymentMethod: PaymentMethod;
  category: string;
}

const COMMAND_PATTERN = /^\/([A-Za-z0-9_]+)(?:@\w+)?(?:\s+([\s\S]*))?$/;
/** Up to twelve integer digits and at most two decimals */
const AMOUNT_PATTERN = /^\d{1,12}(?:[.,]\d{1,2})?$/;

export const KNOWN_COMMANDS: ReadonlySet<string> = new Set<string>(['start', 'add', 'budget', 'lang', 'help']);

export function isKnownCommand(name: string): name is CommandName {
  return KNOWN_COMMANDS.has(name);
}

/**
 * Returns null for text that is not a bot command.
 */
export function parseCommand(text: string): ParsedCommand | null {
  const match = COMMAND_PATTERN.exec(text.trim());
  if (!match) return null;
  return {
    name: match[1].toLowerCase(),
    args: (match[2] ?? '').trim(),
  };
}

/**
 * Parses a positive decimal amount. Accepts "250", "99.9" and "99,9".
 * Rejects values that would not survive as a two-decimal formula term.
 */
export function parseAmount(raw: string): number {
  const value = raw.trim();
  if (!AMOUNT_PATTERN.test(value)) {
    throw new InvalidInputError('amount', `Invalid amount: ${raw}`);
  }
  const amount = Number(value.replace(',', '.'));
  if (!Number.isFinite(amount) || amount <= 0 || amount.toFixed(2) === '0.00') {
    throw new InvalidInputError('amount', `Amount must be positive: ${raw}`);
  }
  return amount;
}

/**
 * Parses the arguments of /add: <amount> <payment token> <category words...>.
 * The category may contain spaces.
 */
export function parseAddArguments(args: string): AddRequest {
  const fields = args.split(/\s+/).filter(field => field !== '');
  if (fields.length < 3) {
    throw new InvalidInputError('usage', 'Expected <amount> <payment method> <category>');
  }

  const [amountField, tokenField, ...categoryFields] = fields;
  const amount = parseAmount(amountField);

  const paymentMethod = parsePaymentToken(tokenField);
  if (!paymentMethod) {
    throw new InvalidInputError('paymentMethod', `Unknown payment method: ${tokenField}`);
  }

  return { amount, paymentMethod, category: categoryFields.join(' ') };
}
