/**
 * Formula Accumulator
 *
 * Each expense appends one term to a cell formula: "=120.00+(400.00)+35.50".
 * Card terms are written as the plain amount, cash terms in parentheses.
 * The spreadsheet evaluates the formula; nothing here parses it back.
 */

import { InvalidInputError } from '../errors.js';
import type { PaymentMethod } from './types.js';

/** Largest amount a term can carry: twelve integer digits, two decimals */
export const MAX_AMOUNT = 999_999_999_999.99;

/**
 * Formats an amount as a formula term with exactly two decimals.
 * Amounts that round to 0.00 or exceed MAX_AMOUNT are rejected.
 */
export function formatTerm(amount: number, paymentMethod: PaymentMethod): string {
  if (!Number.isFinite(amount) || amount <= 0) {
    throw new InvalidInputError('amount', `Amount must be a positive number, got ${amount}`);
  }
  if (amount > MAX_AMOUNT) {
    throw new InvalidInputError('amount', `Amount exceeds ${MAX_AMOUNT}, got ${amount}`);
  }
  const formatted = amount.toFixed(2);
  if (formatted === '0.00') {
    throw new InvalidInputError('amount', `Amount rounds to 0.00, got ${amount}`);
  }
  return paymentMethod === 'cash' ? `(${formatted})` : formatted;
}

/**
 * Appends a new term to the current formula text.
 * Empty text starts a new formula; otherwise the term is added with "+".
 * Not idempotent: every call stands for a separate expense.
 */
export function accumulate(currentFormula: string, amount: number, paymentMethod: PaymentMethod): string {
  const term = formatTerm(amount, paymentMethod);
  if (currentFormula === '') {
    return `=${term}`;
  }
  return `${currentFormula}+${term}`;
}
