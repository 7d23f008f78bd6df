/**
 * Expense Type Definitions
 */

import type { PaymentMethod } from '../sheets/types.js';

/**
 * One expense as typed by the user. Never stored as a record of its own;
 * it only ever becomes a term in the daily-total and category formulas.
 */
export interface ExpenseEntry {
  amount: number;
  paymentMethod: PaymentMethod;
  category: string;
  /** Moment the expense is booked under; decides the tab and the day row */
  at: Date;
}

/** Cells and formulas written by one successful recordExpense call */
export interface RecordResult {
  sheetName: string;
  dailyCell: string;
  dailyFormula: string;
  categoryCell: string;
  categoryFormula: string;
}
