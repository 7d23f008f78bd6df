/**
 * Sheet Type Definitions
 *
 * Shared between addressing, the formula accumulator, the cell store
 * and the expense recorder.
 */

/** How an expense was paid. Cash terms are written parenthesised. */
export type PaymentMethod = 'card' | 'cash';

export const PAYMENT_METHODS: readonly PaymentMethod[] = ['card', 'cash'];

/** Semantic columns addressed by day of month */
export type DayColumnKind = 'dailyTotal' | 'budget';

/** Every semantic column the bot writes or reads */
export type ColumnKind = DayColumnKind | 'category';

/**
 * Fixed layout of the monthly budget template.
 * Columns are A1 letters, the category range is an A1 range without a sheet name.
 */
export interface SheetLayout {
  dailyExpensesColumn: string;
  categoryRange: string;
  categoryColumn: string;
  budgetColumn: string;
  /** Added to the day of month to get the row (row 1 holds the header) */
  dayRowOffset: number;
  /** Row of the first entry of the category range */
  categoryRowOffset: number;
}

/** A concrete cell inside a month's sheet tab */
export interface SheetCoordinate {
  sheetName: string;
  column: string;
  row: number;
}

/** One row of a range as returned by the Sheets API */
export type CellRow = readonly unknown[];
