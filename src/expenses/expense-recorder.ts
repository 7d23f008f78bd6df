/**
 * Expense Recorder
 *
 * Books one expense into the month's tab in two steps:
 *
 *   1. Append the term to the daily-total cell of the day
 *   2. Look the category up in the catalog and append the term to its cell
 *
 * Step 2 is only attempted once step 1 has been written. There is no
 * rollback: when step 2 fails (unknown category or API error) the daily
 * total keeps the new term and the category total does not get it. The
 * caller sees the error and the user can add the category amount by hand.
 *
 * Each append is a read-modify-write of one cell, run under the cell lock.
 */

import { CategoryNotFoundError } from '../errors.js';
import {
  assertValidLayout,
  categoryCoordinate,
  categoryRangeRef,
  dayCoordinate,
  toA1,
  type AddressingOptions,
} from '../sheets/addressing.js';
import { accumulate, formatTerm } from '../sheets/formula.js';
import { resolveCategory } from '../sheets/category-resolver.js';
import type { CellStore } from '../sheets/cell-store.js';
import type { CellLock } from '../sheets/cell-lock.js';
import type { PaymentMethod } from '../sheets/types.js';
import type { ExpenseEntry, RecordResult } from './types.js';

export interface ExpenseRecorderDeps {
  store: CellStore;
  lock: CellLock;
  addressing: AddressingOptions;
}

export class ExpenseRecorder {
  constructor(private readonly deps: ExpenseRecorderDeps) {
    assertValidLayout(deps.addressing.layout);
  }

  /**
   * Records an expense. Resolves once both cells are written.
   *
   * @throws InvalidInputError if the amount is not a positive number (nothing written)
   * @throws RemoteError if a Sheets call fails
   * @throws CategoryNotFoundError if the category is not in the catalog (daily total already written)
   */
  async recordExpense(entry: ExpenseEntry): Promise<RecordResult> {
    const { store, addressing } = this.deps;

    // Reject a bad amount before touching the sheet
    formatTerm(entry.amount, entry.paymentMethod);

    // 1. Daily total
    const daily = dayCoordinate(entry.at, 'dailyTotal', addressing);
    const dailyCell = toA1(daily);
    const dailyFormula = await this.appendTerm(dailyCell, entry.amount, entry.paymentMethod);

    // 2. Category total
    const catalog = await store.readRange(categoryRangeRef(daily.sheetName, addressing.layout));
    const match = resolveCategory(catalog, entry.category);
    if (!match.found) {
      console.warn('[recorder] Category not found; daily total already updated', {
        sheetName: daily.sheetName,
        dailyCell,
        catalogSize: catalog.length,
      });
      throw new CategoryNotFoundError(entry.category);
    }

    const categoryCell = toA1(categoryCoordinate(daily.sheetName, match.index, addressing.layout));
    const categoryFormula = await this.appendTerm(categoryCell, entry.amount, entry.paymentMethod);

    console.log('[recorder] Expense recorded', {
      sheetName: daily.sheetName,
      dailyCell,
      categoryCell,
      paymentMethod: entry.paymentMethod,
    });

    return { sheetName: daily.sheetName, dailyCell, dailyFormula, categoryCell, categoryFormula };
  }

  private appendTerm(cell: string, amount: number, paymentMethod: PaymentMethod): Promise<string> {
    const { store, lock } = this.deps;
    return lock.runExclusive(cell, async () => {
      const current = await store.readFormula(cell);
      const next = accumulate(current, amount, paymentMethod);
      await store.writeCell(cell, next);
      return next;
    });
  }
}
