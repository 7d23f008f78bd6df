/**
 * Budget Reader
 *
 * Reads the evaluated remaining budget of a day from the budget column.
 */

import { ReadError } from '../errors.js';
import { assertValidLayout, dayCoordinate, toA1, type AddressingOptions } from '../sheets/addressing.js';
import type { CellStore } from '../sheets/cell-store.js';

export interface BudgetReaderDeps {
  store: CellStore;
  addressing: AddressingOptions;
}

/**
 * Converts a raw cell value to a number. Numeric strings are accepted
 * because a cell formatted as plain text still holds a usable amount.
 */
export function toBudgetNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed === '') return null;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/** Two-decimal rendering used in replies: 123.5 → "123.50" */
export function formatBudget(value: number): string {
  return value.toFixed(2);
}

export class BudgetReader {
  constructor(private readonly deps: BudgetReaderDeps) {
    assertValidLayout(deps.addressing.layout);
  }

  /**
   * @throws ReadError if the cell is empty or not numeric
   * @throws RemoteError if the Sheets call fails
   */
  async getDailyBudget(at: Date): Promise<number> {
    const cell = toA1(dayCoordinate(at, 'budget', this.deps.addressing));
    const raw = await this.deps.store.readValue(cell);

    if (raw === null || raw === undefined || raw === '') {
      throw new ReadError(cell, `Budget cell ${cell} is empty`);
    }

    const value = toBudgetNumber(raw);
    if (value === null) {
      throw new ReadError(cell, `Budget cell ${cell} does not hold a number`);
    }
    return value;
  }
}
