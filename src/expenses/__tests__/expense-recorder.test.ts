/**
 * Expense Recorder Tests
 *
 * Runs against an in-memory cell store; verifies cell addressing, formula
 * accumulation, step ordering and the no-rollback behaviour.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ExpenseRecorder } from '../expense-recorder.js';
import { KeyedMutex, type CellLock } from '../../sheets/cell-lock.js';
import type { AddressingOptions } from '../../sheets/addressing.js';
import { CategoryNotFoundError, ConfigurationError, InvalidInputError, RemoteError } from '../../errors.js';
import { FakeCellStore } from './fake-cell-store.js';

// ============================================================================
// Fixtures
// ============================================================================

const addressing: AddressingOptions = {
  layout: {
    dailyExpensesColumn: 'I',
    categoryRange: 'A22:A23',
    categoryColumn: 'C',
    budgetColumn: 'K',
    dayRowOffset: 1,
    categoryRowOffset: 22,
  },
  sheetLocale: 'en',
  timeZone: 'UTC',
};

const AT = new Date('2026-10-19T09:30:00Z');
const DAILY = "'October 2026'!I20";
const RANGE = "'October 2026'!A22:A23";
const FOOD = "'October 2026'!C22";
const TRANSPORT = "'October 2026'!C23";

const unlocked: CellLock = { runExclusive: (_cell, task) => task() };

describe('ExpenseRecorder', () => {
  let store: FakeCellStore;
  let recorder: ExpenseRecorder;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    store = new FakeCellStore();
    store.ranges.set(RANGE, [['Food'], ['Transport']]);
    recorder = new ExpenseRecorder({ store, lock: new KeyedMutex(), addressing });
  });

  it('starts new formulas in empty cells', async () => {
    const result = await recorder.recordExpense({ amount: 250, paymentMethod: 'card', category: 'Food', at: AT });

    expect(result).toEqual({
      sheetName: 'October 2026',
      dailyCell: DAILY,
      dailyFormula: '=250.00',
      categoryCell: FOOD,
      categoryFormula: '=250.00',
    });
    expect(store.formulas.get(DAILY)).toBe('=250.00');
    expect(store.formulas.get(FOOD)).toBe('=250.00');
  });

  it('appends to existing formulas', async () => {
    store.formulas.set(DAILY, '=100.00');
    store.formulas.set(TRANSPORT, '=(20.00)');

    await recorder.recordExpense({ amount: 400, paymentMethod: 'cash', category: ' transport ', at: AT });

    expect(store.formulas.get(DAILY)).toBe('=100.00+(400.00)');
    expect(store.formulas.get(TRANSPORT)).toBe('=(20.00)+(400.00)');
    expect(store.formulas.has(FOOD)).toBe(false);
  });

  it('writes the daily total before touching the category', async () => {
    await recorder.recordExpense({ amount: 12.5, paymentMethod: 'card', category: 'Food', at: AT });

    expect(store.calls).toEqual([
      `readFormula ${DAILY}`,
      `writeCell ${DAILY}`,
      `readRange ${RANGE}`,
      `readFormula ${FOOD}`,
      `writeCell ${FOOD}`,
    ]);
  });

  it('keeps the daily total when the category is unknown', async () => {
    const error = await recorder
      .recordExpense({ amount: 400, paymentMethod: 'cash', category: 'home', at: AT })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(CategoryNotFoundError);
    expect(error instanceof CategoryNotFoundError && error.category).toBe('home');
    expect(store.formulas.get(DAILY)).toBe('=(400.00)');
    expect(store.writes()).toEqual([`writeCell ${DAILY}`]);
  });

  it('never reaches the category when the daily write fails', async () => {
    store.failingWrites.add(DAILY);

    await expect(
      recorder.recordExpense({ amount: 10, paymentMethod: 'card', category: 'Food', at: AT }),
    ).rejects.toThrow(RemoteError);

    expect(store.calls).toEqual([`readFormula ${DAILY}`, `writeCell ${DAILY}`]);
  });

  it('leaves the daily total written when the category write fails', async () => {
    store.failingWrites.add(FOOD);

    await expect(
      recorder.recordExpense({ amount: 10, paymentMethod: 'card', category: 'Food', at: AT }),
    ).rejects.toThrow(RemoteError);

    expect(store.formulas.get(DAILY)).toBe('=10.00');
    expect(store.formulas.has(FOOD)).toBe(false);
  });

  it('rejects a non-positive amount before any call', async () => {
    await expect(
      recorder.recordExpense({ amount: 0, paymentMethod: 'card', category: 'Food', at: AT }),
    ).rejects.toThrow(InvalidInputError);
    expect(store.calls).toEqual([]);
  });

  it('refuses a malformed layout', () => {
    const broken: AddressingOptions = { ...addressing, layout: { ...addressing.layout, budgetColumn: '' } };
    expect(() => new ExpenseRecorder({ store, lock: new KeyedMutex(), addressing: broken })).toThrow(ConfigurationError);
  });

  describe('concurrent appends to the same cell', () => {
    it('keeps both terms under the cell lock', async () => {
      await Promise.all([
        recorder.recordExpense({ amount: 10, paymentMethod: 'card', category: 'Food', at: AT }),
        recorder.recordExpense({ amount: 20, paymentMethod: 'card', category: 'Food', at: AT }),
      ]);

      expect(store.formulas.get(DAILY)).toBe('=10.00+20.00');
      expect(['=10.00+20.00', '=20.00+10.00']).toContain(store.formulas.get(FOOD));
    });

    it('loses a term without a lock', async () => {
      const racy = new ExpenseRecorder({ store, lock: unlocked, addressing });

      await Promise.all([
        racy.recordExpense({ amount: 10, paymentMethod: 'card', category: 'Food', at: AT }),
        racy.recordExpense({ amount: 20, paymentMethod: 'card', category: 'Food', at: AT }),
      ]);

      expect(store.formulas.get(DAILY)).toBe('=20.00');
    });
  });
});
