/**
 * Spreadsheet Module: Public API
 *
 * Addressing, formula accumulation, category lookup and the cell store
 * used by the expense recorder and budget reader.
 */

export {
  sheetNameFor,
  dayCoordinate,
  categoryCoordinate,
  categoryRangeRef,
  toA1,
  calendarDate,
  parseA1Range,
  assertValidLayout,
} from './addressing.js';
export type { AddressingOptions, CalendarDate } from './addressing.js';
export { accumulate, formatTerm } from './formula.js';
export { resolveCategory } from './category-resolver.js';
export type { CategoryMatch } from './category-resolver.js';
export { GoogleSheetsCellStore } from './cell-store.js';
export type { CellStore } from './cell-store.js';
export { KeyedMutex } from './cell-lock.js';
export type { CellLock } from './cell-lock.js';
export { loadSheetsConfig } from './config.js';
export type { SheetsConfig } from './config.js';
export { getSheetsClient, resetSheetsClient } from './sheets-client.js';
export type { SheetsClient } from './sheets-client.js';
export type { PaymentMethod, SheetLayout, SheetCoordinate, ColumnKind, DayColumnKind, CellRow } from './types.js';
