/**
 * Sheet Addressing
 *
 * Pure functions mapping a date and a semantic column to a quoted A1
 * reference inside the month's sheet tab, e.g. 'Октябрь 2026'!I20.
 *
 * Layout of the budget template:
 * - one tab per month, titled "{month name} {year}"
 * - daily total and budget rows: day of month + dayRowOffset (row 1 is the header)
 * - category rows: categoryRowOffset + index within the category range
 *
 * The tab title uses the configured sheet locale, never the acting user's
 * reply language, so every user writes to the same tab.
 */

import { ConfigurationError } from '../errors.js';
import { monthName } from '../i18n/vocabulary.js';
import type { Locale } from '../i18n/types.js';
import type { DayColumnKind, SheetCoordinate, SheetLayout } from './types.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AddressingOptions {
  layout: SheetLayout;
  /** Locale of the month names in the tab titles */
  sheetLocale: Locale;
  /** IANA zone in which "today" is decided */
  timeZone: string;
}

export interface CalendarDate {
  year: number;
  /** 1-based */
  month: number;
  day: number;
}

export interface A1Range {
  startColumn: string;
  startRow: number;
  endColumn: string;
  endRow: number;
}

// ---------------------------------------------------------------------------
// A1 Validation
// ---------------------------------------------------------------------------

const COLUMN_PATTERN = /^[A-Z]{1,3}$/;
const RANGE_PATTERN = /^([A-Z]{1,3})(\d+)(?::([A-Z]{1,3})(\d+))?$/;

export function isColumn(value: string): boolean {
  return COLUMN_PATTERN.test(value);
}

/**
 * Parses "A22:A40" (or a single cell "A22") into its corners.
 * Returns null for anything else, including ranges that run backwards.
 */
export function parseA1Range(range: string): A1Range | null {
  const match = RANGE_PATTERN.exec(range.trim().toUpperCase());
  if (!match) return null;

  const startColumn = match[1];
  const startRow = parseInt(match[2], 10);
  const endColumn = match[3] ?? startColumn;
  const endRow = match[4] !== undefined ? parseInt(match[4], 10) : startRow;

  if (startRow < 1 || endRow < startRow) return null;
  return { startColumn, startRow, endColumn, endRow };
}

/**
 * Collects every problem with a layout. Empty when the layout is usable.
 */
export function layoutProblems(layout: SheetLayout): string[] {
  const problems: string[] = [];

  const columns: Array<[keyof SheetLayout, string]> = [
    ['dailyExpensesColumn', layout.dailyExpensesColumn],
    ['categoryColumn', layout.categoryColumn],
    ['budgetColumn', layout.budgetColumn],
  ];
  for (const [name, value] of columns) {
    if (!value) {
      problems.push(`${name} is missing`);
    } else if (!isColumn(value)) {
      problems.push(`${name} "${value}" is not a column letter`);
    }
  }

  if (!layout.categoryRange) {
    problems.push('categoryRange is missing');
  } else if (!parseA1Range(layout.categoryRange)) {
    problems.push(`categoryRange "${layout.categoryRange}" is not an A1 range`);
  }

  if (!Number.isInteger(layout.dayRowOffset) || layout.dayRowOffset < 0) {
    problems.push(`dayRowOffset ${layout.dayRowOffset} must be a non-negative integer`);
  }
  if (!Number.isInteger(layout.categoryRowOffset) || layout.categoryRowOffset < 1) {
    problems.push(`categoryRowOffset ${layout.categoryRowOffset} must be a positive integer`);
  }

  return problems;
}

export function assertValidLayout(layout: SheetLayout): void {
  const problems = layoutProblems(layout);
  if (problems.length > 0) {
    throw new ConfigurationError(problems);
  }
}

// ---------------------------------------------------------------------------
// Dates & Tab Names
// ---------------------------------------------------------------------------

/**
 * Year, month and day of `at` as seen on a wall clock in `timeZone`.
 */
export function calendarDate(at: Date, timeZone: string): CalendarDate {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: 'numeric',
    day: 'numeric',
  }).formatToParts(at);

  const pick = (type: Intl.DateTimeFormatPartTypes): number => {
    const part = parts.find(p => p.type === type);
    if (!part) throw new RangeError(`Could not read ${type} of ${at.toISOString()} in ${timeZone}`);
    return parseInt(part.value, 10);
  };

  return { year: pick('year'), month: pick('month'), day: pick('day') };
}

export function sheetNameFor(at: Date, options: Pick<AddressingOptions, 'sheetLocale' | 'timeZone'>): string {
  const { year, month } = calendarDate(at, options.timeZone);
  return `${monthName(options.sheetLocale, month)} ${year}`;
}

/**
 * Escapes tab names for use in A1 notation.
 * The surrounding quotes are added by the caller; this doubles internal quotes.
 */
export function escapeTabName(name: string): string {
  return name.replace(/'/g, "''");
}

export function toA1(coordinate: SheetCoordinate): string {
  return `'${escapeTabName(coordinate.sheetName)}'!${coordinate.column}${coordinate.row}`;
}

// ---------------------------------------------------------------------------
// Cell Coordinates
// ---------------------------------------------------------------------------

function requireColumn(name: string, value: string): string {
  if (!value || !isColumn(value)) {
    throw new ConfigurationError([`${name} "${value}" is not a column letter`]);
  }
  return value;
}

/**
 * Cell holding the daily total or the budget for the day of `at`.
 * Only the calendar day matters; the time of day never moves the row.
 */
export function dayCoordinate(at: Date, kind: DayColumnKind, options: AddressingOptions): SheetCoordinate {
  const { layout } = options;
  const column = kind === 'dailyTotal'
    ? requireColumn('dailyExpensesColumn', layout.dailyExpensesColumn)
    : requireColumn('budgetColumn', layout.budgetColumn);

  const { day } = calendarDate(at, options.timeZone);
  return {
    sheetName: sheetNameFor(at, options),
    column,
    row: day + layout.dayRowOffset,
  };
}

/** Cell holding the running total of the category at `index` in the catalog. */
export function categoryCoordinate(sheetName: string, index: number, layout: SheetLayout): SheetCoordinate {
  return {
    sheetName,
    column: requireColumn('categoryColumn', layout.categoryColumn),
    row: layout.categoryRowOffset + index,
  };
}

/** Quoted A1 reference of the category catalog on the given tab. */
export function categoryRangeRef(sheetName: string, layout: SheetLayout): string {
  if (!parseA1Range(layout.categoryRange)) {
    throw new ConfigurationError([`categoryRange "${layout.categoryRange}" is not an A1 range`]);
  }
  return `'${escapeTabName(sheetName)}'!${layout.categoryRange.trim().toUpperCase()}`;
}
