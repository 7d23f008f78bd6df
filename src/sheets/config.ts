/**
 * Spreadsheet Configuration
 *
 * Centralizes all environment variable access for the budget spreadsheet.
 * Follows the same pattern as src/config.ts.
 *
 * Environment variables:
 * - SHEETS_SPREADSHEET_ID: Google Sheets ID of the budget spreadsheet (required)
 * - SHEETS_DAILY_EXPENSES_COLUMN: Column of the daily expense totals, e.g. I (required)
 * - SHEETS_CATEGORY_RANGE: Range of the category names, e.g. A22:A40 (required)
 * - SHEETS_CATEGORY_COLUMN: Column of the category totals, e.g. C (required)
 * - SHEETS_BUDGET_COLUMN: Column of the remaining daily budget, e.g. K (required)
 * - SHEETS_DAY_ROW_OFFSET: Added to the day of month to get the row (default: 1)
 * - SHEETS_CATEGORY_ROW_OFFSET: Row of the first category (default: first row of SHEETS_CATEGORY_RANGE)
 * - SHEET_LOCALE: Language of the month names in tab titles (default: ru)
 * - SHEETS_TIME_ZONE: IANA zone deciding "today" (default: the process time zone)
 */

import 'dotenv/config';
import { ConfigurationError } from '../errors.js';
import { isLocale, type Locale } from '../i18n/types.js';
import { layoutProblems, parseA1Range } from './addressing.js';
import type { SheetLayout } from './types.js';

export interface SheetsConfig {
  spreadsheetId: string;
  layout: SheetLayout;
  sheetLocale: Locale;
  timeZone: string;
}

type Env = Record<string, string | undefined>;

function isTimeZone(zone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: zone });
    return true;
  } catch (err) {
    if (err instanceof RangeError) return false;
    throw err;
  }
}

function parseOffset(raw: string | undefined, name: string, problems: string[]): number | undefined {
  if (raw === undefined || raw === '') return undefined;
  if (!/^\d+$/.test(raw.trim())) {
    problems.push(`${name} "${raw}" is not a whole number`);
    return undefined;
  }
  return parseInt(raw, 10);
}

/**
 * Builds the spreadsheet configuration from the environment.
 * Every problem is collected and thrown at once as a ConfigurationError.
 */
export function loadSheetsConfig(env: Env = process.env): SheetsConfig {
  const problems: string[] = [];

  const required = (key: string): string => {
    const value = env[key]?.trim();
    if (!value) {
      problems.push(`Missing required environment variable: ${key}`);
      return '';
    }
    return value;
  };

  const spreadsheetId = required('SHEETS_SPREADSHEET_ID');
  const dailyExpensesColumn = required('SHEETS_DAILY_EXPENSES_COLUMN').toUpperCase();
  const categoryRange = required('SHEETS_CATEGORY_RANGE').toUpperCase();
  const categoryColumn = required('SHEETS_CATEGORY_COLUMN').toUpperCase();
  const budgetColumn = required('SHEETS_BUDGET_COLUMN').toUpperCase();

  const dayRowOffset = parseOffset(env.SHEETS_DAY_ROW_OFFSET, 'SHEETS_DAY_ROW_OFFSET', problems) ?? 1;
  const categoryRowOffset =
    parseOffset(env.SHEETS_CATEGORY_ROW_OFFSET, 'SHEETS_CATEGORY_ROW_OFFSET', problems) ??
    parseA1Range(categoryRange)?.startRow ??
    0;

  const sheetLocaleRaw = env.SHEET_LOCALE?.trim().toLowerCase() || 'ru';
  let sheetLocale: Locale = 'ru';
  if (isLocale(sheetLocaleRaw)) {
    sheetLocale = sheetLocaleRaw;
  } else {
    problems.push(`SHEET_LOCALE "${sheetLocaleRaw}" is not one of en, ru`);
  }

  const timeZone = env.SHEETS_TIME_ZONE?.trim() || Intl.DateTimeFormat().resolvedOptions().timeZone;
  if (!isTimeZone(timeZone)) {
    problems.push(`SHEETS_TIME_ZONE "${timeZone}" is not a known time zone`);
  }

  const layout: SheetLayout = {
    dailyExpensesColumn,
    categoryRange,
    categoryColumn,
    budgetColumn,
    dayRowOffset,
    categoryRowOffset,
  };

  // Missing values are already reported above; only add format problems
  for (const problem of layoutProblems(layout)) {
    if (!problem.endsWith('is missing') && !problems.includes(problem)) {
      problems.push(problem);
    }
  }

  if (problems.length > 0) {
    throw new ConfigurationError(problems);
  }

  return { spreadsheetId, layout, sheetLocale, timeZone };
}
