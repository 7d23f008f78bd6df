/**
 * Category Resolver
 *
 * Finds a category in the rows of the configured category range.
 * The catalog is a handful of rows, so a linear scan is all it takes.
 */

import type { CellRow } from './types.js';

export type CategoryMatch =
  | { found: true; index: number }
  | { found: false };

function normalize(value: string): string {
  return value.trim().toLowerCase();
}

function firstCellText(row: CellRow | undefined): string {
  if (!row || row.length === 0) return '';
  const cell = row[0];
  if (cell === null || cell === undefined) return '';
  return String(cell);
}

/**
 * Returns the index of the first row whose first cell equals `name`,
 * ignoring case and surrounding whitespace. Blank cells never match.
 */
export function resolveCategory(rows: readonly (CellRow | undefined)[], name: string): CategoryMatch {
  const needle = normalize(name);
  if (needle === '') return { found: false };

  for (let index = 0; index < rows.length; index++) {
    const label = normalize(firstCellText(rows[index]));
    if (label !== '' && label === needle) {
      return { found: true, index };
    }
  }
  return { found: false };
}
