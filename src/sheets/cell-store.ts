/**
 * Cell Store
 *
 * The spreadsheet as seen by the recorder and the budget reader: four
 * single-request operations on A1 references. GoogleSheetsCellStore maps
 * them onto spreadsheets.values.get / update and wraps every API failure
 * in a RemoteError carrying the cell reference.
 */

import { RemoteError } from '../errors.js';
import { getSheetsClient, type SheetsClient } from './sheets-client.js';
import type { CellRow } from './types.js';

export interface CellStore {
  /**
   * Literal content of a cell as formula text: '' when empty, otherwise
   * always starting with '=' (a plain value 150 reads as '=150').
   */
  readFormula(cell: string): Promise<string>;
  /** Evaluated value of a cell; null when empty */
  readValue(cell: string): Promise<unknown>;
  /** Writes a cell the way a user would type it, so '=...' becomes a formula */
  writeCell(cell: string, content: string): Promise<void>;
  /** Rows of a rectangular range; trailing empty rows are omitted by the API */
  readRange(range: string): Promise<CellRow[]>;
}

function firstCell(values: unknown[][] | null | undefined): unknown {
  const row = values?.[0];
  if (!row || row.length === 0) return null;
  return row[0] ?? null;
}

export class GoogleSheetsCellStore implements CellStore {
  constructor(
    private readonly spreadsheetId: string,
    private readonly getClient: () => SheetsClient = getSheetsClient,
  ) {}

  async readFormula(cell: string): Promise<string> {
    const value = await this.getFirstCell('readFormula', cell, 'FORMULA');
    if (value === null || value === '') return '';
    const text = String(value);
    return text.startsWith('=') ? text : `=${text}`;
  }

  async readValue(cell: string): Promise<unknown> {
    const value = await this.getFirstCell('readValue', cell, 'UNFORMATTED_VALUE');
    return value === '' ? null : value;
  }

  async writeCell(cell: string, content: string): Promise<void> {
    try {
      await this.getClient().spreadsheets.values.update({
        spreadsheetId: this.spreadsheetId,
        range: cell,
        valueInputOption: 'USER_ENTERED',
        requestBody: { values: [[content]] },
      });
    } catch (err) {
      throw new RemoteError('writeCell', cell, err);
    }
  }

  async readRange(range: string): Promise<CellRow[]> {
    try {
      const response = await this.getClient().spreadsheets.values.get({
        spreadsheetId: this.spreadsheetId,
        range,
      });
      return response.data.values ?? [];
    } catch (err) {
      throw new RemoteError('readRange', range, err);
    }
  }

  private async getFirstCell(
    operation: 'readFormula' | 'readValue',
    cell: string,
    valueRenderOption: 'FORMULA' | 'UNFORMATTED_VALUE',
  ): Promise<unknown> {
    try {
      const response = await this.getClient().spreadsheets.values.get({
        spreadsheetId: this.spreadsheetId,
        range: cell,
        valueRenderOption,
      });
      return firstCell(response.data.values);
    } catch (err) {
      throw new RemoteError(operation, cell, err);
    }
  }
}
