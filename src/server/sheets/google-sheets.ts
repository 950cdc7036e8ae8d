import { google, type sheets_v4 } from 'googleapis';
import type { CellValue, SheetClient, SheetRow } from './types';

export const SHEETS_SCOPE = 'https://www.googleapis.com/auth/spreadsheets';

/**
 * The slice of `sheets_v4.Sheets` the client calls.
 */
export interface SpreadsheetsApi {
  spreadsheets: {
    get(params: sheets_v4.Params$Resource$Spreadsheets$Get): Promise<{ data: sheets_v4.Schema$Spreadsheet }>;
    batchUpdate(params: sheets_v4.Params$Resource$Spreadsheets$Batchupdate): Promise<unknown>;
    values: {
      get(params: sheets_v4.Params$Resource$Spreadsheets$Values$Get): Promise<{ data: sheets_v4.Schema$ValueRange }>;
      clear(params: sheets_v4.Params$Resource$Spreadsheets$Values$Clear): Promise<unknown>;
      update(params: sheets_v4.Params$Resource$Spreadsheets$Values$Update): Promise<unknown>;
      append(params: sheets_v4.Params$Resource$Spreadsheets$Values$Append): Promise<unknown>;
    };
  };
}

// A1 notation needs single quotes around titles with spaces; embedded quotes are doubled
export function quoteTitle(title: string): string {
  return `'${title.replace(/'/g, "''")}'`;
}

function toCell(value: unknown): CellValue {
  if (typeof value === 'number') return value;
  if (value === null || value === undefined) return '';
  return String(value);
}

export class GoogleSheetsClient implements SheetClient {
  constructor(
    private readonly sheets: SpreadsheetsApi,
    private readonly spreadsheetId: string,
  ) {}

  async listSheets(): Promise<string[]> {
    const res = await this.sheets.spreadsheets.get({
      spreadsheetId: this.spreadsheetId,
      fields: 'sheets.properties.title',
    });
    return (res.data.sheets ?? [])
      .map((s) => s.properties?.title)
      .filter((t): t is string => typeof t === 'string');
  }

  async addSheet(title: string): Promise<void> {
    await this.sheets.spreadsheets.batchUpdate({
      spreadsheetId: this.spreadsheetId,
      requestBody: { requests: [{ addSheet: { properties: { title } } }] },
    });
  }

  async readValues(title: string): Promise<SheetRow[]> {
    const res = await this.sheets.spreadsheets.values.get({
      spreadsheetId: this.spreadsheetId,
      range: quoteTitle(title),
    });
    const values: unknown[][] = res.data.values ?? [];
    return values.map((row) => row.map(toCell));
  }

  async clearValues(title: string): Promise<void> {
    await this.sheets.spreadsheets.values.clear({
      spreadsheetId: this.spreadsheetId,
      range: quoteTitle(title),
    });
  }

  async writeValues(title: string, rows: SheetRow[]): Promise<void> {
    await this.sheets.spreadsheets.values.update({
      spreadsheetId: this.spreadsheetId,
      range: `${quoteTitle(title)}!A1`,
      valueInputOption: 'RAW',
      requestBody: { values: rows },
    });
  }

  async appendValues(title: string, rows: SheetRow[]): Promise<void> {
    await this.sheets.spreadsheets.values.append({
      spreadsheetId: this.spreadsheetId,
      range: `${quoteTitle(title)}!A1`,
      valueInputOption: 'RAW',
      insertDataOption: 'INSERT_ROWS',
      requestBody: { values: rows },
    });
  }
}

/**
 * Authorize with a service-account key file and bind to one spreadsheet.
 */
export function createGoogleSheetsClient(params: { spreadsheetId: string; keyFile: string }): GoogleSheetsClient {
  const auth = new google.auth.GoogleAuth({ keyFile: params.keyFile, scopes: [SHEETS_SCOPE] });
  const sheets = google.sheets({ version: 'v4', auth });
  return new GoogleSheetsClient(sheets, params.spreadsheetId);
}
