export type CellValue = string | number;
export type SheetRow = CellValue[];

/**
 * How a table lands in its tab:
 * - replace: clear the tab and write header + rows
 * - append-new: append only rows whose (year, week) key is not already in the tab
 * - append: append every row
 * Each mode creates the tab (with its header) when it is missing.
 */
export type PublishMode = 'replace' | 'append-new' | 'append';

export interface SheetTable {
  header: string[];
  rows: SheetRow[];
}

/**
 * Low-level tab operations over one spreadsheet.
 */
export interface SheetClient {
  listSheets(): Promise<string[]>;
  addSheet(title: string): Promise<void>;
  readValues(title: string): Promise<SheetRow[]>;
  clearValues(title: string): Promise<void>;
  writeValues(title: string, rows: SheetRow[]): Promise<void>;
  appendValues(title: string, rows: SheetRow[]): Promise<void>;
}
