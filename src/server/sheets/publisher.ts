import type { PublishMode, SheetClient, SheetRow, SheetTable } from './types';

export interface PublishResult {
  sheet: string;
  mode: PublishMode;
  written: number;
}

export interface SheetPublisherOptions {
  // Perform reads but only log writes
  dryRun?: boolean;
}

function rowKey(row: SheetRow): string | null {
  if (row.length < 2) return null;
  return `${String(row[0]).trim()}|${String(row[1]).trim()}`;
}

/**
 * Upsert-by-name over the tabs of one spreadsheet.
 */
export class SheetPublisher {
  private knownSheets: Set<string> | null = null;

  constructor(
    private readonly client: SheetClient,
    private readonly options: SheetPublisherOptions = {},
  ) {}

  get dryRun(): boolean {
    return this.options.dryRun === true;
  }

  async listSheets(): Promise<string[]> {
    if (!this.knownSheets) {
      this.knownSheets = new Set(await this.client.listSheets());
    }
    return Array.from(this.knownSheets);
  }

  async hasSheet(title: string): Promise<boolean> {
    const sheets = await this.listSheets();
    return sheets.includes(title);
  }

  async publish(title: string, table: SheetTable, mode: PublishMode): Promise<PublishResult> {
    const exists = await this.hasSheet(title);
    if (!exists) {
      if (this.dryRun) {
        console.log(`[sheets] (dry run) would create tab "${title}"`);
      } else {
        await this.client.addSheet(title);
        this.knownSheets?.add(title);
        console.log(`[sheets] Created tab "${title}"`);
      }
    }

    if (mode === 'replace') {
      if (this.dryRun) {
        console.log(`[sheets] (dry run) would replace "${title}" with ${table.rows.length} rows`);
      } else {
        await this.client.clearValues(title);
        await this.client.writeValues(title, [table.header, ...table.rows]);
        console.log(`[sheets] Replaced "${title}" with ${table.rows.length} rows`);
      }
      return { sheet: title, mode, written: table.rows.length };
    }

    const existing = exists ? await this.client.readValues(title) : [];
    let rows = table.rows;
    if (mode === 'append-new') {
      const seen = new Set<string>();
      for (const row of existing) {
        const key = rowKey(row);
        if (key) seen.add(key);
      }
      rows = [];
      for (const row of table.rows) {
        const key = rowKey(row);
        if (key && seen.has(key)) continue;
        if (key) seen.add(key);
        rows.push(row);
      }
    }

    if (rows.length === 0) {
      console.log(`[sheets] "${title}" is up to date`);
      return { sheet: title, mode, written: 0 };
    }

    const payload = existing.length === 0 ? [table.header, ...rows] : rows;
    if (this.dryRun) {
      console.log(`[sheets] (dry run) would append ${rows.length} rows to "${title}"`);
    } else {
      await this.client.appendValues(title, payload);
      console.log(`[sheets] Appended ${rows.length} rows to "${title}"`);
    }
    return { sheet: title, mode, written: rows.length };
  }
}
