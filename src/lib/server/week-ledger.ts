import { mkdir, readFile, appendFile } from 'node:fs/promises';
import path from 'node:path';
import { insertProcessedWeek, listProcessedWeeks, type LedgerPipeline } from '@/server/db/queries';

/**
 * Append-only record of (year, week) units a pipeline has already published.
 * Keys are never removed, so re-running after a crash only ever re-derives.
 */
export interface WeekLedger {
  readonly name: string;
  readonly size: number;
  isProcessed(year: number, week: number): boolean;
  markProcessed(year: number, week: number): Promise<void>;
  keys(): string[];
}

export function weekKey(year: number, week: number): string {
  return `${year},${week}`;
}

const LINE_RE = /^(\d{4}),(\d{1,2})$/;

/**
 * Parse ledger text: one `year,week` per line. Blank and malformed lines are
 * ignored and duplicates collapse.
 */
export function parseLedgerText(text: string): Set<string> {
  const out = new Set<string>();
  for (const raw of text.split(/\r?\n/)) {
    const m = LINE_RE.exec(raw.trim());
    if (!m) continue;
    out.add(weekKey(Number(m[1]), Number(m[2])));
  }
  return out;
}

abstract class AppendOnlyWeekLedger implements WeekLedger {
  protected readonly processed: Set<string>;

  constructor(readonly name: string, keys: Iterable<string> = []) {
    this.processed = new Set(keys);
  }

  get size(): number {
    return this.processed.size;
  }

  isProcessed(year: number, week: number): boolean {
    return this.processed.has(weekKey(year, week));
  }

  async markProcessed(year: number, week: number): Promise<void> {
    await this.persist(year, week);
    this.processed.add(weekKey(year, week));
  }

  keys(): string[] {
    return Array.from(this.processed);
  }

  protected abstract persist(year: number, week: number): Promise<void>;
}

export class InMemoryWeekLedger extends AppendOnlyWeekLedger {
  protected async persist(): Promise<void> {
    // nothing to persist
  }
}

export class FileWeekLedger extends AppendOnlyWeekLedger {
  private constructor(name: string, readonly filePath: string, keys: Iterable<string>) {
    super(name, keys);
  }

  static async open(name: string, filePath: string): Promise<FileWeekLedger> {
    let text = '';
    try {
      text = await readFile(filePath, 'utf8');
    } catch (err: unknown) {
      if (!(err instanceof Error && 'code' in err && err.code === 'ENOENT')) throw err;
    }
    const ledger = new FileWeekLedger(name, filePath, parseLedgerText(text));
    console.log(`[week-ledger] ${name}: loaded ${ledger.size} weeks from ${filePath}`);
    return ledger;
  }

  protected async persist(year: number, week: number): Promise<void> {
    await mkdir(path.dirname(path.resolve(this.filePath)), { recursive: true });
    await appendFile(this.filePath, `${weekKey(year, week)}\n`, 'utf8');
  }
}

export class PostgresWeekLedger extends AppendOnlyWeekLedger {
  private constructor(readonly pipeline: LedgerPipeline, keys: Iterable<string>) {
    super(pipeline, keys);
  }

  static async open(pipeline: LedgerPipeline): Promise<PostgresWeekLedger> {
    const rows = await listProcessedWeeks(pipeline);
    const ledger = new PostgresWeekLedger(pipeline, rows.map((r) => weekKey(r.year, r.week)));
    console.log(`[week-ledger] ${pipeline}: loaded ${ledger.size} weeks from postgres`);
    return ledger;
  }

  protected async persist(year: number, week: number): Promise<void> {
    await insertProcessedWeek(this.pipeline, year, week);
  }
}
