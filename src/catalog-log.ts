import { appendFile, readFile } from 'node:fs/promises';
import { IOError, errorCode } from './errors.js';
import type { CatalogRecord } from './book.js';

/**
 * Local calendar date as YYYY-MM-DD (what `date +%F` prints).
 */
export function formatDate(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, '0');
  const d = String(date.getDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

function escapeField(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\t/g, '\\t').replace(/\n/g, '\\n');
}

function unescapeField(value: string): string {
  return value.replace(/\\(\\|t|n)/g, (_, c: string) => (c === 't' ? '\t' : c === 'n' ? '\n' : '\\'));
}

export function formatCatalogLine(record: CatalogRecord): string {
  return [record.date, record.checksum, escapeField(record.name)].join('\t');
}

export function parseCatalogLine(line: string): CatalogRecord | null {
  const fields = line.split('\t');
  if (fields.length !== 3) return null;
  const [date, checksum, name] = fields;
  return { date, checksum, name: unescapeField(name) };
}

/**
 * Tab-delimited history of catalog events: one `date, checksum, name` line
 * per ledger entry, written right after the ledger append.
 */
export class CatalogLog {
  readonly path: string;

  constructor(path: string) {
    this.path = path;
  }

  /** Create the log file if it does not exist yet. */
  async init(): Promise<void> {
    try {
      await appendFile(this.path, '');
    } catch (err) {
      throw new IOError(this.path, 'Cannot create catalog log', err);
    }
  }

  async append(record: CatalogRecord): Promise<void> {
    try {
      await appendFile(this.path, formatCatalogLine(record) + '\n');
    } catch (err) {
      throw new IOError(this.path, 'Cannot write catalog log', err);
    }
  }

  async records(): Promise<CatalogRecord[]> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf8');
    } catch (err) {
      if (errorCode(err) === 'ENOENT') return [];
      throw new IOError(this.path, 'Cannot read catalog log', err);
    }
    const records: CatalogRecord[] = [];
    for (const line of content.split('\n')) {
      if (line === '') continue;
      const record = parseCatalogLine(line);
      if (record) records.push(record);
    }
    return records;
  }
}
