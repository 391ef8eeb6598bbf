import { appendFile, readFile } from 'node:fs/promises';
import { IOError, errorCode } from './errors.js';
import type { ChecksumEntry, DuplicateGroup } from './book.js';

const LINE = /^(\\?)([0-9a-fA-F]{32}) [ *](.+)$/;

function escapeName(name: string): string {
  return name.replace(/\\/g, '\\\\').replace(/\n/g, '\\n').replace(/\r/g, '\\r');
}

function unescapeName(name: string): string {
  return name.replace(/\\(\\|n|r)/g, (_, c: string) => (c === 'n' ? '\n' : c === 'r' ? '\r' : '\\'));
}

/**
 * Format an entry the way `md5sum` prints it, so `md5sum -c` can read the
 * ledger back. Names holding a backslash or a line break get md5sum's
 * leading-backslash escape form.
 */
export function formatLedgerLine(entry: ChecksumEntry): string {
  if (/[\\\n\r]/.test(entry.name)) {
    return `\\${entry.checksum}  ${escapeName(entry.name)}`;
  }
  return `${entry.checksum}  ${entry.name}`;
}

/**
 * Parse one md5sum line (text or binary mode). Returns null for anything else.
 */
export function parseLedgerLine(line: string): ChecksumEntry | null {
  const match = line.match(LINE);
  if (!match) return null;
  const [, escaped, checksum, name] = match;
  return {
    checksum: checksum.toLowerCase(),
    name: escaped ? unescapeName(name) : name,
  };
}

/**
 * Group entries by checksum. Every checksum held by more than one entry is
 * reported once, with its names in ledger order.
 */
export function findDuplicates(entries: readonly ChecksumEntry[]): DuplicateGroup[] {
  const groups = new Map<string, string[]>();
  for (const entry of entries) {
    const names = groups.get(entry.checksum);
    if (names) names.push(entry.name);
    else groups.set(entry.checksum, [entry.name]);
  }
  return [...groups]
    .filter(([, names]) => names.length > 1)
    .map(([checksum, names]) => ({ checksum, names }));
}

/**
 * Append-only ledger of book checksums, backed by an md5sum-format file.
 * There is no update or delete: an entry, once written, is the book's
 * reference checksum for good.
 */
export class ChecksumLedger {
  readonly path: string;
  private readonly all: ChecksumEntry[] = [];
  private readonly byName = new Map<string, string>();
  private readonly malformed: number[] = [];
  private needsNewline = false;

  private constructor(path: string) {
    this.path = path;
  }

  /**
   * Read the ledger at `path`, creating an empty one if it does not exist.
   */
  static async open(path: string): Promise<ChecksumLedger> {
    const ledger = new ChecksumLedger(path);
    let content: string;
    try {
      content = await readFile(path, 'utf8');
    } catch (err) {
      if (errorCode(err) !== 'ENOENT') {
        throw new IOError(path, 'Cannot read checksum ledger', err);
      }
      try {
        await appendFile(path, '');
      } catch (createErr) {
        throw new IOError(path, 'Cannot create checksum ledger', createErr);
      }
      content = '';
    }
    ledger.load(content);
    return ledger;
  }

  private load(content: string): void {
    const lines = content.split('\n');
    if (lines[lines.length - 1] === '') lines.pop();
    else this.needsNewline = true;

    lines.forEach((raw, i) => {
      // CRLF from a ledger edited on Windows
      const line = raw.endsWith('\r') ? raw.slice(0, -1) : raw;
      if (line.trim() === '') return;
      const entry = parseLedgerLine(line);
      if (entry) this.remember(entry);
      else this.malformed.push(i + 1);
    });
  }

  private remember(entry: ChecksumEntry): void {
    this.all.push(entry);
    // First entry wins; later copies only matter for duplicate detection.
    if (!this.byName.has(entry.name)) this.byName.set(entry.name, entry.checksum);
  }

  /** Exact-match lookup by ledger key. */
  contains(name: string): boolean {
    return this.byName.has(name);
  }

  /** The recorded checksum for `name`, if any. */
  lookup(name: string): string | undefined {
    return this.byName.get(name);
  }

  /**
   * Append one entry. The line is written with a single append call.
   */
  async append(name: string, checksum: string): Promise<ChecksumEntry> {
    const entry: ChecksumEntry = { name, checksum };
    const line = formatLedgerLine(entry) + '\n';
    try {
      await appendFile(this.path, this.needsNewline ? '\n' + line : line);
    } catch (err) {
      throw new IOError(this.path, 'Cannot write checksum ledger', err);
    }
    this.needsNewline = false;
    this.remember(entry);
    return entry;
  }

  entries(): readonly ChecksumEntry[] {
    return this.all;
  }

  get size(): number {
    return this.all.length;
  }

  /** 1-based line numbers that could not be parsed. */
  get malformedLines(): readonly number[] {
    return this.malformed;
  }

  duplicates(): DuplicateGroup[] {
    return findDuplicates(this.all);
  }
}
