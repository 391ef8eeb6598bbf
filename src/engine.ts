import { stat } from 'node:fs/promises';
import { md5File } from './checksum.js';
import { ChecksumLedger } from './ledger.js';
import { CatalogLog, formatDate } from './catalog-log.js';
import { RepairStore } from './repair-store.js';
import { Verifier } from './verifier.js';
import { walkCollections } from './collections.js';
import {
  ArmorError,
  BookReadError,
  ChecksumMismatchError,
  ContainerStructureError,
  IOError,
  RepairCreationError,
  errorCode,
} from './errors.js';
import type { ArmorConfig } from './config.js';
import type { ParityTool } from './parity.js';
import type { Book, DuplicateGroup, RepairSet } from './book.js';

/**
 * Progress and outcomes, emitted as they happen.
 */
export type ArmorEvent =
  | { kind: 'cataloging'; book: Book }
  | { kind: 'cataloged'; book: Book; checksum: string }
  | { kind: 'protecting'; book: Book }
  | { kind: 'protected'; book: Book; set: RepairSet }
  | { kind: 'protect-failed'; book: Book; reason: string }
  | { kind: 'verifying'; book: Book }
  | { kind: 'verified'; book: Book; checksum: string }
  | { kind: 'mismatch'; book: Book; expected: string; actual: string }
  | { kind: 'structure-passed'; book: Book; entries: number }
  | { kind: 'structure-skipped'; book: Book; reason: string }
  | { kind: 'structure-failed'; book: Book; reason: string }
  | { kind: 'read-failed'; book: Book; reason: string };

export interface ArmorReport {
  cataloged: string[];
  verified: string[];
  mismatches: Array<{ name: string; expected: string; actual: string }>;
  structureFailures: Array<{ name: string; reason: string }>;
  protectFailures: Array<{ name: string; reason: string }>;
  /** Books that vanished or could not be read mid-run */
  readFailures: Array<{ name: string; reason: string }>;
  duplicates: DuplicateGroup[];
  /** Stopped at a book boundary before the walk finished */
  interrupted: boolean;
}

export interface ArmorEngineDeps {
  ledger: ChecksumLedger;
  log: CatalogLog;
  repairStore: RepairStore;
  verifier?: Verifier;
  onEvent?: (event: ArmorEvent) => void;
  /** Clock for catalog dates */
  now?: () => Date;
}

export function emptyReport(): ArmorReport {
  return {
    cataloged: [],
    verified: [],
    mismatches: [],
    structureFailures: [],
    protectFailures: [],
    readFailures: [],
    duplicates: [],
    interrupted: false,
  };
}

/**
 * Walks the collections and, per book, either catalogs and protects it
 * (first sighting) or re-verifies it against the ledger. Books are handled
 * one at a time; a run finishes with duplicate detection over the ledger.
 */
export class ArmorEngine {
  readonly config: ArmorConfig;
  readonly ledger: ChecksumLedger;
  private readonly log: CatalogLog;
  private readonly repairStore: RepairStore;
  private readonly verifier: Verifier;
  private readonly emit: (event: ArmorEvent) => void;
  private readonly now: () => Date;

  constructor(config: ArmorConfig, deps: ArmorEngineDeps) {
    this.config = config;
    this.ledger = deps.ledger;
    this.log = deps.log;
    this.repairStore = deps.repairStore;
    this.verifier = deps.verifier ?? new Verifier();
    this.emit = deps.onEvent ?? (() => {});
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Check the book directory, then open (or create) the ledger, the log and
   * the repair directory.
   */
  static async open(
    config: ArmorConfig,
    parity: ParityTool,
    opts: Pick<ArmorEngineDeps, 'verifier' | 'onEvent' | 'now'> = {},
  ): Promise<ArmorEngine> {
    let isDir = false;
    try {
      isDir = (await stat(config.bookDir)).isDirectory();
    } catch (err) {
      throw new IOError(config.bookDir, 'Book directory not found', err);
    }
    if (!isDir) throw new IOError(config.bookDir, 'Book directory is not a directory');

    const ledger = await ChecksumLedger.open(config.index);
    const log = new CatalogLog(config.csv);
    await log.init();
    const repairStore = new RepairStore(config.repair, parity);
    await repairStore.init();

    return new ArmorEngine(config, { ...opts, ledger, log, repairStore });
  }

  /**
   * Process every book. `signal` is honoured between books only.
   */
  async run(signal?: AbortSignal): Promise<ArmorReport> {
    const report = emptyReport();
    const books = walkCollections({
      bookDir: this.config.bookDir,
      repairDir: this.config.repair,
      exclude: [this.config.index, this.config.csv],
    });

    for await (const book of books) {
      if (signal?.aborted) {
        report.interrupted = true;
        break;
      }
      await this.processBook(book, report);
    }

    report.duplicates = this.ledger.duplicates();
    return report;
  }

  /**
   * Catalog or verify one book. A book that cannot be read is an outcome like
   * any other failure; ledger, log and repair-store errors stay fatal.
   */
  async processBook(book: Book, report: ArmorReport): Promise<void> {
    try {
      const expected = this.ledger.lookup(book.key);
      if (expected === undefined) {
        await this.catalog(book, report);
      } else {
        await this.verify(book, expected, report);
      }
    } catch (err) {
      if (err instanceof ArmorError || errorCode(err) === undefined) throw err;
      const failure = new BookReadError(book.key, err);
      if (this.config.failFast) throw failure;
      report.readFailures.push({ name: book.key, reason: failure.message });
      this.emit({ kind: 'read-failed', book, reason: failure.message });
    }
  }

  private async catalog(book: Book, report: ArmorReport): Promise<void> {
    this.emit({ kind: 'cataloging', book });

    // A broken container is not cataloged; the next run tries again.
    if (!(await this.checkStructure(book, report))) return;

    const checksum = await md5File(book.path);
    await this.ledger.append(book.key, checksum);
    await this.log.append({ date: formatDate(this.now()), checksum, name: book.key });
    report.cataloged.push(book.key);
    this.emit({ kind: 'cataloged', book, checksum });

    this.emit({ kind: 'protecting', book });
    try {
      const set = await this.repairStore.protect(book, this.config.redundancy);
      this.emit({ kind: 'protected', book, set });
    } catch (err) {
      if (!(err instanceof RepairCreationError) || this.config.failFast) throw err;
      const reason = err.message;
      report.protectFailures.push({ name: book.key, reason });
      this.emit({ kind: 'protect-failed', book, reason });
    }
  }

  private async verify(book: Book, expected: string, report: ArmorReport): Promise<void> {
    this.emit({ kind: 'verifying', book });

    const result = await this.verifier.verifyChecksum(book, expected);
    if (result.ok) {
      report.verified.push(book.key);
      this.emit({ kind: 'verified', book, checksum: result.checksum });
    } else {
      if (this.config.failFast) {
        throw new ChecksumMismatchError(book.key, result.expected, result.actual);
      }
      report.mismatches.push({ name: book.key, expected: result.expected, actual: result.actual });
      this.emit({ kind: 'mismatch', book, expected: result.expected, actual: result.actual });
    }

    await this.checkStructure(book, report);
  }

  /** False when the book is a ZIP container that fails its test. */
  private async checkStructure(book: Book, report: ArmorReport): Promise<boolean> {
    const result = await this.verifier.verifyContainerStructure(book);
    if (result.status === 'skipped') {
      if (result.reason !== undefined) this.emit({ kind: 'structure-skipped', book, reason: result.reason });
      return true;
    }
    if (result.status === 'passed') {
      this.emit({ kind: 'structure-passed', book, entries: result.entries });
      return true;
    }
    if (this.config.failFast) throw new ContainerStructureError(book.key, result.reason);
    report.structureFailures.push({ name: book.key, reason: result.reason });
    this.emit({ kind: 'structure-failed', book, reason: result.reason });
    return false;
  }
}
