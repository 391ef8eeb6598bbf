import { lstat, mkdir, readdir, rename, rm, stat, symlink } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { IOError, RepairCreationError, errorCode, errorMessage } from './errors.js';
import { splitBookKey, type Book, type RepairSet } from './book.js';
import type { ParityTool } from './parity.js';

/**
 * Pick the first free numbered backup name, `file.~N~`.
 */
export function backupName(fileName: string, taken: ReadonlySet<string>): string {
  for (let n = 1; ; n++) {
    const candidate = `${fileName}.~${n}~`;
    if (!taken.has(candidate)) return candidate;
  }
}

/**
 * Per-book recovery data.
 *
 * Layout: `<root>/<collection>/<name>` is a symbolic link to the book's
 * absolute path, and the parity tool's files sit next to it. The parity
 * tool always runs inside `<root>/<collection>`, so the link is how it
 * finds the book.
 */
export class RepairStore {
  readonly root: string;
  private readonly parity: ParityTool;

  constructor(root: string, parity: ParityTool) {
    this.root = root;
    this.parity = parity;
  }

  async init(): Promise<void> {
    try {
      await mkdir(this.root, { recursive: true });
    } catch (err) {
      throw new IOError(this.root, 'Cannot create repair directory', err);
    }
  }

  private directoryFor(collection: string): string {
    return join(this.root, collection);
  }

  private async artifactsIn(dir: string, target: string): Promise<string[]> {
    const names = await readdir(dir);
    return names.filter(n => this.parity.isArtifact(target, n)).sort().map(n => join(dir, n));
  }

  /**
   * Move aside whatever an earlier attempt left for this book.
   */
  private async clearPrevious(dir: string, book: Book): Promise<void> {
    const names = await readdir(dir);
    const taken = new Set(names);
    for (const n of names) {
      if (!this.parity.isArtifact(book.name, n)) continue;
      const backup = backupName(n, taken);
      taken.add(backup);
      await rename(join(dir, n), join(dir, backup));
    }

    const link = join(dir, book.name);
    try {
      const s = await lstat(link);
      if (s.isSymbolicLink()) await rm(link);
      else await rename(link, join(dir, backupName(book.name, taken)));
    } catch (err) {
      if (errorCode(err) !== 'ENOENT') throw err;
    }
  }

  /**
   * Generate recovery data for `book` and prove it verifies before
   * returning. On any failure the partial set is removed and
   * RepairCreationError is thrown.
   */
  async protect(book: Book, redundancy: number): Promise<RepairSet> {
    const dir = this.directoryFor(book.collection);
    const link = join(dir, book.name);

    try {
      await mkdir(dir, { recursive: true });
      await this.clearPrevious(dir, book);
      await symlink(resolve(book.path), link);
    } catch (err) {
      throw new RepairCreationError(book.key, `cannot prepare ${dir}: ${errorMessage(err)}`, err);
    }

    const fail = async (reason: string, cause?: unknown): Promise<never> => {
      const leftovers = [link, ...(await this.artifactsIn(dir, book.name).catch(() => []))];
      const results = await Promise.allSettled(leftovers.map(p => rm(p, { force: true })));
      const failed = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
      const note = failed.length > 0 ? ` (cleanup failed: ${errorMessage(failed[0].reason)})` : '';
      throw new RepairCreationError(book.key, reason + note, cause);
    };

    try {
      await this.parity.create({ cwd: dir, target: book.name, redundancy });
    } catch (err) {
      return fail(errorMessage(err), err);
    }

    const artifacts = await this.artifactsIn(dir, book.name);
    if (artifacts.length === 0) return fail('no recovery files were produced');

    let recoverable: boolean;
    try {
      recoverable = await this.verify(book.key);
    } catch (err) {
      return fail(errorMessage(err), err);
    }
    if (!recoverable) return fail('recovery data failed self-verification');

    return { name: book.key, directory: dir, link, artifacts };
  }

  /**
   * Check that the stored recovery data still validates the book.
   * A missing set or a link whose target is gone reports false.
   */
  async verify(name: string): Promise<boolean> {
    const { collection, name: target } = splitBookKey(name);
    const dir = this.directoryFor(collection);
    try {
      await stat(join(dir, target));
    } catch (err) {
      const code = errorCode(err);
      if (code === 'ENOENT' || code === 'ENOTDIR') return false;
      throw err;
    }
    return this.parity.verify({ cwd: dir, target });
  }
}
