import { readdir, stat } from 'node:fs/promises';
import { basename, join, resolve } from 'node:path';
import type { Stats } from 'node:fs';
import { IOError, errorCode } from './errors.js';
import { bookKey, type Book } from './book.js';

export interface WalkOptions {
  /** Root holding one directory per collection */
  bookDir: string;
  /** Repair store root; a collection with its base name is skipped */
  repairDir: string;
  /** Absolute paths never treated as books (the ledger and the log) */
  exclude?: string[];
}

/**
 * Names in a directory as a shell glob lists them: sorted, dot-files left out.
 */
async function listVisible(dirPath: string, what: string): Promise<string[]> {
  let names: string[];
  try {
    names = await readdir(dirPath);
  } catch (err) {
    throw new IOError(dirPath, `Cannot list ${what}`, err);
  }
  return names.filter(n => !n.startsWith('.')).sort();
}

/** stat() that follows links; dangling links and vanished entries give null. */
async function statOrNull(p: string): Promise<Stats | null> {
  try {
    return await stat(p);
  } catch (err) {
    const code = errorCode(err);
    if (code === 'ENOENT' || code === 'ELOOP') return null;
    throw err;
  }
}

/**
 * Collection directory names directly under the book directory.
 * Loose files at the top level and the repair directory are not collections.
 */
export async function listCollections(bookDir: string, repairDir: string): Promise<string[]> {
  const repairName = basename(repairDir);
  const collections: string[] = [];
  for (const name of await listVisible(bookDir, 'book directory')) {
    if (name === repairName) continue;
    const s = await statOrNull(join(bookDir, name));
    if (s?.isDirectory()) collections.push(name);
  }
  return collections;
}

/**
 * Lazily yield every book, collection by collection, in listing order.
 * Only regular files count; nested directories are not descended into.
 */
export async function* walkCollections(opts: WalkOptions): AsyncGenerator<Book> {
  const exclude = new Set((opts.exclude ?? []).map(p => resolve(p)));

  for (const collection of await listCollections(opts.bookDir, opts.repairDir)) {
    const collectionPath = join(opts.bookDir, collection);
    for (const name of await listVisible(collectionPath, 'collection')) {
      const path = resolve(collectionPath, name);
      if (exclude.has(path)) continue;
      const s = await statOrNull(path);
      if (!s?.isFile()) continue;
      yield { collection, name, path, key: bookKey(collection, name) };
    }
  }
}
