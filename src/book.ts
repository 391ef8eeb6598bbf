/**
 * A file under BOOK_DIR/<collection>/ whose integrity is tracked.
 */
export interface Book {
  /** Collection directory name (one level below BOOK_DIR) */
  collection: string;
  /** Base file name, unique only within its collection */
  name: string;
  /** Absolute path to the file */
  path: string;
  /** Ledger key: `<collection>/<name>` */
  key: string;
}

/** One line of the checksum ledger. */
export interface ChecksumEntry {
  name: string;
  /** MD5 hex digest */
  checksum: string;
}

/** One line of the catalog log. */
export interface CatalogRecord {
  /** Local date, YYYY-MM-DD */
  date: string;
  checksum: string;
  name: string;
}

/** Recovery data for one book, kept under the repair directory. */
export interface RepairSet {
  /** Ledger key of the protected book */
  name: string;
  /** Directory holding the link and the artifacts */
  directory: string;
  /** Symbolic link pointing at the book's absolute path */
  link: string;
  /** Recovery files, absolute paths */
  artifacts: string[];
}

/** Ledger entries sharing one checksum. */
export interface DuplicateGroup {
  checksum: string;
  names: string[];
}

export function bookKey(collection: string, name: string): string {
  return `${collection}/${name}`;
}

/**
 * Split a ledger key into collection and file name.
 * Collection names never contain a separator, so the first `/` splits.
 */
export function splitBookKey(key: string): { collection: string; name: string } {
  const idx = key.indexOf('/');
  if (idx <= 0 || idx === key.length - 1) {
    throw new Error(`Not a collection-qualified book name: ${key}`);
  }
  return { collection: key.slice(0, idx), name: key.slice(idx + 1) };
}
