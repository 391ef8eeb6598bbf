/**
 * Error taxonomy for an armor run.
 *
 * IOError is always fatal. The per-book errors are only thrown in fail-fast
 * mode; otherwise the engine records them as outcomes and moves on.
 */

export class ArmorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ArmorError';
  }
}

export class ConfigError extends ArmorError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Ledger, log or book directory unreadable or unwritable. */
export class IOError extends ArmorError {
  readonly path: string;

  constructor(path: string, message: string, cause?: unknown) {
    super(`${message}: ${path}`, { cause });
    this.name = 'IOError';
    this.path = path;
  }
}

export class RepairCreationError extends ArmorError {
  readonly book: string;

  constructor(book: string, reason: string, cause?: unknown) {
    super(`Could not protect ${book}: ${reason}`, { cause });
    this.name = 'RepairCreationError';
    this.book = book;
  }
}

/** A single book could not be read (vanished, unreadable, I/O error). */
export class BookReadError extends ArmorError {
  readonly book: string;

  constructor(book: string, cause: unknown) {
    super(`Cannot read ${book}: ${errorMessage(cause)}`, { cause });
    this.name = 'BookReadError';
    this.book = book;
  }
}

export class ChecksumMismatchError extends ArmorError {
  readonly book: string;
  readonly expected: string;
  readonly actual: string;

  constructor(book: string, expected: string, actual: string) {
    super(`Checksum mismatch for ${book}: expected ${expected}, got ${actual}`);
    this.name = 'ChecksumMismatchError';
    this.book = book;
    this.expected = expected;
    this.actual = actual;
  }
}

export class ContainerStructureError extends ArmorError {
  readonly book: string;
  readonly reason: string;

  constructor(book: string, reason: string) {
    super(`ZIP check failed for ${book}: ${reason}`);
    this.name = 'ContainerStructureError';
    this.book = book;
    this.reason = reason;
  }
}

/** Node's errno code, when the value is a system error. */
export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
