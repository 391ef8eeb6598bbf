import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { ConfigError } from './errors.js';

/**
 * Settings for one armor run. Built once at startup and handed to every
 * component; nothing below the CLI reads the environment.
 */
export interface ArmorConfig {
  /** Recoverable damage per book, percent */
  readonly redundancy: number;
  /** Root of the collections */
  readonly bookDir: string;
  /** Checksum ledger (md5sum format) */
  readonly index: string;
  /** Tab-delimited catalog log */
  readonly csv: string;
  /** Repair store root */
  readonly repair: string;
  /** Abort on the first per-book failure instead of reporting at the end */
  readonly failFast: boolean;
}

export const DEFAULT_REDUNDANCY = 10;
export const DEFAULT_BOOK_DIR = '~/Desktop/Ebooks';

export type Env = Readonly<Record<string, string | undefined>>;

/**
 * Expand ~ to home directory.
 */
export function expandTilde(p: string): string {
  if (p.startsWith('~/')) return join(homedir(), p.slice(2));
  if (p === '~') return homedir();
  return p;
}

function setting(env: Env, name: string): string | undefined {
  const value = env[name];
  return value === undefined || value === '' ? undefined : value;
}

function toPath(p: string, cwd: string): string {
  return resolve(cwd, expandTilde(p));
}

export function parseRedundancy(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new ConfigError(`REDUNDANCY must be an integer percentage, got "${value}"`);
  }
  const n = parseInt(value, 10);
  if (n < 1 || n > 100) {
    throw new ConfigError(`REDUNDANCY must be between 1 and 100, got ${n}`);
  }
  return n;
}

export function parseFlag(value: string | undefined): boolean {
  return value !== undefined && /^(1|true|yes|on)$/i.test(value.trim());
}

/**
 * Build the configuration from environment-style variables:
 * REDUNDANCY, BOOK_DIR, INDEX, CSV, REPAIR and FAIL_FAST.
 * Relative paths are resolved against `cwd` here, once.
 */
export function loadConfig(env: Env = process.env, cwd: string = process.cwd()): ArmorConfig {
  const redundancy = setting(env, 'REDUNDANCY');
  const bookDir = toPath(setting(env, 'BOOK_DIR') ?? DEFAULT_BOOK_DIR, cwd);
  const pathOr = (name: string, fallback: string): string => {
    const value = setting(env, name);
    return value === undefined ? join(bookDir, fallback) : toPath(value, cwd);
  };

  return {
    redundancy: redundancy === undefined ? DEFAULT_REDUNDANCY : parseRedundancy(redundancy),
    bookDir,
    index: pathOr('INDEX', 'index.md5sum'),
    csv: pathOr('CSV', 'index.csv'),
    repair: pathOr('REPAIR', 'repair'),
    failFast: parseFlag(setting(env, 'FAIL_FAST')),
  };
}

/**
 * Name/value rows for displaying the active configuration.
 */
export function describeConfig(config: ArmorConfig): Array<[string, string]> {
  return [
    ['REDUNDANCY', String(config.redundancy)],
    ['BOOK_DIR', config.bookDir],
    ['INDEX', config.index],
    ['CSV', config.csv],
    ['REPAIR', config.repair],
    ['FAIL_FAST', config.failFast ? 'yes' : 'no'],
  ];
}
