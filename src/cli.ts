#!/usr/bin/env node
/**
 * book-armor: guard e-book collections against bit-rot.
 *
 *   book-armor [-h|-u|-d|-v] [--fail-fast]
 *
 * Every file in BOOK_DIR/<collection>/ is either cataloged (checksum written
 * to the ledger, par2 recovery data created and self-verified) or, when the
 * ledger already knows it, re-verified against its recorded checksum.
 */

import { ArmorEngine } from './engine.js';
import { Par2Tool } from './parity.js';
import { describeConfig, loadConfig, type ArmorConfig } from './config.js';
import { ArmorError } from './errors.js';
import {
  EXIT_FATAL,
  EXIT_INFO,
  exitStatus,
  formatEvent,
  formatSummary,
} from './report.js';

const VERSION = '1.0.0';

const USAGE = 'Usage: book-armor [-h|-u|-d|-v] [--fail-fast]';

const HELP = `book-armor ${VERSION}

Ensure the long-term integrity of electronic books and guard against bit-rot.

${USAGE}

Options:
  -h, --help       show this documentation
  -u, --usage      show usage
  -d, --display    display configuration values
  -v, --version    show version
      --fail-fast  stop at the first failed book (also FAIL_FAST=1)

Environment Variables:
  REDUNDANCY   % damage each book can recover from (default 10)
  BOOK_DIR     top-level directory for e-books (default ~/Desktop/Ebooks)
  INDEX        location of md5sums (default $BOOK_DIR/index.md5sum)
  CSV          location of enhanced, tab-delimited index (default $BOOK_DIR/index.csv)
  REPAIR       directory for storing par2 files (default $BOOK_DIR/repair)

Exit status:
  0 all books good, 1 fatal error or interrupted, 2 informational flag,
  4 checksum, ZIP or read failure, 8 recovery data could not be created,
  16 duplicates found (4, 8 and 16 combine)`;

type Action = 'run' | 'help' | 'usage' | 'version' | 'display';

interface ParsedArgs {
  action: Action;
  failFast: boolean;
}

const SHORT: Record<string, Action> = { h: 'help', u: 'usage', v: 'version', d: 'display' };
const LONG: Record<string, Action> = {
  '--help': 'help',
  '--usage': 'usage',
  '--version': 'version',
  '--display': 'display',
};

function parseArgs(args: string[]): ParsedArgs {
  let failFast = false;
  for (const arg of args) {
    if (arg === '--fail-fast') { failFast = true; continue; }
    if (Object.hasOwn(LONG, arg)) return { action: LONG[arg], failFast };
    if (/^-[a-z]+$/.test(arg)) {
      // First recognised flag wins, like getopts exiting on it.
      const flag = arg.slice(1).split('').find(c => Object.hasOwn(SHORT, c));
      return { action: flag ? SHORT[flag] : 'usage', failFast };
    }
    return { action: 'usage', failFast };
  }
  return { action: 'run', failFast };
}

async function armor(config: ArmorConfig): Promise<number> {
  const missing = Par2Tool.missingCommands();
  if (missing.length > 0) {
    console.error(`✗ ${missing.join(', ')} not found. Install par2cmdline to create recovery data.`);
    return EXIT_FATAL;
  }

  const engine = await ArmorEngine.open(config, new Par2Tool(), {
    onEvent: event => {
      const line = formatEvent(event);
      if (line.error) console.error(line.text);
      else console.log(line.text);
    },
  });

  const malformed = engine.ledger.malformedLines;
  if (malformed.length > 0) {
    console.warn(`⚠ Ignoring unreadable ledger lines in ${config.index}: ${malformed.join(', ')}`);
  }

  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.error('⚠ Interrupted, stopping after the current book...');
    controller.abort();
  });

  const report = await engine.run(controller.signal);
  console.log('');
  for (const line of formatSummary(report)) console.log(line);
  return exitStatus(report);
}

async function main(args: string[]): Promise<number> {
  const parsed = parseArgs(args);

  switch (parsed.action) {
    case 'help':
      console.log(HELP);
      return EXIT_INFO;
    case 'usage':
      console.log(USAGE);
      return EXIT_INFO;
    case 'version':
      console.log(`book-armor ${VERSION}`);
      return EXIT_INFO;
    default:
      break;
  }

  const loaded = loadConfig(process.env);
  const config: ArmorConfig = { ...loaded, failFast: loaded.failFast || parsed.failFast };

  if (parsed.action === 'display') {
    console.log('Environment Variables:');
    for (const [name, value] of describeConfig(config)) {
      console.log(`    ${name}:\t\t${value}`);
    }
    return EXIT_INFO;
  }

  return armor(config);
}

main(process.argv.slice(2)).then(
  code => process.exit(code),
  (err: unknown) => {
    if (err instanceof ArmorError) console.error(`✗ ${err.message}`);
    else console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(EXIT_FATAL);
  },
);
