import type { ArmorEvent, ArmorReport } from './engine.js';
import type { DuplicateGroup } from './book.js';

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
/** Help, usage, version or configuration shown; nothing was run */
export const EXIT_INFO = 2;
export const EXIT_INTEGRITY = 4;
export const EXIT_REPAIR = 8;
export const EXIT_DUPLICATES = 16;

/**
 * Exit status for a finished run. Each kind of problem sets its own bit.
 */
export function exitStatus(report: ArmorReport): number {
  let status = EXIT_OK;
  const integrity = report.mismatches.length + report.structureFailures.length + report.readFailures.length;
  if (integrity > 0) status |= EXIT_INTEGRITY;
  if (report.protectFailures.length > 0) status |= EXIT_REPAIR;
  if (report.duplicates.length > 0) status |= EXIT_DUPLICATES;
  if (report.interrupted) status |= EXIT_FATAL;
  return status;
}

export interface OutputLine {
  text: string;
  /** Goes to stderr */
  error: boolean;
}

const out = (text: string): OutputLine => ({ text, error: false });
const err = (text: string): OutputLine => ({ text, error: true });

export function formatEvent(event: ArmorEvent): OutputLine {
  switch (event.kind) {
    case 'cataloging':
      return out(`Cataloging ${event.book.key} ...`);
    case 'cataloged':
      return out(`  ✓ md5 ${event.checksum}`);
    case 'protecting':
      return out(`Protecting ${event.book.key} ...`);
    case 'protected':
      return out(`  ✓ recoverable (${event.set.artifacts.length} recovery files)`);
    case 'protect-failed':
      return err(`  ✗ ${event.reason}`);
    case 'verifying':
      return out(`Verifying ${event.book.key} ...`);
    case 'verified':
      return out('  ✓ checksum OK');
    case 'mismatch':
      return err(`  ✗ checksum FAILED: expected ${event.expected}, got ${event.actual}`);
    case 'structure-passed':
      return out(`  ✓ ZIP check passed (${event.entries} entries)`);
    case 'structure-skipped':
      return out(`  ⚠ ZIP check skipped: ${event.reason}`);
    case 'structure-failed':
      return err(`  ✗ ZIP check FAILED: ${event.reason}`);
    case 'read-failed':
      return err(`  ✗ ${event.reason}`);
  }
}

export function formatDuplicates(groups: readonly DuplicateGroup[]): string[] {
  if (groups.length === 0) return [];
  return ['Duplicates found:', ...groups.map(g => `    ${g.checksum}  ${g.names.join(', ')}`)];
}

/**
 * End-of-run summary: counts, each failed book once, then duplicates.
 */
export function formatSummary(report: ArmorReport): string[] {
  const lines = [
    'Summary:',
    `  Cataloged:           ${report.cataloged.length}`,
    `  Verified:            ${report.verified.length}`,
    `  Checksum mismatches: ${report.mismatches.length}`,
    `  ZIP check failures:  ${report.structureFailures.length}`,
    `  Protect failures:    ${report.protectFailures.length}`,
    `  Unreadable books:    ${report.readFailures.length}`,
  ];
  for (const m of report.mismatches) lines.push(`  ✗ ${m.name}: checksum ${m.actual}, ledger has ${m.expected}`);
  for (const f of report.structureFailures) lines.push(`  ✗ ${f.name}: ${f.reason}`);
  for (const f of report.protectFailures) lines.push(`  ✗ ${f.reason}`);
  for (const f of report.readFailures) lines.push(`  ✗ ${f.reason}`);
  if (report.interrupted) lines.push('  ⚠ Interrupted before all books were processed');
  return [...lines, ...formatDuplicates(report.duplicates)];
}
