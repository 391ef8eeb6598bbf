/**
 * Erasure-coding backend for the repair store.
 *
 * The default backend shells out to par2cmdline. Every call names its
 * working directory explicitly; nothing here changes the process cwd.
 */

import { execSync, spawn } from 'node:child_process';
import { errorMessage } from './errors.js';

export interface ParityCreateOptions {
  /** Directory the tool runs in; recovery files are written here */
  cwd: string;
  /** File to protect, relative to `cwd` */
  target: string;
  /** Recoverable damage, percent */
  redundancy: number;
}

export interface ParityVerifyOptions {
  cwd: string;
  target: string;
}

export interface ParityTool {
  /** Generate recovery files for `target`. Throws when generation fails. */
  create(opts: ParityCreateOptions): Promise<void>;
  /** True when the recovery files can still validate `target`. */
  verify(opts: ParityVerifyOptions): Promise<boolean>;
  /** Whether a file in `cwd` is one of the recovery files for `target`. */
  isArtifact(target: string, fileName: string): boolean;
}

export function hasCommand(cmd: string): boolean {
  try {
    execSync(process.platform === 'win32' ? `where ${cmd}` : `which ${cmd}`, { stdio: 'pipe' });
    return true;
  } catch { return false; }
}

export interface ExitResult {
  code: number | null;
  stderr: string;
}

/**
 * Run a command in its own process group, so a Ctrl-C at the terminal reaches
 * only this process and the caller decides when to stop. Rejects only when
 * the command cannot be started.
 */
export function runDetached(cmd: string, args: string[], cwd: string): Promise<ExitResult> {
  const child = spawn(cmd, args, { cwd, detached: true, stdio: ['ignore', 'ignore', 'pipe'] });
  let stderr = '';
  child.stderr.on('data', (d: Buffer) => { stderr += d.toString(); });

  return new Promise((resolve, reject) => {
    child.once('error', reject);
    child.once('close', code => resolve({ code, stderr: stderr.trim() }));
  });
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * par2cmdline backend: `par2create -qq -u -r<N>` and `par2verify -qq`.
 */
export class Par2Tool implements ParityTool {
  static readonly commands = ['par2create', 'par2verify'] as const;

  /** Names of the par2 commands that are not on PATH. */
  static missingCommands(): string[] {
    return Par2Tool.commands.filter(cmd => !hasCommand(cmd));
  }

  async create(opts: ParityCreateOptions): Promise<void> {
    let result: ExitResult;
    try {
      result = await runDetached(
        'par2create',
        ['-qq', '-u', `-r${opts.redundancy}`, '--', `${opts.target}.par2`, opts.target],
        opts.cwd,
      );
    } catch (err) {
      throw new Error(`par2create failed: ${errorMessage(err)}`, { cause: err });
    }
    if (result.code !== 0) {
      throw new Error(`par2create failed: ${result.stderr || `exit code ${String(result.code)}`}`);
    }
  }

  async verify(opts: ParityVerifyOptions): Promise<boolean> {
    // A missing binary rejects: a setup problem, not a failed verification.
    const result = await runDetached('par2verify', ['-qq', '--', `${opts.target}.par2`], opts.cwd);
    return result.code === 0;
  }

  isArtifact(target: string, fileName: string): boolean {
    const base = escapeRegExp(target);
    return new RegExp(`^${base}(\\.vol\\d+\\+\\d+)?\\.par2$`).test(fileName);
  }
}
