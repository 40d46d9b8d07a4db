/**
 * Blocking execution of external tools.
 * Every tool the pipeline drives goes through a CommandRunner so that the
 * parsing and decision logic can be exercised without the real binaries.
 */

import { spawnSync } from 'child_process';
import logger from '../lib/logger.js';

const runnerLogger = logger.child({ component: 'commandRunner' });

export interface CommandResult {
  /** Exit code, or null when the process could not be started or was killed */
  status: number | null;
  stdout: string;
  stderr: string;
  /** Set when the command was not executed (dry run) */
  skipped?: boolean;
  error?: Error;
}

export interface RunOptions {
  /** Data written to the child's stdin */
  input?: string;
  /** Kill the child after this many milliseconds */
  timeoutMs?: number;
}

export interface CommandRunner {
  run(command: string, args: string[], options?: RunOptions): CommandResult;
}

export function succeeded(result: CommandResult): boolean {
  return result.status === 0;
}

/** stderr, falling back to stdout, falling back to the spawn error */
export function failureText(result: CommandResult): string {
  return result.stderr.trim() || result.stdout.trim() || result.error?.message || `exit code ${result.status}`;
}

export class SystemCommandRunner implements CommandRunner {
  run(command: string, args: string[], options: RunOptions = {}): CommandResult {
    runnerLogger.debug({ command, args }, 'Running command');

    const result = spawnSync(command, args, {
      encoding: 'utf-8',
      input: options.input,
      timeout: options.timeoutMs,
    });

    if (result.error) {
      runnerLogger.debug({ command, error: result.error.message }, 'Command could not be started');
    }

    return {
      status: result.status,
      stdout: result.stdout ?? '',
      stderr: result.stderr ?? '',
      error: result.error,
    };
  }
}

/**
 * Passes read-only commands through and only logs the ones that change
 * system state.
 */
export class DryRunCommandRunner implements CommandRunner {
  constructor(
    private readonly inner: CommandRunner,
    private readonly readOnlyCommands: ReadonlySet<string> = DEFAULT_READ_ONLY_COMMANDS
  ) {}

  run(command: string, args: string[], options?: RunOptions): CommandResult {
    if (this.readOnlyCommands.has(command)) {
      return this.inner.run(command, args, options);
    }

    runnerLogger.info({ command, args, dryRun: true }, 'Skipping command');
    return { status: 0, stdout: '', stderr: '', skipped: true };
  }
}

export const DEFAULT_READ_ONLY_COMMANDS: ReadonlySet<string> = new Set([
  'ip',
  'nmap',
  'smbclient',
  'findmnt',
]);
