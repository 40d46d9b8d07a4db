import { appendFileSync, copyFileSync, existsSync, readFileSync } from 'fs';
import {
  ErrorCodes,
  MOUNT_FS_TYPE,
  MergeOutcomeValues,
  type MergeResult,
  type MountEntry,
} from '@netmount/shared';
import { NetmountError, describeError } from '../lib/errors.js';
import logger from '../lib/logger.js';
import { escapeFstabField, formatFstabLine, parseFstab } from './fstab.js';

const tableLogger = logger.child({ component: 'mountTable' });

export interface MountTableOptions {
  path: string;
  dryRun?: boolean;
}

/**
 * The persisted mount table (fstab). Append-only: existing lines are never
 * rewritten or removed.
 *
 * The read-check-append in merge() is not locked; concurrent runs against the
 * same file are not supported.
 */
export class MountTable {
  readonly path: string;
  private readonly dryRun: boolean;
  private backedUp = false;

  constructor(options: MountTableOptions) {
    this.path = options.path;
    this.dryRun = options.dryRun ?? false;
  }

  get backupPath(): string {
    return `${this.path}.netmount.bak`;
  }

  read(): string {
    try {
      return existsSync(this.path) ? readFileSync(this.path, 'utf-8') : '';
    } catch (err) {
      throw new NetmountError(
        `Failed to read ${this.path}: ${describeError(err)}`,
        ErrorCodes.MOUNT_TABLE_READ_FAILED
      );
    }
  }

  /**
   * Append the entry unless its remote path is already present.
   * Another record on the same local path is a conflict and is left alone.
   */
  merge(entry: MountEntry): MergeResult {
    const content = this.read();
    const records = parseFstab(content);
    const remote = escapeFstabField(entry.remotePath);
    const local = escapeFstabField(entry.localPath);

    const existing = records.find((record) => record.remotePath === remote);
    if (existing) {
      tableLogger.info(
        { remotePath: entry.remotePath, line: existing.lineNumber },
        'Mount entry already exists'
      );
      return { outcome: MergeOutcomeValues.EXISTS, existing };
    }

    const conflicting = records.find((record) => record.localPath === local);
    if (conflicting) {
      tableLogger.warn(
        { remotePath: entry.remotePath, localPath: entry.localPath, existing: conflicting.remotePath },
        'Mount point already used by another entry'
      );
      return { outcome: MergeOutcomeValues.CONFLICT, existing: conflicting };
    }

    const line = formatFstabLine(entry.remotePath, entry.localPath, MOUNT_FS_TYPE, entry.options);

    if (this.dryRun) {
      tableLogger.info({ path: this.path, line, dryRun: true }, 'Skipping mount table append');
      return { outcome: MergeOutcomeValues.APPENDED, line };
    }

    try {
      this.backupOnce();
      const separator = content === '' || content.endsWith('\n') ? '' : '\n';
      appendFileSync(this.path, `${separator}${line}\n`);
    } catch (err) {
      throw new NetmountError(
        `Failed to update ${this.path}: ${describeError(err)}`,
        ErrorCodes.MOUNT_TABLE_WRITE_FAILED
      );
    }

    tableLogger.info({ path: this.path, remotePath: entry.remotePath }, 'Appended mount entry');
    return { outcome: MergeOutcomeValues.APPENDED, line };
  }

  private backupOnce(): void {
    if (this.backedUp) {
      return;
    }
    if (existsSync(this.path)) {
      copyFileSync(this.path, this.backupPath);
      tableLogger.debug({ backup: this.backupPath }, 'Backed up mount table');
    }
    this.backedUp = true;
  }
}
