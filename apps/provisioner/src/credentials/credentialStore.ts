/**
 * Credential files for mount.cifs and smbclient.
 *
 * Security model:
 * - One file per host, `username=` and `password=` lines
 * - Directory 0700, file 0600, owned by root unless told otherwise
 * - Content is complete before the file appears under its final name, and
 *   it never exists with a wider mode than 0600
 * - The secret is never logged
 * - In dry run the file is staged in a private temporary directory instead,
 *   so read-only queries can still use it; dispose() removes it
 */

import { chmodSync, chownSync, mkdirSync, mkdtempSync, renameSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  CREDENTIAL_DIR_MODE,
  CREDENTIAL_FILE_MODE,
  ErrorCodes,
  type CredentialFileRef,
} from '@netmount/shared';
import { NetmountError, describeError } from '../lib/errors.js';
import { sanitizePathSegment } from '../mounts/paths.js';
import logger from '../lib/logger.js';

const credLogger = logger.child({ component: 'credentialStore' });

export interface FileOwner {
  uid: number;
  gid: number;
}

export interface CredentialStoreOptions {
  directory: string;
  owner?: FileOwner;
  dryRun?: boolean;
}

export function formatCredentialFile(username: string, secret: string): string {
  return `username=${username}\npassword=${secret}\n`;
}

export class CredentialStore {
  private readonly directory: string;
  private readonly owner: FileOwner;
  private readonly dryRun: boolean;
  private scratchDir: string | null = null;

  constructor(options: CredentialStoreOptions) {
    this.directory = options.directory;
    this.owner = options.owner ?? { uid: 0, gid: 0 };
    this.dryRun = options.dryRun ?? false;
  }

  pathFor(host: string): string {
    return join(this.directory, `${sanitizePathSegment(host)}.cred`);
  }

  /**
   * Write (or overwrite) the credential file for a host. Last write wins.
   */
  materialize(host: string, username: string, secret: string): CredentialFileRef {
    const path = this.pathFor(host);

    if (/[\r\n]/.test(username) || /[\r\n]/.test(secret)) {
      throw new NetmountError(
        `Credentials for ${host} must not contain line breaks`,
        ErrorCodes.CREDENTIAL_WRITE_FAILED
      );
    }

    if (this.dryRun) {
      const stagedPath = this.writeSecurely(this.stagingDirectory(), host, username, secret);
      credLogger.info({ host, path, dryRun: true }, 'Staged credential file');
      return { host, path, stagedPath };
    }

    this.writeSecurely(this.directory, host, username, secret);
    credLogger.info({ host, path }, 'Wrote credential file');
    return { host, path };
  }

  /** Remove staged dry-run files */
  dispose(): void {
    if (this.scratchDir) {
      rmSync(this.scratchDir, { recursive: true, force: true });
      this.scratchDir = null;
    }
  }

  private stagingDirectory(): string {
    if (!this.scratchDir) {
      this.scratchDir = mkdtempSync(join(tmpdir(), 'netmount-'));
    }
    return this.scratchDir;
  }

  private writeSecurely(directory: string, host: string, username: string, secret: string): string {
    const name = sanitizePathSegment(host);
    const path = join(directory, `${name}.cred`);
    const tempPath = join(directory, `.${name}.${process.pid}.tmp`);
    let created = false;

    try {
      mkdirSync(directory, { recursive: true, mode: CREDENTIAL_DIR_MODE });
      // mkdir leaves an existing directory as it was
      chmodSync(directory, CREDENTIAL_DIR_MODE);
      rmSync(tempPath, { force: true });

      writeFileSync(tempPath, formatCredentialFile(username, secret), {
        mode: CREDENTIAL_FILE_MODE,
        flag: 'wx',
      });
      created = true;
      // The creation mode is subject to umask; pin it explicitly
      chmodSync(tempPath, CREDENTIAL_FILE_MODE);
      chownSync(tempPath, this.owner.uid, this.owner.gid);
      renameSync(tempPath, path);
    } catch (err) {
      if (created) {
        rmSync(tempPath, { force: true });
      }
      throw new NetmountError(
        `Failed to write credential file ${path}: ${describeError(err)}`,
        ErrorCodes.CREDENTIAL_WRITE_FAILED
      );
    }

    return path;
  }
}
