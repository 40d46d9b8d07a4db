import { mkdirSync } from 'fs';
import {
  BASE_MOUNT_OPTIONS,
  ErrorCodes,
  MergeOutcomeValues,
  type CredentialFileRef,
  type MergeResult,
  type MountEntry,
} from '@netmount/shared';
import { NetmountError, describeError } from '../lib/errors.js';
import logger from '../lib/logger.js';
import type { MountTable } from './mountTable.js';
import { buildLocalPath, buildRemotePath } from './paths.js';

const plannerLogger = logger.child({ component: 'mountPlanner' });

export interface PlanOptions {
  mountRoot: string;
  extraOptions?: string[];
}

/**
 * Mount options in a fixed order. uid/gid are only added for a non-root
 * owner; root is what mount.cifs assumes anyway.
 */
export function buildMountOptions(
  credentialRef: CredentialFileRef,
  ownerUid: number,
  ownerGid: number,
  extraOptions: string[] = []
): string[] {
  const options = [`credentials=${credentialRef.path}`, ...BASE_MOUNT_OPTIONS, ...extraOptions];
  if (ownerUid !== 0) {
    options.push(`uid=${ownerUid}`);
  }
  if (ownerGid !== 0) {
    options.push(`gid=${ownerGid}`);
  }
  return options;
}

export function planMountEntry(
  host: string,
  share: string,
  credentialRef: CredentialFileRef,
  ownerUid: number,
  ownerGid: number,
  options: PlanOptions
): MountEntry {
  return {
    host,
    share,
    remotePath: buildRemotePath(host, share),
    localPath: buildLocalPath(options.mountRoot, host, share),
    credentialFileRef: credentialRef,
    ownerUid,
    ownerGid,
    options: buildMountOptions(credentialRef, ownerUid, ownerGid, options.extraOptions),
  };
}

export interface MountEntryPlannerOptions extends PlanOptions {
  table: MountTable;
  dryRun?: boolean;
}

export class MountEntryPlanner {
  constructor(private readonly options: MountEntryPlannerOptions) {}

  plan(
    host: string,
    share: string,
    credentialRef: CredentialFileRef,
    ownerUid: number,
    ownerGid: number
  ): MountEntry {
    return planMountEntry(host, share, credentialRef, ownerUid, ownerGid, this.options);
  }

  /**
   * Persist a planned entry: create its mount point and merge it into the
   * mount table.
   */
  commit(entry: MountEntry): MergeResult {
    const result = this.options.table.merge(entry);

    if (result.outcome !== MergeOutcomeValues.CONFLICT && !this.options.dryRun) {
      try {
        mkdirSync(entry.localPath, { recursive: true });
      } catch (err) {
        throw new NetmountError(
          `Failed to create mount point ${entry.localPath}: ${describeError(err)}`,
          ErrorCodes.MOUNT_TABLE_WRITE_FAILED
        );
      }
    }

    plannerLogger.debug({ remotePath: entry.remotePath, outcome: result.outcome }, 'Committed mount entry');
    return result;
  }
}
