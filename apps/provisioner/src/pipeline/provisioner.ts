/**
 * The discovery-to-provisioning pipeline.
 *
 * Strictly sequential: each selected host runs to completion (credentials,
 * share listing, selection, mount entries, activation) before the next one
 * starts. Results are returned, never accumulated in module state.
 */

import {
  HostStatusValues,
  MergeOutcomeValues,
  type Credential,
  type CredentialFileRef,
  type DiscoveredHost,
  type HostResult,
  type RunSummary,
  type ShareListing,
  type ShareResult,
} from '@netmount/shared';
import type { CommandRunner } from '../executor/commandRunner.js';
import type { CredentialStore } from '../credentials/credentialStore.js';
import type { MountEntryPlanner } from '../mounts/mountPlanner.js';
import type { MountActivator } from '../mounts/mountActivator.js';
import type { Prompter } from '../prompts/types.js';
import { resolveNetworkRange } from '../discovery/rangeResolver.js';
import { scanHosts } from '../discovery/hostScanner.js';
import { listShares } from '../shares/shareEnumerator.js';
import { isNetmountError } from '../lib/errors.js';
import logger from '../lib/logger.js';

const pipelineLogger = logger.child({ component: 'provisioner' });

export interface Owner {
  uid: number;
  gid: number;
}

export interface ProvisionerOptions {
  runner: CommandRunner;
  prompter: Prompter;
  credentials: CredentialStore;
  planner: MountEntryPlanner;
  activator: MountActivator;
  smbPort: number;
  defaultUsername: string;
  defaultOwner: Owner;
  explicitRange?: string;
  dryRun?: boolean;
}

/**
 * `1000:1000` or `1000` (gid defaults to uid). Null for anything else.
 */
export function parseOwner(value: string): Owner | null {
  const match = /^\s*(\d+)(?::(\d+))?\s*$/.exec(value);
  if (!match?.[1]) {
    return null;
  }
  const uid = parseInt(match[1], 10);
  const gid = match[2] !== undefined ? parseInt(match[2], 10) : uid;
  return { uid, gid };
}

export function describeHost(host: DiscoveredHost): string {
  return host.hostname ? `${host.address} (${host.hostname})` : host.address;
}

export class Provisioner {
  constructor(private readonly options: ProvisionerOptions) {}

  async run(): Promise<RunSummary> {
    const { runner, prompter, smbPort, explicitRange, dryRun = false } = this.options;

    const range = await resolveNetworkRange({ runner, prompter, explicitRange });
    const discovered = scanHosts(range, runner, smbPort);
    const summary: RunSummary = { range, discovered, hosts: [], dryRun };

    if (discovered.length === 0) {
      pipelineLogger.info({ cidr: range.cidr }, 'No SMB hosts found');
      await prompter.message('No SMB hosts', `No host with port ${smbPort} open was found in ${range.cidr}.`);
      return summary;
    }

    const selected = await prompter.choose(
      'SMB hosts',
      `Hosts with port ${smbPort} open in ${range.cidr}`,
      discovered.map((host) => ({ value: host.address, description: host.hostname }))
    );
    if (selected.length === 0) {
      pipelineLogger.info('No hosts selected');
      return summary;
    }

    const chosen = new Set(selected);
    for (const host of discovered.filter((candidate) => chosen.has(candidate.address))) {
      summary.hosts.push(await this.provisionHost(host));
    }

    return summary;
  }

  async provisionHost(host: DiscoveredHost): Promise<HostResult> {
    const { prompter } = this.options;
    const shares: ShareResult[] = [];
    let credentialRef: CredentialFileRef | undefined;

    const result = (status: HostResult['status'], diagnostic?: string): HostResult => ({
      host,
      status,
      credentialFile: credentialRef?.path,
      shares,
      ...(diagnostic !== undefined ? { diagnostic } : {}),
    });

    try {
      let session: { listing: ShareListing; credentialRef: CredentialFileRef } | null = null;

      while (session === null) {
        const username = await prompter.promptText(
          `Username for ${describeHost(host)}`,
          this.options.defaultUsername
        );
        if (!username) {
          return result(HostStatusValues.CANCELLED);
        }
        const secret = await prompter.promptSecret(`Password for ${username}@${host.address}`);
        if (secret === null) {
          return result(HostStatusValues.CANCELLED);
        }

        const credential: Credential = { host: host.address, username, secret };
        const ref = this.options.credentials.materialize(credential.host, credential.username, credential.secret);
        credentialRef = ref;
        const attempt = listShares(host.address, ref, this.options.runner);

        if (attempt.shares.length > 0) {
          session = { listing: attempt, credentialRef: ref };
          break;
        }

        const heading = attempt.authFailed ? 'Authentication failed' : 'No shares found';
        await prompter.message(`${heading}: ${host.address}`, attempt.rawOutput || '(no output)');
        const retry = await prompter.confirm(`Try ${host.address} again with different credentials?`);
        if (!retry) {
          return result(HostStatusValues.NO_SHARES, attempt.rawOutput || heading);
        }
      }

      const selectedShares = await prompter.choose(
        `Shares on ${host.address}`,
        'Select shares to mount',
        session.listing.shares.map((share) => ({ value: share.shareName, description: share.comment }))
      );
      if (selectedShares.length === 0) {
        return result(HostStatusValues.CANCELLED);
      }

      const owner = await this.promptOwner();
      const confirmed = await prompter.confirm(
        `Add ${selectedShares.length} mount(s) from ${host.address} owned by ${owner.uid}:${owner.gid}?`
      );
      if (!confirmed) {
        return result(HostStatusValues.CANCELLED);
      }

      for (const share of selectedShares) {
        shares.push(this.provisionShare(host.address, share, session.credentialRef, owner));
      }

      return result(HostStatusValues.PROVISIONED);
    } catch (err) {
      if (isNetmountError(err) && !err.isFatal) {
        pipelineLogger.error({ host: host.address, code: err.code, error: err.message }, 'Host provisioning failed');
        return result(HostStatusValues.FAILED, err.message);
      }
      throw err;
    }
  }

  private provisionShare(
    host: string,
    share: string,
    credentialRef: CredentialFileRef,
    owner: Owner
  ): ShareResult {
    const { planner, activator } = this.options;

    const entry = planner.plan(host, share, credentialRef, owner.uid, owner.gid);
    try {
      const merge = planner.commit(entry);
      if (merge.outcome === MergeOutcomeValues.CONFLICT) {
        return { share, entry, merge };
      }
      return { share, entry, merge, activation: activator.activate(entry) };
    } catch (err) {
      if (isNetmountError(err) && !err.isFatal) {
        pipelineLogger.error({ host, share, code: err.code, error: err.message }, 'Share provisioning failed');
        return { share, entry, error: err.message };
      }
      throw err;
    }
  }

  private async promptOwner(): Promise<Owner> {
    const fallback = this.options.defaultOwner;
    const answer = await this.options.prompter.promptText(
      'Owner of mounted files (uid:gid)',
      `${fallback.uid}:${fallback.gid}`
    );
    if (answer === null || answer.trim() === '') {
      return fallback;
    }
    const owner = parseOwner(answer);
    if (!owner) {
      pipelineLogger.warn({ answer }, 'Not a uid:gid pair, using the default owner');
      return fallback;
    }
    return owner;
  }
}
