import type { DiscoveredHost, NetworkRange } from './network.js';
import type { ActivationResult, MergeResult, MountEntry } from './mount.js';
import type { HostStatus } from '../constants/status.js';

export interface ShareResult {
  share: string;
  entry: MountEntry;
  /** Absent when the share failed before its merge finished */
  merge?: MergeResult;
  activation?: ActivationResult;
  /** Soft failure that stopped this share; the host's other shares carry on */
  error?: string;
}

export interface HostResult {
  host: DiscoveredHost;
  status: HostStatus;
  credentialFile?: string;
  shares: ShareResult[];
  /** Raw tool output or error text shown to the operator */
  diagnostic?: string;
}

export interface RunSummary {
  range: NetworkRange;
  discovered: DiscoveredHost[];
  hosts: HostResult[];
  dryRun: boolean;
}
