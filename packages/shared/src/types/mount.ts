import type { CredentialFileRef } from './credential.js';
import type { ActivationStatus, MergeOutcome } from '../constants/status.js';

export interface MountEntry {
  host: string;
  share: string;
  /** `//host/share`, unescaped */
  remotePath: string;
  localPath: string;
  credentialFileRef: CredentialFileRef;
  ownerUid: number;
  ownerGid: number;
  options: string[];
}

export interface MountTableRecord {
  remotePath: string;
  localPath: string;
  fsType: string;
  options: string;
  lineNumber: number;
}

export interface MergeResult {
  outcome: MergeOutcome;
  /** The record that caused `exists` or `conflict` */
  existing?: MountTableRecord;
  line?: string;
}

export interface ActivationResult {
  status: ActivationStatus;
  alreadyMounted: boolean;
  reason?: string;
}
