import type { HostResult, RunSummary, ShareResult } from '@netmount/shared';
import { unescapeFstabField } from '../mounts/fstab.js';
import { describeHost } from './provisioner.js';

function firstLine(text: string): string {
  return text.split('\n').find((line) => line.trim() !== '')?.trim() ?? '';
}

function describeShare(result: ShareResult): string {
  const { merge, activation, entry, error } = result;
  const parts: string[] = [];

  if (error !== undefined) {
    parts.push(`failed: ${error}`);
  }

  switch (merge?.outcome) {
    case 'appended':
      parts.push('added');
      break;
    case 'exists':
      parts.push('already present');
      break;
    case 'conflict':
      parts.push(`not added: ${entry.localPath} is used by ${merge?.existing ? unescapeFstabField(merge.existing.remotePath) : 'another entry'}`);
      break;
  }

  if (activation?.status === 'started') {
    parts.push(activation.alreadyMounted ? 'already mounted' : 'mounted');
  } else if (activation?.status === 'deferred') {
    parts.push(`mount deferred${activation.reason ? `: ${firstLine(activation.reason)}` : ''}`);
  }

  return `${entry.remotePath} -> ${entry.localPath} (${parts.join(', ')})`;
}

function hostProblem(result: HostResult): string | null {
  switch (result.status) {
    case 'no-shares':
      return `${describeHost(result.host)}: no shares listed${result.diagnostic ? ` (${firstLine(result.diagnostic)})` : ''}`;
    case 'failed':
      return `${describeHost(result.host)}: ${result.diagnostic ?? 'failed'}`;
    default:
      return null;
  }
}

/**
 * End-of-run report: credential files written, mount entries and their
 * state, and every soft failure.
 */
export function formatRunSummary(summary: RunSummary): string {
  const lines: string[] = [];

  lines.push(`Network range: ${summary.range.cidr}`);
  lines.push(`SMB hosts found: ${summary.discovered.length}`);
  if (summary.dryRun) {
    lines.push('Dry run: no files were changed and no mounts were started');
  }

  const credentialFiles = [
    ...new Set(summary.hosts.flatMap((host) => (host.credentialFile ? [host.credentialFile] : []))),
  ];
  const shareResults = summary.hosts.flatMap((host) => host.shares);
  const skipped = summary.hosts.filter((host) => host.status === 'cancelled');

  const problems: string[] = [];
  for (const host of summary.hosts) {
    const problem = hostProblem(host);
    if (problem) {
      problems.push(problem);
    }
  }
  for (const share of shareResults) {
    if (share.error !== undefined || share.merge?.outcome === 'conflict' || share.activation?.status === 'deferred') {
      problems.push(describeShare(share));
    }
  }

  if (credentialFiles.length > 0) {
    lines.push('', 'Credential files:');
    lines.push(...credentialFiles.map((file) => `  ${file}`));
  }

  if (shareResults.length > 0) {
    lines.push('', 'Mounts:');
    lines.push(...shareResults.map((share) => `  ${describeShare(share)}`));
  }

  if (skipped.length > 0) {
    lines.push('', 'Skipped:');
    lines.push(...skipped.map((host) => `  ${describeHost(host.host)}`));
  }

  if (problems.length > 0) {
    lines.push('', 'Problems:');
    lines.push(...problems.map((problem) => `  ${problem}`));
  }

  return lines.join('\n');
}
