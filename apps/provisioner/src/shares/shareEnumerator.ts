import type { CredentialFileRef, ShareDescriptor, ShareListing } from '@netmount/shared';
import { succeeded, type CommandRunner } from '../executor/commandRunner.js';
import logger from '../lib/logger.js';

const shareLogger = logger.child({ component: 'shareEnumerator' });

const SHARE_TYPES = ['Disk', 'Printer', 'IPC', 'Device'] as const;
const EXCLUDED_TYPES = new Set<string>(['Printer', 'IPC']);
const KNOWN_TYPES = new Set<string>(SHARE_TYPES);

// `name   Type      comment`: the type column is padded, so a type word inside
// a name (one space after it) is not taken as the column
const TYPED_ROW = new RegExp(`^(.+?)\\s+(${SHARE_TYPES.join('|')})(?:\\s{2,}(.*))?$`);

const AUTH_FAILURE_MARKERS = [
  'NT_STATUS_LOGON_FAILURE',
  'NT_STATUS_ACCESS_DENIED',
  'NT_STATUS_WRONG_PASSWORD',
];

export interface ParsedShareRow {
  name: string;
  type?: string;
  comment?: string;
}

/**
 * Administrative shares end in `$` (IPC$, ADMIN$, C$, print$).
 */
export function isAdministrativeShare(row: ParsedShareRow): boolean {
  return row.name.endsWith('$') || (row.type !== undefined && EXCLUDED_TYPES.has(row.type));
}

function parseRow(line: string): ParsedShareRow | null {
  const trimmed = line.trim();
  const typed = TYPED_ROW.exec(trimmed);
  if (typed?.[1]) {
    return row(typed[1].trim(), typed[2], typed[3]);
  }
  const [first] = trimmed.split(/\s+/);
  return first ? { name: first } : null;
}

function row(name: string, type?: string, comment?: string): ParsedShareRow {
  const text = comment?.trim();
  const base = type ? { name, type } : { name };
  return text ? { ...base, comment: text } : base;
}

/**
 * `smbclient -g` rows: `Disk|data|Family files`. Server and Workgroup rows
 * and notices are skipped.
 */
function parseGrepableRow(line: string): ParsedShareRow | null {
  const [type, name, ...comment] = line.trim().split('|');
  if (type === undefined || name === undefined || !KNOWN_TYPES.has(type) || name === '') {
    return null;
  }
  return row(name, type, comment.join('|'));
}

function collect(rows: Array<ParsedShareRow | null>): ParsedShareRow[] {
  const seen = new Set<string>();
  const shares: ParsedShareRow[] = [];
  for (const candidate of rows) {
    if (!candidate || isAdministrativeShare(candidate) || seen.has(candidate.name)) {
      continue;
    }
    seen.add(candidate.name);
    shares.push(candidate);
  }
  return shares;
}

/**
 * Parse the share list printed by `smbclient -L`. The pipe-delimited `-g`
 * form is used when present:
 *
 *     Disk|data|Family files
 *     IPC|IPC$|IPC Service (Samba)
 *
 * Otherwise the human-readable table is read:
 *
 *         Sharename       Type      Comment
 *         ---------       ----      -------
 *         data            Disk
 *         IPC$            IPC       IPC Service (Samba)
 *
 * Only the indented rows between the separator and the next blank or
 * unindented line are considered. Header, separator and administrative rows
 * are dropped; names are deduplicated in order.
 */
export function parseShareListing(output: string): ParsedShareRow[] {
  const lines = output.split('\n');

  const grepable = lines.map(parseGrepableRow);
  if (grepable.some((candidate) => candidate !== null)) {
    return collect(grepable);
  }

  const tableRows: Array<ParsedShareRow | null> = [];
  let inTable = false;

  for (const line of lines) {
    const trimmed = line.trim();

    if (!inTable) {
      if (/^-{3,}(\s+-{3,})*$/.test(trimmed)) {
        inTable = true;
      }
      continue;
    }

    // Table rows are indented; trailing notices like
    // "SMB1 disabled -- no workgroup available" are not
    if (trimmed === '' || !/^\s/.test(line)) {
      break;
    }
    if (/^-{3,}/.test(trimmed) || /^Sharename\b/.test(trimmed)) {
      continue;
    }
    tableRows.push(parseRow(line));
  }

  return collect(tableRows);
}

export function isAuthFailure(output: string): boolean {
  return AUTH_FAILURE_MARKERS.some((marker) => output.includes(marker));
}

/**
 * Query a host's shares with a stored credential file. Failures are
 * returned, not thrown: the caller shows `rawOutput` and decides what to do.
 */
export function listShares(host: string, credentialRef: CredentialFileRef, runner: CommandRunner): ShareListing {
  // -g: pipe-delimited rows, unambiguous for names containing spaces
  // -A: the secret is read from the file, never passed on the command line
  const authFile = credentialRef.stagedPath ?? credentialRef.path;
  const result = runner.run('smbclient', ['-g', '-L', `//${host}`, '-A', authFile]);
  const rawOutput = [result.stdout, result.stderr].filter((text) => text.trim() !== '').join('\n');

  if (!succeeded(result)) {
    const authFailed = isAuthFailure(rawOutput);
    shareLogger.warn({ host, status: result.status, authFailed }, 'Share listing failed');
    return { host, shares: [], ok: false, authFailed, rawOutput };
  }

  const shares: ShareDescriptor[] = parseShareListing(result.stdout).map((row) =>
    row.comment ? { host, shareName: row.name, comment: row.comment } : { host, shareName: row.name }
  );

  shareLogger.info({ host, count: shares.length }, 'Listed shares');
  return { host, shares, ok: shares.length > 0, authFailed: false, rawOutput };
}
