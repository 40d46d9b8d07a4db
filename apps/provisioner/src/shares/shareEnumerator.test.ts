import { describe, it, expect } from 'vitest';
import type { CredentialFileRef } from '@netmount/shared';
import { FakeCommandRunner, anyArgs, fail, ok } from '../test/fakes.js';
import { isAdministrativeShare, isAuthFailure, listShares, parseShareListing } from './shareEnumerator.js';

const REF: CredentialFileRef = { host: '192.168.1.10', path: '/etc/netmount/credentials/192.168.1.10.cred' };

const LISTING = [
  '',
  '\tSharename       Type      Comment',
  '\t---------       ----      -------',
  '\tdata            Disk      Family files',
  '\tprint$          Disk      Printer Drivers',
  '\tbackups         Disk',
  '\tIPC$            IPC       IPC Service (nas server)',
  '\tlaser           Printer   Office printer',
  'SMB1 disabled -- no workgroup available',
  '',
].join('\n');

const GREPABLE = [
  'Disk|Office Printer Scans|Scanner drop',
  'Disk|Backup Device|',
  'Disk|data|Family files',
  'Disk|print$|Printer Drivers',
  'Printer|laser|Office printer',
  'IPC|IPC$|IPC Service (nas server)',
  'Server|NAS|nas server',
  'Workgroup|WORKGROUP|NAS',
  'SMB1 disabled -- no workgroup available',
].join('\n');

describe('parseShareListing', () => {
  it('reads pipe-delimited rows, keeping type words inside names', () => {
    expect(parseShareListing(GREPABLE)).toEqual([
      { name: 'Office Printer Scans', type: 'Disk', comment: 'Scanner drop' },
      { name: 'Backup Device', type: 'Disk' },
      { name: 'data', type: 'Disk', comment: 'Family files' },
    ]);
  });

  it('keeps pipes that belong to the comment', () => {
    expect(parseShareListing('Disk|media|films | series')).toEqual([
      { name: 'media', type: 'Disk', comment: 'films | series' },
    ]);
  });

  it('yields the ordinary shares in order', () => {
    expect(parseShareListing(LISTING)).toEqual([
      { name: 'data', type: 'Disk', comment: 'Family files' },
      { name: 'backups', type: 'Disk' },
    ]);
  });

  it('keeps names that contain spaces', () => {
    const output = [
      '\tSharename       Type      Comment',
      '\t---------       ----      -------',
      '\tPhoto Archive   Disk      Scans',
    ].join('\n');

    expect(parseShareListing(output)).toEqual([{ name: 'Photo Archive', type: 'Disk', comment: 'Scans' }]);
  });

  it('takes the padded type column of a table row, not a type word in the name', () => {
    const output = [
      '\tSharename       Type      Comment',
      '\t---------       ----      -------',
      '\tOffice Printer Scans Disk      Scanner drop',
      '\tIPC share       Disk',
    ].join('\n');

    expect(parseShareListing(output)).toEqual([
      { name: 'Office Printer Scans', type: 'Disk', comment: 'Scanner drop' },
      { name: 'IPC share', type: 'Disk' },
    ]);
  });

  it('stops at the first blank line after the table', () => {
    const output = [
      '\tSharename       Type      Comment',
      '\t---------       ----      -------',
      '\tmedia           Disk',
      '',
      '\tServer               Comment',
      '\t---------            -------',
      '\tNAS                  nas server',
    ].join('\n');

    expect(parseShareListing(output).map((row) => row.name)).toEqual(['media']);
  });

  it('deduplicates names', () => {
    const output = [
      '\t---------       ----      -------',
      '\tmedia           Disk',
      '\tmedia           Disk',
    ].join('\n');

    expect(parseShareListing(output)).toEqual([{ name: 'media', type: 'Disk' }]);
  });

  it('falls back to the first token for rows without a type column', () => {
    const output = ['\t---------', '\tscratch'].join('\n');
    expect(parseShareListing(output)).toEqual([{ name: 'scratch' }]);
  });

  it('returns nothing without a separator', () => {
    expect(parseShareListing('session setup failed: NT_STATUS_LOGON_FAILURE\n')).toEqual([]);
  });
});

describe('isAdministrativeShare', () => {
  it('flags dollar shares and non-disk service types', () => {
    expect(isAdministrativeShare({ name: 'ADMIN$', type: 'Disk' })).toBe(true);
    expect(isAdministrativeShare({ name: 'laser', type: 'Printer' })).toBe(true);
    expect(isAdministrativeShare({ name: 'ipc', type: 'IPC' })).toBe(true);
    expect(isAdministrativeShare({ name: 'data', type: 'Disk' })).toBe(false);
  });
});

describe('isAuthFailure', () => {
  it('recognizes logon failures', () => {
    expect(isAuthFailure('session setup failed: NT_STATUS_LOGON_FAILURE')).toBe(true);
    expect(isAuthFailure('tree connect failed: NT_STATUS_ACCESS_DENIED')).toBe(true);
    expect(isAuthFailure('Connection to 192.168.1.10 failed (Error NT_STATUS_HOST_UNREACHABLE)')).toBe(false);
  });
});

describe('listShares', () => {
  it('reads the secret from the credential file', () => {
    const runner = new FakeCommandRunner().when('smbclient', anyArgs, ok(GREPABLE));

    const listing = listShares('192.168.1.10', REF, runner);

    expect(runner.calls).toEqual([
      {
        command: 'smbclient',
        args: ['-g', '-L', '//192.168.1.10', '-A', '/etc/netmount/credentials/192.168.1.10.cred'],
      },
    ]);
    expect(listing.ok).toBe(true);
    expect(listing.authFailed).toBe(false);
    expect(listing.shares).toEqual([
      { host: '192.168.1.10', shareName: 'Office Printer Scans', comment: 'Scanner drop' },
      { host: '192.168.1.10', shareName: 'Backup Device' },
      { host: '192.168.1.10', shareName: 'data', comment: 'Family files' },
    ]);
  });

  it('queries with the staged file in dry run', () => {
    const runner = new FakeCommandRunner().when('smbclient', anyArgs, ok(LISTING));

    listShares('192.168.1.10', { ...REF, stagedPath: '/tmp/netmount-abc/192.168.1.10.cred' }, runner);

    expect(runner.calls[0]?.args).toEqual(['-g', '-L', '//192.168.1.10', '-A', '/tmp/netmount-abc/192.168.1.10.cred']);
  });

  it('reports an authentication failure with the raw output', () => {
    const runner = new FakeCommandRunner().when(
      'smbclient',
      anyArgs,
      fail('session setup failed: NT_STATUS_LOGON_FAILURE')
    );

    expect(listShares('192.168.1.10', REF, runner)).toEqual({
      host: '192.168.1.10',
      shares: [],
      ok: false,
      authFailed: true,
      rawOutput: 'session setup failed: NT_STATUS_LOGON_FAILURE',
    });
  });

  it('is not ok when only administrative shares exist', () => {
    const output = 'IPC|IPC$|IPC Service\nServer|NAS|nas server';
    const runner = new FakeCommandRunner().when('smbclient', anyArgs, ok(output));

    const listing = listShares('192.168.1.10', REF, runner);

    expect(listing.ok).toBe(false);
    expect(listing.shares).toEqual([]);
    expect(listing.rawOutput).toBe(output);
  });
});
