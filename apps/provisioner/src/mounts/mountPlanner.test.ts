import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import type { CredentialFileRef } from '@netmount/shared';
import { MountEntryPlanner, buildMountOptions, planMountEntry } from './mountPlanner.js';
import { MountTable } from './mountTable.js';

const REF: CredentialFileRef = { host: '192.168.1.10', path: '/etc/netmount/credentials/192.168.1.10.cred' };

const BASE = [
  'iocharset=utf8',
  'noauto',
  'x-systemd.automount',
  '_netdev',
  'x-systemd.requires=network-online.target',
  'x-systemd.after=network-online.target',
];

describe('buildMountOptions', () => {
  it('adds uid and gid for a non-root owner', () => {
    expect(buildMountOptions(REF, 1000, 1000)).toEqual([
      'credentials=/etc/netmount/credentials/192.168.1.10.cred',
      ...BASE,
      'uid=1000',
      'gid=1000',
    ]);
  });

  it('omits them for root and keeps extra options before them', () => {
    expect(buildMountOptions(REF, 0, 0, ['vers=3.0'])).toEqual([
      'credentials=/etc/netmount/credentials/192.168.1.10.cred',
      ...BASE,
      'vers=3.0',
    ]);
    expect(buildMountOptions(REF, 0, 100).slice(-1)).toEqual(['gid=100']);
  });
});

describe('planMountEntry', () => {
  it('places the mount under root/host/share', () => {
    const entry = planMountEntry('192.168.1.10', 'data', REF, 1000, 1000, { mountRoot: '/mnt' });

    expect(entry.remotePath).toBe('//192.168.1.10/data');
    expect(entry.localPath).toBe('/mnt/192.168.1.10/data');
    expect(entry.credentialFileRef).toBe(REF);
    expect(entry.options).toContain('uid=1000');
    expect(entry.options).toContain('gid=1000');
  });
});

describe('MountEntryPlanner', () => {
  let dir: string;
  let fstab: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'netmount-planner-'));
    fstab = join(dir, 'fstab');
    writeFileSync(fstab, 'UUID=1234-abcd / ext4 defaults 0 1\n');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('creates the mount point and leaves one record for repeated commits', () => {
    const planner = new MountEntryPlanner({ mountRoot: join(dir, 'mnt'), table: new MountTable({ path: fstab }) });
    const entry = planner.plan('192.168.1.10', 'data', REF, 1000, 1000);

    expect(planner.commit(entry).outcome).toBe('appended');
    expect(planner.commit(planner.plan('192.168.1.10', 'data', REF, 1000, 1000)).outcome).toBe('exists');

    expect(existsSync(entry.localPath)).toBe(true);
    const records = readFileSync(fstab, 'utf-8').split('\n').filter((line) => line.startsWith('//192.168.1.10/data '));
    expect(records).toHaveLength(1);
  });

  it('creates nothing on conflict or in dry run', () => {
    const mountRoot = join(dir, 'mnt');
    const table = new MountTable({ path: fstab });
    const planner = new MountEntryPlanner({ mountRoot, table });
    planner.commit(planner.plan('nas', 'data', REF, 0, 0));

    const clash = { ...planner.plan('nas', 'data', REF, 0, 0), remotePath: '//other/data' };
    rmSync(join(mountRoot, 'nas'), { recursive: true, force: true });
    expect(planner.commit(clash).outcome).toBe('conflict');
    expect(existsSync(join(mountRoot, 'nas'))).toBe(false);

    const dryPlanner = new MountEntryPlanner({ mountRoot, table: new MountTable({ path: fstab, dryRun: true }), dryRun: true });
    const dryEntry = dryPlanner.plan('nas', 'media', REF, 0, 0);
    expect(dryPlanner.commit(dryEntry).outcome).toBe('appended');
    expect(existsSync(dryEntry.localPath)).toBe(false);
  });
});
