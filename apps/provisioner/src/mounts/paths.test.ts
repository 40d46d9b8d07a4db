import { describe, it, expect } from 'vitest';
import { buildLocalPath, buildRemotePath, sanitizePathSegment } from './paths.js';

describe('paths', () => {
  it('replaces separators in a segment', () => {
    expect(sanitizePathSegment('fe80::1')).toBe('fe80__1');
    expect(sanitizePathSegment('media/films')).toBe('media_films');
    expect(sanitizePathSegment('data')).toBe('data');
  });

  it('never leaves a slash or colon and is stable', () => {
    const inputs = ['a/b:c', '//host/share', ':::', 'plain', 'x/y/z', '.', '..', '...'];
    for (const input of inputs) {
      const once = sanitizePathSegment(input);
      expect(once).not.toMatch(/[/:]/);
      expect(sanitizePathSegment(input)).toBe(once);
      expect(sanitizePathSegment(once)).toBe(once);
    }
  });

  it('maps dot segments to underscores', () => {
    expect(sanitizePathSegment('.')).toBe('_');
    expect(sanitizePathSegment('..')).toBe('__');
    expect(sanitizePathSegment('...')).toBe('...');
    expect(sanitizePathSegment('.hidden')).toBe('.hidden');
  });

  it('keeps every local path below the mount root and host', () => {
    expect(buildLocalPath('/mnt', 'nas', '..')).toBe('/mnt/nas/__');
    expect(buildLocalPath('/mnt', 'nas', '.')).toBe('/mnt/nas/_');
    expect(buildLocalPath('/mnt', '..', '..')).toBe('/mnt/__/__');
  });

  it('builds remote and local paths', () => {
    expect(buildRemotePath('192.168.1.10', 'data')).toBe('//192.168.1.10/data');
    expect(buildLocalPath('/mnt', '192.168.1.10', 'media/films')).toBe('/mnt/192.168.1.10/media_films');
    expect(buildLocalPath('/', 'nas', 'data')).toBe('/nas/data');
  });
});
