import { posix } from 'path';

/**
 * Make a host or share name usable as a single path segment:
 * `/` and `:` become `_`, and the dot segments `.` and `..` become `_` and
 * `__`. Pure and stable, so the same (host, share) always maps to the same
 * mount point below the mount root.
 */
export function sanitizePathSegment(value: string): string {
  const replaced = value.replace(/[/:]/g, '_');
  return replaced === '.' || replaced === '..' ? '_'.repeat(replaced.length) : replaced;
}

export function buildRemotePath(host: string, share: string): string {
  return `//${host}/${share}`;
}

export function buildLocalPath(mountRoot: string, host: string, share: string): string {
  return posix.join(mountRoot, sanitizePathSegment(host), sanitizePathSegment(share));
}
