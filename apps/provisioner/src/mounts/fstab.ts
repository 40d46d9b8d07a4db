/**
 * fstab line format: fields are whitespace separated, so spaces and tabs
 * inside a field are written as octal escapes (\040, \011).
 */

import type { MountTableRecord } from '@netmount/shared';

export function escapeFstabField(value: string): string {
  return value.replace(/\\/g, '\\134').replace(/ /g, '\\040').replace(/\t/g, '\\011');
}

export function unescapeFstabField(value: string): string {
  return value.replace(/\\([0-7]{3})/g, (_, octal: string) => String.fromCharCode(parseInt(octal, 8)));
}

export function formatFstabLine(
  remotePath: string,
  localPath: string,
  fsType: string,
  options: string[]
): string {
  return [
    escapeFstabField(remotePath),
    escapeFstabField(localPath),
    fsType,
    escapeFstabField(options.join(',')),
    '0',
    '0',
  ].join(' ');
}

/**
 * Records of an fstab file. Blank and comment lines are skipped; paths are
 * returned escaped, exactly as they appear in the file.
 */
export function parseFstab(content: string): MountTableRecord[] {
  const records: MountTableRecord[] = [];
  const lines = content.split('\n');

  lines.forEach((line, index) => {
    const trimmed = line.trim();
    if (trimmed === '' || trimmed.startsWith('#')) {
      return;
    }
    const [remotePath, localPath, fsType = '', options = ''] = trimmed.split(/\s+/);
    if (!remotePath || !localPath) {
      return;
    }
    records.push({ remotePath, localPath, fsType, options, lineNumber: index + 1 });
  });

  return records;
}
