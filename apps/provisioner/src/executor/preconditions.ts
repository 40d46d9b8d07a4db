import { accessSync, constants, statSync } from 'fs';
import { delimiter, join } from 'path';
import { ErrorCodes, REQUIRED_TOOLS } from '@netmount/shared';
import { NetmountError } from '../lib/errors.js';

/**
 * Locate an executable on PATH, like `command -v`.
 */
export function findExecutable(name: string, pathEnv: string = process.env.PATH ?? ''): string | null {
  for (const dir of pathEnv.split(delimiter)) {
    if (!dir) {
      continue;
    }
    const candidate = join(dir, name);
    try {
      accessSync(candidate, constants.X_OK);
      if (statSync(candidate).isFile()) {
        return candidate;
      }
    } catch {
      // Not in this directory
    }
  }
  return null;
}

export interface PreconditionOptions {
  /** Effective uid of the process; undefined on platforms without one */
  uid: number | undefined;
  requireRoot: boolean;
  tools?: readonly string[];
  locate?: (name: string) => string | null;
}

/**
 * Fail fast before any state is touched: privilege first, then tools.
 */
export function checkPreconditions(options: PreconditionOptions): void {
  const { uid, requireRoot, tools = REQUIRED_TOOLS, locate = (name) => findExecutable(name) } = options;

  if (requireRoot && uid !== 0) {
    throw new NetmountError(
      'netmount must run as root (try sudo), or use --dry-run to preview',
      ErrorCodes.PRIVILEGE_REQUIRED
    );
  }

  const missing = tools.filter((tool) => locate(tool) === null);
  if (missing.length > 0) {
    throw new NetmountError(
      `Required tools not found on PATH: ${missing.join(', ')}`,
      ErrorCodes.TOOL_MISSING,
      missing
    );
  }
}
