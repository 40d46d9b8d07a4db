/**
 * Works out which IPv4 block to scan.
 * Detection order: default-route interface, first global address, manual
 * entry. The operator always gets to confirm or replace the result.
 */

import { ErrorCodes, type NetworkRange, type NetworkRangeSource } from '@netmount/shared';
import { succeeded, type CommandRunner } from '../executor/commandRunner.js';
import type { Prompter } from '../prompts/types.js';
import { NetmountError } from '../lib/errors.js';
import logger from '../lib/logger.js';
import { toNetworkCidr } from './cidr.js';

const rangeLogger = logger.child({ component: 'rangeResolver' });

export interface RangeResolverOptions {
  runner: CommandRunner;
  prompter: Prompter;
  /** Range given on the command line; skips detection and the prompt */
  explicitRange?: string;
}

/**
 * Interface name from `ip route show default`, e.g.
 * `default via 192.168.1.1 dev eth0 proto dhcp metric 100`.
 */
export function parseDefaultRouteInterface(output: string): string | null {
  for (const line of output.split('\n')) {
    if (!line.trimStart().startsWith('default')) {
      continue;
    }
    const match = /\bdev\s+(\S+)/.exec(line);
    if (match) {
      return match[1] ?? null;
    }
  }
  return null;
}

/**
 * Addresses from `ip -o -f inet addr show`, one `inet a.b.c.d/n` per line.
 */
export function parseInetAddresses(output: string, globalOnly = false): string[] {
  const addresses: string[] = [];
  for (const line of output.split('\n')) {
    const match = /\binet\s+(\d{1,3}(?:\.\d{1,3}){3}\/\d{1,2})/.exec(line);
    if (!match?.[1]) {
      continue;
    }
    if (globalOnly && !/\bscope\s+global\b/.test(line)) {
      continue;
    }
    addresses.push(match[1]);
  }
  return addresses;
}

interface Detected {
  cidr: string;
  source: NetworkRangeSource;
}

function detectFromDefaultRoute(runner: CommandRunner): Detected | null {
  const route = runner.run('ip', ['route', 'show', 'default']);
  if (!succeeded(route)) {
    return null;
  }
  const iface = parseDefaultRouteInterface(route.stdout);
  if (!iface) {
    return null;
  }

  const addr = runner.run('ip', ['-o', '-f', 'inet', 'addr', 'show', 'dev', iface]);
  if (!succeeded(addr)) {
    return null;
  }
  const [first] = parseInetAddresses(addr.stdout);
  const cidr = first ? toNetworkCidr(first) : null;
  if (!cidr) {
    return null;
  }
  rangeLogger.debug({ iface, cidr }, 'Range from default route');
  return { cidr, source: 'default-route' };
}

function detectFromGlobalAddress(runner: CommandRunner): Detected | null {
  const addr = runner.run('ip', ['-o', '-f', 'inet', 'addr', 'show', 'scope', 'global']);
  if (!succeeded(addr)) {
    return null;
  }
  const [first] = parseInetAddresses(addr.stdout, true);
  const cidr = first ? toNetworkCidr(first) : null;
  return cidr ? { cidr, source: 'global-address' } : null;
}

function validated(value: string, source: NetworkRangeSource): NetworkRange {
  const cidr = toNetworkCidr(value);
  if (!cidr) {
    throw new NetmountError(
      `Not a valid IPv4 CIDR range: "${value}" (expected e.g. 192.168.1.0/24)`,
      ErrorCodes.INVALID_NETWORK_RANGE
    );
  }
  return { cidr, source };
}

export async function resolveNetworkRange(options: RangeResolverOptions): Promise<NetworkRange> {
  const { runner, prompter, explicitRange } = options;

  if (explicitRange !== undefined) {
    return validated(explicitRange, 'argument');
  }

  const detected = detectFromDefaultRoute(runner) ?? detectFromGlobalAddress(runner);
  if (detected) {
    rangeLogger.info({ cidr: detected.cidr, source: detected.source }, 'Detected network range');
  } else {
    rangeLogger.warn('Could not detect the local network range');
  }

  const answer = await prompter.promptText('Network range to scan (CIDR)', detected?.cidr ?? '');
  const entered = answer?.trim() ?? '';

  if (entered === '') {
    if (!detected) {
      throw new NetmountError(
        'No network range available to scan',
        ErrorCodes.NETWORK_RANGE_UNAVAILABLE
      );
    }
    return detected;
  }

  if (detected && toNetworkCidr(entered) === detected.cidr) {
    return detected;
  }
  return validated(entered, 'manual');
}
