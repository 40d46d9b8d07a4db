import { ErrorCodes, SMB_PORT, type DiscoveredHost, type NetworkRange } from '@netmount/shared';
import { failureText, succeeded, type CommandRunner } from '../executor/commandRunner.js';
import { NetmountError } from '../lib/errors.js';
import logger from '../lib/logger.js';

const scanLogger = logger.child({ component: 'hostScanner' });

const HOST_LINE = /^Host:\s+(\d{1,3}(?:\.\d{1,3}){3})\s+\(([^)]*)\)/;

/**
 * Parse nmap grepable output (`-oG -`).
 *
 * Only `Host:` lines whose `Ports:` field reports the port as open count;
 * `Status: Up` lines, comments and everything else are ignored. Addresses
 * are deduplicated, first occurrence wins.
 */
export function parseScanOutput(output: string, port: number = SMB_PORT): DiscoveredHost[] {
  const openPort = new RegExp(`(?:^|[\\s,])${port}/open/`);
  const seen = new Set<string>();
  const hosts: DiscoveredHost[] = [];

  for (const line of output.split('\n')) {
    const host = HOST_LINE.exec(line);
    if (!host?.[1]) {
      continue;
    }
    const portsIndex = line.indexOf('Ports:');
    if (portsIndex === -1 || !openPort.test(line.slice(portsIndex + 'Ports:'.length))) {
      continue;
    }

    const address = host[1];
    if (seen.has(address)) {
      continue;
    }
    seen.add(address);

    const hostname = host[2]?.trim();
    hosts.push(hostname ? { address, hostname } : { address });
  }

  return hosts;
}

export function buildScanArgs(range: NetworkRange, port: number): string[] {
  // -Pn: probe the port even on hosts that drop ICMP
  return ['-Pn', '-p', String(port), '--open', '-oG', '-', range.cidr];
}

/**
 * One nmap pass over the range. An empty result is a valid outcome.
 */
export function scanHosts(range: NetworkRange, runner: CommandRunner, port: number = SMB_PORT): DiscoveredHost[] {
  scanLogger.info({ cidr: range.cidr, port }, 'Scanning for SMB hosts');

  const result = runner.run('nmap', buildScanArgs(range, port));
  if (!succeeded(result)) {
    throw new NetmountError(
      `nmap scan of ${range.cidr} failed: ${failureText(result)}`,
      ErrorCodes.SCAN_FAILED
    );
  }

  const hosts = parseScanOutput(result.stdout, port);
  scanLogger.info({ cidr: range.cidr, count: hosts.length }, 'Scan complete');
  return hosts;
}
