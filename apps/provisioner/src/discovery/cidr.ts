export interface ParsedCidr {
  address: string;
  prefix: number;
}

const IPV4_PATTERN = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;

export function isValidIpv4(address: string): boolean {
  const match = IPV4_PATTERN.exec(address);
  if (!match) {
    return false;
  }
  return match.slice(1).every((octet) => Number(octet) <= 255);
}

/**
 * Parse `a.b.c.d/n`. Returns null for anything that is not a well-formed
 * IPv4 CIDR block.
 */
export function parseCidr(value: string): ParsedCidr | null {
  const [address, prefixText, ...rest] = value.trim().split('/');
  if (rest.length > 0 || address === undefined || prefixText === undefined) {
    return null;
  }
  if (!isValidIpv4(address) || !/^\d{1,2}$/.test(prefixText)) {
    return null;
  }
  const prefix = Number(prefixText);
  if (prefix > 32) {
    return null;
  }
  return { address, prefix };
}

function toInt(address: string): number {
  return address.split('.').reduce((acc, octet) => ((acc << 8) | Number(octet)) >>> 0, 0);
}

function fromInt(value: number): string {
  return [24, 16, 8, 0].map((shift) => (value >>> shift) & 0xff).join('.');
}

/**
 * Mask the host bits off: `192.168.1.57/24` becomes `192.168.1.0/24`.
 */
export function toNetworkCidr(value: string): string | null {
  const parsed = parseCidr(value);
  if (!parsed) {
    return null;
  }
  const mask = parsed.prefix === 0 ? 0 : (0xffffffff << (32 - parsed.prefix)) >>> 0;
  return `${fromInt((toInt(parsed.address) & mask) >>> 0)}/${parsed.prefix}`;
}
