export type NetworkRangeSource = 'argument' | 'default-route' | 'global-address' | 'manual';

export interface NetworkRange {
  /** IPv4 block in CIDR notation, normalized to its network address */
  cidr: string;
  source: NetworkRangeSource;
}

export interface DiscoveredHost {
  address: string;
  hostname?: string;
}
