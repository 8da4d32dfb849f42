// Target enumeration types

/** An IPv4 address as an unsigned 32-bit integer. */
export type TargetAddress = number;

export interface Cidr {
  network: TargetAddress;
  prefixLength: number;
}

export type AddressSpec =
  | { kind: 'single'; address: TargetAddress }
  | ({ kind: 'cidr' } & Cidr)
  | { kind: 'range'; start: TargetAddress; end: TargetAddress }
  | { kind: 'prefix-list'; prefixes: readonly Cidr[] };

export interface ExpansionOptions {
  /** Take only the first N host addresses of each CIDR or listed prefix. */
  samplePerPrefix?: number | undefined;
}

/** Inclusive interval of addresses. */
export interface AddressInterval {
  first: TargetAddress;
  last: TargetAddress;
}

export interface PortRange {
  lo: number;
  hi: number;
}

export type PortSpec =
  | { kind: 'list'; ports: readonly number[] }
  | { kind: 'ranges'; ranges: readonly PortRange[] }
  | { kind: 'all' };

export interface PrefixListParseResult {
  spec: Extract<AddressSpec, { kind: 'prefix-list' }>;
  skipped: string[];
}
