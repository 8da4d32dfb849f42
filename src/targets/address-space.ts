import { AddressSet } from './address-set.js';
import { cidrHostInterval, formatIpv4, parseCidr, parseIpv4 } from './ipv4.js';
import { InvalidSpecError } from '../utils/errors.js';
import type {
  AddressInterval,
  AddressSpec,
  Cidr,
  ExpansionOptions,
  PrefixListParseResult,
} from '../types/targets.js';

/**
 * Parse one textual target: `a.b.c.d`, `a.b.c.d/n` or `a.b.c.d-e.f.g.h`.
 */
export function parseAddressSpec(text: string): AddressSpec {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    throw new InvalidSpecError('Empty target specification');
  }

  if (trimmed.includes('/')) {
    return { kind: 'cidr', ...parseCidr(trimmed) };
  }

  const dash = trimmed.indexOf('-');
  if (dash !== -1) {
    const start = parseIpv4(trimmed.slice(0, dash));
    const end = parseIpv4(trimmed.slice(dash + 1));
    if (start > end) {
      throw new InvalidSpecError(
        `Invalid range: start ${formatIpv4(start)} is after end ${formatIpv4(end)}`
      );
    }
    return { kind: 'range', start, end };
  }

  return { kind: 'single', address: parseIpv4(trimmed) };
}

/**
 * Parse prefix-list lines. Blank lines and `#` comments are ignored;
 * anything else that is not an IPv4 CIDR is skipped and reported back.
 */
export function parsePrefixList(lines: Iterable<string>): PrefixListParseResult {
  const prefixes: Cidr[] = [];
  const skipped: string[] = [];

  for (const raw of lines) {
    const line = raw.trim();
    if (line.length === 0 || line.startsWith('#')) continue;

    try {
      prefixes.push(parseCidr(line));
    } catch {
      skipped.push(line);
    }
  }

  return { spec: { kind: 'prefix-list', prefixes }, skipped };
}

function prefixInterval(cidr: Cidr, options: ExpansionOptions): AddressInterval {
  const hosts = cidrHostInterval(cidr);
  const sample = options.samplePerPrefix;
  if (sample === undefined) {
    return hosts;
  }
  return { first: hosts.first, last: Math.min(hosts.last, hosts.first + sample - 1) };
}

export function expandAddressSpec(spec: AddressSpec, options: ExpansionOptions = {}): AddressSet {
  if (options.samplePerPrefix !== undefined && !(Number.isInteger(options.samplePerPrefix) && options.samplePerPrefix >= 1)) {
    throw new InvalidSpecError(`Invalid sample size: ${options.samplePerPrefix}`);
  }

  switch (spec.kind) {
    case 'single':
      return AddressSet.of(spec.address);
    case 'cidr':
      return AddressSet.fromIntervals([prefixInterval(spec, options)]);
    case 'range':
      if (spec.start > spec.end) {
        throw new InvalidSpecError(
          `Invalid range: start ${formatIpv4(spec.start)} is after end ${formatIpv4(spec.end)}`
        );
      }
      return AddressSet.fromIntervals([{ first: spec.start, last: spec.end }]);
    case 'prefix-list':
      return AddressSet.fromIntervals(spec.prefixes.map((prefix) => prefixInterval(prefix, options)));
  }
}

/** Expand several specs into one deduplicated set. */
export function expandAll(specs: readonly AddressSpec[], options: ExpansionOptions = {}): AddressSet {
  return AddressSet.union(...specs.map((spec) => expandAddressSpec(spec, options)));
}
