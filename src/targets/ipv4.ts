import { InvalidSpecError } from '../utils/errors.js';
import type { AddressInterval, Cidr, TargetAddress } from '../types/targets.js';

const DOTTED_QUAD_REGEX = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;

/**
 * Parse a dotted-quad IPv4 address. Octets must be decimal 0-255 without
 * leading zeros, so "010.0.0.1" is rejected rather than read as octal.
 */
export function parseIpv4(text: string): TargetAddress {
  const match = DOTTED_QUAD_REGEX.exec(text.trim());
  if (!match) {
    throw new InvalidSpecError(`Invalid IPv4 address: "${text}"`);
  }

  let value = 0;
  for (const octetText of match.slice(1)) {
    if (octetText.length > 1 && octetText.startsWith('0')) {
      throw new InvalidSpecError(`Invalid IPv4 address: "${text}"`);
    }
    const octet = Number(octetText);
    if (octet > 255) {
      throw new InvalidSpecError(`Invalid IPv4 address: "${text}"`);
    }
    value = value * 256 + octet;
  }
  return value;
}

export function isIpv4(text: string): boolean {
  try {
    parseIpv4(text);
    return true;
  } catch {
    return false;
  }
}

export function formatIpv4(address: TargetAddress): string {
  return [address >>> 24, (address >>> 16) & 255, (address >>> 8) & 255, address & 255].join('.');
}

export function prefixMask(prefixLength: number): number {
  return prefixLength === 0 ? 0 : (~0 << (32 - prefixLength)) >>> 0;
}

/** Parse `a.b.c.d/n`; host bits of the address are masked off. */
export function parseCidr(text: string): Cidr {
  const trimmed = text.trim();
  const slash = trimmed.indexOf('/');
  if (slash === -1) {
    throw new InvalidSpecError(`Invalid CIDR (missing prefix length): "${text}"`);
  }

  const address = parseIpv4(trimmed.slice(0, slash));
  const lengthText = trimmed.slice(slash + 1);
  if (!/^\d{1,2}$/.test(lengthText) || Number(lengthText) > 32) {
    throw new InvalidSpecError(`Invalid CIDR prefix length: "${text}"`);
  }

  const prefixLength = Number(lengthText);
  return { network: (address & prefixMask(prefixLength)) >>> 0, prefixLength };
}

/**
 * Usable host addresses of a block. Up to /30 the network and broadcast
 * addresses are excluded; a /31 yields both of its addresses (RFC 3021
 * point-to-point) and a /32 yields its single address.
 */
export function cidrHostInterval(cidr: Cidr): AddressInterval {
  const size = 2 ** (32 - cidr.prefixLength);
  const first = cidr.network;
  const last = first + size - 1;

  if (cidr.prefixLength >= 31) {
    return { first, last };
  }
  return { first: first + 1, last: last - 1 };
}

export function cidrHostCount(prefixLength: number): number {
  if (prefixLength >= 31) {
    return 2 ** (32 - prefixLength);
  }
  return 2 ** (32 - prefixLength) - 2;
}
