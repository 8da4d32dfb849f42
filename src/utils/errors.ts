import type { SilentReason } from '../types/scanner.js';

export type ScanErrorCode = 'INVALID_SPEC' | 'INVALID_PORT_SPEC' | 'LOOKUP_FAILURE';

export class ScanError extends Error {
  readonly code: ScanErrorCode;

  constructor(code: ScanErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ScanError';
    this.code = code;
  }
}

/** Address, range, CIDR or option syntax that cannot be parsed. */
export class InvalidSpecError extends ScanError {
  constructor(message: string, code: ScanErrorCode = 'INVALID_SPEC') {
    super(code, message);
    this.name = 'InvalidSpecError';
  }
}

export class InvalidPortSpecError extends InvalidSpecError {
  readonly token: string;

  constructor(token: string, reason: string) {
    super(`Invalid port specification "${token}": ${reason}`, 'INVALID_PORT_SPEC');
    this.name = 'InvalidPortSpecError';
    this.token = token;
  }
}

/** An ASN lookup or prefix file that could not be read. */
export class LookupFailureError extends ScanError {
  readonly source: string;

  constructor(source: string, message: string, options?: ErrorOptions) {
    super('LOOKUP_FAILURE', message, options);
    this.name = 'LookupFailureError';
    this.source = source;
  }
}

// Checked in order; the first pattern found in the error code or message wins
const PROBE_FAILURE_PATTERNS: Array<{ pattern: string; reason: SilentReason }> = [
  { pattern: 'ECONNREFUSED', reason: 'refused' },
  { pattern: 'Connection refused', reason: 'refused' },
  { pattern: 'ETIMEDOUT', reason: 'timeout' },
  { pattern: 'ECONNABORTED', reason: 'timeout' },
  { pattern: 'ERR_CANCELED', reason: 'timeout' },
  { pattern: 'AbortError', reason: 'timeout' },
  { pattern: 'timeout', reason: 'timeout' },
  { pattern: 'EHOSTUNREACH', reason: 'unreachable' },
  { pattern: 'ENETUNREACH', reason: 'unreachable' },
  { pattern: 'EADDRNOTAVAIL', reason: 'unreachable' },
  { pattern: 'ECONNRESET', reason: 'reset' },
  { pattern: 'EPIPE', reason: 'reset' },
  { pattern: 'socket hang up', reason: 'reset' },
  { pattern: 'EPROTO', reason: 'protocol' },
  { pattern: 'SSL', reason: 'protocol' },
  { pattern: 'TLS', reason: 'protocol' },
  { pattern: 'HPE_', reason: 'protocol' },
  { pattern: 'Parse Error', reason: 'protocol' },
  { pattern: 'ERR_FR_TOO_MANY_REDIRECTS', reason: 'protocol' },
];

export function classifyProbeError(error: unknown): SilentReason {
  const parts: string[] = [];
  if (error instanceof Error) {
    parts.push(error.name, error.message);
    if ('code' in error && typeof error.code === 'string') {
      parts.push(error.code);
    }
  } else {
    parts.push(String(error));
  }

  const haystack = parts.join(' ').toLowerCase();
  for (const { pattern, reason } of PROBE_FAILURE_PATTERNS) {
    if (haystack.includes(pattern.toLowerCase())) {
      return reason;
    }
  }
  return 'error';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
