import { DEFAULT_PORTS, MAX_PORT, MIN_PORT, isValidPort } from '../scanner/port-profiles.js';
import { InvalidPortSpecError } from '../utils/errors.js';
import type { PortRange, PortSpec } from '../types/targets.js';

const PORT_TOKEN_REGEX = /^\d{1,5}$/;

function parsePort(text: string, token: string): number {
  if (!PORT_TOKEN_REGEX.test(text)) {
    throw new InvalidPortSpecError(token, `"${text}" is not a port number`);
  }
  const port = Number(text);
  if (!isValidPort(port)) {
    throw new InvalidPortSpecError(token, `port must be between ${MIN_PORT} and ${MAX_PORT}`);
  }
  return port;
}

/**
 * Parse `80,443,8080-8090`. Single ports become one-port ranges so the
 * result is always a range list.
 */
export function parsePortSpec(text: string): PortSpec {
  const ranges: PortRange[] = [];

  for (const rawToken of text.split(',')) {
    const token = rawToken.trim();
    if (token.length === 0) continue;

    const dash = token.indexOf('-');
    if (dash === -1) {
      const port = parsePort(token, token);
      ranges.push({ lo: port, hi: port });
      continue;
    }

    const lo = parsePort(token.slice(0, dash).trim(), token);
    const hi = parsePort(token.slice(dash + 1).trim(), token);
    if (lo > hi) {
      throw new InvalidPortSpecError(token, `range start ${lo} is after end ${hi}`);
    }
    ranges.push({ lo, hi });
  }

  if (ranges.length === 0) {
    throw new InvalidPortSpecError(text, 'no ports given');
  }
  return { kind: 'ranges', ranges };
}

/** Sorted, deduplicated ports. No spec means the default WebFig ports. */
export function buildPortSet(spec?: PortSpec): number[] {
  if (!spec) {
    return [...DEFAULT_PORTS].sort((a, b) => a - b);
  }

  const ports = new Set<number>();
  switch (spec.kind) {
    case 'all':
      for (let port = MIN_PORT; port <= MAX_PORT; port++) ports.add(port);
      break;
    case 'list':
      for (const port of spec.ports) {
        if (!isValidPort(port)) {
          throw new InvalidPortSpecError(String(port), `port must be between ${MIN_PORT} and ${MAX_PORT}`);
        }
        ports.add(port);
      }
      break;
    case 'ranges':
      for (const { lo, hi } of spec.ranges) {
        if (!isValidPort(lo) || !isValidPort(hi) || lo > hi) {
          throw new InvalidPortSpecError(`${lo}-${hi}`, 'invalid range');
        }
        for (let port = lo; port <= hi; port++) ports.add(port);
      }
      break;
  }

  return [...ports].sort((a, b) => a - b);
}
