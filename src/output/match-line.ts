import type { ProbeResult } from '../types/scanner.js';

/**
 * `<address>:<port> -> <label> [<status-or-"tcp">] <scheme>://<address>:<port>/`
 * for matches, and the same shape for open ports when those are reported.
 * Silent results print nothing.
 */
export function formatResultLine(result: ProbeResult, reportOpen = false): string | null {
  const endpoint = `${result.address}:${result.port}`;

  switch (result.kind) {
    case 'match': {
      const status = result.scheme === 'tcp' || result.statusCode === null ? 'tcp' : String(result.statusCode);
      return `${endpoint} -> ${result.label} [${status}] ${result.scheme}://${endpoint}/`;
    }
    case 'open':
      return reportOpen ? `${endpoint} -> open [tcp] tcp://${endpoint}/` : null;
    case 'silent':
      return null;
  }
}
