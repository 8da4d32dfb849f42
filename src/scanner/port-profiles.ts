// Ports WebFig is served on when no port list is given
export const DEFAULT_PORTS: readonly number[] = [80, 443, 8080];

// Ports where TLS is the likelier transport, so https is tried first
export const TLS_PORTS: readonly number[] = [443, 4443, 8443, 10443];

export const MIN_PORT = 1;
export const MAX_PORT = 65535;

export function isTlsPort(port: number, tlsPorts: readonly number[] = TLS_PORTS): boolean {
  return tlsPorts.includes(port);
}

export function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= MIN_PORT && port <= MAX_PORT;
}
