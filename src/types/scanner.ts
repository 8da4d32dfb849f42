// Probe and scan types

export type ProbeScheme = 'http' | 'https' | 'tcp';

export type SilentReason =
  | 'timeout'
  | 'refused'
  | 'unreachable'
  | 'reset'
  | 'protocol'
  | 'no-match'
  | 'error';

export interface ProbeUnit {
  address: number;
  port: number;
}

export interface MatchResult {
  kind: 'match';
  address: string;
  port: number;
  scheme: ProbeScheme;
  statusCode: number | null;
  label: string;
  server: string | null;
  title: string | null;
  elapsedMs: number;
}

export interface OpenResult {
  kind: 'open';
  address: string;
  port: number;
  elapsedMs: number;
}

export interface SilentResult {
  kind: 'silent';
  address: string;
  port: number;
  reason: SilentReason;
  elapsedMs: number;
}

export type ProbeResult = MatchResult | OpenResult | SilentResult;

/** Whatever an attempt managed to read off the wire. */
export interface ProbeResponse {
  statusCode: number | null;
  server: string | null;
  body: string;
  truncated: boolean;
}

export interface Signature {
  name: string;
  pattern: RegExp;
}

export interface LabelPattern {
  name: string;
  pattern: RegExp;
  /** Label template; `$1`..`$9` are replaced with capture groups. */
  template: string;
}

export type Detection =
  | { matched: true; label: string; title: string | null; via: 'header' | 'body' }
  | { matched: false };

export interface HttpProbeClientOptions {
  timeout?: number | undefined;
  maxBodyBytes?: number | undefined;
  maxRedirects?: number | undefined;
  userAgent?: string | undefined;
}

export interface TcpProbeOptions {
  timeout?: number | undefined;
  maxBodyBytes?: number | undefined;
}

export interface EndpointProberOptions {
  timeout?: number | undefined;
  maxBodyBytes?: number | undefined;
  tlsPorts?: readonly number[] | undefined;
}

export interface ProbeSchedulerOptions {
  concurrency?: number | undefined;
}

export interface ScanSummary {
  units: number;
  matches: number;
  open: number;
  silent: Record<SilentReason, number>;
  peakInFlight: number;
  durationMs: number;
}
