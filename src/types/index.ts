// Target types
export type {
  TargetAddress,
  Cidr,
  AddressSpec,
  ExpansionOptions,
  AddressInterval,
  PortRange,
  PortSpec,
  PrefixListParseResult,
} from './targets.js';

// Scanner types
export type {
  ProbeScheme,
  SilentReason,
  ProbeUnit,
  MatchResult,
  OpenResult,
  SilentResult,
  ProbeResult,
  ProbeResponse,
  Signature,
  LabelPattern,
  Detection,
  HttpProbeClientOptions,
  TcpProbeOptions,
  EndpointProberOptions,
  ProbeSchedulerOptions,
  ScanSummary,
} from './scanner.js';
