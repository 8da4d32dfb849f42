import { parseArgs } from 'util';
import type { Writable } from 'stream';
import { AddressSet } from './targets/address-set.js';
import { expandAddressSpec, parseAddressSpec, parsePrefixList } from './targets/address-space.js';
import { buildPortSet, parsePortSpec } from './targets/port-set.js';
import { AsnPrefixSource, isAsnIdentifier, readPrefixFile } from './targets/prefix-sources.js';
import { EndpointProber, type ProbeTarget } from './scanner/endpoint-prober.js';
import { ProbeScheduler } from './scheduler/probe-scheduler.js';
import { formatResultLine } from './output/match-line.js';
import { StreamLineWriter, type LineSink } from './output/line-writer.js';
import { ScanConfigSchema, type ScanConfig } from './schemas/config.js';
import { configureLogging, createLogger } from './utils/logger.js';
import { InvalidSpecError, ScanError, errorMessage } from './utils/errors.js';
import type { ExpansionOptions } from './types/targets.js';
import type { ScanSummary } from './types/scanner.js';

const logger = createLogger('cli');

export const VERSION = '0.1.0';

export const USAGE = `Usage: webfig-sweep [target] [options]

Scan an IPv4 address, CIDR, start-end range or ASN for MikroTik WebFig over HTTP/HTTPS.

Options:
  --ports LIST             ports to probe, e.g. "80,443,8080-8090" (default 80,443,8080)
  --all-ports              probe every port 1-65535
  -c, --concurrency N      probe units in flight at once (default 400)
  --timeout-ms N           per-attempt timeout in milliseconds (default 800)
  --asn ASN                add the announced IPv4 prefixes of an AS (e.g. AS13335)
  --asn-file PATH          add the IPv4 prefixes listed in a file, one per line
  --sample-per-prefix N    only probe the first N hosts of each CIDR or prefix
  --report-open            also print ports that accept TCP but do not match
  --max-body-bytes N       read at most N bytes of each response (default 262144)
  --log-level LEVEL        error | warn | info | debug (default warn)
  --log-file PATH          also write diagnostics to PATH
  -h, --help               show this help
  -V, --version            show the version`;

export type CliCommand = { kind: 'scan'; config: ScanConfig } | { kind: 'help' } | { kind: 'version' };

const CLI_OPTIONS = {
  'ports': { type: 'string' },
  'all-ports': { type: 'boolean' },
  'concurrency': { type: 'string', short: 'c' },
  'timeout-ms': { type: 'string' },
  'asn': { type: 'string' },
  'asn-file': { type: 'string' },
  'sample-per-prefix': { type: 'string' },
  'report-open': { type: 'boolean' },
  'max-body-bytes': { type: 'string' },
  'log-level': { type: 'string' },
  'log-file': { type: 'string' },
  'help': { type: 'boolean', short: 'h' },
  'version': { type: 'boolean', short: 'V' },
} as const;

function tokenize(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: CLI_OPTIONS, allowPositionals: true, strict: true });
  } catch (error) {
    throw new InvalidSpecError(errorMessage(error));
  }
}

export function parseCliArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): CliCommand {
  const parsed = tokenize(argv);
  const { values, positionals } = parsed;
  if (values.help) return { kind: 'help' };
  if (values.version) return { kind: 'version' };

  if (positionals.length > 1) {
    throw new InvalidSpecError(`Expected at most one target, got ${positionals.length}: ${positionals.join(' ')}`);
  }

  const result = ScanConfigSchema.safeParse({
    target: positionals[0],
    ports: values['ports'],
    allPorts: values['all-ports'] ?? false,
    concurrency: values['concurrency'] ?? env['WEBFIG_CONCURRENCY'],
    timeoutMs: values['timeout-ms'] ?? env['WEBFIG_TIMEOUT_MS'],
    maxBodyBytes: values['max-body-bytes'],
    asn: values['asn'],
    asnFile: values['asn-file'],
    samplePerPrefix: values['sample-per-prefix'],
    reportOpen: values['report-open'] ?? false,
    logLevel: values['log-level'] ?? env['LOG_LEVEL'],
    logFile: values['log-file'],
  });

  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'options'}: ${issue.message}`)
      .join('; ');
    throw new InvalidSpecError(`Invalid options: ${details}`);
  }
  return { kind: 'scan', config: result.data };
}

export interface TargetSources {
  asnSource?: Pick<AsnPrefixSource, 'fetchPrefixes'>;
  readFile?: (path: string) => Promise<string[]>;
}

async function loadPrefixLines(
  lines: string[],
  origin: string,
  options: ExpansionOptions
): Promise<AddressSet> {
  const { spec, skipped } = parsePrefixList(lines);
  if (skipped.length > 0) {
    logger.warn(`Skipped ${skipped.length} malformed prefix lines from ${origin}`, { sample: skipped.slice(0, 5) });
  }
  return expandAddressSpec(spec, options);
}

/** Union of every target the config names: prefix file, ASN, then the positional target. */
export async function resolveTargets(config: ScanConfig, sources: TargetSources = {}): Promise<AddressSet> {
  const options: ExpansionOptions = { samplePerPrefix: config.samplePerPrefix };
  const sets: AddressSet[] = [];
  const asns: string[] = [];

  if (config.asnFile) {
    const readFile = sources.readFile ?? readPrefixFile;
    sets.push(await loadPrefixLines(await readFile(config.asnFile), config.asnFile, options));
  }

  if (config.asn) asns.push(config.asn);
  if (config.target && isAsnIdentifier(config.target)) {
    asns.push(config.target);
  } else if (config.target) {
    sets.push(expandAddressSpec(parseAddressSpec(config.target), options));
  }

  if (asns.length > 0) {
    const asnSource = sources.asnSource ?? new AsnPrefixSource();
    for (const asn of asns) {
      const prefixes = await asnSource.fetchPrefixes(asn);
      if (prefixes.length === 0) {
        logger.warn(`${asn} announces no IPv4 prefixes`);
      }
      sets.push(await loadPrefixLines(prefixes, asn, options));
    }
  }

  return AddressSet.union(...sets);
}

export function resolvePorts(config: ScanConfig): number[] {
  if (config.allPorts) {
    if (config.ports) {
      logger.warn('--all-ports given; ignoring --ports');
    }
    return buildPortSet({ kind: 'all' });
  }
  return buildPortSet(config.ports !== undefined ? parsePortSpec(config.ports) : undefined);
}

export interface ScanDeps extends TargetSources {
  prober?: ProbeTarget;
  /** Receives result lines instead of `stdout`. */
  writeLine?: (line: string) => void;
  /** Where result lines go when `writeLine` is not given; defaults to process.stdout. */
  stdout?: Writable;
}

function createSink(deps: ScanDeps): { sink: LineSink; stream: StreamLineWriter | null } {
  const { writeLine } = deps;
  if (writeLine) {
    return { sink: { write: (line) => writeLine(line), closed: false }, stream: null };
  }
  const stream = new StreamLineWriter(deps.stdout ?? process.stdout);
  return { sink: stream, stream };
}

/**
 * Resolve inputs, run the scan and stream result lines. Input errors throw
 * before any probe is sent.
 */
export async function runScan(config: ScanConfig, deps: ScanDeps = {}): Promise<ScanSummary> {
  const ports = resolvePorts(config);
  const addresses = await resolveTargets(config, deps);

  if (addresses.isEmpty) {
    throw new InvalidSpecError('No targets to scan');
  }

  const { sink, stream } = createSink(deps);
  const prober = deps.prober ?? new EndpointProber({ timeout: config.timeoutMs, maxBodyBytes: config.maxBodyBytes });
  const scheduler = new ProbeScheduler(addresses, ports, prober, { concurrency: config.concurrency });

  logger.info(`Scanning ${addresses.size} addresses on ${ports.length} ports`, {
    concurrency: config.concurrency,
    timeoutMs: config.timeoutMs,
  });

  for await (const result of scheduler.run()) {
    const line = formatResultLine(result, config.reportOpen);
    if (line !== null) {
      await sink.write(line);
    }
    if (sink.closed) {
      logger.info('Output closed; stopping the scan');
      break;
    }
  }

  stream?.throwIfFailed();
  return scheduler.summary;
}

function banner(): string {
  return [
    '============================================================',
    `   webfig-sweep ${VERSION} - MikroTik WebFig scanner`,
    '============================================================',
  ].join('\n');
}

/** Returns the process exit status. */
export async function main(argv: string[], deps: ScanDeps = {}): Promise<number> {
  try {
    const command = parseCliArgs(argv);
    if (command.kind === 'help') {
      console.log(USAGE);
      return 0;
    }
    if (command.kind === 'version') {
      console.log(VERSION);
      return 0;
    }

    const { config } = command;
    configureLogging({ level: config.logLevel, logFile: config.logFile });
    if (!config.target && !config.asn && !config.asnFile) {
      throw new InvalidSpecError('No target given');
    }

    console.error(banner());
    const summary = await runScan(config, deps);
    console.error(
      `Done: ${summary.units} units, ${summary.matches} matches, ${summary.open} open, ${Math.round(summary.durationMs / 1000)}s`
    );
    return 0;
  } catch (error) {
    if (error instanceof ScanError) {
      console.error(`Error: ${error.message}`);
      return 1;
    }
    throw error;
  }
}
