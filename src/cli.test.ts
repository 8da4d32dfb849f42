import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Writable } from 'stream';
import { main, parseCliArgs, resolvePorts, resolveTargets, runScan } from './cli.js';
import { EndpointProber } from './scanner/endpoint-prober.js';
import { InvalidSpecError, LookupFailureError } from './utils/errors.js';
import type { ScanConfig } from './schemas/config.js';
import { formatIpv4 } from './targets/ipv4.js';
import type { ProbeResponse, ProbeResult, ProbeUnit } from './types/scanner.js';

function refused(): Error {
  return Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' });
}

function scanConfig(argv: string[]): ScanConfig {
  const command = parseCliArgs(argv, {});
  if (command.kind !== 'scan') {
    throw new Error(`expected a scan command, got ${command.kind}`);
  }
  return command.config;
}

/** Only http://10.0.0.2:80/ answers; everything else refuses. */
function singleRouterProber() {
  const fetch = vi.fn(async (url: string): Promise<ProbeResponse> => {
    if (url === 'http://10.0.0.2:80/') {
      return {
        statusCode: 200,
        server: null,
        body: '<html><head><title>RouterOS router</title></head><body>RouterOS v6.48.6</body></html>',
        truncated: false,
      };
    }
    throw refused();
  });
  const probe = vi.fn(async () => {
    throw refused();
  });
  return new EndpointProber({}, { httpClient: { fetch }, tcpProber: { probe } });
}

function unreachableProber() {
  const fail = async (): Promise<never> => {
    throw Object.assign(new Error('connect EHOSTUNREACH'), { code: 'EHOSTUNREACH' });
  };
  return new EndpointProber({}, { httpClient: { fetch: vi.fn(fail) }, tcpProber: { probe: vi.fn(fail) } });
}

describe('parseCliArgs', () => {
  it('applies defaults', () => {
    const config = scanConfig(['10.0.0.0/24']);
    expect(config).toMatchObject({
      target: '10.0.0.0/24',
      allPorts: false,
      concurrency: 400,
      timeoutMs: 800,
      maxBodyBytes: 262144,
      reportOpen: false,
      logLevel: 'warn',
    });
    expect(config.ports).toBeUndefined();
    expect(config.samplePerPrefix).toBeUndefined();
  });

  it('reads flags and environment fallbacks', () => {
    const command = parseCliArgs(
      ['AS64500', '--ports', '80,8080', '--sample-per-prefix', '2', '--report-open', '--timeout-ms', '1500'],
      { WEBFIG_CONCURRENCY: '50', WEBFIG_TIMEOUT_MS: '300', LOG_LEVEL: 'debug' }
    );
    expect(command).toEqual({
      kind: 'scan',
      config: {
        target: 'AS64500',
        ports: '80,8080',
        allPorts: false,
        concurrency: 50,
        timeoutMs: 1500,
        maxBodyBytes: 262144,
        samplePerPrefix: 2,
        reportOpen: true,
        logLevel: 'debug',
      },
    });
  });

  it('recognises help and version', () => {
    expect(parseCliArgs(['--help'], {})).toEqual({ kind: 'help' });
    expect(parseCliArgs(['-V'], {})).toEqual({ kind: 'version' });
  });

  it.each([
    [['10.0.0.1', '-c', '0']],
    [['10.0.0.1', '--timeout-ms', 'soon']],
    [['10.0.0.1', '--log-level', 'loud']],
    [['10.0.0.1', '--bogus']],
    [['10.0.0.1', '10.0.0.2']],
  ])('rejects %j', (argv) => {
    expect(() => parseCliArgs(argv, {})).toThrow(InvalidSpecError);
  });
});

describe('resolvePorts', () => {
  it('uses the default ports', () => {
    expect(resolvePorts(scanConfig(['10.0.0.1']))).toEqual([80, 443, 8080]);
  });

  it('lets --all-ports win over --ports', () => {
    const ports = resolvePorts(scanConfig(['10.0.0.1', '--ports', '80', '--all-ports']));
    expect(ports).toHaveLength(65535);
    expect(ports[0]).toBe(1);
    expect(ports[65534]).toBe(65535);
  });
});

describe('resolveTargets', () => {
  it('merges the prefix file, the ASN and the target', async () => {
    const fetchPrefixes = vi.fn(async () => ['10.1.0.0/30', 'bogus']);
    const readFile = vi.fn(async () => ['# edge routers', '192.0.2.0/31', '']);

    const addresses = await resolveTargets(
      scanConfig(['10.0.0.7', '--asn', 'AS64500', '--asn-file', 'prefixes.txt']),
      { asnSource: { fetchPrefixes }, readFile }
    );

    expect(addresses.toStrings()).toEqual(['10.0.0.7', '10.1.0.1', '10.1.0.2', '192.0.2.0', '192.0.2.1']);
    expect(fetchPrefixes).toHaveBeenCalledWith('AS64500');
    expect(readFile).toHaveBeenCalledWith('prefixes.txt');
  });

  it('treats an ASN target as a lookup', async () => {
    const fetchPrefixes = vi.fn(async () => ['198.51.100.0/30']);
    const addresses = await resolveTargets(scanConfig(['as64500', '--sample-per-prefix', '1']), {
      asnSource: { fetchPrefixes },
    });

    expect(addresses.toStrings()).toEqual(['198.51.100.1']);
    expect(fetchPrefixes).toHaveBeenCalledWith('as64500');
  });

  it('propagates lookup failures', async () => {
    const fetchPrefixes = vi.fn(async (): Promise<string[]> => {
      throw new LookupFailureError('asn', 'ASN lookup for AS64500 failed: offline');
    });
    await expect(resolveTargets(scanConfig(['AS64500']), { asnSource: { fetchPrefixes } })).rejects.toThrow(
      LookupFailureError
    );
  });
});

describe('runScan', () => {
  it('prints exactly the matching endpoint', async () => {
    const lines: string[] = [];
    const summary = await runScan(scanConfig(['10.0.0.1-10.0.0.3', '--ports', '80']), {
      prober: singleRouterProber(),
      writeLine: (line) => lines.push(line),
    });

    expect(lines).toEqual(['10.0.0.2:80 -> MikroTik RouterOS v6.48.6 [200] http://10.0.0.2:80/']);
    expect(summary.units).toBe(3);
    expect(summary.matches).toBe(1);
    expect(summary.silent.refused).toBe(2);
  });

  it('checks the ports before looking up an ASN', async () => {
    const fetchPrefixes = vi.fn(async () => ['10.1.0.0/30']);

    await expect(
      runScan(scanConfig(['AS64500', '--ports', '80,70000']), { asnSource: { fetchPrefixes }, writeLine: () => undefined })
    ).rejects.toMatchObject({ name: 'InvalidPortSpecError', token: '70000' });
    expect(fetchPrefixes).not.toHaveBeenCalled();
  });

  it('stops scanning once stdout is closed by its reader', async () => {
    let writes = 0;
    const stdout = new Writable({
      write(_chunk, _encoding, callback) {
        writes++;
        callback(Object.assign(new Error('write EPIPE'), { code: 'EPIPE' }));
      },
    });
    const prober = {
      probe: vi.fn(async ({ address, port }: ProbeUnit): Promise<ProbeResult> => {
        await new Promise((resolve) => setTimeout(resolve, 1));
        return {
          kind: 'match',
          address: formatIpv4(address),
          port,
          scheme: 'http',
          statusCode: 200,
          label: 'MikroTik',
          server: null,
          title: null,
          elapsedMs: 1,
        };
      }),
    };

    const summary = await runScan(scanConfig(['10.0.0.0/24', '--ports', '80', '-c', '2']), { prober, stdout });

    expect(writes).toBe(1);
    expect(summary.units).toBeLessThan(254);
    expect(prober.probe.mock.calls.length).toBeLessThan(254);
  });

  it('rejects an empty target set', async () => {
    await expect(
      runScan(scanConfig(['AS64500']), {
        asnSource: { fetchPrefixes: vi.fn(async () => []) },
        writeLine: () => undefined,
      })
    ).rejects.toThrow('No targets to scan');
  });
});

describe('main', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('exits 0 with no output when nothing answers', async () => {
    const lines: string[] = [];
    const status = await main(['10.0.0.5/32'], { prober: unreachableProber(), writeLine: (line) => lines.push(line) });

    expect(status).toBe(0);
    expect(lines).toEqual([]);
  });

  it('prints usage for --help', async () => {
    await expect(main(['--help'])).resolves.toBe(0);
    expect(console.log).toHaveBeenCalledWith(expect.stringContaining('Usage: webfig-sweep'));
  });

  it.each([
    [['10.0.0.9-10.0.0.1']],
    [['10.0.0.1', '--ports', '0']],
    [['10.0.0.256']],
    [[]],
  ])('exits 1 for %j', async (argv) => {
    const writeLine = vi.fn();
    await expect(main(argv, { prober: unreachableProber(), writeLine })).resolves.toBe(1);
    expect(writeLine).not.toHaveBeenCalled();
  });

  it('exits 1 when an ASN announces nothing', async () => {
    const status = await main(['AS64500'], { asnSource: { fetchPrefixes: vi.fn(async () => []) } });
    expect(status).toBe(1);
    expect(console.error).toHaveBeenCalledWith('Error: No targets to scan');
  });
});
