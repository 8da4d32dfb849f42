import { describe, it, expect, vi } from 'vitest';
import { EndpointProber } from './endpoint-prober.js';
import { parseIpv4 } from '../targets/ipv4.js';
import type { ProbeResponse } from '../types/scanner.js';

function netError(code: string): Error {
  return Object.assign(new Error(`connect ${code} 10.0.0.2`), { code });
}

function page(body: string, server: string | null = null, statusCode = 200): ProbeResponse {
  return { statusCode, server, body, truncated: false };
}

const unit = (port: number) => ({ address: parseIpv4('10.0.0.2'), port });

describe('EndpointProber', () => {
  it('tries http first on ordinary ports and stops at the first match', async () => {
    const fetch = vi.fn(async (_url: string) => page('<h1>RouterOS v6.48.6</h1>'));
    const probe = vi.fn(async () => ({ banner: '', responseTimeMs: 1 }));
    const prober = new EndpointProber({}, { httpClient: { fetch }, tcpProber: { probe } });

    const result = await prober.probe(unit(8080));

    expect(result).toMatchObject({
      kind: 'match',
      address: '10.0.0.2',
      port: 8080,
      scheme: 'http',
      statusCode: 200,
      label: 'MikroTik RouterOS v6.48.6',
    });
    expect(fetch.mock.calls.map(([url]) => url)).toEqual(['http://10.0.0.2:8080/']);
    expect(probe).not.toHaveBeenCalled();
  });

  it('tries https first on TLS ports', async () => {
    const fetch = vi.fn(async (_url: string) => page('webfig'));
    const prober = new EndpointProber({}, { httpClient: { fetch }, tcpProber: { probe: vi.fn() } });

    const result = await prober.probe(unit(443));

    expect(result).toMatchObject({ kind: 'match', scheme: 'https', label: 'MikroTik WebFig' });
    expect(fetch.mock.calls.map(([url]) => url)).toEqual(['https://10.0.0.2:443/']);
  });

  it('falls back to the second scheme after a failure', async () => {
    const fetch = vi.fn(async (url: string) => {
      if (url.startsWith('http:')) throw netError('ECONNRESET');
      return page('', 'Mikrotik HttpProxy', 403);
    });
    const prober = new EndpointProber({}, { httpClient: { fetch }, tcpProber: { probe: vi.fn() } });

    const result = await prober.probe(unit(80));

    expect(result).toMatchObject({ kind: 'match', scheme: 'https', statusCode: 403, server: 'Mikrotik HttpProxy' });
    expect(fetch.mock.calls.map(([url]) => url)).toEqual(['http://10.0.0.2:80/', 'https://10.0.0.2:80/']);
  });

  it('falls back to raw TCP when neither scheme matches', async () => {
    const fetch = vi.fn(async () => page('<html>It works!</html>'));
    const probe = vi.fn(async () => ({
      banner: 'HTTP/1.0 200 OK\r\nServer: Mikrotik HttpProxy\r\n\r\n',
      responseTimeMs: 3,
    }));
    const prober = new EndpointProber({}, { httpClient: { fetch }, tcpProber: { probe } });

    const result = await prober.probe(unit(80));

    expect(result).toMatchObject({ kind: 'match', scheme: 'tcp', statusCode: 200, label: 'MikroTik' });
    expect(fetch).toHaveBeenCalledTimes(2);
    expect(probe).toHaveBeenCalledWith('10.0.0.2', 80);
  });

  it('reports an open port when only the TCP connect succeeds', async () => {
    const fetch = vi.fn(async () => {
      throw netError('ECONNRESET');
    });
    const probe = vi.fn(async () => ({ banner: '', responseTimeMs: 3 }));
    const prober = new EndpointProber({}, { httpClient: { fetch }, tcpProber: { probe } });

    await expect(prober.probe(unit(8291))).resolves.toMatchObject({ kind: 'open', address: '10.0.0.2', port: 8291 });
  });

  it('is silent with the last failure when nothing connects', async () => {
    const fetch = vi.fn(async () => {
      throw netError('ETIMEDOUT');
    });
    const probe = vi.fn(async () => {
      throw netError('ECONNREFUSED');
    });
    const prober = new EndpointProber({}, { httpClient: { fetch }, tcpProber: { probe } });

    await expect(prober.probe(unit(80))).resolves.toMatchObject({ kind: 'silent', reason: 'refused' });
  });

  it('is silent with no-match when responses carry no signature', async () => {
    const fetch = vi.fn(async () => page('<html>It works!</html>', 'Apache'));
    const probe = vi.fn(async () => {
      throw netError('ETIMEDOUT');
    });
    const prober = new EndpointProber({}, { httpClient: { fetch }, tcpProber: { probe } });

    await expect(prober.probe(unit(80))).resolves.toMatchObject({ kind: 'silent', reason: 'no-match' });
  });

  it('honours a custom TLS port list', () => {
    const prober = new EndpointProber({ tlsPorts: [9443] }, { httpClient: { fetch: vi.fn() }, tcpProber: { probe: vi.fn() } });
    expect(prober.schemeOrder(9443)).toEqual(['https', 'http']);
    expect(prober.schemeOrder(443)).toEqual(['http', 'https']);
  });
});
