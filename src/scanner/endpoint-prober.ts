import { HttpProbeClient } from './http-client.js';
import { TcpProber, parseRawHttpResponse } from './tcp-prober.js';
import { SignatureDetector } from './signature-detector.js';
import { TLS_PORTS, isTlsPort } from './port-profiles.js';
import { formatIpv4 } from '../targets/ipv4.js';
import { createLogger } from '../utils/logger.js';
import { classifyProbeError, errorMessage } from '../utils/errors.js';
import type {
  EndpointProberOptions,
  ProbeResponse,
  ProbeResult,
  ProbeScheme,
  ProbeUnit,
  SilentReason,
} from '../types/scanner.js';

const logger = createLogger('prober');

interface ProbeAttempt {
  scheme: ProbeScheme;
  run: () => Promise<ProbeResponse>;
}

export interface EndpointProberDeps {
  httpClient?: Pick<HttpProbeClient, 'fetch'>;
  tcpProber?: Pick<TcpProber, 'probe'>;
  detector?: SignatureDetector;
}

export interface ProbeTarget {
  probe(unit: ProbeUnit): Promise<ProbeResult>;
}

export class EndpointProber implements ProbeTarget {
  private readonly httpClient: Pick<HttpProbeClient, 'fetch'>;
  private readonly tcpProber: Pick<TcpProber, 'probe'>;
  private readonly detector: SignatureDetector;
  private readonly tlsPorts: readonly number[];

  constructor(options: EndpointProberOptions = {}, deps: EndpointProberDeps = {}) {
    const timeout = options.timeout ?? 800;
    this.httpClient = deps.httpClient ?? new HttpProbeClient({ timeout, maxBodyBytes: options.maxBodyBytes });
    this.tcpProber = deps.tcpProber ?? new TcpProber({ timeout, maxBodyBytes: options.maxBodyBytes });
    this.detector = deps.detector ?? new SignatureDetector();
    this.tlsPorts = options.tlsPorts ?? TLS_PORTS;
  }

  /** Likeliest scheme first; both are always tried before falling back to raw TCP. */
  schemeOrder(port: number): ['http' | 'https', 'http' | 'https'] {
    return isTlsPort(port, this.tlsPorts) ? ['https', 'http'] : ['http', 'https'];
  }

  planAttempts(host: string, port: number): ProbeAttempt[] {
    const httpAttempts = this.schemeOrder(port).map((scheme): ProbeAttempt => ({
      scheme,
      run: () => this.httpClient.fetch(`${scheme}://${host}:${port}/`),
    }));

    return [
      ...httpAttempts,
      {
        scheme: 'tcp',
        run: async () => parseRawHttpResponse((await this.tcpProber.probe(host, port)).banner),
      },
    ];
  }

  /**
   * Run the attempts in order and stop at the first match. Never rejects:
   * every failure ends up as a silent result.
   */
  async probe(unit: ProbeUnit): Promise<ProbeResult> {
    const { port } = unit;
    const address = formatIpv4(unit.address);
    const startTime = Date.now();

    let responded = false;
    let tcpConnected = false;
    let lastFailure: SilentReason = 'error';

    for (const attempt of this.planAttempts(address, port)) {
      let response: ProbeResponse;
      try {
        response = await attempt.run();
      } catch (error) {
        lastFailure = classifyProbeError(error);
        logger.debug(`${attempt.scheme}://${address}:${port}/ failed`, { reason: lastFailure, error: errorMessage(error) });
        continue;
      }

      responded = true;
      if (attempt.scheme === 'tcp') {
        tcpConnected = true;
      }

      const detection = this.detector.detect(response);
      if (detection.matched) {
        return {
          kind: 'match',
          address,
          port,
          scheme: attempt.scheme,
          statusCode: response.statusCode,
          label: detection.label,
          server: response.server,
          title: detection.title,
          elapsedMs: Date.now() - startTime,
        };
      }

      logger.debug(`${attempt.scheme}://${address}:${port}/ answered without a signature`, {
        status: response.statusCode,
      });
    }

    const elapsedMs = Date.now() - startTime;
    if (tcpConnected) {
      return { kind: 'open', address, port, elapsedMs };
    }
    return { kind: 'silent', address, port, reason: responded ? 'no-match' : lastFailure, elapsedMs };
  }
}
