import net from 'net';
import { DEFAULT_MAX_BODY_BYTES } from './http-client.js';
import type { ProbeResponse, TcpProbeOptions } from '../types/scanner.js';

export interface TcpBanner {
  /** Whatever the peer sent back before closing, the cap, or the deadline. */
  banner: string;
  responseTimeMs: number;
}

const STATUS_LINE_REGEX = /^HTTP\/\d(?:\.\d)?\s+(\d{3})/i;

/**
 * Best-effort parse of a raw HTTP/1.x reply that may be cut off anywhere.
 */
export function parseRawHttpResponse(raw: string): ProbeResponse {
  const headerEnd = raw.search(/\r?\n\r?\n/);
  const head = headerEnd === -1 ? raw : raw.slice(0, headerEnd);
  const body = headerEnd === -1 ? '' : raw.slice(headerEnd).replace(/^\r?\n\r?\n/, '');

  const lines = head.split(/\r?\n/);
  const statusMatch = STATUS_LINE_REGEX.exec(lines[0] ?? '');
  if (!statusMatch) {
    // Not HTTP; treat the whole banner as the body
    return { statusCode: null, server: null, body: raw, truncated: false };
  }

  let server: string | null = null;
  for (const line of lines.slice(1)) {
    const colon = line.indexOf(':');
    if (colon !== -1 && line.slice(0, colon).trim().toLowerCase() === 'server') {
      server = line.slice(colon + 1).trim();
      break;
    }
  }

  return { statusCode: Number(statusMatch[1]), server, body, truncated: false };
}

export class TcpProber {
  private readonly timeout: number;
  private readonly maxBodyBytes: number;

  constructor(options: TcpProbeOptions = {}) {
    this.timeout = options.timeout ?? 800;
    this.maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
  }

  getProbeString(host: string, port: number): string {
    return `GET / HTTP/1.0\r\nHost: ${host}:${port}\r\nConnection: close\r\n\r\n`;
  }

  /**
   * Connect, send a bare HTTP/1.0 request and grab what comes back. Rejects
   * only when the connection itself fails; once connected, resets and the
   * deadline end the read and resolve with the partial banner.
   */
  probe(host: string, port: number): Promise<TcpBanner> {
    const startTime = Date.now();

    return new Promise((resolve, reject) => {
      const socket = net.createConnection({ host, port });
      const chunks: Buffer[] = [];
      let totalBytes = 0;
      let connected = false;
      let settled = false;

      const finish = (error?: Error): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        socket.destroy();

        if (!connected) {
          reject(error ?? new Error('Socket closed before connecting'));
          return;
        }
        resolve({
          banner: Buffer.concat(chunks).toString('utf8'),
          responseTimeMs: Date.now() - startTime,
        });
      };

      const timer = setTimeout(() => {
        const error: NodeJS.ErrnoException = new Error(`connect ETIMEDOUT ${host}:${port}`);
        error.code = 'ETIMEDOUT';
        finish(error);
      }, this.timeout);

      socket.once('connect', () => {
        connected = true;
        socket.write(this.getProbeString(host, port));
      });

      socket.on('data', (chunk: Buffer) => {
        const remaining = this.maxBodyBytes - totalBytes;
        chunks.push(chunk.length > remaining ? chunk.subarray(0, remaining) : chunk);
        totalBytes += Math.min(chunk.length, remaining);
        if (totalBytes >= this.maxBodyBytes) {
          finish();
        }
      });

      socket.once('end', () => finish());
      socket.once('close', () => finish());
      socket.once('error', (err) => finish(err));
    });
  }
}
