import http from 'http';
import https from 'https';
import axios, { type AxiosInstance, type AxiosRequestConfig } from 'axios';
import type { Readable } from 'stream';
import type { HttpProbeClientOptions, ProbeResponse } from '../types/scanner.js';

export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:128.0) Gecko/20100101 Firefox/128.0';

export const DEFAULT_MAX_BODY_BYTES = 256 * 1024;

/**
 * Read a stream until it ends, `maxBytes` have arrived, or `deadline`
 * (epoch ms) passes. Whatever arrived so far is returned; the stream is
 * destroyed in every case.
 */
export function readStreamWithLimit(
  stream: Readable,
  maxBytes: number,
  deadline: number
): Promise<{ data: string; truncated: boolean }> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let totalBytes = 0;
    let truncated = false;
    let settled = false;

    const finish = (error?: Error): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      stream.destroy();
      if (error && chunks.length === 0) {
        reject(error);
        return;
      }
      resolve({ data: Buffer.concat(chunks).toString('utf8'), truncated });
    };

    const timer = setTimeout(() => {
      truncated = true;
      finish();
    }, Math.max(0, deadline - Date.now()));

    stream.on('data', (chunk: Buffer | string) => {
      const buffer = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
      const remaining = maxBytes - totalBytes;
      if (buffer.length >= remaining) {
        chunks.push(buffer.subarray(0, remaining));
        totalBytes = maxBytes;
        truncated = buffer.length > remaining;
        finish();
        return;
      }
      chunks.push(buffer);
      totalBytes += buffer.length;
    });

    stream.on('end', () => finish());
    stream.on('close', () => finish());
    stream.on('error', (err) => finish(err));
  });
}

/** Case-insensitive lookup; multi-valued headers are joined. */
export function headerValue(headers: object, name: string): string | null {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== wanted) continue;
    if (typeof value === 'string') return value;
    if (Array.isArray(value)) return value.map(String).join(', ');
    if (typeof value === 'number') return String(value);
  }
  return null;
}

export class HttpProbeClient {
  private readonly http: AxiosInstance;
  private readonly timeout: number;
  private readonly maxBodyBytes: number;
  private readonly maxRedirects: number;
  private readonly userAgent: string;
  private readonly httpAgent: http.Agent;
  private readonly httpsAgent: https.Agent;

  constructor(options: HttpProbeClientOptions = {}, instance?: AxiosInstance) {
    this.http = instance ?? axios.create();
    this.timeout = options.timeout ?? 800;
    this.maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
    this.maxRedirects = options.maxRedirects ?? 5;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;

    this.httpAgent = new http.Agent({ keepAlive: false });
    // Detection only: accept any certificate and the old TLS stacks routers ship with
    this.httpsAgent = new https.Agent({
      keepAlive: false,
      rejectUnauthorized: false,
      minVersion: 'TLSv1',
      ciphers: 'DEFAULT:@SECLEVEL=0',
    });
  }

  getRequestConfig(url: string): AxiosRequestConfig {
    return {
      url,
      method: 'GET',
      timeout: this.timeout,
      signal: AbortSignal.timeout(this.timeout),
      maxRedirects: this.maxRedirects,
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
      responseType: 'stream',
      // Any status is a response; only network failures throw
      validateStatus: () => true,
      headers: {
        'User-Agent': this.userAgent,
        'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        'Connection': 'close',
      },
    };
  }

  /**
   * GET `url` and read its body under the per-attempt deadline. Network
   * failures reject; the caller classifies them.
   */
  async fetch(url: string): Promise<ProbeResponse> {
    const deadline = Date.now() + this.timeout;
    const response = await this.http.request<Readable>(this.getRequestConfig(url));

    const { data, truncated } = await readStreamWithLimit(response.data, this.maxBodyBytes, deadline);

    return {
      statusCode: response.status,
      server: headerValue(response.headers, 'server'),
      body: data,
      truncated,
    };
  }
}
