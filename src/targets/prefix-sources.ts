import fs from 'fs/promises';
import axios, { type AxiosInstance } from 'axios';
import { isIpv4 } from './ipv4.js';
import { AnnouncedPrefixesResponseSchema } from '../schemas/asn.js';
import { LookupFailureError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('prefix-sources');

export const RIPESTAT_BASE_URL = 'https://stat.ripe.net';

const ASN_REGEX = /^(?:AS)?(\d{1,10})$/i;
const MAX_ASN = 4294967295;

export function isAsnIdentifier(text: string): boolean {
  return /^AS\d+$/i.test(text.trim());
}

/** `AS13335`, `as13335` and `13335` all normalise to `AS13335`. */
export function normalizeAsn(text: string): string {
  const match = ASN_REGEX.exec(text.trim());
  const asn = match?.[1] !== undefined ? Number(match[1]) : NaN;
  if (!Number.isInteger(asn) || asn < 1 || asn > MAX_ASN) {
    throw new LookupFailureError('asn', `Invalid ASN identifier: "${text}"`);
  }
  return `AS${asn}`;
}

export interface AsnPrefixSourceOptions {
  baseUrl?: string | undefined;
  timeout?: number | undefined;
}

export class AsnPrefixSource {
  private readonly http: AxiosInstance;
  private readonly baseUrl: string;
  private readonly timeout: number;

  constructor(options: AsnPrefixSourceOptions = {}, instance?: AxiosInstance) {
    this.http = instance ?? axios.create();
    this.baseUrl = options.baseUrl ?? RIPESTAT_BASE_URL;
    this.timeout = options.timeout ?? 15000;
  }

  /**
   * Announced IPv4 prefixes of an AS, in the order the service lists them.
   * An AS announcing nothing yields an empty list; every failure to get an
   * answer throws LookupFailureError.
   */
  async fetchPrefixes(asnText: string): Promise<string[]> {
    const asn = normalizeAsn(asnText);
    const url = `${this.baseUrl}/data/announced-prefixes/data.json`;

    let payload: unknown;
    try {
      const response = await this.http.get<unknown>(url, {
        params: { resource: asn },
        timeout: this.timeout,
        responseType: 'json',
      });
      payload = response.data;
    } catch (error) {
      throw new LookupFailureError('asn', `ASN lookup for ${asn} failed: ${errorMessage(error)}`, { cause: error });
    }

    const parsed = AnnouncedPrefixesResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new LookupFailureError('asn', `ASN lookup for ${asn} returned a malformed response: ${parsed.error.message}`);
    }
    if (parsed.data.status !== 'ok') {
      throw new LookupFailureError('asn', `ASN lookup for ${asn} returned status "${parsed.data.status}"`);
    }

    const prefixes = parsed.data.data.prefixes
      .map(({ prefix }) => prefix)
      .filter((prefix) => isIpv4(prefix.split('/')[0] ?? ''));

    logger.info(`${asn} announces ${prefixes.length} IPv4 prefixes`);
    return prefixes;
  }
}

/** Lines of a prefix file; parsing and skipping happen downstream. */
export async function readPrefixFile(path: string): Promise<string[]> {
  try {
    const content = await fs.readFile(path, 'utf8');
    return content.split(/\r?\n/);
  } catch (error) {
    throw new LookupFailureError('file', `Failed to read prefix file ${path}: ${errorMessage(error)}`, { cause: error });
  }
}
