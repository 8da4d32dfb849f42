import * as cheerio from 'cheerio';
import type { Detection, LabelPattern, ProbeResponse, Signature } from '../types/scanner.js';

export const VENDOR_NAME = 'mikrotik';

// Body signatures, checked in order
const BODY_SIGNATURES: Signature[] = [
  { name: 'vendor', pattern: /mikrotik/i },
  { name: 'webfig', pattern: /webfig/i },
  { name: 'routeros', pattern: /routeros/i },
];

// Most specific first; the first pattern that matches names the product
const LABEL_PATTERNS: LabelPattern[] = [
  {
    name: 'routeros-version',
    pattern: /RouterOS\s+v?(\d+(?:\.\d+)+(?:rc\d+|beta\d+)?)/i,
    template: 'MikroTik RouterOS v$1',
  },
  { name: 'routeros', pattern: /RouterOS/i, template: 'MikroTik RouterOS' },
  { name: 'webfig', pattern: /WebFig/i, template: 'MikroTik WebFig' },
];

const FALLBACK_LABEL = 'MikroTik';

const MAX_TITLE_LENGTH = 200;

export class SignatureDetector {
  private readonly signatures: Signature[];
  private readonly labelPatterns: LabelPattern[];
  private readonly vendor: string;

  constructor(options: { signatures?: Signature[]; labelPatterns?: LabelPattern[]; vendor?: string } = {}) {
    this.signatures = options.signatures ?? BODY_SIGNATURES;
    this.labelPatterns = options.labelPatterns ?? LABEL_PATTERNS;
    this.vendor = (options.vendor ?? VENDOR_NAME).toLowerCase();
  }

  /**
   * Header first, then body. A bare 200 with no signature is not a match.
   */
  detect(response: Pick<ProbeResponse, 'server' | 'body'>): Detection {
    const { server, body } = response;

    let via: 'header' | 'body' | null = null;
    if (server && server.toLowerCase().includes(this.vendor)) {
      via = 'header';
    } else if (this.signatures.some((sig) => sig.pattern.test(body))) {
      via = 'body';
    }

    if (!via) {
      return { matched: false };
    }

    return {
      matched: true,
      via,
      label: this.extractLabel(body),
      title: this.extractTitle(body),
    };
  }

  extractLabel(body: string): string {
    for (const { pattern, template } of this.labelPatterns) {
      const match = pattern.exec(body);
      if (match) {
        return template.replace(/\$(\d)/g, (_token, index: string) => match[Number(index)] ?? '');
      }
    }
    return FALLBACK_LABEL;
  }

  extractTitle(body: string): string | null {
    if (!/<title/i.test(body)) {
      return null;
    }

    const $ = cheerio.load(body);
    const title = $('title').first().text().replace(/\s+/g, ' ').trim();
    return title.length > 0 ? title.substring(0, MAX_TITLE_LENGTH) : null;
  }
}
