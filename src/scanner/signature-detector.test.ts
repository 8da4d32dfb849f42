import { describe, it, expect } from 'vitest';
import { SignatureDetector } from './signature-detector.js';

const detector = new SignatureDetector();

describe('SignatureDetector', () => {
  it('matches on the vendor name in the body despite a generic Server header', () => {
    expect(detector.detect({ server: 'nginx', body: '<p>Welcome to your MikroTik device</p>' })).toEqual({
      matched: true,
      via: 'body',
      label: 'MikroTik',
      title: null,
    });
  });

  it('matches on the Server header alone', () => {
    expect(detector.detect({ server: 'Mikrotik HttpProxy', body: '' })).toEqual({
      matched: true,
      via: 'header',
      label: 'MikroTik',
      title: null,
    });
  });

  it('prefers the header stage when both header and body match', () => {
    const detection = detector.detect({ server: 'MIKROTIK', body: 'webfig' });
    expect(detection).toMatchObject({ matched: true, via: 'header', label: 'MikroTik WebFig' });
  });

  it('does not match a plain successful page', () => {
    expect(detector.detect({ server: 'Apache', body: '<html><title>Welcome</title>It works!</html>' })).toEqual({
      matched: false,
    });
    expect(detector.detect({ server: null, body: '' })).toEqual({ matched: false });
  });

  it('prefers a product and version label over the bare product name', () => {
    const body = [
      '<html><head><title>',
      '  RouterOS router configuration page',
      '</title></head>',
      '<body><a href="/webfig/">WebFig</a><h1>RouterOS v7.12.1</h1></body></html>',
    ].join('\n');

    expect(detector.detect({ server: null, body })).toEqual({
      matched: true,
      via: 'body',
      label: 'MikroTik RouterOS v7.12.1',
      title: 'RouterOS router configuration page',
    });
  });

  it('falls back through the label patterns in order', () => {
    expect(detector.extractLabel('routeros configuration')).toBe('MikroTik RouterOS');
    expect(detector.extractLabel('<title>WebFig</title>')).toBe('MikroTik WebFig');
    expect(detector.extractLabel('mikrotik')).toBe('MikroTik');
    expect(detector.extractLabel('RouterOS 6.49.7 (long-term)')).toBe('MikroTik RouterOS v6.49.7');
  });

  it('accepts custom signatures', () => {
    const custom = new SignatureDetector({
      vendor: 'acme',
      signatures: [{ name: 'acme', pattern: /acme console/i }],
      labelPatterns: [{ name: 'acme-version', pattern: /Acme OS (\d+)/i, template: 'Acme OS $1' }],
    });
    expect(custom.detect({ server: null, body: 'ACME Console - Acme OS 4' })).toMatchObject({
      matched: true,
      label: 'Acme OS 4',
    });
    expect(custom.detect({ server: null, body: 'MikroTik' })).toEqual({ matched: false });
  });
});
