#!/usr/bin/env node
import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { main } from './cli.js';

export { main, runScan, parseCliArgs, resolveTargets, resolvePorts } from './cli.js';
export { AddressSet } from './targets/address-set.js';
export { parseAddressSpec, expandAddressSpec, expandAll, parsePrefixList } from './targets/address-space.js';
export { parsePortSpec, buildPortSet } from './targets/port-set.js';
export { AsnPrefixSource, normalizeAsn, readPrefixFile } from './targets/prefix-sources.js';
export { EndpointProber } from './scanner/endpoint-prober.js';
export { SignatureDetector } from './scanner/signature-detector.js';
export { ProbeScheduler } from './scheduler/probe-scheduler.js';
export { AdmissionControl } from './scheduler/admission.js';
export * from './utils/index.js';
export * from './schemas/index.js';
export type * from './types/index.js';

const isMainModule = process.argv[1] !== undefined
  && realpathSync(process.argv[1]) === fileURLToPath(import.meta.url);

if (isMainModule) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error('Fatal error:', error);
      process.exitCode = 1;
    });
}
