// Config schemas
export {
  ScanConfigSchema,
  type ScanConfig,
} from './config.js';

// ASN lookup schemas
export {
  AnnouncedPrefixSchema,
  AnnouncedPrefixesResponseSchema,
  type AnnouncedPrefix,
  type AnnouncedPrefixesResponse,
} from './asn.js';
