import { z } from 'zod';
import { LOG_LEVELS } from '../utils/logger.js';

export const ScanConfigSchema = z.object({
  target: z.string().trim().min(1).optional(),
  ports: z.string().optional(),
  allPorts: z.boolean().default(false),
  concurrency: z.coerce.number().int().min(1).default(400),
  timeoutMs: z.coerce.number().int().min(1).default(800),
  maxBodyBytes: z.coerce.number().int().min(1).default(256 * 1024),
  asn: z.string().trim().min(1).optional(),
  asnFile: z.string().min(1).optional(),
  samplePerPrefix: z.coerce.number().int().min(1).optional(),
  reportOpen: z.boolean().default(false),
  logLevel: z.enum(LOG_LEVELS).default('warn'),
  logFile: z.string().min(1).optional(),
});

export type ScanConfig = z.infer<typeof ScanConfigSchema>;
