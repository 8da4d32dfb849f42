import { z } from 'zod';

// RIPEstat announced-prefixes payload; fields we do not read are stripped
export const AnnouncedPrefixSchema = z.object({
  prefix: z.string(),
});

export const AnnouncedPrefixesResponseSchema = z.object({
  status: z.string(),
  data: z.object({
    resource: z.string().optional(),
    prefixes: z.array(AnnouncedPrefixSchema),
  }),
});

export type AnnouncedPrefix = z.infer<typeof AnnouncedPrefixSchema>;
export type AnnouncedPrefixesResponse = z.infer<typeof AnnouncedPrefixesResponseSchema>;
