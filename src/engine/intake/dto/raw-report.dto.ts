import { z } from 'zod';
import { SEVERITY } from '../../../db/types/index.js';

const RegionLocationSchema = z.object({
  region: z.string().trim().min(1).max(64),
});

const PointLocationSchema = z.object({
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
});

export const RawReportSchema = z.object({
  hazardType: z.string().trim().min(1).max(64),
  location: z.union([RegionLocationSchema, PointLocationSchema]),
  severity: z
    .string()
    .transform((v) => v.trim().toLowerCase())
    .pipe(z.enum(SEVERITY)),
  timestamp: z.union([
    z.string().datetime({ offset: true }),
    z.number().int().nonnegative(),
  ]),
  source: z.string().trim().min(1).max(120),
  description: z.string().trim().max(2000).optional(),
});

export type RawReport = z.input<typeof RawReportSchema>;
export type ParsedReport = z.output<typeof RawReportSchema>;
