/**
 * Dashboard request and AI reply schemas
 */

import { z } from 'zod';
import { env } from '../../config/env';
import { queryBoolean, queryString } from '../../lib/validation';
import { CropInsight } from './dashboard.types';

export const dashboardQuerySchema = z.object({
  location: queryString(env.DASHBOARD_LOCATIONS[0]),
  use_cache: queryBoolean(env.CACHE_READS_ENABLED),
});

export const cachedDashboardQuerySchema = z.object({
  location: queryString(env.DASHBOARD_LOCATIONS[0]),
});

const confidenceSchema = z.preprocess(
  (value) => (typeof value === 'string' ? parseFloat(value) : value),
  z.number().min(0).max(100)
);

export const cropInsightsSchema: z.ZodType<CropInsight[], z.ZodTypeDef, unknown> = z
  .array(
    z.object({
      crop: z.string().min(1),
      recommendation_type: z
        .string()
        .nullish()
        .transform((value) => value ?? null),
      confidence: confidenceSchema,
      reason: z.union([z.string(), z.array(z.string())]).transform((value) => (typeof value === 'string' ? [value] : value)),
    })
  )
  .min(1);
