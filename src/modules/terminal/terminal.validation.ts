/**
 * Terminal request and AI reply schemas
 */

import { z } from 'zod';
import { env } from '../../config/env';
import { queryBoolean, queryPositiveInt, queryString } from '../../lib/validation';
import { TerminalInsight } from './terminal.types';

const MAX_HARVEST_DAYS = 365;

export const terminalQuerySchema = z.object({
  commodity: queryString('wheat'),
  location: queryString(env.TERMINAL_LOCATION),
  harvest_days: queryPositiveInt(MAX_HARVEST_DAYS),
  use_cache: queryBoolean(env.CACHE_READS_ENABLED),
});

export const cachedTerminalQuerySchema = z.object({
  commodity: queryString('wheat'),
  location: queryString(env.TERMINAL_LOCATION),
});

const stringList = z.array(z.string()).default([]);

const normalizedText = (transform: (value: string) => string) =>
  z.preprocess((value) => (typeof value === 'string' ? transform(value.trim()) : value), z.string());

export const terminalInsightSchema: z.ZodType<TerminalInsight, z.ZodTypeDef, unknown> = z.object({
  recommendation: z.object({
    action: normalizedText((value) => value.toUpperCase()).pipe(z.enum(['BUY', 'SELL', 'HOLD'])),
    confidence: z.preprocess(
      (value) => (typeof value === 'string' ? parseFloat(value) : value),
      z.number().min(0).max(100)
    ),
    reason: z.string(),
  }),
  yield_outlook: z
    .object({
      change_percent: z
        .union([z.string(), z.number()])
        .transform((value) => (typeof value === 'number' ? `${value >= 0 ? '+' : ''}${value}%` : value)),
      factors: stringList,
    })
    .default({ change_percent: '+0.0%', factors: [] }),
  price_forecast_comment: z.string().default(''),
  market_sentiment: z
    .object({
      overall: normalizedText((value) => value.toLowerCase()).pipe(z.enum(['bullish', 'bearish', 'neutral'])).catch('neutral'),
      keywords: stringList,
    })
    .default({ overall: 'neutral', keywords: [] }),
  optimal_market: z
    .object({
      sell_high: stringList,
      buy_low: stringList,
    })
    .default({ sell_high: [], buy_low: [] }),
  ai_summary: z.string().min(1),
  reason: z.string().default(''),
});
