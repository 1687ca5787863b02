/**
 * Mandi Price Client
 * data.gov.in daily mandi (wholesale market) prices, normalized to MarketRecord
 */

import { z } from 'zod';
import { CircuitBreaker } from '../circuit-breaker/circuit-breaker.manager';
import { CircuitBreakerConfig, CircuitBreakerStats } from '../circuit-breaker/circuit-breaker.types';
import { capitalize } from '../utils/text';
import { fetchJson } from './http';
import { UpstreamError, UpstreamErrorType, classifyUpstreamError } from './upstream.errors';
import { IMarketProvider, MarketQuery, MarketRecord } from './upstream.types';

const PROVIDER = 'data.gov.in';
const DEFAULT_UNIT = 'Rs/Quintal';

const text = z.string().optional();
const price = z.union([z.string(), z.number()]).nullable().optional();

const mandiRecordSchema = z.object({
  state: text,
  state_name: text,
  district: text,
  market: text,
  market_name: text,
  commodity: text,
  variety: text,
  arrival_date: text,
  min_price: price,
  max_price: price,
  modal_price: price,
  price_unit: text,
});

const mandiResponseSchema = z.object({
  records: z.array(mandiRecordSchema).default([]),
});

export type MandiRecord = z.infer<typeof mandiRecordSchema>;

export interface MandiClientConfig {
  apiUrl: string;
  apiKey?: string;
  timeoutMs: number;
  circuitBreaker?: CircuitBreakerConfig;
}

export function toPrice(value: string | number | null | undefined): number | null {
  if (value === null || value === undefined || value === '') {
    return null;
  }
  const parsed = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Map a raw data.gov.in record onto MarketRecord
 */
export function normalizeMandiRecord(record: MandiRecord, commodity?: string): MarketRecord {
  return {
    state: record.state || record.state_name || '',
    district: record.district || '',
    market: record.market || record.market_name || '',
    commodity: commodity ? capitalize(commodity) : record.commodity || 'Unknown',
    variety: record.variety || '',
    arrival_date: record.arrival_date || '',
    min_price: toPrice(record.min_price),
    max_price: toPrice(record.max_price),
    modal_price: toPrice(record.modal_price),
    unit: record.price_unit || DEFAULT_UNIT,
  };
}

export class MandiClient implements IMarketProvider {
  private config: MandiClientConfig;
  private breaker: CircuitBreaker<[MarketQuery], MarketRecord[]>;

  constructor(config: MandiClientConfig) {
    this.config = config;
    this.breaker = new CircuitBreaker((query: MarketQuery) => this.fetchRecords(query), {
      name: PROVIDER,
      timeout: config.timeoutMs + 1000,
      ...config.circuitBreaker,
    });
  }

  isAvailable(): boolean {
    return !!this.config.apiKey;
  }

  async getRecords(query: MarketQuery): Promise<MarketRecord[]> {
    if (!this.config.apiKey) {
      throw new UpstreamError(PROVIDER, UpstreamErrorType.NOT_CONFIGURED, 'DATA_GOV_API_KEY not configured');
    }

    try {
      return await this.breaker.execute(query);
    } catch (error: unknown) {
      throw classifyUpstreamError(PROVIDER, error);
    }
  }

  getBreakerStats(): CircuitBreakerStats {
    return this.breaker.getStats();
  }

  shutdown(): void {
    this.breaker.shutdown();
  }

  private async fetchRecords(query: MarketQuery): Promise<MarketRecord[]> {
    const body = await fetchJson(PROVIDER, this.config.apiUrl, {
      timeoutMs: this.config.timeoutMs,
      params: {
        'api-key': this.config.apiKey,
        format: 'json',
        limit: query.limit,
        'filters[market]': query.market,
        'filters[commodity]': query.commodity ? capitalize(query.commodity) : undefined,
      },
    });

    const parsed = mandiResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new UpstreamError(PROVIDER, UpstreamErrorType.PARSE_ERROR, `Unexpected mandi response: ${parsed.error.message}`);
    }

    if (parsed.data.records.length === 0) {
      throw new UpstreamError(PROVIDER, UpstreamErrorType.EMPTY_RESPONSE, 'No mandi records returned');
    }

    return parsed.data.records.map((record) => normalizeMandiRecord(record, query.commodity));
  }
}
