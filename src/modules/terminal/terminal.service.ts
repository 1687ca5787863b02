/**
 * Terminal Service
 * Assembles the market terminal snapshot for one commodity
 */

import { ITextGenerator } from '../../lib/gemini';
import { IMarketProvider, IWeatherProvider, MarketRecord } from '../../lib/upstream/upstream.types';
import {
  BASELINE_PRICE,
  demoMarketRecord,
  fallbackMandiRecords,
  fallbackWeather,
  withFallback,
} from '../../lib/fallback';
import { addDays, formatDisplayTimestamp, formatIsoDate } from '../../lib/utils/date';
import { capitalize } from '../../lib/utils/text';
import { fallbackTerminalInsight } from './terminal.fallback';
import { buildTerminalInsightPrompt } from './terminal.prompts';
import { terminalInsightSchema } from './terminal.validation';
import { PriceForecastPoint, PriceSummary, TerminalParams, TerminalSnapshot } from './terminal.types';

const RECORD_LIMIT = 200;
const FORECAST_DAYS = 7;
const FORECAST_SPREAD = 50; // ± Rs/Quintal around the median

export interface TerminalServiceDeps {
  weather: IWeatherProvider;
  market: IMarketProvider;
  advisor: ITextGenerator;
  clock?: () => Date;
  random?: () => number;
}

const round2 = (value: number): number => Math.round(value * 100) / 100;

/**
 * Positive modal prices of the given records
 */
export function modalPrices(records: MarketRecord[]): number[] {
  return records
    .map((record) => record.modal_price)
    .filter((price): price is number => price !== null && price > 0);
}

export function median(values: number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[middle - 1] + sorted[middle]) / 2 : sorted[middle];
}

export function summarizePrices(commodity: string, records: MarketRecord[]): PriceSummary {
  const prices = modalPrices(records);
  const total = prices.reduce((sum, price) => sum + price, 0);

  return {
    commodity: capitalize(commodity),
    average_price: prices.length > 0 ? round2(total / prices.length) : BASELINE_PRICE,
    highest_price: prices.length > 0 ? Math.max(...prices) : 0,
    lowest_price: prices.length > 0 ? Math.min(...prices) : 0,
  };
}

/**
 * Daily forecast for the next `days` days, jittered around the median modal price
 */
export function forecastPrices(
  records: MarketRecord[],
  today: Date,
  random: () => number,
  days: number = FORECAST_DAYS
): PriceForecastPoint[] {
  const prices = modalPrices(records);
  const baseline = prices.length > 0 ? median(prices) : BASELINE_PRICE;

  return Array.from({ length: days }, (_, index) => ({
    date: formatIsoDate(addDays(today, index + 1)),
    forecast_price: round2(baseline + (random() * 2 - 1) * FORECAST_SPREAD),
  }));
}

export class TerminalService {
  private deps: TerminalServiceDeps;
  private clock: () => Date;
  private random: () => number;

  constructor(deps: TerminalServiceDeps) {
    this.deps = deps;
    this.clock = deps.clock ?? (() => new Date());
    this.random = deps.random ?? Math.random;
  }

  /**
   * Never rejects for upstream failures: mandi, weather and AI insight each
   * fall back independently.
   */
  async produceSnapshot({ commodity, location, harvestDays }: TerminalParams): Promise<TerminalSnapshot> {
    const { weather: weatherProvider, market: marketProvider, advisor } = this.deps;
    const now = this.clock();

    const [records, weather] = await Promise.all([
      withFallback(
        'Mandi',
        () => marketProvider.getRecords({ commodity, limit: RECORD_LIMIT }),
        () => fallbackMandiRecords(commodity, now)
      ),
      withFallback(
        'Weather',
        () => weatherProvider.getForecast(location),
        () => fallbackWeather(location)
      ),
    ]);

    const marketData = records.value.length > 0 ? records.value : [demoMarketRecord(commodity, now)];
    const summary = summarizePrices(commodity, marketData);
    const priceForecast = forecastPrices(marketData, now, this.random);

    const insight = await withFallback(
      'Gemini terminal insight',
      () =>
        advisor.generateJson(
          buildTerminalInsightPrompt({
            commodity: summary.commodity,
            location,
            harvestDays,
            summary,
            market: marketData,
            forecast: priceForecast,
            weather: weather.value,
          }),
          terminalInsightSchema
        ),
      fallbackTerminalInsight
    );

    return {
      timestamp: formatDisplayTimestamp(now),
      commodity: summary.commodity,
      location,
      harvest_days: harvestDays,
      summary,
      market_data: marketData,
      weather: weather.value,
      price_forecast: priceForecast,
      recommendation: insight.value.recommendation,
      yield_outlook: insight.value.yield_outlook,
      price_forecast_comment: insight.value.price_forecast_comment,
      market_sentiment: insight.value.market_sentiment,
      optimal_market: insight.value.optimal_market,
      ai_summary: insight.value.ai_summary,
      ai_reason: insight.value.reason,
      sources: {
        market: records.source,
        weather: weather.source,
        ai_insight: insight.source,
      },
    };
  }
}
