/**
 * Terminal Module Types
 * Declared as type aliases so snapshots stay assignable to JsonObject
 */

import { DataSource } from '../../lib/fallback';
import { MarketRecord, WeatherReport } from '../../lib/upstream/upstream.types';

export type PriceSummary = {
  commodity: string;
  average_price: number;
  highest_price: number;
  lowest_price: number;
};

export type PriceForecastPoint = {
  date: string; // yyyy-mm-dd
  forecast_price: number;
};

export type TradeAction = 'BUY' | 'SELL' | 'HOLD';

export type TerminalInsight = {
  recommendation: {
    action: TradeAction;
    confidence: number;
    reason: string;
  };
  yield_outlook: {
    change_percent: string;
    factors: string[];
  };
  price_forecast_comment: string;
  market_sentiment: {
    overall: 'bullish' | 'bearish' | 'neutral';
    keywords: string[];
  };
  optimal_market: {
    sell_high: string[];
    buy_low: string[];
  };
  ai_summary: string;
  reason: string;
};

export type TerminalSources = {
  market: DataSource;
  weather: DataSource;
  ai_insight: DataSource;
};

export type TerminalSnapshot = {
  timestamp: string;
  commodity: string;
  location: string;
  harvest_days: number;
  summary: PriceSummary;
  market_data: MarketRecord[];
  weather: WeatherReport;
  price_forecast: PriceForecastPoint[];
  recommendation: TerminalInsight['recommendation'];
  yield_outlook: TerminalInsight['yield_outlook'];
  price_forecast_comment: string;
  market_sentiment: TerminalInsight['market_sentiment'];
  optimal_market: TerminalInsight['optimal_market'];
  ai_summary: string;
  ai_reason: string;
  sources: TerminalSources;
};

export interface TerminalParams {
  commodity: string;
  location: string;
  harvestDays: number;
}

export type InternationalOptions = {
  commodities: string[];
  ports: string[];
  source: DataSource;
};
