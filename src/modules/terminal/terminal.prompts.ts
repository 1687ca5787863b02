/**
 * Terminal Prompts
 */

import { MarketRecord, WeatherReport } from '../../lib/upstream/upstream.types';
import { PriceForecastPoint, PriceSummary } from './terminal.types';

export interface TerminalInsightContext {
  commodity: string;
  location: string;
  harvestDays: number;
  summary: PriceSummary;
  market: MarketRecord[];
  forecast: PriceForecastPoint[];
  weather: WeatherReport;
}

export function buildTerminalInsightPrompt(context: TerminalInsightContext): string {
  return `You are a commodity market analyst advising Indian farmers and traders.
Commodity: ${context.commodity}
Location: ${context.location}
Days until harvest: ${context.harvestDays}
Price summary (Rs/Quintal): ${JSON.stringify(context.summary)}
Mandi records: ${JSON.stringify(context.market.slice(0, 10))}
7-day price forecast: ${JSON.stringify(context.forecast)}
Weather: ${JSON.stringify(context.weather.current)}

Reply strictly with one JSON object of this shape:
{
  "recommendation": { "action": "BUY | SELL | HOLD", "confidence": 0-100, "reason": "..." },
  "yield_outlook": { "change_percent": "+2.5%", "factors": ["..."] },
  "price_forecast_comment": "...",
  "market_sentiment": { "overall": "bullish | bearish | neutral", "keywords": ["..."] },
  "optimal_market": { "sell_high": ["market names"], "buy_low": ["market names"] },
  "ai_summary": "two sentences",
  "reason": "one sentence"
}`;
}
