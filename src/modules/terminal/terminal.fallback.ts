/**
 * Terminal fallbacks
 */

import { TerminalInsight } from './terminal.types';

export function fallbackTerminalInsight(): TerminalInsight {
  return {
    recommendation: {
      action: 'HOLD',
      confidence: 75,
      reason: 'Market stable, minor price movement expected.',
    },
    yield_outlook: { change_percent: '+0.0%', factors: ['stable weather'] },
    price_forecast_comment: 'Prices likely steady for next week.',
    market_sentiment: { overall: 'neutral', keywords: ['steady', 'stable'] },
    optimal_market: { sell_high: [], buy_low: [] },
    ai_summary: 'Market remains stable with no major risk detected.',
    reason: 'Stable prices and normal conditions.',
  };
}

export function fallbackInternationalOptions(): { commodities: string[]; ports: string[] } {
  return {
    commodities: ['Wheat', 'Rice', 'Maize', 'Soybean'],
    ports: ['Mumbai Port', 'Kandla', 'Chennai', 'Novorossiysk'],
  };
}
