/**
 * Test Fixtures
 * Reusable test data
 */

import { MarketRecord, WeatherReport } from '../../lib/upstream/upstream.types';

export function weatherReportFixture(location: string = 'Indore'): WeatherReport {
  return {
    location,
    country: 'India',
    current: {
      temp_c: 31.5,
      condition: 'Partly cloudy',
      icon: '//cdn.example.com/116.png',
      humidity: 40,
      wind_kph: 12.2,
      precip_mm: 0,
    },
    astro: { sunrise: '06:21 AM', sunset: '05:58 PM' },
    forecast: [
      {
        date: '2026-10-19',
        avgtemp_c: 27.4,
        totalprecip_mm: 0.2,
        avghumidity: 48,
        condition: 'Sunny',
        icon: '//cdn.example.com/113.png',
        daily_chance_of_rain: 10,
      },
    ],
  };
}

export function marketRecordFixture(overrides: Partial<MarketRecord> = {}): MarketRecord {
  return {
    state: 'Madhya Pradesh',
    district: 'Indore',
    market: 'Indore',
    commodity: 'Wheat',
    variety: 'Lokwan',
    arrival_date: '19/10/2026',
    min_price: 2400,
    max_price: 2700,
    modal_price: 2600,
    unit: 'Rs/Quintal',
    ...overrides,
  };
}

/**
 * Raw WeatherAPI forecast.json body
 */
export const forecastApiBody = {
  location: { name: 'Indore', country: 'India' },
  current: {
    temp_c: 31.5,
    humidity: 40,
    wind_kph: 12.2,
    precip_mm: 0,
    condition: { text: 'Partly cloudy', icon: '//cdn.example.com/116.png' },
  },
  forecast: {
    forecastday: [
      {
        date: '2026-10-19',
        day: {
          avgtemp_c: 27.4,
          totalprecip_mm: 0.2,
          avghumidity: 48,
          daily_chance_of_rain: 10,
          condition: { text: 'Sunny', icon: '//cdn.example.com/113.png' },
        },
        astro: { sunrise: '06:21 AM', sunset: '05:58 PM' },
      },
    ],
  },
};

/**
 * Raw data.gov.in mandi body (prices arrive as strings)
 */
export const mandiApiBody = {
  records: [
    {
      state: 'Madhya Pradesh',
      district: 'Indore',
      market: 'Indore',
      commodity: 'Wheat',
      variety: 'Lokwan',
      arrival_date: '19/10/2026',
      min_price: '2400',
      max_price: '2700',
      modal_price: '2600',
    },
    {
      state_name: 'Rajasthan',
      district: 'Kota',
      market_name: 'Kota',
      commodity: 'Wheat',
      variety: 'Other',
      arrival_date: '19/10/2026',
      min_price: 2350,
      max_price: 2550,
      modal_price: 'NR',
    },
  ],
};

export const cropInsightsReply = [
  { crop: 'Soybean', recommendation_type: 'sell', confidence: 88, reason: ['Strong export demand'] },
  { crop: 'Wheat', recommendation_type: 'plant', confidence: '72', reason: 'Sowing window open' },
];

export const terminalInsightReply = {
  recommendation: { action: 'sell', confidence: 81, reason: 'Prices near seasonal high.' },
  yield_outlook: { change_percent: 2.5, factors: ['good soil moisture'] },
  price_forecast_comment: 'Mild upward drift expected.',
  market_sentiment: { overall: 'Bullish', keywords: ['demand'] },
  optimal_market: { sell_high: ['Indore'], buy_low: ['Kota'] },
  ai_summary: 'Prices are firm across central India.',
  reason: 'Arrivals are below average.',
};

// 1x1 transparent PNG
export const PNG_BASE64 =
  'iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAQAAAC1HAwCAAAAC0lEQVR42mNkYAAAAAYAAjCB0C8AAAAASUVORK5CYII=';
