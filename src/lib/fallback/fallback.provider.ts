/**
 * Fallback Data Provider
 * Deterministic synthetic upstream data substituted for a failed sub-call.
 * Every call returns fresh objects.
 */

import { MarketRecord, WeatherReport } from '../upstream/upstream.types';
import { capitalize } from '../utils/text';
import { formatIsoDate } from '../utils/date';

export const BASELINE_PRICE = 2300;

export function fallbackWeather(location: string): WeatherReport {
  return {
    location,
    country: 'India',
    current: {
      temp_c: 28,
      condition: 'Clear',
      icon: null,
      humidity: 55,
      wind_kph: null,
      precip_mm: 0,
    },
    astro: {
      sunrise: '06:30 AM',
      sunset: '05:45 PM',
    },
    forecast: [],
  };
}

export function fallbackMandiRecords(commodity: string, date: Date): MarketRecord[] {
  const name = capitalize(commodity);
  const arrivalDate = formatIsoDate(date);

  return [
    {
      state: 'Madhya Pradesh',
      district: 'Indore',
      market: 'Indore',
      commodity: name,
      variety: 'Common',
      arrival_date: arrivalDate,
      min_price: 2200,
      max_price: 2450,
      modal_price: 2350,
      unit: 'Rs/Quintal',
    },
    {
      state: 'Maharashtra',
      district: 'Nagpur',
      market: 'Nagpur',
      commodity: name,
      variety: 'Common',
      arrival_date: arrivalDate,
      min_price: 2250,
      max_price: 2480,
      modal_price: 2380,
      unit: 'Rs/Quintal',
    },
  ];
}

/**
 * Placeholder row used when live records normalize to nothing usable
 */
export function demoMarketRecord(commodity: string, date: Date): MarketRecord {
  return {
    state: 'DemoState',
    district: 'DemoDistrict',
    market: 'Indore',
    commodity: capitalize(commodity),
    variety: 'Common',
    arrival_date: formatIsoDate(date),
    min_price: 2200,
    max_price: 2500,
    modal_price: 2350,
    unit: 'Rs/Quintal',
  };
}
