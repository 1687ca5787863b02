/**
 * Weather Client
 * WeatherAPI.com 7-day forecast, normalized to WeatherReport
 */

import { z } from 'zod';
import { CircuitBreaker } from '../circuit-breaker/circuit-breaker.manager';
import { CircuitBreakerConfig, CircuitBreakerStats } from '../circuit-breaker/circuit-breaker.types';
import { fetchJson } from './http';
import { UpstreamError, UpstreamErrorType, classifyUpstreamError } from './upstream.errors';
import { IWeatherProvider, WeatherReport } from './upstream.types';

const PROVIDER = 'WeatherAPI';
const FORECAST_DAYS = 7;

const num = z.number().nullable().optional();

const conditionSchema = z
  .object({
    text: z.string().optional(),
    icon: z.string().optional(),
  })
  .optional();

const forecastResponseSchema = z.object({
  location: z
    .object({
      name: z.string().optional(),
      country: z.string().optional(),
    })
    .optional(),
  current: z
    .object({
      temp_c: num,
      humidity: num,
      wind_kph: num,
      precip_mm: num,
      condition: conditionSchema,
    })
    .optional(),
  forecast: z
    .object({
      forecastday: z.array(
        z.object({
          date: z.string(),
          day: z.object({
            avgtemp_c: num,
            totalprecip_mm: num,
            avghumidity: num,
            daily_chance_of_rain: num,
            condition: conditionSchema,
          }),
          astro: z
            .object({
              sunrise: z.string().optional(),
              sunset: z.string().optional(),
            })
            .optional(),
        })
      ),
    })
    .optional(),
});

export type ForecastResponse = z.infer<typeof forecastResponseSchema>;

export interface WeatherClientConfig {
  apiUrl: string;
  apiKey?: string;
  timeoutMs: number;
  circuitBreaker?: CircuitBreakerConfig;
}

/**
 * Map a WeatherAPI forecast document onto WeatherReport
 */
export function normalizeForecast(location: string, data: ForecastResponse): WeatherReport {
  const days = data.forecast?.forecastday ?? [];
  const current = data.current;

  return {
    location: data.location?.name || location,
    country: data.location?.country || 'India',
    current: {
      temp_c: current?.temp_c ?? null,
      condition: current?.condition?.text ?? null,
      icon: current?.condition?.icon ?? null,
      humidity: current?.humidity ?? null,
      wind_kph: current?.wind_kph ?? null,
      precip_mm: current?.precip_mm ?? null,
    },
    astro: {
      sunrise: days[0]?.astro?.sunrise ?? '',
      sunset: days[0]?.astro?.sunset ?? '',
    },
    forecast: days.map((day) => ({
      date: day.date,
      avgtemp_c: day.day.avgtemp_c ?? null,
      totalprecip_mm: day.day.totalprecip_mm ?? null,
      avghumidity: day.day.avghumidity ?? null,
      condition: day.day.condition?.text ?? null,
      icon: day.day.condition?.icon ?? null,
      daily_chance_of_rain: day.day.daily_chance_of_rain ?? null,
    })),
  };
}

export class WeatherClient implements IWeatherProvider {
  private config: WeatherClientConfig;
  private breaker: CircuitBreaker<[string], WeatherReport>;

  constructor(config: WeatherClientConfig) {
    this.config = config;
    this.breaker = new CircuitBreaker((location: string) => this.fetchForecast(location), {
      name: PROVIDER,
      timeout: config.timeoutMs + 1000,
      ...config.circuitBreaker,
    });
  }

  isAvailable(): boolean {
    return !!this.config.apiKey;
  }

  async getForecast(location: string): Promise<WeatherReport> {
    if (!this.config.apiKey) {
      throw new UpstreamError(PROVIDER, UpstreamErrorType.NOT_CONFIGURED, 'WEATHER_API_KEY not configured');
    }

    try {
      return await this.breaker.execute(location);
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

  private async fetchForecast(location: string): Promise<WeatherReport> {
    const body = await fetchJson(PROVIDER, this.config.apiUrl, {
      timeoutMs: this.config.timeoutMs,
      params: {
        key: this.config.apiKey,
        q: location,
        days: FORECAST_DAYS,
        aqi: 'no',
        alerts: 'no',
      },
    });

    const parsed = forecastResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new UpstreamError(PROVIDER, UpstreamErrorType.PARSE_ERROR, `Unexpected forecast shape: ${parsed.error.message}`);
    }

    return normalizeForecast(location, parsed.data);
  }
}
