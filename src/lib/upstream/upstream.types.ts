/**
 * Upstream Types
 * Normalized shapes returned by the weather and mandi clients.
 * Declared as type aliases so they stay assignable to JsonObject.
 */

export type CurrentWeather = {
  temp_c: number | null;
  condition: string | null;
  icon: string | null;
  humidity: number | null;
  wind_kph: number | null;
  precip_mm: number | null;
};

export type ForecastDay = {
  date: string;
  avgtemp_c: number | null;
  totalprecip_mm: number | null;
  avghumidity: number | null;
  condition: string | null;
  icon: string | null;
  daily_chance_of_rain: number | null;
};

export type WeatherReport = {
  location: string;
  country: string;
  current: CurrentWeather;
  astro: {
    sunrise: string;
    sunset: string;
  };
  forecast: ForecastDay[];
};

export type MarketRecord = {
  state: string;
  district: string;
  market: string;
  commodity: string;
  variety: string;
  arrival_date: string;
  min_price: number | null;
  max_price: number | null;
  modal_price: number | null;
  unit: string;
};

export interface MarketQuery {
  market?: string;
  commodity?: string;
  limit: number;
}

export interface IWeatherProvider {
  getForecast(location: string): Promise<WeatherReport>;
}

export interface IMarketProvider {
  getRecords(query: MarketQuery): Promise<MarketRecord[]>;
}
