/**
 * Dashboard Module Types
 * Declared as type aliases so snapshots stay assignable to JsonObject
 */

import { DataSource } from '../../lib/fallback';
import { WeatherReport } from '../../lib/upstream/upstream.types';

export type NewsItem = {
  headline: string;
  summary: string;
  sentiment: 'positive' | 'neutral' | 'negative';
};

export type DashboardMarketRow = {
  commodity: string;
  market: string;
  modal_price: number | null;
  max_price: number | null;
  min_price: number | null;
  arrival_date: string;
};

export type CropInsight = {
  crop: string;
  recommendation_type: string | null; // plant | sell | hold
  confidence: number;
  reason: string[];
};

export type DashboardSources = {
  weather: DataSource;
  market: DataSource;
  ai_summary: DataSource;
  ai_crop_insights: DataSource;
};

export type DashboardSnapshot = {
  date: string;
  location: string;
  weather: WeatherReport;
  market_data: DashboardMarketRow[];
  news: NewsItem[];
  ai_summary: string;
  ai_crop_insights: CropInsight[];
  sources: DashboardSources;
};

export interface DashboardParams {
  location: string;
}
