/**
 * Dashboard Prompts
 */

import { WeatherReport } from '../../lib/upstream/upstream.types';
import { DashboardMarketRow, NewsItem } from './dashboard.types';

export function buildSummaryPrompt(
  location: string,
  weather: WeatherReport,
  market: DashboardMarketRow[],
  news: NewsItem[]
): string {
  return `You are an agriculture advisor for Indian farmers.
Analyze the data below and summarize it for farmers in ${location}.

Weather: ${JSON.stringify(weather)}
Market: ${JSON.stringify(market.slice(0, 5))}
News: ${JSON.stringify(news.slice(0, 3))}

Give:
1. Weather Outlook
2. Market Trends
3. Weekly Advisory

Keep it factual, under 100 words, friendly tone.`;
}

export function buildCropInsightsPrompt(location: string, weather: WeatherReport, market: DashboardMarketRow[]): string {
  return `You are a data-driven crop advisor for farmers in ${location}.
Analyze:
- Weather: ${JSON.stringify(weather)}
- Mandi: ${JSON.stringify(market.slice(0, 5))}

Output the top 3 crops to plant or sell this week, strictly as a JSON array:
[{"crop":"Wheat","recommendation_type":"sell","confidence":85,"reason":["Good MSP","Stable yield"]}]`;
}
