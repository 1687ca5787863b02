/**
 * Dashboard Service
 * Assembles the dashboard snapshot for one location
 */

import { ITextGenerator } from '../../lib/gemini';
import { IMarketProvider, IWeatherProvider, MarketRecord } from '../../lib/upstream/upstream.types';
import { fallbackWeather, withFallback } from '../../lib/fallback';
import { formatDisplayDate } from '../../lib/utils/date';
import { FALLBACK_AI_SUMMARY, dashboardNews, fallbackCropInsights, fallbackDashboardMarket } from './dashboard.fallback';
import { buildCropInsightsPrompt, buildSummaryPrompt } from './dashboard.prompts';
import { cropInsightsSchema } from './dashboard.validation';
import { DashboardMarketRow, DashboardParams, DashboardSnapshot } from './dashboard.types';

const MARKET_ROWS = 10;

export interface DashboardServiceDeps {
  weather: IWeatherProvider;
  market: IMarketProvider;
  advisor: ITextGenerator;
  clock?: () => Date;
}

function toDashboardRow(record: MarketRecord): DashboardMarketRow {
  return {
    commodity: record.commodity,
    market: record.market,
    modal_price: record.modal_price,
    max_price: record.max_price,
    min_price: record.min_price,
    arrival_date: record.arrival_date,
  };
}

export class DashboardService {
  private deps: DashboardServiceDeps;
  private clock: () => Date;

  constructor(deps: DashboardServiceDeps) {
    this.deps = deps;
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Never rejects for upstream failures: each failed sub-call is replaced by
   * its fallback while the rest of the snapshot keeps live data.
   */
  async produceSnapshot({ location }: DashboardParams): Promise<DashboardSnapshot> {
    const { weather: weatherProvider, market: marketProvider, advisor } = this.deps;

    const [weather, market] = await Promise.all([
      withFallback(
        'Weather',
        () => weatherProvider.getForecast(location),
        () => fallbackWeather(location)
      ),
      withFallback(
        'Mandi',
        async () => {
          const records = await marketProvider.getRecords({ market: location, limit: MARKET_ROWS });
          return records.map(toDashboardRow);
        },
        () => fallbackDashboardMarket(location)
      ),
    ]);

    const news = dashboardNews();

    const [summary, insights] = await Promise.all([
      withFallback(
        'Gemini summary',
        () => advisor.generateText(buildSummaryPrompt(location, weather.value, market.value, news)),
        () => FALLBACK_AI_SUMMARY
      ),
      withFallback(
        'Gemini crop insights',
        () => advisor.generateJson(buildCropInsightsPrompt(location, weather.value, market.value), cropInsightsSchema),
        fallbackCropInsights
      ),
    ]);

    return {
      date: formatDisplayDate(this.clock()),
      location,
      weather: weather.value,
      market_data: market.value,
      news,
      ai_summary: summary.value,
      ai_crop_insights: insights.value,
      sources: {
        weather: weather.source,
        market: market.source,
        ai_summary: summary.source,
        ai_crop_insights: insights.source,
      },
    };
  }
}
