/**
 * Dashboard Service Tests
 */

import { DashboardService } from '../dashboard.service';
import { fallbackWeather } from '../../../lib/fallback/fallback.provider';
import { FALLBACK_AI_SUMMARY, fallbackCropInsights } from '../dashboard.fallback';
import { cropInsightsReply, marketRecordFixture, weatherReportFixture } from '../../../__tests__/helpers/fixtures';
import { FakeAdvisor, createMockMarketProvider, createMockWeatherProvider } from '../../../__tests__/helpers/mocks';

describe('DashboardService', () => {
  let weather: ReturnType<typeof createMockWeatherProvider>;
  let market: ReturnType<typeof createMockMarketProvider>;
  let advisor: FakeAdvisor;
  let service: DashboardService;

  beforeEach(() => {
    weather = createMockWeatherProvider();
    market = createMockMarketProvider();
    advisor = new FakeAdvisor();
    advisor.jsonReply = cropInsightsReply;
    service = new DashboardService({ weather, market, advisor, clock: () => new Date(2026, 9, 19, 10, 4) });
  });

  it('should assemble a fully live snapshot', async () => {
    const snapshot = await service.produceSnapshot({ location: 'Indore' });

    expect(snapshot).toMatchObject({
      date: '19 Oct 2026',
      location: 'Indore',
      weather: weatherReportFixture('Indore'),
      market_data: [
        {
          commodity: 'Wheat',
          market: 'Indore',
          modal_price: 2600,
          max_price: 2700,
          min_price: 2400,
          arrival_date: '19/10/2026',
        },
      ],
      ai_summary: 'Mock advisory text',
      sources: { weather: 'live', market: 'live', ai_summary: 'live', ai_crop_insights: 'live' },
    });
    expect(snapshot.news).toHaveLength(3);
    expect(weather.getForecast).toHaveBeenCalledWith('Indore');
    expect(market.getRecords).toHaveBeenCalledWith({ market: 'Indore', limit: 10 });
  });

  it('should normalize crop insights from the model', async () => {
    const snapshot = await service.produceSnapshot({ location: 'Indore' });

    expect(snapshot.ai_crop_insights).toEqual([
      { crop: 'Soybean', recommendation_type: 'sell', confidence: 88, reason: ['Strong export demand'] },
      { crop: 'Wheat', recommendation_type: 'plant', confidence: 72, reason: ['Sowing window open'] },
    ]);
  });

  it('should replace only the failed weather call', async () => {
    weather.getForecast.mockRejectedValue(new Error('HTTP 500'));

    const snapshot = await service.produceSnapshot({ location: 'Indore' });

    expect(snapshot.weather).toEqual(fallbackWeather('Indore'));
    expect(snapshot.sources).toEqual({ weather: 'fallback', market: 'live', ai_summary: 'live', ai_crop_insights: 'live' });
    expect(advisor.prompts[0]).toContain(JSON.stringify(fallbackWeather('Indore')));
  });

  it('should use fallback market rows for the location', async () => {
    market.getRecords.mockRejectedValue(new Error('timeout'));

    const snapshot = await service.produceSnapshot({ location: 'Bhopal' });

    expect(snapshot.market_data.map((row) => [row.commodity, row.market, row.modal_price])).toEqual([
      ['Wheat', 'Bhopal', 2300],
      ['Soybean', 'Bhopal', 5200],
      ['Maize', 'Bhopal', 1850],
    ]);
    expect(snapshot.sources.market).toBe('fallback');
  });

  it('should fall back on AI failures', async () => {
    advisor.textReply = new Error('quota exhausted');
    advisor.jsonReply = new Error('quota exhausted');

    const snapshot = await service.produceSnapshot({ location: 'Indore' });

    expect(snapshot.ai_summary).toBe(FALLBACK_AI_SUMMARY);
    expect(snapshot.ai_crop_insights).toEqual(fallbackCropInsights());
    expect(snapshot.sources).toMatchObject({ ai_summary: 'fallback', ai_crop_insights: 'fallback' });
  });

  it('should fall back when the model returns no insights', async () => {
    advisor.jsonReply = [];

    const snapshot = await service.produceSnapshot({ location: 'Indore' });

    expect(snapshot.ai_crop_insights).toEqual(fallbackCropInsights());
    expect(snapshot.sources.ai_crop_insights).toBe('fallback');
  });

  it('should still produce a snapshot when every upstream fails', async () => {
    weather.getForecast.mockRejectedValue(new Error('down'));
    market.getRecords.mockRejectedValue(new Error('down'));
    advisor.textReply = new Error('down');
    advisor.jsonReply = new Error('down');

    const snapshot = await service.produceSnapshot({ location: 'Indore' });

    expect(Object.values(snapshot.sources)).toEqual(['fallback', 'fallback', 'fallback', 'fallback']);
  });

  it('should keep market rows the provider returned', async () => {
    market.getRecords.mockResolvedValue([
      marketRecordFixture({ commodity: 'Soybean', modal_price: 5100 }),
      marketRecordFixture({ commodity: 'Gram', modal_price: null }),
    ]);

    const snapshot = await service.produceSnapshot({ location: 'Indore' });

    expect(snapshot.market_data.map((row) => row.commodity)).toEqual(['Soybean', 'Gram']);
    expect(snapshot.market_data[1].modal_price).toBeNull();
  });
});
