/**
 * Weather Client Tests
 */

import { WeatherClient, normalizeForecast } from '../weather.client';
import { UpstreamErrorType } from '../upstream.errors';
import { forecastApiBody, weatherReportFixture } from '../../../__tests__/helpers/fixtures';
import { jsonResponse } from '../../../__tests__/helpers/mocks';

describe('WeatherClient', () => {
  let client: WeatherClient;
  let fetchSpy: jest.SpyInstance<ReturnType<typeof fetch>, Parameters<typeof fetch>>;

  beforeEach(() => {
    fetchSpy = jest.spyOn(global, 'fetch');
    client = new WeatherClient({
      apiUrl: 'https://weather.example.com/v1/forecast.json',
      apiKey: 'test-key',
      timeoutMs: 1000,
    });
  });

  afterEach(() => {
    client.shutdown();
    fetchSpy.mockRestore();
  });

  it('should normalize a forecast', async () => {
    fetchSpy.mockResolvedValue(jsonResponse(forecastApiBody));

    await expect(client.getForecast('Indore')).resolves.toEqual(weatherReportFixture('Indore'));
  });

  it('should request seven days for the location', async () => {
    fetchSpy.mockResolvedValue(jsonResponse(forecastApiBody));

    await client.getForecast('Bhopal');

    const url = new URL(String(fetchSpy.mock.calls[0][0]));
    expect(url.searchParams.get('q')).toBe('Bhopal');
    expect(url.searchParams.get('days')).toBe('7');
    expect(url.searchParams.get('key')).toBe('test-key');
  });

  it('should reject when no API key is configured', async () => {
    const unconfigured = new WeatherClient({ apiUrl: 'https://weather.example.com/v1/forecast.json', timeoutMs: 1000 });

    await expect(unconfigured.getForecast('Indore')).rejects.toMatchObject({ type: UpstreamErrorType.NOT_CONFIGURED });
    expect(unconfigured.isAvailable()).toBe(false);
    expect(fetchSpy).not.toHaveBeenCalled();
    unconfigured.shutdown();
  });

  it('should surface HTTP errors', async () => {
    fetchSpy.mockResolvedValue(jsonResponse({ error: { message: 'Internal' } }, 500));

    await expect(client.getForecast('Indore')).rejects.toMatchObject({
      type: UpstreamErrorType.HTTP_ERROR,
      statusCode: 500,
    });
  });

  it('should reject an unexpected document shape', async () => {
    fetchSpy.mockResolvedValue(jsonResponse({ forecast: { forecastday: 'none' } }));

    await expect(client.getForecast('Indore')).rejects.toMatchObject({ type: UpstreamErrorType.PARSE_ERROR });
  });

  it('should count outcomes in breaker stats', async () => {
    fetchSpy.mockResolvedValue(jsonResponse(forecastApiBody));

    await client.getForecast('Indore');

    expect(client.getBreakerStats()).toMatchObject({ name: 'WeatherAPI', successes: 1, failures: 0 });
  });
});

describe('normalizeForecast', () => {
  it('should fill gaps in a sparse document', () => {
    expect(normalizeForecast('Dewas', {})).toEqual({
      location: 'Dewas',
      country: 'India',
      current: { temp_c: null, condition: null, icon: null, humidity: null, wind_kph: null, precip_mm: null },
      astro: { sunrise: '', sunset: '' },
      forecast: [],
    });
  });
});
