import dotenv from 'dotenv';

dotenv.config();

function parseList(value: string | undefined, fallback: string[]): string[] {
  if (!value) {
    return fallback;
  }
  const items = value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : fallback;
}

const CACHE_REFRESH_INTERVAL = parseInt(process.env.CACHE_REFRESH_INTERVAL || '300', 10);

export const env = {
  // Server
  PORT: parseInt(process.env.PORT || '3001', 10),
  NODE_ENV: process.env.NODE_ENV || 'development',

  // CORS
  CLIENT_URLS: parseList(process.env.CLIENT_URLS || process.env.CLIENT_URL, ['http://localhost:5173']),

  // AI Services
  GEMINI_API_KEY: process.env.GEMINI_API_KEY,
  GEMINI_MODELS: parseList(process.env.GEMINI_MODELS, [
    'gemini-2.5-flash',
    'gemini-2.0-flash',
    'gemini-1.5-flash',
  ]),

  // Upstream data providers
  WEATHER_API_KEY: process.env.WEATHER_API_KEY,
  WEATHER_API_URL: process.env.WEATHER_API_URL || 'https://api.weatherapi.com/v1/forecast.json',
  DATA_GOV_API_KEY: process.env.DATA_GOV_API_KEY,
  MANDI_API_URL:
    process.env.MANDI_API_URL ||
    'https://api.data.gov.in/resource/9ef84268-d588-465a-a308-a864a43d0070',

  // Per-call upstream timeouts (ms)
  WEATHER_TIMEOUT: parseInt(process.env.WEATHER_TIMEOUT || '8000', 10),
  MARKET_TIMEOUT: parseInt(process.env.MARKET_TIMEOUT || '10000', 10),
  AI_TIMEOUT: parseInt(process.env.AI_TIMEOUT || '30000', 10),

  // Snapshot cache
  CACHE_FILE_PATH: process.env.CACHE_FILE_PATH ?? 'data/cache.json', // Empty string = memory only
  CACHE_PERSIST_DEBOUNCE_MS: parseInt(process.env.CACHE_PERSIST_DEBOUNCE_MS || '0', 10),
  CACHE_READS_ENABLED: process.env.CACHE_READS_ENABLED !== 'false', // Default true
  READ_THROUGH_TIMEOUT: parseInt(process.env.READ_THROUGH_TIMEOUT || '45000', 10),

  // Refresh scheduling
  CACHE_REFRESH_INTERVAL, // seconds
  TERMINAL_CACHE_REFRESH_SECONDS: parseInt(
    process.env.TERMINAL_CACHE_REFRESH_SECONDS || String(CACHE_REFRESH_INTERVAL),
    10
  ),
  REFRESH_TOPIC_TIMEOUT: parseInt(process.env.REFRESH_TOPIC_TIMEOUT || '60000', 10),
  REFRESH_CONCURRENCY: parseInt(process.env.REFRESH_CONCURRENCY || '2', 10),

  // Fixed topic sets
  DASHBOARD_LOCATIONS: parseList(process.env.DASHBOARD_LOCATIONS, ['Indore']),
  TERMINAL_COMMODITIES: parseList(process.env.TERMINAL_COMMODITIES, ['wheat', 'rice', 'maize', 'soybean']),
  TERMINAL_LOCATION: process.env.TERMINAL_LOCATION || 'Indore',
  TERMINAL_HARVEST_DAYS: parseInt(process.env.TERMINAL_HARVEST_DAYS || '53', 10),
  INTERNATIONAL_PRICES_PATH: process.env.INTERNATIONAL_PRICES_PATH || 'data/international-prices.csv',

  // Circuit Breaker
  CIRCUIT_BREAKER_ENABLED: process.env.CIRCUIT_BREAKER_ENABLED !== 'false', // Default true
  CIRCUIT_BREAKER_ERROR_THRESHOLD: parseInt(process.env.CIRCUIT_BREAKER_ERROR_THRESHOLD || '50', 10), // 50%
  CIRCUIT_BREAKER_RESET_TIMEOUT: parseInt(process.env.CIRCUIT_BREAKER_RESET_TIMEOUT || '30000', 10), // 30 seconds
  CIRCUIT_BREAKER_MIN_REQUESTS: parseInt(process.env.CIRCUIT_BREAKER_MIN_REQUESTS || '5', 10),
} as const;

export default env;
