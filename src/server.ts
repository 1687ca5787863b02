/**
 * Server Entry Point
 * Restores the snapshot cache, starts background refresh and the HTTP server
 */

import { createServer } from 'http';
import { createApp } from './app';
import { createAppContext } from './context';
import { env } from './config/env';
import { FileCachePersistence, ICachePersistence, MemoryCachePersistence } from './lib/cache';
import { CircuitBreakerConfig } from './lib/circuit-breaker/circuit-breaker.types';
import { GeminiService } from './lib/gemini';
import { MandiClient } from './lib/upstream/mandi.client';
import { WeatherClient } from './lib/upstream/weather.client';
import { describeError } from './lib/upstream/upstream.errors';

const circuitBreaker: CircuitBreakerConfig = {
  enabled: env.CIRCUIT_BREAKER_ENABLED,
  errorThresholdPercentage: env.CIRCUIT_BREAKER_ERROR_THRESHOLD,
  resetTimeout: env.CIRCUIT_BREAKER_RESET_TIMEOUT,
  minimumRequests: env.CIRCUIT_BREAKER_MIN_REQUESTS,
};

const createPersistence = (): ICachePersistence => {
  if (!env.CACHE_FILE_PATH) {
    console.log('⚠️  CACHE_FILE_PATH is empty, snapshots are kept in memory only');
    return new MemoryCachePersistence();
  }
  return new FileCachePersistence({
    filePath: env.CACHE_FILE_PATH,
    debounceMs: env.CACHE_PERSIST_DEBOUNCE_MS,
  });
};

const startServer = async (): Promise<void> => {
  const weather = new WeatherClient({
    apiUrl: env.WEATHER_API_URL,
    apiKey: env.WEATHER_API_KEY,
    timeoutMs: env.WEATHER_TIMEOUT,
    circuitBreaker,
  });
  const market = new MandiClient({
    apiUrl: env.MANDI_API_URL,
    apiKey: env.DATA_GOV_API_KEY,
    timeoutMs: env.MARKET_TIMEOUT,
    circuitBreaker,
  });
  const advisor = new GeminiService({
    apiKey: env.GEMINI_API_KEY,
    models: env.GEMINI_MODELS,
    timeoutMs: env.AI_TIMEOUT,
    circuitBreaker,
  });

  if (!weather.isAvailable()) console.log('⚠️  WEATHER_API_KEY not set, weather will use fallback data');
  if (!market.isAvailable()) console.log('⚠️  DATA_GOV_API_KEY not set, mandi prices will use fallback data');
  if (!advisor.isAvailable()) console.log('⚠️  GEMINI_API_KEY not set, AI text will use fallback data');

  const context = createAppContext({
    services: { weather, market, advisor },
    persistence: createPersistence(),
    breakerStats: () => [weather.getBreakerStats(), market.getBreakerStats(), advisor.getBreakerStats()],
  });

  // Restore last-known-good snapshots
  console.log('💾 Restoring snapshot cache...');
  const restored = await context.store.load();
  console.log(`✅ Snapshot cache ready (${restored} entr${restored === 1 ? 'y' : 'ies'} restored)`);

  // Initial refresh pass for every domain before accepting requests
  await Promise.all(context.schedulers.map((scheduler) => scheduler.start()));

  const app = createApp(context);
  const httpServer = createServer(app);

  httpServer.listen(env.PORT, () => {
    console.log('');
    console.log('🚀 ═══════════════════════════════════════════════════════');
    console.log(`🚀 Agri Snapshot API is running`);
    console.log(`🚀 Environment: ${env.NODE_ENV}`);
    console.log(`🚀 Port: ${env.PORT}`);
    console.log(`🚀 Cache: ${env.CACHE_FILE_PATH || 'memory only'}`);
    console.log(`🚀 API: http://localhost:${env.PORT}/health`);
    console.log('🚀 ═══════════════════════════════════════════════════════');
    console.log('');
  });

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    console.log(`${signal} signal received: stopping refresh and closing HTTP server`);

    await Promise.all(context.schedulers.map((scheduler) => scheduler.stop()));
    await context.store.flush();
    console.log('💾 Snapshot cache flushed');

    weather.shutdown();
    market.shutdown();
    advisor.shutdown();

    httpServer.close(() => {
      console.log('HTTP server closed');
      process.exit(0);
    });
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });
};

// Start the server
startServer().catch((error: unknown) => {
  console.error('Failed to start server:', describeError(error));
  process.exit(1);
});
