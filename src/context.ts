/**
 * Application Context
 * Wires the snapshot store, producers, schedulers and controllers together
 */

import { env } from './config/env';
import { ICachePersistence, SnapshotReader, SnapshotStore } from './lib/cache';
import { RefreshScheduler } from './lib/scheduler';
import { CircuitBreakerStats } from './lib/circuit-breaker/circuit-breaker.types';
import { IImageAnalyzer, ITextGenerator } from './lib/gemini';
import { titleCase } from './lib/utils';
import { IMarketProvider, IWeatherProvider } from './lib/upstream/upstream.types';
import { DashboardService } from './modules/dashboard/dashboard.service';
import { DASHBOARD_DOMAIN, DashboardController, dashboardTopicKey } from './modules/dashboard/dashboard.controller';
import { TerminalService } from './modules/terminal/terminal.service';
import { InternationalOptionsService } from './modules/terminal/international-options.service';
import {
  INTERNATIONAL_OPTIONS_KEY,
  TERMINAL_DOMAIN,
  TerminalController,
  terminalTopicKey,
} from './modules/terminal/terminal.controller';
import { ChatController } from './modules/chat/chat.controller';
import { DetectController } from './modules/detect/detect.controller';

export interface AppServices {
  weather: IWeatherProvider;
  market: IMarketProvider;
  advisor: ITextGenerator & IImageAnalyzer;
}

export interface RuntimeSettings {
  dashboardLocations: string[];
  dashboardIntervalMs: number;
  terminalCommodities: string[];
  terminalLocation: string;
  terminalHarvestDays: number;
  terminalIntervalMs: number;
  internationalPricesPath: string;
  topicTimeoutMs: number;
  concurrency: number;
  readThroughTimeoutMs: number;
}

export interface AppContextOptions {
  services: AppServices;
  persistence?: ICachePersistence;
  settings?: Partial<RuntimeSettings>;
  clock?: () => number;
  breakerStats?: () => CircuitBreakerStats[];
}

export interface AppContext {
  store: SnapshotStore;
  reader: SnapshotReader;
  schedulers: RefreshScheduler[];
  dashboard: DashboardController;
  terminal: TerminalController;
  chat: ChatController;
  detect: DetectController;
  breakerStats: () => CircuitBreakerStats[];
}

export const settingsFromEnv = (): RuntimeSettings => ({
  dashboardLocations: env.DASHBOARD_LOCATIONS,
  dashboardIntervalMs: env.CACHE_REFRESH_INTERVAL * 1000,
  terminalCommodities: env.TERMINAL_COMMODITIES,
  terminalLocation: env.TERMINAL_LOCATION,
  terminalHarvestDays: env.TERMINAL_HARVEST_DAYS,
  terminalIntervalMs: env.TERMINAL_CACHE_REFRESH_SECONDS * 1000,
  internationalPricesPath: env.INTERNATIONAL_PRICES_PATH,
  topicTimeoutMs: env.REFRESH_TOPIC_TIMEOUT,
  concurrency: env.REFRESH_CONCURRENCY,
  readThroughTimeoutMs: env.READ_THROUGH_TIMEOUT,
});

export function createAppContext(options: AppContextOptions): AppContext {
  const settings: RuntimeSettings = { ...settingsFromEnv(), ...options.settings };
  const { services } = options;
  const dashboardLocations = settings.dashboardLocations.map(titleCase);
  const terminalLocation = titleCase(settings.terminalLocation);

  const store = new SnapshotStore({ persistence: options.persistence, clock: options.clock });
  const reader = new SnapshotReader(store, { produceTimeoutMs: settings.readThroughTimeoutMs });

  const dashboardService = new DashboardService(services);
  const terminalService = new TerminalService(services);
  const optionsService = new InternationalOptionsService({ csvPath: settings.internationalPricesPath });

  const dashboardScheduler = new RefreshScheduler(
    store,
    {
      domain: DASHBOARD_DOMAIN,
      topics: dashboardLocations.map((location) => ({
        key: dashboardTopicKey(location),
        produce: () => dashboardService.produceSnapshot({ location }),
      })),
      intervalMs: settings.dashboardIntervalMs,
      topicTimeoutMs: settings.topicTimeoutMs,
      concurrency: settings.concurrency,
    },
    { clock: options.clock }
  );

  const terminalScheduler = new RefreshScheduler(
    store,
    {
      domain: TERMINAL_DOMAIN,
      topics: [
        ...settings.terminalCommodities.map((commodity) => ({
          key: terminalTopicKey(commodity, terminalLocation, settings.terminalHarvestDays),
          produce: () =>
            terminalService.produceSnapshot({
              commodity,
              location: terminalLocation,
              harvestDays: settings.terminalHarvestDays,
            }),
        })),
        {
          key: INTERNATIONAL_OPTIONS_KEY,
          produce: () => optionsService.produceSnapshot(),
        },
      ],
      intervalMs: settings.terminalIntervalMs,
      topicTimeoutMs: settings.topicTimeoutMs,
      concurrency: settings.concurrency,
    },
    { clock: options.clock }
  );

  return {
    store,
    reader,
    schedulers: [dashboardScheduler, terminalScheduler],
    dashboard: new DashboardController(reader, dashboardService),
    terminal: new TerminalController(reader, terminalService, optionsService, settings.terminalHarvestDays),
    chat: new ChatController(services.advisor),
    detect: new DetectController(services.advisor),
    breakerStats: options.breakerStats ?? (() => []),
  };
}
