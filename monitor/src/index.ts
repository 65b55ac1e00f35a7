export * from "./core/dto";
export * from "./core/errors";
export * from "./core/criteria";
export { dedupe, compareListings } from "./core/dedupe";
export { parseYen, formatYen } from "./core/price";
export { TokenBucket, Semaphore } from "./core/limiter";
export type { Clock, Release } from "./core/limiter";
export { CircuitBreaker, DEFAULT_BREAKER_OPTIONS, isCountedFailure } from "./core/breaker";
export type { BreakerOptions, BreakerState } from "./core/breaker";
export { AdapterGate } from "./core/gate";
export type { GateOptions, GateStatus } from "./core/gate";
export { ScrapeOrchestrator } from "./core/orchestrator";
export type { OrchestratorOptions, SearchScraper } from "./core/orchestrator";
export {
  DEFAULT_SAMPLE_SIZE,
  formatPrice,
  formatSummary,
  NotificationDispatcher,
  summaryTitle,
} from "./core/dispatch";
export { CycleRunner } from "./core/cycle";
export type { CycleRunnerDeps, CycleRunnerOptions } from "./core/cycle";
export { CycleScheduler } from "./core/scheduler";
export type { CycleSource, LastCycleSummary, SchedulerState, SchedulerStatus } from "./core/scheduler";
export type {
  BrowserSession,
  BrowserSessionFactory,
  FeedQuery,
  FetchContext,
  NotificationChannel,
  PersistencePort,
  SavedSearchFilter,
  SiteAdapter,
  SnapshotUpdate,
} from "./core/ports";

export { MemoryPersistence } from "./adapters/repo.memory";
export type { NewSavedSearch } from "./adapters/repo.memory";
export { PostgresPersistence } from "./adapters/repo.sql";
export type { SqlPool, SqlPoolClient, SqlQueryable } from "./adapters/repo.sql";
export { loadSeedFile, parseSeed } from "./adapters/seed.file";
export { YahooAuctionsAdapter } from "./adapters/site.yahoo";
export { RakutenAdapter } from "./adapters/site.rakuten";
export { MercariAdapter } from "./adapters/site.mercari";
export { PlaywrightSessionFactory } from "./adapters/browser.playwright";
export { DesktopChannel } from "./adapters/channel.desktop";
export { WebhookChannel } from "./adapters/channel.webhook";
export { LogChannel } from "./adapters/channel.log";

export { ConfigError, loadConfig, loadEnvFile } from "./config/env";
export type { ChannelName, MonitorConfig } from "./config/env";
export { createApp } from "./http/server";
export { SseHub } from "./http/sse";
export { createAdapters, createChannels, createMonitor } from "./monitor";
export type { Monitor, MonitorDeps } from "./monitor";
