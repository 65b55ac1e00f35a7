import { BusPort, Logger } from "@marketwatch/shared-utils";
import express from "express";
import { DesktopChannel } from "./adapters/channel.desktop";
import { LogChannel } from "./adapters/channel.log";
import { WebhookChannel } from "./adapters/channel.webhook";
import { MercariAdapter } from "./adapters/site.mercari";
import { RakutenAdapter } from "./adapters/site.rakuten";
import { YahooAuctionsAdapter } from "./adapters/site.yahoo";
import { MonitorConfig } from "./config/env";
import { CycleRunner } from "./core/cycle";
import { NotificationDispatcher } from "./core/dispatch";
import { SiteId } from "./core/dto";
import { AdapterGate } from "./core/gate";
import { Semaphore } from "./core/limiter";
import { ScrapeOrchestrator } from "./core/orchestrator";
import {
  BrowserSessionFactory,
  NotificationChannel,
  PersistencePort,
  SiteAdapter,
} from "./core/ports";
import { CycleScheduler } from "./core/scheduler";
import { createApp } from "./http/server";
import { SseHub } from "./http/sse";

export interface MonitorDeps {
  logger: Logger;
  persistence: PersistencePort;
  bus?: BusPort;
  /** Needed when mercari is enabled and no adapters are injected */
  sessions?: BrowserSessionFactory;
  /** Replaces the adapters built from `config.sites` */
  adapters?: SiteAdapter[];
  /** Replaces the channels built from `config.notify` */
  channels?: NotificationChannel[];
  fetchImpl?: typeof fetch;
}

export interface Monitor {
  scheduler: CycleScheduler;
  runner: CycleRunner;
  gates: ReadonlyMap<SiteId, AdapterGate>;
  sse: SseHub;
  app: express.Express;
  /** Stop the scheduler, close adapters and drop SSE clients */
  close(): Promise<void>;
}

export function createAdapters(
  config: MonitorConfig,
  deps: Pick<MonitorDeps, "logger" | "sessions" | "fetchImpl">
): SiteAdapter[] {
  return config.sites.map((site): SiteAdapter => {
    const logger = deps.logger.child(site);
    switch (site) {
      case "yahoo_auctions":
        return new YahooAuctionsAdapter({
          maxRetries: config.httpMaxRetries,
          fetchImpl: deps.fetchImpl,
          logger,
        });
      case "rakuten":
        return new RakutenAdapter({
          maxRetries: config.httpMaxRetries,
          fetchImpl: deps.fetchImpl,
          logger,
        });
      case "mercari":
        if (!deps.sessions) {
          throw new Error("mercari needs a browser session factory");
        }
        return new MercariAdapter({
          sessions: deps.sessions,
          thinkTimeMs: config.browser.thinkTimeMs,
          maxRetries: config.httpMaxRetries,
          logger,
        });
    }
  });
}

export function createChannels(
  config: MonitorConfig,
  sse: SseHub,
  deps: Pick<MonitorDeps, "logger" | "fetchImpl">
): NotificationChannel[] {
  const { sampleSize, webhookUrl } = config.notify;

  return config.notify.channels.map((name): NotificationChannel => {
    switch (name) {
      case "desktop":
        return new DesktopChannel(sse, sampleSize, deps.logger);
      case "log":
        return new LogChannel(sampleSize, deps.logger);
      case "webhook":
        if (!webhookUrl) {
          throw new Error("WEBHOOK_URL is required for the webhook channel");
        }
        return new WebhookChannel({
          url: webhookUrl,
          sampleSize,
          fetchImpl: deps.fetchImpl,
          logger: deps.logger,
        });
    }
  });
}

/**
 * Wire adapters, gates, orchestrator, cycle runner, dispatcher, scheduler
 * and the operator HTTP app. Nothing runs until `scheduler.start()`.
 */
export function createMonitor(config: MonitorConfig, deps: MonitorDeps): Monitor {
  const { logger, persistence } = deps;

  const adapters = deps.adapters ?? createAdapters(config, deps);
  const gates = new Map<SiteId, AdapterGate>();
  for (const adapter of adapters) {
    const options = config.gates[adapter.site];
    // browser sessions are serialized per adapter anyway
    gates.set(
      adapter.site,
      new AdapterGate(
        adapter.site,
        adapter.kind === "browser" ? { ...options, concurrency: 1 } : options
      )
    );
  }

  const orchestrator = new ScrapeOrchestrator(
    new Map(adapters.map((adapter) => [adapter.site, adapter])),
    gates,
    new Semaphore(config.globalConcurrency),
    { pageLimit: config.pageLimit, adapterTimeoutMs: config.adapterTimeoutMs },
    logger
  );

  const sse = new SseHub();
  const dispatcher = new NotificationDispatcher(
    deps.channels ?? createChannels(config, sse, deps),
    logger
  );

  const runner = new CycleRunner(
    { persistence, scraper: orchestrator, dispatcher, bus: deps.bus, logger },
    {
      notifyEmptyCycles: config.notify.emptyCycles,
      feedRetentionDays: config.feedRetentionDays,
    }
  );

  const scheduler = new CycleScheduler(runner, persistence, config.cycleIntervalMs, logger);

  const app = createApp({
    scheduler,
    persistence,
    gates: () => Array.from(gates.values()).map((gate) => gate.getStatus()),
    sse,
    logger,
    corsOrigins: config.corsOrigins,
  });

  logger.info(
    `Monitor wired: sites=${adapters.map((a) => a.site).join(",")} channels=${dispatcher
      .channelNames()
      .join(",")}`
  );

  return {
    scheduler,
    runner,
    gates,
    sse,
    app,
    async close() {
      await scheduler.stop();
      sse.closeAll();
      const results = await Promise.allSettled(adapters.map((adapter) => adapter.close?.()));
      for (const result of results) {
        if (result.status === "rejected") {
          logger.error("Adapter close failed:", result.reason);
        }
      }
    },
  };
}
