import { describe, expect, it, vi } from "vitest";
import { MemoryPersistence } from "../src/adapters/repo.memory";
import { RakutenAdapter } from "../src/adapters/site.rakuten";
import { YahooAuctionsAdapter } from "../src/adapters/site.yahoo";
import { loadConfig } from "../src/config/env";
import { parseCriteria } from "../src/core/criteria";
import { MarketplaceListing, SiteId } from "../src/core/dto";
import { NotificationChannel, SiteAdapter } from "../src/core/ports";
import { SseHub } from "../src/http/sse";
import { createAdapters, createChannels, createMonitor } from "../src/monitor";
import { listing, logger } from "./helpers";

function stubAdapter(
  site: SiteId,
  kind: SiteAdapter["kind"],
  listings: MarketplaceListing[]
): SiteAdapter {
  return {
    site,
    kind,
    fetch: vi.fn(async () => listings),
    close: vi.fn(async () => undefined),
  };
}

describe("createAdapters", () => {
  it("builds one adapter per enabled site", () => {
    const config = loadConfig({ SITES: "yahoo_auctions,rakuten" });

    const adapters = createAdapters(config, { logger });

    expect(adapters.map((a) => a.site)).toEqual(["yahoo_auctions", "rakuten"]);
    expect(adapters[0]).toBeInstanceOf(YahooAuctionsAdapter);
    expect(adapters[1]).toBeInstanceOf(RakutenAdapter);
  });

  it("needs a browser session factory for mercari", () => {
    expect(() => createAdapters(loadConfig({ SITES: "mercari" }), { logger })).toThrow(
      "mercari needs a browser session factory"
    );
  });
});

describe("createChannels", () => {
  it("builds the configured channels in order", () => {
    const config = loadConfig({
      NOTIFY_CHANNELS: "log,webhook,desktop",
      WEBHOOK_URL: "https://hooks.example.test/mw",
    });

    const channels = createChannels(config, new SseHub(), { logger });

    expect(channels.map((c) => c.name)).toEqual(["log", "webhook", "desktop"]);
  });
});

describe("createMonitor", () => {
  it("wires a cycle end to end and closes the adapters", async () => {
    const config = loadConfig({ SITES: "rakuten,mercari", MERCARI_CONCURRENCY: "3" });
    const rakuten = stubAdapter("rakuten", "static", [listing("rakuten", "r1", 900)]);
    const mercari = stubAdapter("mercari", "browser", [listing("mercari", "m1", 400)]);
    const channel: NotificationChannel = { name: "fake", deliver: vi.fn(async () => undefined) };
    const persistence = new MemoryPersistence([
      {
        id: "s1",
        name: "Items",
        criteria: parseCriteria({ keywords: ["item"], sites: ["rakuten", "mercari"] }),
      },
    ]);

    const monitor = createMonitor(config, {
      logger,
      persistence,
      adapters: [rakuten, mercari],
      channels: [channel],
    });

    expect(monitor.gates.get("mercari")?.semaphore.capacity).toBe(1);
    expect(monitor.gates.get("rakuten")?.semaphore.capacity).toBe(2);

    const report = await monitor.runner.runCycle(new AbortController().signal);

    expect(report.searches).toMatchObject([
      {
        savedSearchId: "s1",
        status: "committed",
        newCount: 2,
        outcomes: {
          rakuten: { status: "success", count: 1 },
          mercari: { status: "success", count: 1 },
        },
      },
    ]);
    expect(report.events[0].newListings.map((l) => l.externalId)).toEqual(["m1", "r1"]);
    expect(channel.deliver).toHaveBeenCalledTimes(1);

    await monitor.close();

    expect(monitor.scheduler.getState()).toBe("stopped");
    expect(rakuten.close).toHaveBeenCalledTimes(1);
    expect(mercari.close).toHaveBeenCalledTimes(1);
  });
});
