import { describe, expect, it, vi } from "vitest";
import {
  isBusEvent,
  ListingsFoundEvent,
  MemoryBus,
  ScrapeCycleCompletedEvent,
} from "../src/bus";
import { createNoopLogger } from "../src/service";

function listingsFound(id: string, count = 2): ListingsFoundEvent {
  return {
    type: "listings_found",
    id,
    timestamp: "2024-05-01T10:00:00.000Z",
    data: {
      savedSearchId: "search-1",
      savedSearchName: "Film cameras",
      newItemCount: count,
      listingKeys: ["yahoo:x1", "rakuten:r9"].slice(0, count),
      cycleTimestamp: "2024-05-01T10:00:00.000Z",
    },
  };
}

describe("MemoryBus", () => {
  it("delivers published events to subscribers of the topic only", async () => {
    const bus = new MemoryBus("test", createNoopLogger());
    const found = vi.fn().mockResolvedValue(undefined);
    const completed = vi.fn().mockResolvedValue(undefined);

    await bus.subscribe("listings_found", found);
    await bus.subscribe("scrape_cycle_completed", completed);

    const event = listingsFound("evt-1");
    await bus.publish(event);

    expect(found).toHaveBeenCalledWith(event);
    expect(completed).not.toHaveBeenCalled();
  });

  it("keeps publishing when a handler throws", async () => {
    const bus = new MemoryBus("test", createNoopLogger());
    const failing = vi.fn().mockRejectedValue(new Error("boom"));
    const healthy = vi.fn().mockResolvedValue(undefined);

    await bus.subscribe("listings_found", failing);
    await bus.subscribe("listings_found", healthy);

    await expect(bus.publish(listingsFound("evt-2"))).resolves.toBeUndefined();
    expect(healthy).toHaveBeenCalledTimes(1);
  });

  it("records history and reports status", async () => {
    const bus = new MemoryBus("test", createNoopLogger());
    await bus.subscribe("listings_found", async () => {});
    await bus.subscribe("listings_found", async () => {});

    await bus.publish(listingsFound("evt-3"));
    await bus.publish(listingsFound("evt-4", 1));

    expect(bus.getPublishedEvents().map((e) => e.id)).toEqual([
      "evt-3",
      "evt-4",
    ]);
    expect(bus.getStatus()).toEqual({
      subscribedTopics: ["listings_found"],
      handlerCount: 2,
      publishedEventCount: 2,
    });

    bus.clearHistory();
    expect(bus.getPublishedEvents()).toEqual([]);
  });

  it("drops handlers on close", async () => {
    const bus = new MemoryBus("test", createNoopLogger());
    const handler = vi.fn().mockResolvedValue(undefined);
    await bus.subscribe("listings_found", handler);

    await bus.close();
    await bus.publish(listingsFound("evt-5"));

    expect(handler).not.toHaveBeenCalled();
    expect(bus.getStatus().handlerCount).toBe(0);
  });
});

describe("isBusEvent", () => {
  it("accepts well-formed events", () => {
    const event: ScrapeCycleCompletedEvent = {
      type: "scrape_cycle_completed",
      id: "cycle-1",
      timestamp: "2024-05-01T10:00:00.000Z",
      data: {
        cycleId: "cycle-1",
        startedAt: "2024-05-01T10:00:00.000Z",
        finishedAt: "2024-05-01T10:00:05.000Z",
        cancelled: false,
        searches: [],
      },
    };

    expect(isBusEvent(JSON.parse(JSON.stringify(event)))).toBe(true);
  });

  it("rejects unknown types and missing fields", () => {
    expect(isBusEvent(null)).toBe(false);
    expect(isBusEvent("listings_found")).toBe(false);
    expect(
      isBusEvent({ type: "listing_changed", id: "a", timestamp: "t", data: {} })
    ).toBe(false);
    expect(isBusEvent({ type: "listings_found", id: "a", timestamp: "t" })).toBe(
      false
    );
  });
});
