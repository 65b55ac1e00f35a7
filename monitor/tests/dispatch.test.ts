import { describe, expect, it, vi } from "vitest";
import {
  formatPrice,
  formatSummary,
  NotificationDispatcher,
  summaryTitle,
} from "../src/core/dispatch";
import { NotificationEvent } from "../src/core/dto";
import { DeliveryError } from "../src/core/errors";
import { NotificationChannel } from "../src/core/ports";
import { listing, logger } from "./helpers";

const event: NotificationEvent = {
  savedSearchId: "s1",
  savedSearchName: "Film cameras",
  newListings: [
    listing("yahoo_auctions", "2", 300, { title: "Nikon FM2" }),
    listing("rakuten", "3", 25000, { title: "Nikon F3" }),
  ],
  cycleTimestamp: "2024-05-01T10:00:00.000Z",
};

function channel(name: string, deliver: NotificationChannel["deliver"]): NotificationChannel {
  return { name, deliver: vi.fn(deliver) };
}

describe("formatSummary", () => {
  it("lists the new listings under a title", () => {
    expect(formatSummary(event)).toBe(
      [
        "Film cameras: 2 new listings",
        "- Nikon FM2 (¥300) https://example.test/yahoo_auctions/2",
        "- Nikon F3 (¥25,000) https://example.test/rakuten/3",
      ].join("\n")
    );
  });

  it("caps the listing lines at the sample size", () => {
    expect(formatSummary(event, 1)).toBe(
      "Film cameras: 2 new listings\n- Nikon FM2 (¥300) https://example.test/yahoo_auctions/2"
    );
  });

  it("uses the singular for one listing", () => {
    expect(summaryTitle({ ...event, newListings: event.newListings.slice(0, 1) })).toBe(
      "Film cameras: 1 new listing"
    );
    expect(summaryTitle({ ...event, newListings: [] })).toBe("Film cameras: 0 new listings");
  });

  it("prints foreign currencies as plain amounts", () => {
    expect(formatPrice({ priceMinor: 1250, currency: "USD" })).toBe("1250 USD");
  });
});

describe("NotificationDispatcher", () => {
  it("records each delivery without letting failures escape", async () => {
    const sent = channel("desktop", async () => undefined);
    const rejected = channel("webhook", async () => {
      throw new DeliveryError("webhook", "HTTP 500");
    });
    const broken = channel("log", async () => {
      throw new Error("boom");
    });
    const dispatcher = new NotificationDispatcher([sent, rejected, broken], logger);
    const other = { ...event, savedSearchId: "s2", savedSearchName: "Keyboards" };

    const report = await dispatcher.dispatch([event, other]);

    expect(report.deliveries).toEqual([
      { savedSearchId: "s1", channel: "desktop", status: "sent" },
      { savedSearchId: "s1", channel: "webhook", status: "failed", error: "webhook: HTTP 500" },
      { savedSearchId: "s1", channel: "log", status: "failed", error: "log: boom" },
      { savedSearchId: "s2", channel: "desktop", status: "sent" },
      { savedSearchId: "s2", channel: "webhook", status: "failed", error: "webhook: HTTP 500" },
      { savedSearchId: "s2", channel: "log", status: "failed", error: "log: boom" },
    ]);
    expect(sent.deliver).toHaveBeenCalledTimes(2);
    expect(sent.deliver).toHaveBeenCalledWith(other);
  });

  it("delivers to the channels concurrently", async () => {
    const order: string[] = [];
    let releaseSlow: () => void = () => undefined;
    const slow = channel("slow", async () => {
      await new Promise<void>((resolve) => {
        releaseSlow = resolve;
      });
      order.push("slow");
    });
    const fast = channel("fast", async () => {
      order.push("fast");
      releaseSlow();
    });

    const report = await new NotificationDispatcher([slow, fast], logger).dispatch([event]);

    expect(order).toEqual(["fast", "slow"]);
    expect(report.deliveries.map((d) => d.status)).toEqual(["sent", "sent"]);
    expect(new NotificationDispatcher([slow, fast], logger).channelNames()).toEqual([
      "slow",
      "fast",
    ]);
  });
});
