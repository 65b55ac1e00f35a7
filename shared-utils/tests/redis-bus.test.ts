import { describe, expect, it } from "vitest";
import { channelFor, decodeMessage } from "../src/bus";

const event = {
  type: "scrape_cycle_completed",
  id: "evt-9",
  timestamp: "2024-05-01T10:05:00.000Z",
  data: {
    cycleId: "cycle-1",
    startedAt: "2024-05-01T10:00:00.000Z",
    finishedAt: "2024-05-01T10:05:00.000Z",
    cancelled: false,
    searches: [],
  },
};

describe("redis bus wire format", () => {
  it("namespaces channels by prefix", () => {
    expect(channelFor("marketwatch", "listings_found")).toBe("marketwatch:listings_found");
    expect(channelFor("", "listings_found")).toBe("listings_found");
  });

  it("decodes events published on their own channel", () => {
    const decoded = decodeMessage(
      "marketwatch",
      "marketwatch:scrape_cycle_completed",
      JSON.stringify(event)
    );

    expect(decoded).toEqual(event);
  });

  it("drops foreign channels and mismatched types", () => {
    const payload = JSON.stringify(event);

    expect(decodeMessage("marketwatch", "other:scrape_cycle_completed", payload)).toBeUndefined();
    expect(decodeMessage("marketwatch", "marketwatch:listings_found", payload)).toBeUndefined();
    expect(decodeMessage("marketwatch", "marketwatch:unknown", payload)).toBeUndefined();
  });

  it("drops payloads that are not events", () => {
    const channel = "marketwatch:scrape_cycle_completed";

    expect(decodeMessage("marketwatch", channel, "{not json")).toBeUndefined();
    expect(decodeMessage("marketwatch", channel, JSON.stringify({ type: "scrape_cycle_completed" }))).toBeUndefined();
  });
});
