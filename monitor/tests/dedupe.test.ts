import { describe, expect, it } from "vitest";
import { listingKey } from "../src/core/criteria";
import { dedupe } from "../src/core/dedupe";
import { listing } from "./helpers";

describe("dedupe", () => {
  it("orders new listings by ascending price", () => {
    const { newListings } = dedupe(new Set(), [
      listing("yahoo_auctions", "a", 300),
      listing("rakuten", "b", 100),
      listing("mercari", "c", 250),
    ]);

    expect(newListings.map((l) => l.priceMinor)).toEqual([100, 250, 300]);
  });

  it("breaks price ties by site, then external id", () => {
    const { newListings } = dedupe(new Set(), [
      listing("yahoo_auctions", "a", 500),
      listing("mercari", "z", 500),
      listing("mercari", "b", 500),
      listing("rakuten", "c", 500),
    ]);

    expect(newListings.map(listingKey)).toEqual([
      "mercari:b",
      "mercari:z",
      "rakuten:c",
      "yahoo_auctions:a",
    ]);
  });

  it("never reports a known listing, even with a changed price or title", () => {
    const known = new Set(["yahoo_auctions:1"]);
    const { newListings, updatedKnownIds } = dedupe(known, [
      listing("yahoo_auctions", "1", 100, { title: "Price dropped" }),
      listing("yahoo_auctions", "2", 300),
    ]);

    expect(newListings.map(listingKey)).toEqual(["yahoo_auctions:2"]);
    expect(Array.from(updatedKnownIds).sort()).toEqual(["yahoo_auctions:1", "yahoo_auctions:2"]);
  });

  it("does not mutate its inputs", () => {
    const known = new Set(["rakuten:r1"]);
    const merged = [listing("rakuten", "r3", 900), listing("rakuten", "r2", 100)];

    dedupe(known, merged);

    expect(Array.from(known)).toEqual(["rakuten:r1"]);
    expect(merged.map((l) => l.externalId)).toEqual(["r3", "r2"]);
  });

  it("collapses duplicates within one cycle, first occurrence wins", () => {
    const { newListings } = dedupe(new Set(), [
      listing("mercari", "m1", 700, { title: "first" }),
      listing("mercari", "m1", 200, { title: "second" }),
    ]);

    expect(newListings).toHaveLength(1);
    expect(newListings[0].title).toBe("first");
  });

  it("is idempotent and reports nothing once the snapshot is updated", () => {
    const known = new Set(["mercari:m0"]);
    const merged = [listing("mercari", "m1", 700), listing("mercari", "m0", 10)];

    const first = dedupe(known, merged);
    const second = dedupe(known, merged);
    expect(second).toEqual(first);

    expect(dedupe(first.updatedKnownIds, merged).newListings).toEqual([]);
  });
});
