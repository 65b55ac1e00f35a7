import { describe, expect, it } from "vitest";
import {
  describeSearch,
  listingKey,
  matchesKeywords,
  parseCriteria,
  refineListings,
  withinPriceBounds,
} from "../src/core/criteria";
import { listing, savedSearch } from "./helpers";

describe("parseCriteria", () => {
  it("collapses duplicate sites into canonical order", () => {
    const criteria = parseCriteria({
      keywords: ["Nikon"],
      sites: ["mercari", "yahoo_auctions", "mercari"],
    });

    expect(criteria.sites).toEqual(["yahoo_auctions", "mercari"]);
    expect(Object.isFrozen(criteria)).toBe(true);
  });

  it("rejects an inverted price range", () => {
    expect(() =>
      parseCriteria({
        keywords: ["Nikon"],
        minPriceMinor: 5000,
        maxPriceMinor: 1000,
        sites: ["rakuten"],
      })
    ).toThrow("minPriceMinor must not exceed maxPriceMinor");
  });

  it("rejects empty keyword and site lists", () => {
    expect(() => parseCriteria({ keywords: [], sites: ["rakuten"] })).toThrow();
    expect(() => parseCriteria({ keywords: ["F3"], sites: [] })).toThrow();
    expect(() => parseCriteria({ keywords: ["F3"], sites: ["ebay"] })).toThrow();
  });

  it("omits absent price bounds", () => {
    const criteria = parseCriteria({ keywords: ["F3"], sites: ["rakuten"] });
    expect("minPriceMinor" in criteria).toBe(false);
    expect("maxPriceMinor" in criteria).toBe(false);
  });
});

describe("matching", () => {
  const criteria = parseCriteria({
    keywords: ["nikon", "f3"],
    minPriceMinor: 1000,
    maxPriceMinor: 40000,
    sites: ["mercari"],
  });

  it("matches every keyword case-insensitively after NFKC normalization", () => {
    expect(matchesKeywords("ＮＩＫＯＮ F3 ボディ", criteria.keywords)).toBe(true);
    expect(matchesKeywords("Nikon FM2", criteria.keywords)).toBe(false);
  });

  it("treats price bounds as inclusive", () => {
    expect(withinPriceBounds(1000, criteria)).toBe(true);
    expect(withinPriceBounds(40000, criteria)).toBe(true);
    expect(withinPriceBounds(999, criteria)).toBe(false);
    expect(withinPriceBounds(40001, criteria)).toBe(false);
  });

  it("filters listings and keeps the first of duplicate ids", () => {
    const refined = refineListings(
      [
        listing("mercari", "m1", 20000, { title: "Nikon F3" }),
        listing("mercari", "m2", 90000, { title: "Nikon F3 set" }),
        listing("mercari", "m3", 15000, { title: "Canon AE-1" }),
        listing("mercari", "m1", 18000, { title: "Nikon F3 (relisted)" }),
      ],
      criteria
    );

    expect(refined.map(listingKey)).toEqual(["mercari:m1"]);
    expect(refined[0].priceMinor).toBe(20000);
  });
});

describe("describeSearch", () => {
  it("names the search and its id", () => {
    expect(describeSearch(savedSearch("s1", { name: "Film cameras" }))).toBe("Film cameras (s1)");
  });
});
