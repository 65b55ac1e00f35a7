import { z } from "zod";
import {
  ListingKey,
  MarketplaceListing,
  SavedSearch,
  SearchCriteria,
  SITE_IDS,
} from "./dto";

const siteSchema = z.enum(SITE_IDS);

export const criteriaSchema = z
  .object({
    keywords: z.array(z.string().trim().min(1)).min(1),
    minPriceMinor: z.number().int().nonnegative().optional(),
    maxPriceMinor: z.number().int().nonnegative().optional(),
    sites: z.array(siteSchema).min(1),
  })
  .refine(
    (data) =>
      data.minPriceMinor === undefined ||
      data.maxPriceMinor === undefined ||
      data.minPriceMinor <= data.maxPriceMinor,
    { message: "minPriceMinor must not exceed maxPriceMinor", path: ["minPriceMinor"] }
  );

export type CriteriaInput = z.input<typeof criteriaSchema>;

/**
 * Validate and freeze criteria. Duplicate sites collapse and keep the
 * canonical site order.
 */
export function parseCriteria(input: unknown): SearchCriteria {
  const parsed = criteriaSchema.parse(input);
  const sites = SITE_IDS.filter((site) => parsed.sites.includes(site));

  return Object.freeze({
    keywords: Object.freeze([...parsed.keywords]),
    ...(parsed.minPriceMinor !== undefined && { minPriceMinor: parsed.minPriceMinor }),
    ...(parsed.maxPriceMinor !== undefined && { maxPriceMinor: parsed.maxPriceMinor }),
    sites: Object.freeze(sites),
  });
}

export function listingKey(listing: Pick<MarketplaceListing, "site" | "externalId">): ListingKey {
  return `${listing.site}:${listing.externalId}`;
}

export function normalizeText(text: string): string {
  return text.normalize("NFKC").toLowerCase();
}

export function withinPriceBounds(priceMinor: number, criteria: SearchCriteria): boolean {
  if (criteria.minPriceMinor !== undefined && priceMinor < criteria.minPriceMinor) {
    return false;
  }
  if (criteria.maxPriceMinor !== undefined && priceMinor > criteria.maxPriceMinor) {
    return false;
  }
  return true;
}

/** Every keyword must appear in the title */
export function matchesKeywords(title: string, keywords: readonly string[]): boolean {
  const haystack = normalizeText(title);
  return keywords.every((keyword) => haystack.includes(normalizeText(keyword)));
}

export function matchesCriteria(listing: MarketplaceListing, criteria: SearchCriteria): boolean {
  return (
    withinPriceBounds(listing.priceMinor, criteria) &&
    matchesKeywords(listing.title, criteria.keywords)
  );
}

/**
 * Client-side filter applied by every adapter: drops listings outside the
 * criteria and collapses duplicate ids (first occurrence wins).
 */
export function refineListings(
  listings: MarketplaceListing[],
  criteria: SearchCriteria
): MarketplaceListing[] {
  const seen = new Set<ListingKey>();
  const result: MarketplaceListing[] = [];

  for (const listing of listings) {
    const key = listingKey(listing);
    if (seen.has(key) || !matchesCriteria(listing, criteria)) {
      continue;
    }
    seen.add(key);
    result.push(listing);
  }

  return result;
}

export function describeSearch(search: SavedSearch): string {
  return `${search.name} (${search.id})`;
}
