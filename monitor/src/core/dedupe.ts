import { listingKey } from "./criteria";
import { ListingKey, MarketplaceListing } from "./dto";

export interface DedupeResult {
  newListings: MarketplaceListing[];
  updatedKnownIds: Set<ListingKey>;
}

/**
 * Identity-based diff of a cycle's listings against the stored snapshot.
 * Pure: inputs are never mutated.
 */
export function dedupe(
  knownListingIds: ReadonlySet<ListingKey>,
  merged: readonly MarketplaceListing[]
): DedupeResult {
  const updatedKnownIds = new Set(knownListingIds);
  const newListings: MarketplaceListing[] = [];

  for (const listing of merged) {
    const key = listingKey(listing);
    if (updatedKnownIds.has(key)) {
      continue;
    }
    updatedKnownIds.add(key);
    newListings.push(listing);
  }

  newListings.sort(compareListings);
  return { newListings, updatedKnownIds };
}

/** Price ascending, then site, then externalId */
export function compareListings(a: MarketplaceListing, b: MarketplaceListing): number {
  if (a.priceMinor !== b.priceMinor) {
    return a.priceMinor - b.priceMinor;
  }
  if (a.site !== b.site) {
    return a.site < b.site ? -1 : 1;
  }
  if (a.externalId !== b.externalId) {
    return a.externalId < b.externalId ? -1 : 1;
  }
  return 0;
}
