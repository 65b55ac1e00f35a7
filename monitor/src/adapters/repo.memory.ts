import { FeedEntry, ISO, MarketplaceListing, SavedSearch, SearchCriteria } from "../core/dto";
import { listingKey } from "../core/criteria";
import { ConflictError, NotFoundError } from "../core/errors";
import { FeedQuery, PersistencePort, SavedSearchFilter, SnapshotUpdate } from "../core/ports";

export interface NewSavedSearch {
  id: string;
  name: string;
  criteria: SearchCriteria;
  notificationsEnabled?: boolean;
  knownListingIds?: Iterable<string>;
  lastCycleAt?: ISO | null;
}

/**
 * In-process gateway for development mode and tests. Reads hand out
 * copies, so callers never share state with the store.
 */
export class MemoryPersistence implements PersistencePort {
  private searches = new Map<string, SavedSearch>();
  private feed: FeedEntry[] = [];
  private nextFeedId = 1;

  constructor(seed: NewSavedSearch[] = []) {
    seed.forEach((search) => this.addSavedSearch(search));
  }

  async getSavedSearches(filter: SavedSearchFilter): Promise<SavedSearch[]> {
    return Array.from(this.searches.values())
      .filter(
        (search) =>
          filter.notificationsEnabled === undefined ||
          search.notificationsEnabled === filter.notificationsEnabled
      )
      .map(copySearch);
  }

  async updateSnapshot(id: string, update: SnapshotUpdate): Promise<void> {
    const current = this.searches.get(id);
    if (!current) {
      throw new NotFoundError(id);
    }
    if (current.revision !== update.expectedRevision) {
      throw new ConflictError(id, update.expectedRevision, current.revision);
    }

    this.searches.set(id, {
      ...current,
      knownListingIds: new Set(update.knownListingIds),
      lastCycleAt: update.lastCycleAt,
      revision: current.revision + 1,
    });
  }

  async appendFeedEntries(
    savedSearchId: string,
    listings: MarketplaceListing[],
    timestamp: ISO
  ): Promise<FeedEntry[]> {
    const existing = new Set(
      this.feed
        .filter((entry) => entry.savedSearchId === savedSearchId)
        .map((entry) => listingKey(entry.listing))
    );

    const added: FeedEntry[] = [];
    for (const listing of listings) {
      if (existing.has(listingKey(listing))) continue;
      const entry: FeedEntry = {
        id: String(this.nextFeedId++),
        savedSearchId,
        listing: { ...listing },
        addedAt: timestamp,
        isRead: false,
      };
      this.feed.push(entry);
      added.push({ ...entry });
    }
    return added;
  }

  async listFeed(query: FeedQuery): Promise<FeedEntry[]> {
    const entries = this.feed
      .filter((entry) => !query.unreadOnly || !entry.isRead)
      .filter((entry) => !query.savedSearchId || entry.savedSearchId === query.savedSearchId)
      .sort((a, b) =>
        a.addedAt === b.addedAt ? Number(b.id) - Number(a.id) : a.addedAt < b.addedAt ? 1 : -1
      );

    return entries.slice(0, query.limit ?? entries.length).map((entry) => ({ ...entry }));
  }

  async markFeedRead(entryId: string): Promise<boolean> {
    const entry = this.feed.find((e) => e.id === entryId);
    if (!entry) {
      return false;
    }
    entry.isRead = true;
    return true;
  }

  async pruneFeed(olderThan: ISO): Promise<number> {
    const cutoff = Date.parse(olderThan);
    const before = this.feed.length;
    this.feed = this.feed.filter((entry) => Date.parse(entry.addedAt) >= cutoff);
    return before - this.feed.length;
  }

  // Helper methods for seeding, tests and debugging
  addSavedSearch(input: NewSavedSearch): SavedSearch {
    const search: SavedSearch = {
      id: input.id,
      name: input.name,
      criteria: input.criteria,
      notificationsEnabled: input.notificationsEnabled ?? true,
      knownListingIds: new Set(input.knownListingIds ?? []),
      lastCycleAt: input.lastCycleAt ?? null,
      revision: 0,
    };
    this.searches.set(search.id, search);
    return copySearch(search);
  }

  removeSavedSearch(id: string): boolean {
    return this.searches.delete(id);
  }

  getSavedSearch(id: string): SavedSearch | undefined {
    const search = this.searches.get(id);
    return search ? copySearch(search) : undefined;
  }

  size(): number {
    return this.searches.size;
  }

  clear(): void {
    this.searches.clear();
    this.feed = [];
  }
}

function copySearch(search: SavedSearch): SavedSearch {
  return { ...search, knownListingIds: new Set(search.knownListingIds) };
}
