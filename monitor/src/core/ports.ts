import {
  FeedEntry,
  ISO,
  ListingKey,
  MarketplaceListing,
  NotificationEvent,
  SavedSearch,
  SearchCriteria,
  SiteId,
} from "./dto";

export interface FetchContext {
  /** Cycle-scoped; aborted on cancellation or adapter timeout */
  signal: AbortSignal;
  /** Await before every outbound page request */
  throttle: () => Promise<void>;
}

// One per marketplace
export interface SiteAdapter {
  readonly site: SiteId;
  readonly kind: "static" | "browser";
  fetch(
    criteria: SearchCriteria,
    pageLimit: number,
    ctx: FetchContext
  ): Promise<MarketplaceListing[]>;
  close?(): Promise<void>;
}

export interface SavedSearchFilter {
  notificationsEnabled?: boolean;
}

export interface SnapshotUpdate {
  knownListingIds: ReadonlySet<ListingKey>;
  lastCycleAt: ISO;
  expectedRevision: number;
}

export interface FeedQuery {
  unreadOnly?: boolean;
  limit?: number;
  savedSearchId?: string;
}

// Saved searches, snapshots and the listing feed
export interface PersistencePort {
  getSavedSearches(filter: SavedSearchFilter): Promise<SavedSearch[]>;
  /** Rejects with NotFoundError or ConflictError */
  updateSnapshot(id: string, update: SnapshotUpdate): Promise<void>;
  appendFeedEntries(
    savedSearchId: string,
    listings: MarketplaceListing[],
    timestamp: ISO
  ): Promise<FeedEntry[]>;
  listFeed(query: FeedQuery): Promise<FeedEntry[]>;
  markFeedRead(entryId: string): Promise<boolean>;
  pruneFeed(olderThan: ISO): Promise<number>;
  close?(): Promise<void>;
}

export interface NotificationChannel {
  readonly name: string;
  /** Rejects with DeliveryError */
  deliver(event: NotificationEvent): Promise<void>;
}

// Browser automation, kept narrow so adapters can be tested without a browser
export interface BrowserSession {
  /** Navigate and return the main document's HTTP status (null if unknown) */
  open(url: string, timeoutMs: number): Promise<number | null>;
  waitFor(selector: string, timeoutMs: number): Promise<boolean>;
  scroll(pixels: number): Promise<void>;
  content(): Promise<string>;
  close(): Promise<void>;
}

export interface BrowserSessionFactory {
  create(): Promise<BrowserSession>;
}
