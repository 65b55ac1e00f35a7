export type ISO = string;

export type SiteId = "yahoo_auctions" | "rakuten" | "mercari";

export const SITE_IDS = ["yahoo_auctions", "rakuten", "mercari"] as const satisfies readonly SiteId[];

export function isSiteId(value: string): value is SiteId {
  return SITE_IDS.some((site) => site === value);
}

export interface MarketplaceListing {
  site: SiteId;
  externalId: string; // site-native id, else normalized URL
  title: string;
  priceMinor: number; // smallest currency unit (yen for JPY)
  currency: string; // ISO 4217
  url: string;
  imageUrl?: string;
  fetchedAt: ISO;
}

/** `"<site>:<externalId>"` */
export type ListingKey = string;

export interface SearchCriteria {
  readonly keywords: readonly string[];
  readonly minPriceMinor?: number;
  readonly maxPriceMinor?: number;
  readonly sites: readonly SiteId[];
}

export interface SavedSearch {
  id: string;
  name: string;
  criteria: SearchCriteria;
  notificationsEnabled: boolean;
  knownListingIds: ReadonlySet<ListingKey>;
  lastCycleAt: ISO | null;
  revision: number;
}

export type AdapterErrorKind =
  | "NetworkError"
  | "BlockedError"
  | "ParseError"
  | "TimeoutError"
  | "CircuitOpenError"
  | "CancelledError";

export type AdapterOutcome =
  | { status: "success"; count: number }
  | { status: "failed"; error: AdapterErrorKind; message: string };

export type OutcomeMap = Partial<Record<SiteId, AdapterOutcome>>;

export interface ScrapeCycleResult {
  savedSearchId: string;
  listings: MarketplaceListing[];
  outcomes: OutcomeMap;
  allFailed: boolean;
  cancelled: boolean;
}

export interface NotificationEvent {
  savedSearchId: string;
  savedSearchName: string;
  newListings: MarketplaceListing[]; // price ascending
  cycleTimestamp: ISO;
}

export interface FeedEntry {
  id: string;
  savedSearchId: string;
  listing: MarketplaceListing;
  addedAt: ISO;
  isRead: boolean;
}

export type SearchCycleStatus =
  | "committed"
  | "all_failed"
  | "cancelled"
  | "abandoned"
  | "commit_failed";

export interface SearchCycleReport {
  savedSearchId: string;
  status: SearchCycleStatus;
  outcomes: OutcomeMap;
  newCount: number;
  finishedAt: ISO;
}

export interface CycleReport {
  cycleId: string;
  startedAt: ISO;
  finishedAt: ISO;
  cancelled: boolean;
  searches: SearchCycleReport[];
  events: NotificationEvent[];
}

export type DeliveryStatus = "sent" | "failed";

export interface DispatchReport {
  deliveries: Array<{
    savedSearchId: string;
    channel: string;
    status: DeliveryStatus;
    error?: string;
  }>;
}
