/**
 * Event types published by the marketplace monitor
 */
export type EventType = "listings_found" | "scrape_cycle_completed";

/**
 * Base event interface that all events must implement
 */
export interface BaseEvent {
  type: EventType;
  id: string;
  timestamp: string;
  source?: string;
  version?: string;
}

/**
 * Per-adapter result as reported on the bus
 */
export type AdapterOutcomeSummary =
  | { status: "success"; count: number }
  | { status: "failed"; error: string; message?: string };

export interface ListingsFoundEvent extends BaseEvent {
  type: "listings_found";
  data: {
    savedSearchId: string;
    savedSearchName: string;
    newItemCount: number;
    listingKeys: string[];
    cycleTimestamp: string;
  };
}

export interface ScrapeCycleCompletedEvent extends BaseEvent {
  type: "scrape_cycle_completed";
  data: {
    cycleId: string;
    startedAt: string;
    finishedAt: string;
    cancelled: boolean;
    searches: Array<{
      savedSearchId: string;
      status: string;
      newCount: number;
      outcomes: Record<string, AdapterOutcomeSummary>;
    }>;
  };
}

export interface EventMap {
  listings_found: ListingsFoundEvent;
  scrape_cycle_completed: ScrapeCycleCompletedEvent;
}

export type BusEvent = EventMap[EventType];

/**
 * Event handler function type
 */
export type EventHandler<T extends BaseEvent = BusEvent> = (
  event: T
) => Promise<void>;

/**
 * Standard bus port interface
 */
export interface BusPort {
  /**
   * Subscribe to events of a specific type
   */
  subscribe<K extends EventType>(
    topic: K,
    handler: EventHandler<EventMap[K]>
  ): Promise<void>;

  /**
   * Publish an event to a topic
   */
  publish(event: BusEvent): Promise<void>;

  /**
   * Close the bus connection and cleanup resources
   */
  close?(): Promise<void>;
}

/**
 * Bus configuration options
 */
export interface BusConfig {
  redisUrl: string;
  serviceName: string;
  retryAttempts?: number;
  /** Channel namespace; events go to `<prefix>:<type>` */
  channelPrefix?: string;
}

export const EVENT_TYPES: readonly EventType[] = [
  "listings_found",
  "scrape_cycle_completed",
];

export function isEventType(value: unknown): value is EventType {
  return typeof value === "string" && EVENT_TYPES.some((t) => t === value);
}

/**
 * Shape check for events arriving over the wire
 */
export function isBusEvent(value: unknown): value is BusEvent {
  if (typeof value !== "object" || value === null) return false;
  if (
    !("type" in value) ||
    !("id" in value) ||
    !("timestamp" in value) ||
    !("data" in value)
  ) {
    return false;
  }
  return (
    isEventType(value.type) &&
    typeof value.id === "string" &&
    typeof value.timestamp === "string" &&
    typeof value.data === "object" &&
    value.data !== null
  );
}
