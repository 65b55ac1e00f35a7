import { Logger } from "@marketwatch/shared-utils";
import { DispatchReport, MarketplaceListing, NotificationEvent } from "./dto";
import { DeliveryError, errorMessage } from "./errors";
import { NotificationChannel } from "./ports";
import { formatYen } from "./price";

export const DEFAULT_SAMPLE_SIZE = 5;

type Delivery = DispatchReport["deliveries"][number];

/**
 * Fans each event out to every channel at once. A channel failure is
 * logged and recorded; it never reaches the caller.
 */
export class NotificationDispatcher {
  private logger: Logger;

  constructor(private channels: NotificationChannel[], logger: Logger) {
    this.logger = logger.child("dispatch");
  }

  channelNames(): string[] {
    return this.channels.map((channel) => channel.name);
  }

  async dispatch(events: NotificationEvent[]): Promise<DispatchReport> {
    const deliveries = await Promise.all(
      events.flatMap((event) =>
        this.channels.map((channel) => this.deliver(channel, event))
      )
    );
    return { deliveries };
  }

  private async deliver(
    channel: NotificationChannel,
    event: NotificationEvent
  ): Promise<Delivery> {
    try {
      await channel.deliver(event);
      return { savedSearchId: event.savedSearchId, channel: channel.name, status: "sent" };
    } catch (error) {
      const failure =
        error instanceof DeliveryError
          ? error
          : new DeliveryError(channel.name, errorMessage(error), { cause: error });
      this.logger.error(
        `Delivery of "${event.savedSearchName}" via ${channel.name} failed: ${failure.message}`
      );
      return {
        savedSearchId: event.savedSearchId,
        channel: channel.name,
        status: "failed",
        error: failure.message,
      };
    }
  }
}

export function formatPrice(listing: Pick<MarketplaceListing, "priceMinor" | "currency">): string {
  return listing.currency === "JPY"
    ? formatYen(listing.priceMinor)
    : `${listing.priceMinor} ${listing.currency}`;
}

export function summaryTitle(event: NotificationEvent): string {
  const count = event.newListings.length;
  return `${event.savedSearchName}: ${count} new ${count === 1 ? "listing" : "listings"}`;
}

/**
 * Title line followed by up to `sampleSize` listing lines:
 *
 *   Film cameras: 2 new listings
 *   - Nikon F3 (¥25,000) https://...
 */
export function formatSummary(
  event: NotificationEvent,
  sampleSize: number = DEFAULT_SAMPLE_SIZE
): string {
  const lines = event.newListings
    .slice(0, sampleSize)
    .map((listing) => `- ${listing.title} (${formatPrice(listing)}) ${listing.url}`);

  return [summaryTitle(event), ...lines].join("\n");
}
