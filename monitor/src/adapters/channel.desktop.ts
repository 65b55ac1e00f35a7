import { Logger } from "@marketwatch/shared-utils";
import { formatPrice, formatSummary, summaryTitle } from "../core/dispatch";
import { NotificationEvent } from "../core/dto";
import { NotificationChannel } from "../core/ports";

export interface SseBroadcaster {
  broadcast(event: string, data: unknown): number;
}

export interface DesktopNotification {
  savedSearchId: string;
  title: string;
  body: string;
  cycleTimestamp: string;
  listings: { title: string; price: string; url: string; imageUrl?: string }[];
}

// Pushed to the operator page, which raises a browser notification
export class DesktopChannel implements NotificationChannel {
  readonly name = "desktop";
  private logger: Logger;

  constructor(private sse: SseBroadcaster, private sampleSize: number, logger: Logger) {
    this.logger = logger.child("desktop");
  }

  async deliver(event: NotificationEvent): Promise<void> {
    const notification: DesktopNotification = {
      savedSearchId: event.savedSearchId,
      title: summaryTitle(event),
      body: formatSummary(event, this.sampleSize),
      cycleTimestamp: event.cycleTimestamp,
      listings: event.newListings.slice(0, this.sampleSize).map((listing) => ({
        title: listing.title,
        price: formatPrice(listing),
        url: listing.url,
        ...(listing.imageUrl !== undefined && { imageUrl: listing.imageUrl }),
      })),
    };

    const receivers = this.sse.broadcast("notification", notification);
    if (receivers === 0) {
      this.logger.debug(`No operator page connected for "${notification.title}"`);
    }
  }
}
