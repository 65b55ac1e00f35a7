import { Logger } from "@marketwatch/shared-utils";
import { DEFAULT_SAMPLE_SIZE } from "../core/dispatch";
import { NotificationEvent } from "../core/dto";
import { DeliveryError, errorMessage } from "../core/errors";
import { NotificationChannel } from "../core/ports";

export interface WebhookOptions {
  url: string;
  sampleSize?: number;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
  logger: Logger;
}

export interface WebhookPayload {
  savedSearchId: string;
  savedSearchName: string;
  newItemCount: number;
  cycleTimestamp: string;
  samples: {
    site: string;
    externalId: string;
    title: string;
    priceMinor: number;
    currency: string;
    url: string;
    imageUrl?: string;
  }[];
}

export function toWebhookPayload(event: NotificationEvent, sampleSize: number): WebhookPayload {
  return {
    savedSearchId: event.savedSearchId,
    savedSearchName: event.savedSearchName,
    newItemCount: event.newListings.length,
    cycleTimestamp: event.cycleTimestamp,
    samples: event.newListings.slice(0, sampleSize).map((listing) => ({
      site: listing.site,
      externalId: listing.externalId,
      title: listing.title,
      priceMinor: listing.priceMinor,
      currency: listing.currency,
      url: listing.url,
      ...(listing.imageUrl !== undefined && { imageUrl: listing.imageUrl }),
    })),
  };
}

/**
 * POSTs a JSON summary to a configured URL. Any non-2xx answer, timeout
 * or transport failure rejects with DeliveryError.
 */
export class WebhookChannel implements NotificationChannel {
  readonly name = "webhook";
  private sampleSize: number;
  private timeoutMs: number;
  private fetchImpl: typeof fetch;
  private logger: Logger;

  constructor(private options: WebhookOptions) {
    this.sampleSize = options.sampleSize ?? DEFAULT_SAMPLE_SIZE;
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.logger = options.logger.child("webhook");
  }

  async deliver(event: NotificationEvent): Promise<void> {
    const payload = toWebhookPayload(event, this.sampleSize);

    let response: Response;
    try {
      response = await this.fetchImpl(this.options.url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new DeliveryError(this.name, `request failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (!response.ok) {
      throw new DeliveryError(this.name, `HTTP ${response.status}`);
    }

    this.logger.debug(`Delivered ${payload.newItemCount} listings for ${payload.savedSearchId}`);
  }
}
