import { AdapterErrorKind, SiteId } from "./dto";

/**
 * Failures an adapter call can end with. `kind` is the discriminator
 * recorded in outcomes; `retryable` drives per-request retries.
 */
export abstract class AdapterError extends Error {
  abstract readonly kind: AdapterErrorKind;
  abstract readonly retryable: boolean;

  constructor(
    message: string,
    readonly site?: SiteId,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NetworkError extends AdapterError {
  readonly kind = "NetworkError" as const;
  readonly retryable = true;

  constructor(
    message: string,
    site?: SiteId,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, site, options);
  }
}

export class TimeoutError extends AdapterError {
  readonly kind = "TimeoutError" as const;
  readonly retryable = true;
}

/** HTTP 403/429, captcha or robot-check page */
export class BlockedError extends AdapterError {
  readonly kind = "BlockedError" as const;
  readonly retryable = false;

  constructor(
    message: string,
    site?: SiteId,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, site, options);
  }
}

export class ParseError extends AdapterError {
  readonly kind = "ParseError" as const;
  readonly retryable = false;
}

export class CircuitOpenError extends AdapterError {
  readonly kind = "CircuitOpenError" as const;
  readonly retryable = false;

  constructor(site: SiteId, readonly retryAt?: number) {
    super(`Circuit open for ${site}`, site);
  }
}

export class CancelledError extends AdapterError {
  readonly kind = "CancelledError" as const;
  readonly retryable = false;

  constructor(message = "Cycle cancelled", site?: SiteId) {
    super(message, site);
  }
}

export class NotFoundError extends Error {
  name = "NotFoundError" as const;

  constructor(readonly savedSearchId: string) {
    super(`Saved search not found: ${savedSearchId}`);
  }
}

export class ConflictError extends Error {
  name = "ConflictError" as const;

  constructor(
    readonly savedSearchId: string,
    readonly expectedRevision: number,
    readonly actualRevision: number
  ) {
    super(
      `Revision mismatch for ${savedSearchId}: expected ${expectedRevision}, found ${actualRevision}`
    );
  }
}

export class DeliveryError extends Error {
  name = "DeliveryError" as const;

  constructor(
    readonly channel: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${channel}: ${message}`, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Classify anything an adapter call threw.
 * Abort reasons that are already AdapterErrors pass through untouched.
 */
export function toAdapterError(err: unknown, site?: SiteId): AdapterError {
  if (err instanceof AdapterError) {
    return err;
  }

  if (err instanceof Error) {
    switch (err.name) {
      case "AbortError":
        return new CancelledError("Request aborted", site);
      case "TimeoutError":
        return new TimeoutError(err.message, site, { cause: err });
    }

    // undici reports transport failures as TypeError("fetch failed")
    if (err instanceof TypeError && err.message === "fetch failed") {
      return new NetworkError(err.message, site, undefined, { cause: err });
    }
    // Chromium navigation failures, e.g. "page.goto: net::ERR_CONNECTION_RESET at ..."
    const chromiumCode = /net::ERR_[A-Z_]+/.exec(err.message);
    if (chromiumCode) {
      return new NetworkError(`Navigation failed: ${chromiumCode[0]}`, site, undefined, { cause: err });
    }

    return new ParseError(`Unexpected failure: ${err.message}`, site, {
      cause: err,
    });
  }

  return new ParseError(`Unexpected failure: ${String(err)}`, site);
}
