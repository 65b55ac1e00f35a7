import { SiteId } from "./dto";
import { CircuitOpenError, toAdapterError } from "./errors";
import { Clock } from "./limiter";

export type BreakerState = "closed" | "open" | "half_open";

export interface BreakerOptions {
  failureThreshold: number;
  windowMs: number;
  cooldownMs: number;
}

export const DEFAULT_BREAKER_OPTIONS: BreakerOptions = {
  failureThreshold: 5,
  windowMs: 10 * 60 * 1000,
  cooldownMs: 5 * 60 * 1000,
};

/**
 * Suspends a site after `failureThreshold` consecutive failures inside
 * `windowMs`. After `cooldownMs` a single trial call decides whether the
 * circuit closes again.
 */
export class CircuitBreaker {
  private state: BreakerState = "closed";
  private failures = 0;
  private lastFailureAt = 0;
  private openedAt = 0;
  private trialInFlight = false;
  private options: BreakerOptions;

  constructor(
    private site: SiteId,
    options: Partial<BreakerOptions> = {},
    private now: Clock = Date.now
  ) {
    this.options = { ...DEFAULT_BREAKER_OPTIONS, ...options };
  }

  getState(): BreakerState {
    if (this.state === "open" && this.cooledDown()) {
      return "half_open";
    }
    return this.state;
  }

  consecutiveFailures(): number {
    return this.failures;
  }

  /** Throws CircuitOpenError if a call would be rejected right now */
  assertAvailable(): void {
    if (this.state === "open" && !this.cooledDown()) {
      throw new CircuitOpenError(this.site, this.openedAt + this.options.cooldownMs);
    }
    if (this.state === "half_open" && this.trialInFlight) {
      throw new CircuitOpenError(this.site);
    }
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    const trial = this.admit();

    let result: T;
    try {
      result = await fn();
    } catch (error) {
      this.onFailure(error, trial);
      throw error;
    }

    this.onSuccess(trial);
    return result;
  }

  private admit(): boolean {
    if (this.state === "closed") {
      return false;
    }

    if (this.state === "open") {
      if (!this.cooledDown()) {
        throw new CircuitOpenError(this.site, this.openedAt + this.options.cooldownMs);
      }
      this.state = "half_open";
    }

    if (this.trialInFlight) {
      throw new CircuitOpenError(this.site);
    }
    this.trialInFlight = true;
    return true;
  }

  private onSuccess(trial: boolean): void {
    if (trial) {
      this.trialInFlight = false;
      this.state = "closed";
      this.failures = 0;
      return;
    }
    if (this.state === "closed") {
      this.failures = 0;
    }
  }

  private onFailure(error: unknown, trial: boolean): void {
    const counted = isCountedFailure(error);

    if (trial) {
      this.trialInFlight = false;
      if (counted) {
        this.trip();
      }
      return;
    }

    // calls admitted before the circuit opened do not extend it
    if (!counted || this.state !== "closed") {
      return;
    }

    const now = this.now();
    if (this.failures > 0 && now - this.lastFailureAt > this.options.windowMs) {
      this.failures = 0;
    }
    this.failures++;
    this.lastFailureAt = now;

    if (this.failures >= this.options.failureThreshold) {
      this.trip();
    }
  }

  private trip(): void {
    this.state = "open";
    this.openedAt = this.now();
  }

  private cooledDown(): boolean {
    return this.now() - this.openedAt >= this.options.cooldownMs;
  }
}

export function isCountedFailure(error: unknown): boolean {
  switch (toAdapterError(error).kind) {
    case "NetworkError":
    case "TimeoutError":
    case "BlockedError":
    case "ParseError":
      return true;
    case "CircuitOpenError":
    case "CancelledError":
      return false;
  }
}
