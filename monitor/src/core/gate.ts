import { CircuitBreaker, BreakerOptions, BreakerState } from "./breaker";
import { SiteId } from "./dto";
import { toAdapterError } from "./errors";
import { Clock, Semaphore, TokenBucket } from "./limiter";

export interface GateOptions {
  ratePerSec: number;
  burst: number;
  concurrency: number;
  breaker?: Partial<BreakerOptions>;
}

export interface GateStatus {
  site: SiteId;
  breaker: BreakerState;
  consecutiveFailures: number;
  inFlight: number;
  queued: number;
  tokens: number;
}

/**
 * Per-site admission: circuit check, concurrency slot, then the breaker
 * wraps the call. The adapter receives `throttle` to pace page requests.
 */
export class AdapterGate {
  readonly bucket: TokenBucket;
  readonly semaphore: Semaphore;
  readonly breaker: CircuitBreaker;

  constructor(readonly site: SiteId, options: GateOptions, now: Clock = Date.now) {
    this.bucket = new TokenBucket(options.ratePerSec, options.burst, now);
    this.semaphore = new Semaphore(options.concurrency);
    this.breaker = new CircuitBreaker(site, options.breaker, now);
  }

  async run<T>(
    fn: (throttle: () => Promise<void>) => Promise<T>,
    signal: AbortSignal
  ): Promise<T> {
    this.breaker.assertAvailable();

    const release = await this.semaphore.acquire(signal);
    try {
      return await this.breaker.execute(async () => {
        try {
          return await fn(() => this.bucket.take(signal));
        } catch (error) {
          throw toAdapterError(error, this.site);
        }
      });
    } finally {
      release();
    }
  }

  getStatus(): GateStatus {
    return {
      site: this.site,
      breaker: this.breaker.getState(),
      consecutiveFailures: this.breaker.consecutiveFailures(),
      inFlight: this.semaphore.inFlight(),
      queued: this.semaphore.queued(),
      tokens: this.bucket.available(),
    };
  }
}

export type GateRegistry = Map<SiteId, AdapterGate>;
