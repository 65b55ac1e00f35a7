import { sleep } from "@marketwatch/shared-utils";

export type Clock = () => number;

/**
 * Token bucket: `burst` tokens, refilled continuously at `ratePerSec`.
 */
export class TokenBucket {
  private tokens: number;
  private updatedAt: number;

  constructor(
    private ratePerSec: number,
    private burst: number,
    private now: Clock = Date.now
  ) {
    if (ratePerSec <= 0 || burst < 1) {
      throw new RangeError("TokenBucket needs ratePerSec > 0 and burst >= 1");
    }
    this.tokens = burst;
    this.updatedAt = now();
  }

  tryTake(): boolean {
    this.refill();
    if (this.tokens >= 1) {
      this.tokens -= 1;
      return true;
    }
    return false;
  }

  /** Wait until a token is available; rejects with the abort reason */
  async take(signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    while (!this.tryTake()) {
      await sleep(this.msUntilNextToken(), signal);
    }
  }

  available(): number {
    this.refill();
    return Math.floor(this.tokens);
  }

  private msUntilNextToken(): number {
    return Math.max(1, Math.ceil(((1 - this.tokens) / this.ratePerSec) * 1000));
  }

  private refill(): void {
    const now = this.now();
    const elapsedSec = Math.max(0, now - this.updatedAt) / 1000;
    this.tokens = Math.min(this.burst, this.tokens + elapsedSec * this.ratePerSec);
    this.updatedAt = now;
  }
}

export type Release = () => void;

interface Waiter {
  grant: () => void;
}

/**
 * Counting semaphore with a FIFO queue. A queued acquire can be abandoned
 * through its signal without disturbing the order of the others.
 */
export class Semaphore {
  private active = 0;
  private waiters: Waiter[] = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Semaphore capacity must be a positive integer, got ${capacity}`);
    }
  }

  acquire(signal?: AbortSignal): Promise<Release> {
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    if (this.active < this.capacity && this.waiters.length === 0) {
      this.active++;
      return Promise.resolve(this.releaser());
    }

    return new Promise<Release>((resolve, reject) => {
      const onAbort = () => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) {
          this.waiters.splice(index, 1);
        }
        reject(signal?.reason);
      };

      const waiter: Waiter = {
        grant: () => {
          signal?.removeEventListener("abort", onAbort);
          resolve(this.releaser());
        },
      };

      this.waiters.push(waiter);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  async use<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const release = await this.acquire(signal);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  inFlight(): number {
    return this.active;
  }

  queued(): number {
    return this.waiters.length;
  }

  private releaser(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.release();
    };
  }

  private release(): void {
    // hand the slot straight to the next waiter
    const next = this.waiters.shift();
    if (next) {
      next.grant();
    } else {
      this.active--;
    }
  }
}
