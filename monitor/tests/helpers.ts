import { createNoopLogger, Logger } from "@marketwatch/shared-utils";
import { readFileSync } from "fs";
import path from "path";
import { vi } from "vitest";
import { MarketplaceListing, SavedSearch, SiteId } from "../src/core/dto";
import { parseCriteria } from "../src/core/criteria";

export const logger: Logger = createNoopLogger();

export const FETCHED_AT = "2024-05-01T00:00:00.000Z";

export function listing(
  site: SiteId,
  externalId: string,
  priceMinor: number,
  overrides: Partial<MarketplaceListing> = {}
): MarketplaceListing {
  return {
    site,
    externalId,
    title: `Item ${externalId}`,
    priceMinor,
    currency: "JPY",
    url: `https://example.test/${site}/${externalId}`,
    fetchedAt: FETCHED_AT,
    ...overrides,
  };
}

export function savedSearch(
  id: string,
  overrides: Partial<Omit<SavedSearch, "id">> = {}
): SavedSearch {
  return {
    id,
    name: `Search ${id}`,
    criteria: parseCriteria({ keywords: ["item"], sites: ["yahoo_auctions", "rakuten"] }),
    notificationsEnabled: true,
    knownListingIds: new Set(),
    lastCycleAt: null,
    revision: 0,
    ...overrides,
  };
}

/** Manually advanced clock for breaker and bucket tests */
export class FakeClock {
  constructor(private t = 0) {}

  now = (): number => this.t;

  advance(ms: number): void {
    this.t += ms;
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Promise that settles only when the signal aborts */
export function untilAborted<T>(signal: AbortSignal): Promise<T> {
  return new Promise<T>((_resolve, reject) => {
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });
}

/** fetch stand-in answering from a queue of responses or errors */
export function fakeFetch(...answers: (Response | Error)[]) {
  const queue = [...answers];
  return vi.fn(async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
    const next = queue.shift();
    if (!next) {
      throw new Error("unexpected request");
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  });
}

export function html(body: string, status = 200): Response {
  return new Response(body, { status, headers: { "Content-Type": "text/html; charset=utf-8" } });
}

export function fixture(name: string): string {
  return readFileSync(path.join(__dirname, "fixtures", name), "utf8");
}

/** FetchContext whose throttle resolves at once */
export function fetchContext(signal: AbortSignal = new AbortController().signal) {
  return { signal, throttle: vi.fn(async () => undefined) };
}
