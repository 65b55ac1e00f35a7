import { Logger, sleep } from "@marketwatch/shared-utils";
import { CheerioAPI, load } from "cheerio";
import { refineListings } from "../core/criteria";
import { MarketplaceListing, SearchCriteria, SiteId } from "../core/dto";
import {
  BlockedError,
  NetworkError,
  ParseError,
  toAdapterError,
} from "../core/errors";
import { FetchContext, SiteAdapter } from "../core/ports";
import { pickUserAgent } from "./user-agents";

export interface StaticAdapterOptions {
  maxRetries?: number;
  backoffMs?: number;
  fetchImpl?: typeof fetch;
  random?: () => number;
  logger: Logger;
}

export interface ParsedPage {
  listings: MarketplaceListing[];
  hasMore: boolean;
}

const BLOCK_PAGE_TITLES = new Set([
  "access denied",
  "attention required! | cloudflare",
  "just a moment...",
  "アクセスが制限されています",
  "不正なアクセスを検知しました",
]);

const CHALLENGE_SELECTOR = [
  'iframe[src*="captcha"]',
  'form[action*="captcha"]',
  '[id*="captcha"]',
  '[class*="captcha"]',
  "#challenge-form",
].join(", ");

/**
 * Anti-bot interstitial: no result items, plus a challenge widget or a
 * known block-page title. Titles are compared whole because result pages
 * echo the query in theirs.
 */
export function isBlockPage($: CheerioAPI, itemSelector: string): boolean {
  if ($(itemSelector).length > 0) {
    return false;
  }
  const title = $("title").first().text().trim().toLowerCase();
  return BLOCK_PAGE_TITLES.has(title) || $(CHALLENGE_SELECTOR).length > 0;
}

/**
 * Plain HTTP GET + cheerio extraction. Stateless, so one instance serves
 * any number of concurrent searches.
 */
export abstract class StaticPageAdapter implements SiteAdapter {
  abstract readonly site: SiteId;
  readonly kind = "static" as const;

  protected abstract readonly origin: string;
  /** One result item; a page with any is never treated as a block page */
  protected abstract readonly itemSelector: string;
  protected logger: Logger;
  private maxRetries: number;
  private backoffMs: number;
  private fetchImpl: typeof fetch;
  private random: () => number;

  constructor(options: StaticAdapterOptions) {
    this.maxRetries = options.maxRetries ?? 2;
    this.backoffMs = options.backoffMs ?? 500;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.random = options.random ?? Math.random;
    this.logger = options.logger;
  }

  protected abstract buildUrl(criteria: SearchCriteria, page: number): string;

  /** Throw ParseError when the result container is missing */
  protected abstract parsePage($: CheerioAPI, page: number, fetchedAt: string): ParsedPage;

  async fetch(
    criteria: SearchCriteria,
    pageLimit: number,
    ctx: FetchContext
  ): Promise<MarketplaceListing[]> {
    const collected: MarketplaceListing[] = [];

    for (let page = 1; page <= pageLimit; page++) {
      ctx.signal.throwIfAborted();
      await ctx.throttle();

      const url = this.buildUrl(criteria, page);
      const html = await this.getPage(url, ctx.signal);
      const $ = load(html);
      this.assertNotBlocked($);

      const parsed = this.parsePage($, page, new Date().toISOString());
      collected.push(...parsed.listings);
      this.logger.debug(`${this.site} page ${page}: ${parsed.listings.length} items`);

      if (!parsed.hasMore) {
        break;
      }
    }

    return refineListings(collected, criteria);
  }

  protected headers(): Record<string, string> {
    return {
      "User-Agent": pickUserAgent(this.random),
      Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
      "Accept-Language": "ja-JP,ja;q=0.9,en-US;q=0.8,en;q=0.7",
      Referer: `${this.origin}/`,
      Origin: this.origin,
    };
  }

  /** GET with bounded exponential backoff for retryable failures */
  protected async getPage(url: string, signal: AbortSignal): Promise<string> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await this.request(url, signal);
      } catch (error) {
        const failure = toAdapterError(error, this.site);
        if (!failure.retryable || attempt >= this.maxRetries || signal.aborted) {
          throw failure;
        }

        const delay = this.backoffMs * 2 ** attempt;
        this.logger.debug(
          `${this.site} request failed (${failure.message}), retry ${attempt + 1}/${this.maxRetries} in ${delay}ms`
        );
        await sleep(delay, signal);
      }
    }
  }

  private async request(url: string, signal: AbortSignal): Promise<string> {
    const response = await this.fetchImpl(url, {
      headers: this.headers(),
      redirect: "follow",
      signal,
    });

    if (response.ok) {
      return response.text();
    }

    // release the connection; error bodies are never read
    await response.body?.cancel();

    if (response.status === 403 || response.status === 429) {
      throw new BlockedError(`HTTP ${response.status} from ${this.site}`, this.site, response.status);
    }
    if (response.status >= 500) {
      throw new NetworkError(`HTTP ${response.status} from ${this.site}`, this.site, response.status);
    }
    throw new ParseError(`Unexpected HTTP ${response.status} from ${this.site}`, this.site);
  }

  private assertNotBlocked($: CheerioAPI): void {
    if (isBlockPage($, this.itemSelector)) {
      throw new BlockedError(`${this.site} served a robot check page`, this.site);
    }
  }
}

/** Resolve a possibly relative href against the site origin */
export function absoluteUrl(href: string, base: string): string {
  try {
    return new URL(href, base).toString();
  } catch {
    return href;
  }
}

/** URL without query string or fragment, for sites without stable ids */
export function normalizeUrl(url: string): string {
  try {
    const parsed = new URL(url);
    return `${parsed.origin}${parsed.pathname.replace(/\/+$/, "")}`;
  } catch {
    return url;
  }
}

/** Last path segment of a URL, e.g. "m12345" for /item/m12345 */
export function lastPathSegment(url: string): string {
  const normalized = normalizeUrl(url);
  const segment = normalized.split("/").pop();
  return segment ? segment : normalized;
}
