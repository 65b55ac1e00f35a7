import { Logger, raceAbort, sleep } from "@marketwatch/shared-utils";
import { CheerioAPI, load } from "cheerio";
import { refineListings } from "../core/criteria";
import { MarketplaceListing, SearchCriteria } from "../core/dto";
import { BlockedError, ParseError, toAdapterError } from "../core/errors";
import { Semaphore } from "../core/limiter";
import { BrowserSession, BrowserSessionFactory, FetchContext, SiteAdapter } from "../core/ports";
import { parseYen } from "../core/price";
import { absoluteUrl, isBlockPage, lastPathSegment } from "./site.static";

export const MERCARI_ORIGIN = "https://jp.mercari.com";
export const MERCARI_SEARCH_URL = `${MERCARI_ORIGIN}/search`;

const ITEM_SELECTOR = 'li[data-testid="item-cell"]';
const NO_RESULTS_SELECTOR = '[data-testid="search-no-results"], [data-testid="no-results"]';
const NEXT_PAGE_SELECTOR = '[data-testid="pagination-next-button"]';

export interface MercariAdapterOptions {
  sessions: BrowserSessionFactory;
  logger: Logger;
  thinkTimeMs?: { min: number; max: number };
  navigationTimeoutMs?: number;
  waitTimeoutMs?: number;
  /** Extra navigation attempts after a network failure or timeout */
  maxRetries?: number;
  backoffMs?: number;
  scrollSteps?: number;
  random?: () => number;
}

/**
 * Mercari renders results client-side, so this adapter drives a real
 * browser. One session per adapter, one operation at a time.
 */
export class MercariAdapter implements SiteAdapter {
  readonly site = "mercari" as const;
  readonly kind = "browser" as const;

  private session: BrowserSession | null = null;
  private mutex = new Semaphore(1);
  private logger: Logger;
  private thinkTimeMs: { min: number; max: number };
  private navigationTimeoutMs: number;
  private waitTimeoutMs: number;
  private maxRetries: number;
  private backoffMs: number;
  private scrollSteps: number;
  private random: () => number;

  constructor(private options: MercariAdapterOptions) {
    this.logger = options.logger;
    this.thinkTimeMs = options.thinkTimeMs ?? { min: 500, max: 1500 };
    this.navigationTimeoutMs = options.navigationTimeoutMs ?? 20000;
    this.waitTimeoutMs = options.waitTimeoutMs ?? 8000;
    this.maxRetries = options.maxRetries ?? 2;
    this.backoffMs = options.backoffMs ?? 1000;
    this.scrollSteps = options.scrollSteps ?? 3;
    this.random = options.random ?? Math.random;
  }

  async fetch(
    criteria: SearchCriteria,
    pageLimit: number,
    ctx: FetchContext
  ): Promise<MarketplaceListing[]> {
    return this.mutex.use(() => this.search(criteria, pageLimit, ctx), ctx.signal);
  }

  async close(): Promise<void> {
    await this.resetSession();
  }

  hasSession(): boolean {
    return this.session !== null;
  }

  buildUrl(criteria: SearchCriteria, page: number): string {
    const params = new URLSearchParams({
      keyword: criteria.keywords.join(" "),
      status: "on_sale",
      sort: "created_time",
      order: "desc",
    });
    if (criteria.minPriceMinor !== undefined) {
      params.set("price_min", String(criteria.minPriceMinor));
    }
    if (criteria.maxPriceMinor !== undefined) {
      params.set("price_max", String(criteria.maxPriceMinor));
    }
    if (page > 0) {
      params.set("page_token", `v1:${page}`);
    }
    return `${MERCARI_SEARCH_URL}?${params.toString()}`;
  }

  private async search(
    criteria: SearchCriteria,
    pageLimit: number,
    ctx: FetchContext
  ): Promise<MarketplaceListing[]> {
    const { signal } = ctx;
    const collected: MarketplaceListing[] = [];

    try {
      const session = await this.ensureSession(signal);

      for (let page = 0; page < pageLimit; page++) {
        signal.throwIfAborted();
        await ctx.throttle();

        const status = await this.navigate(session, this.buildUrl(criteria, page), signal);
        if (status === 403 || status === 429) {
          throw new BlockedError(`HTTP ${status} from mercari`, this.site, status);
        }

        await this.think(signal);
        const found = await raceAbort(session.waitFor(ITEM_SELECTOR, this.waitTimeoutMs), signal);

        for (let step = 0; step < this.scrollSteps && found; step++) {
          await raceAbort(session.scroll(600 + Math.floor(this.random() * 400)), signal);
          await this.think(signal);
        }

        const $ = load(await raceAbort(session.content(), signal));
        assertNotBlocked($);

        if (!found) {
          if ($(NO_RESULTS_SELECTOR).length > 0) {
            break;
          }
          throw new ParseError(`Mercari result grid missing on page ${page + 1}`, this.site);
        }

        const parsed = parseMercariPage($, new Date().toISOString());
        collected.push(...parsed.listings);
        this.logger.debug(`mercari page ${page + 1}: ${parsed.listings.length} items`);

        if (!parsed.hasMore) {
          break;
        }
      }

      return refineListings(collected, criteria);
    } catch (error) {
      const failure = toAdapterError(error, this.site);
      switch (failure.kind) {
        case "BlockedError":
          this.logger.warn("Mercari blocked the browser session; discarding it");
          await this.resetSession();
          break;
        case "CancelledError":
        case "TimeoutError":
          await this.resetSession();
          break;
        default:
          break;
      }
      throw failure;
    }
  }

  /** page.goto with bounded exponential backoff for retryable failures */
  private async navigate(
    session: BrowserSession,
    url: string,
    signal: AbortSignal
  ): Promise<number | null> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await raceAbort(session.open(url, this.navigationTimeoutMs), signal);
      } catch (error) {
        const failure = toAdapterError(error, this.site);
        if (!failure.retryable || attempt >= this.maxRetries || signal.aborted) {
          throw failure;
        }

        const delay = this.backoffMs * 2 ** attempt;
        this.logger.debug(
          `mercari navigation failed (${failure.message}), retry ${attempt + 1}/${this.maxRetries} in ${delay}ms`
        );
        await sleep(delay, signal);
      }
    }
  }

  private async ensureSession(signal: AbortSignal): Promise<BrowserSession> {
    if (this.session) {
      return this.session;
    }

    const creating = this.options.sessions.create();
    try {
      this.session = await raceAbort(creating, signal);
    } catch (error) {
      if (signal.aborted) {
        // the launch keeps going after the abort; close what it produces
        creating
          .then((late) => late.close())
          .catch((closeError: unknown) => {
            this.logger.warn("Closing abandoned Mercari browser session failed:", closeError);
          });
      }
      throw error;
    }
    this.logger.info("Mercari browser session opened");
    return this.session;
  }

  private async resetSession(): Promise<void> {
    const session = this.session;
    this.session = null;
    if (!session) {
      return;
    }

    try {
      await session.close();
      this.logger.debug("Mercari browser session closed");
    } catch (error) {
      this.logger.warn("Closing Mercari browser session failed:", error);
    }
  }

  private think(signal: AbortSignal): Promise<void> {
    const { min, max } = this.thinkTimeMs;
    return sleep(min + Math.floor(this.random() * Math.max(0, max - min)), signal);
  }
}

function assertNotBlocked($: CheerioAPI): void {
  if (isBlockPage($, ITEM_SELECTOR)) {
    throw new BlockedError("Mercari served a robot check page", "mercari");
  }
}

export function parseMercariPage(
  $: CheerioAPI,
  fetchedAt: string
): { listings: MarketplaceListing[]; hasMore: boolean } {
  const listings: MarketplaceListing[] = [];

  $(ITEM_SELECTOR).each((_, element) => {
    const item = $(element);
    const link = item.find('a[data-testid="thumbnail-link"], a[href*="/item/"]').first();
    const href = link.attr("href");
    const label =
      item.find('div[role="img"]').first().attr("aria-label") ??
      item.find('[data-testid="thumbnail-item-name"]').first().text();
    const title = label.replace(/のサムネイル$/, "").trim();
    const price = parseYen(
      item.find('span[class*="merPrice"] span[class*="number"]').first().text() ||
        item.find('[data-testid="price"]').first().text()
    );

    if (!href || !title || price === null) {
      return;
    }

    const url = absoluteUrl(href, MERCARI_ORIGIN);
    listings.push({
      site: "mercari",
      externalId: lastPathSegment(url),
      title,
      priceMinor: price,
      currency: "JPY",
      url,
      imageUrl: item.find("picture img, img").first().attr("src"),
      fetchedAt,
    });
  });

  return { listings, hasMore: $(NEXT_PAGE_SELECTOR).length > 0 };
}
