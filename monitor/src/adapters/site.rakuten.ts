import { CheerioAPI } from "cheerio";
import { MarketplaceListing, SearchCriteria } from "../core/dto";
import { ParseError } from "../core/errors";
import { parseYen } from "../core/price";
import { absoluteUrl, normalizeUrl, ParsedPage, StaticPageAdapter } from "./site.static";

export const RAKUTEN_SEARCH_URL = "https://search.rakuten.co.jp/search/mall/";

const ITEM_SELECTOR = "div.searchresultitem";
const TITLE_SELECTOR = 'h2[class*="title-link-wrapper"] a, h2 a';
const PRICE_SELECTOR = 'div[class*="price--"], [class*="price-wrapper"], .important';

/**
 * Rakuten Ichiba mall search, newest first (`s=4`). The last page is read
 * from the pagination bar.
 */
export class RakutenAdapter extends StaticPageAdapter {
  readonly site = "rakuten" as const;
  protected readonly origin = "https://www.rakuten.co.jp";
  protected readonly itemSelector = ITEM_SELECTOR;

  protected buildUrl(criteria: SearchCriteria, page: number): string {
    const query = encodeURIComponent(criteria.keywords.join(" "));
    const params = new URLSearchParams({ s: "4", p: String(page) });
    if (criteria.minPriceMinor !== undefined) {
      params.set("min", String(criteria.minPriceMinor));
    }
    if (criteria.maxPriceMinor !== undefined) {
      params.set("max", String(criteria.maxPriceMinor));
    }
    return `${RAKUTEN_SEARCH_URL}${query}/?${params.toString()}`;
  }

  protected parsePage($: CheerioAPI, page: number, fetchedAt: string): ParsedPage {
    const container = $(".searchresults");
    const items = $(ITEM_SELECTOR);
    if (items.length === 0 && container.length === 0) {
      throw new ParseError(`Rakuten results container missing on page ${page}`, this.site);
    }

    const listings: MarketplaceListing[] = [];
    items.each((_, element) => {
      const item = $(element);
      const anchor = item.find(TITLE_SELECTOR).first();
      const href = anchor.attr("href");
      const title = anchor.text().trim();
      const price = parseYen(item.find(PRICE_SELECTOR).first().text());

      if (!href || !title || price === null) {
        return;
      }

      const url = absoluteUrl(href, "https://search.rakuten.co.jp");
      const externalId =
        item.attr("data-item-id") ?? item.attr("data-id") ?? rakutenIdFromUrl(url);

      listings.push({
        site: this.site,
        externalId,
        title,
        priceMinor: price,
        currency: "JPY",
        url,
        imageUrl: item.find("img").first().attr("src"),
        fetchedAt,
      });
    });

    return { listings, hasMore: page < lastPage($) };
  }
}

/** Highest page number linked from the pagination bar (1 when absent) */
export function lastPage($: CheerioAPI): number {
  let last = 1;
  $("div.dui-pagination a").each((_, element) => {
    const value = Number($(element).text().trim());
    if (Number.isInteger(value) && value > last) {
      last = value;
    }
  });
  return last;
}

/** "shop/item" from https://item.rakuten.co.jp/<shop>/<item>/ */
export function rakutenIdFromUrl(url: string): string {
  const normalized = normalizeUrl(url);
  try {
    const segments = new URL(normalized).pathname.split("/").filter(Boolean);
    if (segments.length >= 2) {
      return `${segments[0]}/${segments[1]}`;
    }
  } catch {
    return normalized;
  }
  return normalized;
}
