import { CheerioAPI } from "cheerio";
import { MarketplaceListing, SearchCriteria } from "../core/dto";
import { ParseError } from "../core/errors";
import { parseYen } from "../core/price";
import { absoluteUrl, lastPathSegment, ParsedPage, StaticPageAdapter } from "./site.static";

export const YAHOO_SEARCH_URL = "https://auctions.yahoo.co.jp/search/search";
export const YAHOO_PAGE_SIZE = 50;

const ITEM_SELECTOR = "li.Product";
// zero-hit notice shown in place of the product grid
const EMPTY_SELECTOR = ".Empty, .Notfound, .Result__empty";
const EMPTY_TEXT = /条件に一致する商品(は見つかりませんでした|はありません)/;

/**
 * Yahoo! Auctions keyword search, newest first. Auction and fixed-price
 * items both appear; the current bid is taken as the price.
 */
export class YahooAuctionsAdapter extends StaticPageAdapter {
  readonly site = "yahoo_auctions" as const;
  protected readonly origin = "https://auctions.yahoo.co.jp";
  protected readonly itemSelector = ITEM_SELECTOR;

  protected buildUrl(criteria: SearchCriteria, page: number): string {
    const query = criteria.keywords.join(" ");
    const params = new URLSearchParams({
      p: query,
      va: query,
      b: String(1 + (page - 1) * YAHOO_PAGE_SIZE),
      n: String(YAHOO_PAGE_SIZE),
      s1: "new",
      o1: "d",
    });
    if (criteria.minPriceMinor !== undefined) {
      params.set("aucminprice", String(criteria.minPriceMinor));
    }
    if (criteria.maxPriceMinor !== undefined) {
      params.set("aucmaxprice", String(criteria.maxPriceMinor));
    }
    return `${YAHOO_SEARCH_URL}?${params.toString()}`;
  }

  protected parsePage($: CheerioAPI, page: number, fetchedAt: string): ParsedPage {
    const items = $(ITEM_SELECTOR);
    if (items.length === 0) {
      if ($(".Products").length > 0 || isEmptyResult($)) {
        return { listings: [], hasMore: false };
      }
      throw new ParseError(`Yahoo results container missing on page ${page}`, this.site);
    }

    const listings: MarketplaceListing[] = [];

    items.each((_, element) => {
      const item = $(element);
      const link = item.find("a.Product__titleLink").first();
      const anchor = link.length > 0 ? link : item.find("a[href]").first();
      const href = anchor.attr("href");
      const title = (item.find(".Product__title").first().text() || anchor.text()).trim();
      const price = parseYen(
        item.find(".Product__priceValue").first().text() ||
          item.find(".Product__price").first().text()
      );

      if (!href || !title || price === null) {
        return;
      }

      const url = absoluteUrl(href, this.origin);
      const image = item.find("img").first();

      listings.push({
        site: this.site,
        externalId: anchor.attr("data-auction-id") ?? lastPathSegment(url),
        title,
        priceMinor: price,
        currency: "JPY",
        url,
        imageUrl: image.attr("src") ?? image.attr("data-src"),
        fetchedAt,
      });
    });

    return { listings, hasMore: items.length >= YAHOO_PAGE_SIZE };
  }
}

function isEmptyResult($: CheerioAPI): boolean {
  return $(EMPTY_SELECTOR).length > 0 || EMPTY_TEXT.test($(".Result, main").first().text());
}
