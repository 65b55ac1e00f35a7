import { Logger } from "@marketwatch/shared-utils";
import { z } from "zod";
import { listingKey, parseCriteria } from "../core/criteria";
import { FeedEntry, ISO, MarketplaceListing, SavedSearch, SITE_IDS } from "../core/dto";
import { ConflictError, NotFoundError } from "../core/errors";
import { FeedQuery, PersistencePort, SavedSearchFilter, SnapshotUpdate } from "../core/ports";

/**
 * The slice of pg's Pool / PoolClient this gateway uses. Rows come back
 * untyped and are validated below.
 */
export interface SqlQueryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
}

export interface SqlPoolClient extends SqlQueryable {
  release(): void;
}

export interface SqlPool extends SqlQueryable {
  connect(): Promise<SqlPoolClient>;
  end(): Promise<void>;
}

const savedSearchRow = z.object({
  id: z.string(),
  name: z.string(),
  criteria_json: z.unknown(),
  notifications_enabled: z.boolean(),
  known_listing_ids: z.array(z.string()),
  last_cycle_at: z.coerce.date().nullable(),
  revision: z.coerce.number().int(),
});

const revisionRow = z.object({ revision: z.coerce.number().int() });

const feedRow = z.object({
  id: z.coerce.string(),
  saved_search_id: z.string(),
  site: z.enum(SITE_IDS),
  external_id: z.string(),
  title: z.string(),
  price_minor: z.coerce.number().int(),
  currency: z.string(),
  url: z.string(),
  image_url: z.string().nullable(),
  fetched_at: z.coerce.date(),
  added_at: z.coerce.date(),
  is_read: z.boolean(),
});

const SEARCH_COLUMNS =
  "id, name, criteria_json, notifications_enabled, known_listing_ids, last_cycle_at, revision";

const FEED_COLUMNS =
  "id, saved_search_id, site, external_id, title, price_minor, currency, url, image_url, fetched_at, added_at, is_read";

/**
 * PostgreSQL gateway (schema: db/schema.sql). Snapshot commits lock the
 * saved search row and compare revisions inside one transaction.
 */
export class PostgresPersistence implements PersistencePort {
  private logger: Logger;

  constructor(private pool: SqlPool, logger: Logger) {
    this.logger = logger.child("repo");
  }

  async getSavedSearches(filter: SavedSearchFilter): Promise<SavedSearch[]> {
    const result =
      filter.notificationsEnabled === undefined
        ? await this.pool.query(`SELECT ${SEARCH_COLUMNS} FROM saved_searches ORDER BY id`)
        : await this.pool.query(
            `SELECT ${SEARCH_COLUMNS} FROM saved_searches WHERE notifications_enabled = $1 ORDER BY id`,
            [filter.notificationsEnabled]
          );

    const searches: SavedSearch[] = [];
    // one malformed row must not hide the other searches
    for (const raw of result.rows) {
      const row = savedSearchRow.safeParse(raw);
      if (!row.success) {
        this.logger.error(
          `Skipping malformed saved search row: ${row.error.errors.map((e) => `${e.path.join(".")} ${e.message}`).join("; ")}`
        );
        continue;
      }
      try {
        searches.push(mapSavedSearch(row.data));
      } catch (error) {
        this.logger.error(`Skipping saved search ${row.data.id} with invalid criteria:`, error);
      }
    }
    return searches;
  }

  async updateSnapshot(id: string, update: SnapshotUpdate): Promise<void> {
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");

      const current = await client.query(
        "SELECT revision FROM saved_searches WHERE id = $1 FOR UPDATE",
        [id]
      );
      if (current.rows.length === 0) {
        throw new NotFoundError(id);
      }

      const { revision } = revisionRow.parse(current.rows[0]);
      if (revision !== update.expectedRevision) {
        throw new ConflictError(id, update.expectedRevision, revision);
      }

      await client.query(
        `UPDATE saved_searches
            SET known_listing_ids = $2, last_cycle_at = $3, revision = revision + 1
          WHERE id = $1`,
        [id, Array.from(update.knownListingIds), update.lastCycleAt]
      );

      await client.query("COMMIT");
    } catch (error) {
      await this.rollback(client);
      throw error;
    } finally {
      client.release();
    }
  }

  async appendFeedEntries(
    savedSearchId: string,
    listings: MarketplaceListing[],
    timestamp: ISO
  ): Promise<FeedEntry[]> {
    const added: FeedEntry[] = [];

    for (const listing of listings) {
      const result = await this.pool.query(
        `INSERT INTO feed_items
           (saved_search_id, listing_key, site, external_id, title, price_minor, currency, url, image_url, fetched_at, added_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
         ON CONFLICT (saved_search_id, listing_key) DO NOTHING
         RETURNING ${FEED_COLUMNS}`,
        [
          savedSearchId,
          listingKey(listing),
          listing.site,
          listing.externalId,
          listing.title,
          listing.priceMinor,
          listing.currency,
          listing.url,
          listing.imageUrl ?? null,
          listing.fetchedAt,
          timestamp,
        ]
      );
      added.push(...result.rows.map((raw) => mapFeedEntry(feedRow.parse(raw))));
    }

    return added;
  }

  async listFeed(query: FeedQuery): Promise<FeedEntry[]> {
    const conditions: string[] = [];
    const values: unknown[] = [];

    if (query.unreadOnly) {
      conditions.push("is_read = FALSE");
    }
    if (query.savedSearchId) {
      values.push(query.savedSearchId);
      conditions.push(`saved_search_id = $${values.length}`);
    }

    let sql = `SELECT ${FEED_COLUMNS} FROM feed_items`;
    if (conditions.length > 0) {
      sql += ` WHERE ${conditions.join(" AND ")}`;
    }
    sql += " ORDER BY added_at DESC, id DESC";
    if (query.limit !== undefined) {
      values.push(query.limit);
      sql += ` LIMIT $${values.length}`;
    }

    const result = await this.pool.query(sql, values);
    return result.rows.map((raw) => mapFeedEntry(feedRow.parse(raw)));
  }

  async markFeedRead(entryId: string): Promise<boolean> {
    if (!/^\d+$/.test(entryId)) {
      return false;
    }
    const result = await this.pool.query("UPDATE feed_items SET is_read = TRUE WHERE id = $1", [
      entryId,
    ]);
    return (result.rowCount ?? 0) > 0;
  }

  async pruneFeed(olderThan: ISO): Promise<number> {
    const result = await this.pool.query("DELETE FROM feed_items WHERE added_at < $1", [olderThan]);
    return result.rowCount ?? 0;
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async rollback(client: SqlPoolClient): Promise<void> {
    try {
      await client.query("ROLLBACK");
    } catch (error) {
      this.logger.error("Rollback failed:", error);
    }
  }
}

function mapSavedSearch(row: z.infer<typeof savedSearchRow>): SavedSearch {
  return {
    id: row.id,
    name: row.name,
    criteria: parseCriteria(row.criteria_json),
    notificationsEnabled: row.notifications_enabled,
    knownListingIds: new Set(row.known_listing_ids),
    lastCycleAt: row.last_cycle_at ? row.last_cycle_at.toISOString() : null,
    revision: row.revision,
  };
}

function mapFeedEntry(row: z.infer<typeof feedRow>): FeedEntry {
  return {
    id: row.id,
    savedSearchId: row.saved_search_id,
    listing: {
      site: row.site,
      externalId: row.external_id,
      title: row.title,
      priceMinor: row.price_minor,
      currency: row.currency,
      url: row.url,
      ...(row.image_url !== null && { imageUrl: row.image_url }),
      fetchedAt: row.fetched_at.toISOString(),
    },
    addedAt: row.added_at.toISOString(),
    isRead: row.is_read,
  };
}
