import {
  AdapterOutcomeSummary,
  BusPort,
  formatDuration,
  Logger,
} from "@marketwatch/shared-utils";
import { describeSearch, listingKey } from "./criteria";
import { dedupe } from "./dedupe";
import { NotificationDispatcher } from "./dispatch";
import {
  CycleReport,
  NotificationEvent,
  OutcomeMap,
  SavedSearch,
  SearchCycleReport,
  SearchCycleStatus,
} from "./dto";
import { ConflictError, errorMessage, NotFoundError } from "./errors";
import { createId } from "./ids";
import { SearchScraper } from "./orchestrator";
import { PersistencePort } from "./ports";

export interface CycleRunnerOptions {
  notifyEmptyCycles: boolean;
  feedRetentionDays: number;
}

export interface CycleRunnerDeps {
  persistence: PersistencePort;
  scraper: SearchScraper;
  dispatcher: NotificationDispatcher;
  bus?: BusPort;
  logger: Logger;
  now?: () => Date;
}

interface SearchRun {
  report: SearchCycleReport;
  event?: NotificationEvent;
}

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * One monitoring cycle: every saved search is scraped, diffed against its
 * snapshot and committed concurrently; events for committed searches are
 * then dispatched and published.
 */
export class CycleRunner {
  private persistence: PersistencePort;
  private scraper: SearchScraper;
  private dispatcher: NotificationDispatcher;
  private bus?: BusPort;
  private logger: Logger;
  private now: () => Date;

  constructor(deps: CycleRunnerDeps, private options: CycleRunnerOptions) {
    this.persistence = deps.persistence;
    this.scraper = deps.scraper;
    this.dispatcher = deps.dispatcher;
    this.bus = deps.bus;
    this.logger = deps.logger.child("cycle");
    this.now = deps.now ?? (() => new Date());
  }

  async runCycle(signal: AbortSignal, cycleId: string = createId("cycle")): Promise<CycleReport> {
    const startedAt = this.now();
    const searches = await this.persistence.getSavedSearches({});
    this.logger.info(`Cycle ${cycleId} started with ${searches.length} saved searches`);

    const runs = await Promise.all(searches.map((search) => this.runSearch(search, signal)));

    const events = runs.flatMap((run) => (run.event ? [run.event] : []));
    if (events.length > 0) {
      // committed searches are notified even if the cycle was cancelled meanwhile
      await this.dispatcher.dispatch(events);
    }

    const finishedAt = this.now();
    const report: CycleReport = {
      cycleId,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      cancelled: signal.aborted,
      searches: runs.map((run) => run.report),
      events,
    };

    await this.publish(report);
    if (!signal.aborted) {
      await this.prune(finishedAt);
    }

    this.logger.info(
      `Cycle ${cycleId} ${report.cancelled ? "cancelled" : "finished"} in ${formatDuration(
        finishedAt.getTime() - startedAt.getTime()
      )}: ${events.length} notifications`
    );
    return report;
  }

  private async runSearch(search: SavedSearch, signal: AbortSignal): Promise<SearchRun> {
    if (signal.aborted) {
      return { report: this.searchReport(search, "cancelled", {}, 0) };
    }

    const result = await this.scraper.scrapeSearch(search, signal);

    if (result.cancelled || signal.aborted) {
      return { report: this.searchReport(search, "cancelled", result.outcomes, 0) };
    }

    if (result.allFailed) {
      this.logger.warn(`All adapters failed for ${describeSearch(search)}; snapshot kept`);
      return { report: this.searchReport(search, "all_failed", result.outcomes, 0) };
    }

    const { newListings, updatedKnownIds } = dedupe(search.knownListingIds, result.listings);
    const cycleTimestamp = this.now().toISOString();

    const status = await this.commit(search, updatedKnownIds, cycleTimestamp);
    if (status !== "committed") {
      return { report: this.searchReport(search, status, result.outcomes, 0) };
    }

    if (newListings.length > 0) {
      try {
        await this.persistence.appendFeedEntries(search.id, newListings, cycleTimestamp);
      } catch (error) {
        this.logger.error(`Feed append failed for ${describeSearch(search)}:`, error);
      }
    }

    const report = this.searchReport(search, "committed", result.outcomes, newListings.length);
    const notify =
      search.notificationsEnabled && (newListings.length > 0 || this.options.notifyEmptyCycles);

    if (!notify) {
      return { report };
    }

    return {
      report,
      event: {
        savedSearchId: search.id,
        savedSearchName: search.name,
        newListings,
        cycleTimestamp,
      },
    };
  }

  private async commit(
    search: SavedSearch,
    knownListingIds: Set<string>,
    lastCycleAt: string
  ): Promise<SearchCycleStatus> {
    try {
      await this.persistence.updateSnapshot(search.id, {
        knownListingIds,
        lastCycleAt,
        expectedRevision: search.revision,
      });
      return "committed";
    } catch (error) {
      if (error instanceof NotFoundError) {
        this.logger.debug(`Saved search ${search.id} deleted mid-cycle; update abandoned`);
        return "abandoned";
      }
      if (error instanceof ConflictError) {
        this.logger.warn(`Snapshot conflict for ${describeSearch(search)}: ${error.message}`);
        return "commit_failed";
      }
      this.logger.error(`Snapshot commit failed for ${describeSearch(search)}:`, error);
      return "commit_failed";
    }
  }

  private searchReport(
    search: SavedSearch,
    status: SearchCycleStatus,
    outcomes: OutcomeMap,
    newCount: number
  ): SearchCycleReport {
    return {
      savedSearchId: search.id,
      status,
      outcomes,
      newCount,
      finishedAt: this.now().toISOString(),
    };
  }

  private async publish(report: CycleReport): Promise<void> {
    const bus = this.bus;
    if (!bus) {
      return;
    }

    try {
      for (const event of report.events) {
        await bus.publish({
          type: "listings_found",
          id: createId("listings"),
          timestamp: report.finishedAt,
          source: "monitor",
          data: {
            savedSearchId: event.savedSearchId,
            savedSearchName: event.savedSearchName,
            newItemCount: event.newListings.length,
            listingKeys: event.newListings.map(listingKey),
            cycleTimestamp: event.cycleTimestamp,
          },
        });
      }

      await bus.publish({
        type: "scrape_cycle_completed",
        id: report.cycleId,
        timestamp: report.finishedAt,
        source: "monitor",
        data: {
          cycleId: report.cycleId,
          startedAt: report.startedAt,
          finishedAt: report.finishedAt,
          cancelled: report.cancelled,
          searches: report.searches.map((search) => ({
            savedSearchId: search.savedSearchId,
            status: search.status,
            newCount: search.newCount,
            outcomes: summarizeOutcomes(search.outcomes),
          })),
        },
      });
    } catch (error) {
      this.logger.error(`Publishing cycle ${report.cycleId} failed: ${errorMessage(error)}`);
    }
  }

  private async prune(now: Date): Promise<void> {
    if (this.options.feedRetentionDays <= 0) {
      return;
    }

    const cutoff = new Date(now.getTime() - this.options.feedRetentionDays * DAY_MS);
    try {
      const removed = await this.persistence.pruneFeed(cutoff.toISOString());
      if (removed > 0) {
        this.logger.info(`Pruned ${removed} feed entries older than ${cutoff.toISOString()}`);
      }
    } catch (error) {
      this.logger.error("Feed pruning failed:", error);
    }
  }
}

function summarizeOutcomes(outcomes: OutcomeMap): Record<string, AdapterOutcomeSummary> {
  const summary: Record<string, AdapterOutcomeSummary> = {};
  for (const [site, outcome] of Object.entries(outcomes)) {
    if (!outcome) continue;
    summary[site] =
      outcome.status === "success"
        ? { status: "success", count: outcome.count }
        : { status: "failed", error: outcome.error, message: outcome.message };
  }
  return summary;
}
