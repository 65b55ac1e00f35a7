import { formatDuration, linkAbort, Logger, raceAbort } from "@marketwatch/shared-utils";
import {
  AdapterOutcome,
  MarketplaceListing,
  OutcomeMap,
  SavedSearch,
  ScrapeCycleResult,
  SiteId,
} from "./dto";
import { AdapterError, ParseError, TimeoutError, toAdapterError } from "./errors";
import { AdapterGate } from "./gate";
import { Semaphore } from "./limiter";
import { SiteAdapter } from "./ports";

export interface OrchestratorOptions {
  pageLimit: number;
  adapterTimeoutMs: number;
}

export interface SearchScraper {
  scrapeSearch(search: SavedSearch, signal: AbortSignal): Promise<ScrapeCycleResult>;
}

interface SiteRun {
  site: SiteId;
  outcome: AdapterOutcome;
  listings: MarketplaceListing[];
}

/**
 * Fans one saved search out to its selected adapters. Each adapter call
 * holds a slot of the process-wide semaphore and passes its site gate;
 * a failure is recorded for that site only.
 */
export class ScrapeOrchestrator implements SearchScraper {
  private logger: Logger;

  constructor(
    private adapters: ReadonlyMap<SiteId, SiteAdapter>,
    private gates: ReadonlyMap<SiteId, AdapterGate>,
    private globalSlots: Semaphore,
    private options: OrchestratorOptions,
    logger: Logger
  ) {
    this.logger = logger.child("orchestrator");
  }

  async scrapeSearch(search: SavedSearch, signal: AbortSignal): Promise<ScrapeCycleResult> {
    const runs = await Promise.all(
      search.criteria.sites.map((site) => this.runSite(site, search, signal))
    );

    const outcomes: OutcomeMap = {};
    const listings: MarketplaceListing[] = [];
    for (const run of runs) {
      outcomes[run.site] = run.outcome;
      listings.push(...run.listings);
    }

    return {
      savedSearchId: search.id,
      listings,
      outcomes,
      allFailed: runs.every((run) => run.outcome.status === "failed"),
      cancelled: signal.aborted,
    };
  }

  private async runSite(site: SiteId, search: SavedSearch, signal: AbortSignal): Promise<SiteRun> {
    const adapter = this.adapters.get(site);
    const gate = this.gates.get(site);
    if (!adapter || !gate) {
      return this.failed(site, search, new ParseError("no adapter registered", site));
    }

    const started = Date.now();
    try {
      const listings = await this.globalSlots.use(
        () => this.callAdapter(adapter, gate, search, signal),
        signal
      );

      this.logger.info(
        `${site} returned ${listings.length} listings for "${search.name}" in ${formatDuration(Date.now() - started)}`
      );
      return { site, outcome: { status: "success", count: listings.length }, listings };
    } catch (error) {
      return this.failed(site, search, toAdapterError(error, site));
    }
  }

  private async callAdapter(
    adapter: SiteAdapter,
    gate: AdapterGate,
    search: SavedSearch,
    signal: AbortSignal
  ): Promise<MarketplaceListing[]> {
    const timeoutMs = this.options.adapterTimeoutMs;
    const linked = linkAbort(signal, {
      timeoutMs,
      timeoutReason: () =>
        new TimeoutError(`${adapter.site} exceeded ${formatDuration(timeoutMs)}`, adapter.site),
    });

    try {
      return await gate.run(
        (throttle) =>
          raceAbort(
            adapter.fetch(search.criteria, this.options.pageLimit, {
              signal: linked.signal,
              throttle,
            }),
            linked.signal
          ),
        linked.signal
      );
    } finally {
      linked.dispose();
    }
  }

  private failed(site: SiteId, search: SavedSearch, error: AdapterError): SiteRun {
    const label = `${site} failed for "${search.name}"`;
    switch (error.kind) {
      case "BlockedError":
        this.logger.warn(`${label}: blocked by site (${error.message})`);
        break;
      case "ParseError":
        this.logger.error(`${label}: ${error.message}`);
        break;
      case "CircuitOpenError":
        this.logger.info(`${site} skipped for "${search.name}": circuit open`);
        break;
      case "CancelledError":
        this.logger.debug(`${site} cancelled for "${search.name}"`);
        break;
      case "NetworkError":
      case "TimeoutError":
        this.logger.warn(`${label}: ${error.message}`);
        break;
    }

    return {
      site,
      outcome: { status: "failed", error: error.kind, message: error.message },
      listings: [],
    };
  }
}
