import { Logger } from "@marketwatch/shared-utils";
import { CycleReport, SearchCycleReport } from "./dto";
import { CancelledError, errorMessage } from "./errors";
import { createId } from "./ids";
import { PersistencePort } from "./ports";

export type SchedulerState = "idle" | "running" | "cancelling" | "stopped";

export interface CycleSource {
  runCycle(signal: AbortSignal, cycleId?: string): Promise<CycleReport>;
}

export interface LastCycleSummary {
  cycleId: string;
  startedAt: string;
  finishedAt: string;
  cancelled: boolean;
  failed: boolean;
  searchCount: number;
  notificationCount: number;
  error?: string;
}

export interface SchedulerStatus {
  state: SchedulerState;
  intervalMs: number;
  skippedCycles: number;
  completedCycles: number;
  lastCycle: LastCycleSummary | null;
}

/**
 * Runs a cycle at start and then at a fixed rate. At most one cycle is in
 * flight; triggers that arrive meanwhile are dropped and counted.
 */
export class CycleScheduler {
  private state: SchedulerState = "idle";
  private timer: NodeJS.Timeout | undefined;
  private controller: AbortController | undefined;
  private inFlight: Promise<void> | undefined;
  private skippedCycles = 0;
  private completedCycles = 0;
  private lastCycle: LastCycleSummary | null = null;
  private lastBySearch = new Map<string, SearchCycleReport>();
  private started = false;
  private logger: Logger;

  constructor(
    private runner: CycleSource,
    private persistence: PersistencePort,
    private intervalMs: number,
    logger: Logger
  ) {
    this.logger = logger.child("scheduler");
  }

  /**
   * Check the persistence gateway, run the first cycle and arm the timer.
   * Rejects (leaving the scheduler stopped) when the gateway is unreachable.
   */
  async start(): Promise<void> {
    if (this.started) {
      throw new Error("Scheduler already started");
    }
    this.started = true;

    try {
      await this.persistence.getSavedSearches({});
    } catch (error) {
      this.state = "stopped";
      this.logger.error(`Persistence gateway unreachable: ${errorMessage(error)}`);
      throw error;
    }

    this.timer = setInterval(() => {
      this.trigger("timer");
    }, this.intervalMs);
    this.trigger("startup");

    this.logger.info(`Scheduler started, interval ${this.intervalMs}ms`);
  }

  /** Operator trigger; false when dropped because a cycle is in flight */
  triggerNow(): boolean {
    return this.trigger("manual");
  }

  /**
   * Cancel the in-flight cycle, wait for it to wind down and stop for good.
   */
  async stop(): Promise<void> {
    clearInterval(this.timer);
    this.timer = undefined;

    if (this.state === "stopped") {
      return;
    }

    if (this.controller && this.inFlight) {
      this.state = "cancelling";
      this.logger.info("Cancelling in-flight cycle");
      this.controller.abort(new CancelledError("Scheduler stopping"));
      await this.inFlight;
    }

    this.state = "stopped";
    this.logger.info("Scheduler stopped");
  }

  /** Resolves once the in-flight cycle (if any) has finished */
  async idle(): Promise<void> {
    await this.inFlight;
  }

  getState(): SchedulerState {
    return this.state;
  }

  getStatus(): SchedulerStatus {
    return {
      state: this.state,
      intervalMs: this.intervalMs,
      skippedCycles: this.skippedCycles,
      completedCycles: this.completedCycles,
      lastCycle: this.lastCycle,
    };
  }

  getLastSearchReport(savedSearchId: string): SearchCycleReport | undefined {
    return this.lastBySearch.get(savedSearchId);
  }

  private trigger(reason: "startup" | "timer" | "manual"): boolean {
    if (this.state === "stopped") {
      return false;
    }

    if (this.state === "running" || this.state === "cancelling") {
      this.skippedCycles++;
      this.logger.warn(
        `Cycle trigger (${reason}) dropped: previous cycle still ${this.state} (${this.skippedCycles} skipped)`
      );
      return false;
    }

    const cycleId = createId("cycle");
    const controller = new AbortController();
    this.controller = controller;
    this.state = "running";
    this.logger.info(`Cycle ${cycleId} triggered (${reason})`);

    this.inFlight = this.execute(cycleId, controller.signal).finally(() => {
      this.controller = undefined;
      this.inFlight = undefined;
      if (this.state !== "stopped") {
        this.state = "idle";
      }
    });
    return true;
  }

  private async execute(cycleId: string, signal: AbortSignal): Promise<void> {
    const startedAt = new Date().toISOString();
    try {
      const report = await this.runner.runCycle(signal, cycleId);
      this.record(report);
    } catch (error) {
      this.logger.error(`Cycle ${cycleId} failed: ${errorMessage(error)}`);
      this.lastCycle = {
        cycleId,
        startedAt,
        finishedAt: new Date().toISOString(),
        cancelled: signal.aborted,
        failed: true,
        searchCount: 0,
        notificationCount: 0,
        error: errorMessage(error),
      };
    }
  }

  private record(report: CycleReport): void {
    this.completedCycles++;
    for (const search of report.searches) {
      this.lastBySearch.set(search.savedSearchId, search);
    }
    this.lastCycle = {
      cycleId: report.cycleId,
      startedAt: report.startedAt,
      finishedAt: report.finishedAt,
      cancelled: report.cancelled,
      failed: false,
      searchCount: report.searches.length,
      notificationCount: report.events.length,
    };
  }
}
