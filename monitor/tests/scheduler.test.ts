import { afterEach, describe, expect, it, vi } from "vitest";
import { MemoryPersistence } from "../src/adapters/repo.memory";
import { CycleReport, SearchCycleReport } from "../src/core/dto";
import { CancelledError } from "../src/core/errors";
import { CycleScheduler, CycleSource } from "../src/core/scheduler";
import { deferred, Deferred, logger } from "./helpers";

interface PendingCycle {
  cycleId: string;
  signal: AbortSignal;
  done: Deferred<CycleReport>;
}

// Each cycle stays open until the test settles it or its signal aborts
class StubRunner implements CycleSource {
  cycles: PendingCycle[] = [];

  runCycle(signal: AbortSignal, cycleId = "unnamed"): Promise<CycleReport> {
    const done = deferred<CycleReport>();
    signal.addEventListener("abort", () => done.reject(signal.reason), { once: true });
    this.cycles.push({ cycleId, signal, done });
    return done.promise;
  }

  finish(index: number, searches: SearchCycleReport[] = []): void {
    const cycle = this.cycles[index];
    cycle.done.resolve({
      cycleId: cycle.cycleId,
      startedAt: "2024-05-01T10:00:00.000Z",
      finishedAt: "2024-05-01T10:01:00.000Z",
      cancelled: false,
      searches,
      events: [],
    });
  }
}

const searchReport: SearchCycleReport = {
  savedSearchId: "s1",
  status: "committed",
  outcomes: { yahoo_auctions: { status: "success", count: 3 } },
  newCount: 2,
  finishedAt: "2024-05-01T10:01:00.000Z",
};

function setup(intervalMs = 60_000) {
  const runner = new StubRunner();
  const persistence = new MemoryPersistence();
  const scheduler = new CycleScheduler(runner, persistence, intervalMs, logger);
  return { runner, persistence, scheduler };
}

describe("CycleScheduler", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("stays stopped when the persistence check fails", async () => {
    const { runner, persistence, scheduler } = setup();
    vi.spyOn(persistence, "getSavedSearches").mockRejectedValue(new Error("db down"));

    await expect(scheduler.start()).rejects.toThrow("db down");

    expect(scheduler.getState()).toBe("stopped");
    expect(runner.cycles).toHaveLength(0);
    expect(scheduler.triggerNow()).toBe(false);
  });

  it("refuses a second start", async () => {
    const { scheduler } = setup();
    await scheduler.start();

    await expect(scheduler.start()).rejects.toThrow("Scheduler already started");
    await scheduler.stop();
  });

  it("runs a cycle at startup and drops triggers while it is in flight", async () => {
    const { runner, scheduler } = setup();

    await scheduler.start();
    expect(runner.cycles).toHaveLength(1);
    expect(scheduler.getState()).toBe("running");

    expect(scheduler.triggerNow()).toBe(false);
    expect(scheduler.getStatus().skippedCycles).toBe(1);

    runner.finish(0, [searchReport]);
    await scheduler.idle();

    expect(scheduler.getState()).toBe("idle");
    expect(scheduler.getStatus()).toMatchObject({
      state: "idle",
      intervalMs: 60_000,
      skippedCycles: 1,
      completedCycles: 1,
      lastCycle: {
        cycleId: runner.cycles[0].cycleId,
        cancelled: false,
        failed: false,
        searchCount: 1,
        notificationCount: 0,
      },
    });
    expect(scheduler.getLastSearchReport("s1")).toEqual(searchReport);
    expect(scheduler.getLastSearchReport("missing")).toBeUndefined();

    expect(scheduler.triggerNow()).toBe(true);
    expect(runner.cycles).toHaveLength(2);
    await scheduler.stop();
  });

  it("triggers again on every interval", async () => {
    vi.useFakeTimers();
    const { runner, scheduler } = setup(1000);

    await scheduler.start();
    runner.finish(0);
    await scheduler.idle();

    await vi.advanceTimersByTimeAsync(1000);
    expect(runner.cycles).toHaveLength(2);

    runner.finish(1);
    await scheduler.idle();
    await vi.advanceTimersByTimeAsync(1000);
    expect(runner.cycles).toHaveLength(3);
    expect(scheduler.getStatus().completedCycles).toBe(2);

    await scheduler.stop();
    await vi.advanceTimersByTimeAsync(5000);
    expect(runner.cycles).toHaveLength(3);
  });

  it("cancels the in-flight cycle on stop", async () => {
    const { runner, scheduler } = setup();
    await scheduler.start();

    const stopping = scheduler.stop();
    expect(scheduler.getState()).toBe("cancelling");
    await stopping;

    const reason: unknown = runner.cycles[0].signal.reason;
    expect(reason).toBeInstanceOf(CancelledError);
    expect(reason).toMatchObject({ message: "Scheduler stopping" });
    expect(scheduler.getState()).toBe("stopped");
    expect(scheduler.getStatus().lastCycle).toMatchObject({
      cancelled: true,
      failed: true,
      error: "Scheduler stopping",
    });
    expect(scheduler.triggerNow()).toBe(false);
  });

  it("records a cycle that threw and keeps going", async () => {
    const { runner, scheduler } = setup();
    await scheduler.start();

    runner.cycles[0].done.reject(new Error("boom"));
    await scheduler.idle();

    expect(scheduler.getState()).toBe("idle");
    expect(scheduler.getStatus()).toMatchObject({
      completedCycles: 0,
      lastCycle: { failed: true, cancelled: false, error: "boom", searchCount: 0 },
    });
    await scheduler.stop();
  });
});
