import { afterEach, describe, expect, it, vi } from "vitest";
import { formatDuration, linkAbort, raceAbort, sleep } from "../src/async";

describe("sleep", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves after the delay", async () => {
    vi.useFakeTimers();
    let done = false;
    const pending = sleep(1000).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toBe(true);
  });

  it("rejects with the abort reason", async () => {
    const controller = new AbortController();
    const pending = sleep(60_000, controller.signal);
    controller.abort(new Error("stopping"));

    await expect(pending).rejects.toThrow("stopping");
  });

  it("rejects at once for an aborted signal", async () => {
    await expect(sleep(10, AbortSignal.abort(new Error("already")))).rejects.toThrow("already");
  });
});

describe("raceAbort", () => {
  it("settles with the promise when no abort happens", async () => {
    const controller = new AbortController();
    await expect(raceAbort(Promise.resolve(42), controller.signal)).resolves.toBe(42);
  });

  it("rejects as soon as the signal aborts", async () => {
    const controller = new AbortController();
    const never = new Promise<number>(() => undefined);
    const pending = raceAbort(never, controller.signal);

    controller.abort(new Error("cancelled"));
    await expect(pending).rejects.toThrow("cancelled");
  });
});

describe("linkAbort", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("follows the parent with the parent's reason", () => {
    const parent = new AbortController();
    const linked = linkAbort(parent.signal);
    const reason = new Error("parent gone");

    parent.abort(reason);

    expect(linked.signal.aborted).toBe(true);
    expect(linked.signal.reason).toBe(reason);
    linked.dispose();
  });

  it("aborts with the timeout reason", async () => {
    vi.useFakeTimers();
    const timeout = new Error("too slow");
    const linked = linkAbort(new AbortController().signal, {
      timeoutMs: 100,
      timeoutReason: () => timeout,
    });

    await vi.advanceTimersByTimeAsync(100);
    expect(linked.signal.reason).toBe(timeout);
  });

  it("does nothing after dispose", async () => {
    vi.useFakeTimers();
    const parent = new AbortController();
    const linked = linkAbort(parent.signal, { timeoutMs: 100 });

    linked.dispose();
    parent.abort();
    await vi.advanceTimersByTimeAsync(200);

    expect(linked.signal.aborted).toBe(false);
  });
});

describe("formatDuration", () => {
  it("picks a readable unit", () => {
    expect(formatDuration(250)).toBe("250ms");
    expect(formatDuration(1500)).toBe("1.5s");
    expect(formatDuration(90_000)).toBe("1.5m");
  });
});
