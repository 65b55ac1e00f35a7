import { afterEach, describe, expect, it, vi } from "vitest";
import { ConsoleLogger, createNoopLogger, isLogLevel } from "../src/service";

describe("ConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prefixes text output with the service name", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const logger = new ConsoleLogger("monitor");

    logger.info("Cycle started", 3);

    expect(log).toHaveBeenCalledWith("[monitor] Cycle started", 3);
  });

  it("filters messages below the configured level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const logger = new ConsoleLogger("monitor", { level: "warn" });

    logger.info("hidden");
    logger.warn("shown");

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("[monitor] shown");
  });

  it("names children after their component", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = new ConsoleLogger("monitor").child("scheduler");

    logger.error("stopped");

    expect(error).toHaveBeenCalledWith("[monitor:scheduler] stopped");
  });

  it("writes one JSON object per line in json format", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const logger = new ConsoleLogger("monitor", { format: "json" });

    logger.warn("adapter failed", new Error("timeout"), { site: "yahoo" });

    expect(log).toHaveBeenCalledTimes(1);
    const entry: unknown = JSON.parse(String(log.mock.calls[0][0]));
    expect(entry).toMatchObject({
      level: "warn",
      service: "monitor",
      message: "adapter failed",
      context: [{ name: "Error", message: "timeout" }, { site: "yahoo" }],
    });
  });

  it("noop logger writes nothing", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const logger = createNoopLogger();

    logger.info("nothing");
    logger.child("x").error("nothing");

    expect(log).not.toHaveBeenCalled();
  });
});

describe("isLogLevel", () => {
  it("recognises the four levels only", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("error")).toBe(true);
    expect(isLogLevel("trace")).toBe(false);
    expect(isLogLevel("toString")).toBe(false);
  });
});
