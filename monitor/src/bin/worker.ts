import {
  createBus,
  createLogger,
  ServiceLifecycle,
  ServiceState,
  toConnectionString,
} from "@marketwatch/shared-utils";
import path from "path";
import { Pool } from "pg";
import { PlaywrightSessionFactory } from "../adapters/browser.playwright";
import { MemoryPersistence } from "../adapters/repo.memory";
import { PostgresPersistence } from "../adapters/repo.sql";
import { loadSeedFile } from "../adapters/seed.file";
import { ConfigError, loadConfig, loadEnvFile } from "../config/env";
import { PersistencePort } from "../core/ports";
import { closeServer, listen } from "../http/server";
import { createMonitor } from "../monitor";

const DEFAULT_SEED_FILE = path.join(__dirname, "..", "..", "data", "searches.seed.json");

async function main() {
  loadEnvFile();
  const cfg = loadConfig();

  const logger = createLogger("monitor", { level: cfg.logLevel, format: cfg.logFormat });
  const lifecycle = new ServiceLifecycle(30000, logger);
  lifecycle.installProcessHandlers();
  lifecycle.setState(ServiceState.STARTING);

  logger.info(`Starting monitor in ${cfg.mode} mode`);

  let persistence: PersistencePort;
  if (cfg.mode === "dev") {
    const seedFile = cfg.seedFile ?? DEFAULT_SEED_FILE;
    const seed = await loadSeedFile(seedFile);
    persistence = new MemoryPersistence(seed);
    logger.info(`Memory gateway seeded with ${seed.length} saved searches from ${seedFile}`);
  } else {
    const pool = new Pool({ connectionString: toConnectionString(cfg.db) });
    pool.on("error", (error) => logger.error("Idle pg client error:", error));
    persistence = new PostgresPersistence(pool, logger);
  }

  const bus = createBus(
    {
      type: cfg.bus.type,
      serviceName: "monitor",
      redisUrl: cfg.bus.redisUrl,
      channelPrefix: cfg.bus.channelPrefix,
    },
    logger
  );

  const sessions = cfg.sites.includes("mercari")
    ? new PlaywrightSessionFactory({
        headless: cfg.browser.headless,
        executablePath: cfg.browser.executablePath,
        logger,
      })
    : undefined;

  const monitor = createMonitor(cfg, { logger, persistence, bus, sessions });
  const server = await listen(monitor.app, cfg.port, logger);

  lifecycle.addShutdownHandler("monitor", () => monitor.close(), "drain");
  lifecycle.addShutdownHandler("http", () => closeServer(server));
  if (sessions) {
    lifecycle.addShutdownHandler("browser", () => sessions.close());
  }
  lifecycle.addShutdownHandler("bus", async () => {
    await bus.close?.();
  });
  lifecycle.addShutdownHandler("persistence", async () => {
    await persistence.close?.();
  });

  await monitor.scheduler.start();
  lifecycle.setState(ServiceState.RUNNING);
  logger.info(`Monitor running, cycle every ${cfg.cycleIntervalMs}ms`);
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(error.message);
  } else {
    console.error("Monitor failed to start:", error);
  }
  process.exit(1);
});
