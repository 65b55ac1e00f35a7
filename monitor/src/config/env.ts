import * as dotenv from "dotenv";
import {
  createDatabaseConfig,
  DatabaseConfig,
  LogFormat,
  LogLevel,
  parseList,
} from "@marketwatch/shared-utils";
import { z } from "zod";
import { GateOptions } from "../core/gate";
import { SITE_IDS, SiteId } from "../core/dto";

type Env = Record<string, string | undefined>;

export const CHANNEL_NAMES = ["desktop", "webhook", "log"] as const;
export type ChannelName = (typeof CHANNEL_NAMES)[number];

export interface MonitorConfig {
  mode: string;
  logLevel: LogLevel;
  logFormat: LogFormat;
  port: number;
  /** Origins allowed to call the operator API from a browser; empty disables CORS */
  corsOrigins: string[];
  seedFile?: string;
  cycleIntervalMs: number;
  pageLimit: number;
  globalConcurrency: number;
  adapterTimeoutMs: number;
  sites: SiteId[];
  gates: Record<SiteId, GateOptions>;
  httpMaxRetries: number;
  browser: {
    headless: boolean;
    executablePath?: string;
    thinkTimeMs: { min: number; max: number };
  };
  notify: {
    channels: ChannelName[];
    webhookUrl?: string;
    sampleSize: number;
    emptyCycles: boolean;
  };
  feedRetentionDays: number;
  bus: { type: "memory" | "redis"; redisUrl: string; channelPrefix: string };
  db: DatabaseConfig;
}

const int = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);
const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const rate = (fallback: number) => z.coerce.number().positive().default(fallback);

const bool = (fallback: boolean) =>
  z
    .enum(["true", "false", "1", "0", "yes", "no"])
    .default(fallback ? "true" : "false")
    .transform((value) => value === "true" || value === "1" || value === "yes");

function uniqueOr<T>(items: T[], fallback: T[]): T[] {
  return items.length > 0 ? Array.from(new Set(items)) : fallback;
}

const envSchema = z
  .object({
    MODE: z.string().default("dev"),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
    LOG_FORMAT: z.enum(["text", "json"]).default("text"),
    PORT: positiveInt(8090),
    CORS_ORIGINS: z
      .string()
      .optional()
      .transform(parseList)
      .pipe(z.array(z.string().url())),
    SEED_FILE: z.string().optional(),

    CYCLE_INTERVAL_MS: positiveInt(30 * 60 * 1000),
    PAGE_LIMIT: positiveInt(3),
    GLOBAL_CONCURRENCY: positiveInt(4),
    ADAPTER_TIMEOUT_MS: positiveInt(120000),
    SITES: z
      .string()
      .optional()
      .transform(parseList)
      .pipe(z.array(z.enum(SITE_IDS)))
      .transform((items) => uniqueOr<SiteId>(items, [...SITE_IDS])),

    YAHOO_AUCTIONS_RATE_PER_SEC: rate(1),
    YAHOO_AUCTIONS_BURST: positiveInt(2),
    YAHOO_AUCTIONS_CONCURRENCY: positiveInt(2),
    RAKUTEN_RATE_PER_SEC: rate(1),
    RAKUTEN_BURST: positiveInt(2),
    RAKUTEN_CONCURRENCY: positiveInt(2),
    MERCARI_RATE_PER_SEC: rate(0.2),
    MERCARI_BURST: positiveInt(1),
    MERCARI_CONCURRENCY: positiveInt(1),

    BREAKER_FAILURE_THRESHOLD: positiveInt(5),
    BREAKER_WINDOW_MS: positiveInt(10 * 60 * 1000),
    BREAKER_COOLDOWN_MS: positiveInt(5 * 60 * 1000),

    HTTP_MAX_RETRIES: int(2),
    BROWSER_HEADLESS: bool(true),
    BROWSER_EXECUTABLE_PATH: z.string().min(1).optional(),
    THINK_TIME_MIN_MS: int(500),
    THINK_TIME_MAX_MS: int(1500),

    NOTIFY_CHANNELS: z
      .string()
      .optional()
      .transform(parseList)
      .pipe(z.array(z.enum(CHANNEL_NAMES)))
      .transform((items) => uniqueOr<ChannelName>(items, ["log"])),
    WEBHOOK_URL: z.string().url().optional(),
    WEBHOOK_SAMPLE_SIZE: positiveInt(5),
    NOTIFY_EMPTY_CYCLES: bool(false),
    FEED_RETENTION_DAYS: int(30),

    BUS_TYPE: z.enum(["memory", "redis"]).default("memory"),
    REDIS_URL: z.string().default("redis://localhost:6379"),
    BUS_CHANNEL_PREFIX: z.string().default("marketwatch"),
  })
  .superRefine((env, ctx) => {
    if (env.THINK_TIME_MAX_MS < env.THINK_TIME_MIN_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["THINK_TIME_MAX_MS"],
        message: "must be >= THINK_TIME_MIN_MS",
      });
    }
    if (env.NOTIFY_CHANNELS.includes("webhook") && !env.WEBHOOK_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["WEBHOOK_URL"],
        message: "required when NOTIFY_CHANNELS includes webhook",
      });
    }
  });

export class ConfigError extends Error {
  readonly name = "ConfigError" as const;

  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`);
  }
}

/** Load .env into process.env (existing variables win) */
export function loadEnvFile(path?: string): void {
  dotenv.config(path ? { path } : undefined);
}

/**
 * Parse and validate the monitor's environment. Throws ConfigError naming
 * every invalid variable.
 */
export function loadConfig(env: Env = process.env): MonitorConfig {
  // empty strings count as unset so `FOO=` in .env falls back to the default
  const cleaned: Env = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") cleaned[key] = value;
  }

  const result = envSchema.safeParse(cleaned);
  if (!result.success) {
    throw new ConfigError(
      result.error.errors.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const e = result.data;
  const breaker = {
    failureThreshold: e.BREAKER_FAILURE_THRESHOLD,
    windowMs: e.BREAKER_WINDOW_MS,
    cooldownMs: e.BREAKER_COOLDOWN_MS,
  };

  return {
    mode: e.MODE,
    logLevel: e.LOG_LEVEL,
    logFormat: e.LOG_FORMAT,
    port: e.PORT,
    corsOrigins: e.CORS_ORIGINS,
    seedFile: e.SEED_FILE,
    cycleIntervalMs: e.CYCLE_INTERVAL_MS,
    pageLimit: e.PAGE_LIMIT,
    globalConcurrency: e.GLOBAL_CONCURRENCY,
    adapterTimeoutMs: e.ADAPTER_TIMEOUT_MS,
    sites: e.SITES,
    gates: {
      yahoo_auctions: {
        ratePerSec: e.YAHOO_AUCTIONS_RATE_PER_SEC,
        burst: e.YAHOO_AUCTIONS_BURST,
        concurrency: e.YAHOO_AUCTIONS_CONCURRENCY,
        breaker,
      },
      rakuten: {
        ratePerSec: e.RAKUTEN_RATE_PER_SEC,
        burst: e.RAKUTEN_BURST,
        concurrency: e.RAKUTEN_CONCURRENCY,
        breaker,
      },
      mercari: {
        ratePerSec: e.MERCARI_RATE_PER_SEC,
        burst: e.MERCARI_BURST,
        concurrency: e.MERCARI_CONCURRENCY,
        breaker,
      },
    },
    httpMaxRetries: e.HTTP_MAX_RETRIES,
    browser: {
      headless: e.BROWSER_HEADLESS,
      executablePath: e.BROWSER_EXECUTABLE_PATH,
      thinkTimeMs: { min: e.THINK_TIME_MIN_MS, max: e.THINK_TIME_MAX_MS },
    },
    notify: {
      channels: e.NOTIFY_CHANNELS,
      webhookUrl: e.WEBHOOK_URL,
      sampleSize: e.WEBHOOK_SAMPLE_SIZE,
      emptyCycles: e.NOTIFY_EMPTY_CYCLES,
    },
    feedRetentionDays: e.FEED_RETENTION_DAYS,
    bus: { type: e.BUS_TYPE, redisUrl: e.REDIS_URL, channelPrefix: e.BUS_CHANNEL_PREFIX },
    db: createDatabaseConfig("monitor", cleaned),
  };
}
