export type {
  AdapterOutcomeSummary,
  BaseEvent,
  BusConfig,
  BusEvent,
  BusPort,
  EventHandler,
  EventMap,
  EventType,
  ListingsFoundEvent,
  ScrapeCycleCompletedEvent,
} from "./types";
export { isBusEvent, isEventType } from "./types";

export { createMemoryBus, MemoryBus } from "./memory-bus";
export {
  channelFor,
  createRedisBus,
  decodeMessage,
  DEFAULT_CHANNEL_PREFIX,
  RedisBus,
} from "./redis-bus";

import { Logger } from "../service/types";
import { createMemoryBus } from "./memory-bus";
import { createRedisBus } from "./redis-bus";
import { BusPort } from "./types";

export interface BusFactoryConfig {
  type: "redis" | "memory";
  serviceName: string;
  redisUrl?: string;
  retryAttempts?: number;
  channelPrefix?: string;
}

/**
 * Factory function to create the appropriate bus based on configuration
 */
export function createBus(config: BusFactoryConfig, logger?: Logger): BusPort {
  switch (config.type) {
    case "redis":
      if (!config.redisUrl) {
        throw new Error("Redis URL is required for Redis bus");
      }
      return createRedisBus(
        {
          redisUrl: config.redisUrl,
          serviceName: config.serviceName,
          retryAttempts: config.retryAttempts,
          channelPrefix: config.channelPrefix,
        },
        logger
      );

    case "memory":
      return createMemoryBus(config.serviceName, logger);
  }
}
