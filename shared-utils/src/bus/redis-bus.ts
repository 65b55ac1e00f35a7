import Redis from "ioredis";
import { createLogger } from "../service/logger";
import { Logger } from "../service/types";
import { HandlerRegistry } from "./registry";
import {
  BusConfig,
  BusEvent,
  BusPort,
  EventHandler,
  EventMap,
  EventType,
  isBusEvent,
  isEventType,
} from "./types";

export const DEFAULT_CHANNEL_PREFIX = "marketwatch";

export function channelFor(prefix: string, topic: EventType): string {
  return prefix ? `${prefix}:${topic}` : topic;
}

/**
 * Decode a pub/sub message. Returns undefined for foreign channels,
 * unparseable payloads and events whose type disagrees with the channel.
 */
export function decodeMessage(
  prefix: string,
  channel: string,
  message: string
): BusEvent | undefined {
  const head = prefix ? `${prefix}:` : "";
  if (!channel.startsWith(head)) return undefined;
  const topic = channel.slice(head.length);
  if (!isEventType(topic)) return undefined;

  let parsed: unknown;
  try {
    parsed = JSON.parse(message);
  } catch {
    return undefined;
  }
  return isBusEvent(parsed) && parsed.type === topic ? parsed : undefined;
}

/**
 * Redis pub/sub bus. A subscribed ioredis connection cannot issue other
 * commands, so publishing goes through its own connection.
 */
export class RedisBus implements BusPort {
  private subscriber: Redis;
  private publisher: Redis;
  private registry: HandlerRegistry;
  private prefix: string;
  private subscriberReady = false;
  private dropped = 0;
  private logger: Logger;

  constructor(config: BusConfig, logger?: Logger) {
    this.logger = (logger ?? createLogger(config.serviceName)).child("bus");
    this.registry = new HandlerRegistry(this.logger);
    this.prefix = config.channelPrefix ?? DEFAULT_CHANNEL_PREFIX;

    const options = {
      enableReadyCheck: false,
      maxRetriesPerRequest: config.retryAttempts ?? 3,
      lazyConnect: true,
      connectionName: `${config.serviceName}-bus`,
    };
    this.subscriber = new Redis(config.redisUrl, options);
    this.publisher = new Redis(config.redisUrl, options);

    this.watch(this.subscriber, "subscriber");
    this.watch(this.publisher, "publisher");

    this.subscriber.on("message", (channel: string, message: string) => {
      this.receive(channel, message).catch((error: unknown) => {
        this.logger.error(`Failed to handle message on ${channel}:`, error);
      });
    });
  }

  private watch(connection: Redis, role: "subscriber" | "publisher"): void {
    connection.on("ready", () => {
      this.logger.info(`Redis ${role} ready`);
      if (role === "subscriber") this.subscriberReady = true;
    });
    connection.on("error", (error) => {
      this.logger.error(`Redis ${role} error:`, error);
    });
    connection.on("close", () => {
      this.logger.warn(`Redis ${role} connection closed`);
      if (role === "subscriber") this.subscriberReady = false;
    });
  }

  async subscribe<K extends EventType>(
    topic: K,
    handler: EventHandler<EventMap[K]>
  ): Promise<void> {
    if (!this.registry.add(topic, handler)) return;
    const channel = channelFor(this.prefix, topic);
    await this.subscriber.subscribe(channel);
    this.logger.info(`Subscribed to ${channel}`);
  }

  async publish(event: BusEvent): Promise<void> {
    const channel = channelFor(this.prefix, event.type);
    const receivers = await this.publisher.publish(channel, JSON.stringify(event));
    this.logger.debug(`Published ${event.type} (${event.id}) to ${receivers} receiver(s)`);
  }

  private async receive(channel: string, message: string): Promise<void> {
    const event = decodeMessage(this.prefix, channel, message);
    if (!event) {
      this.dropped += 1;
      this.logger.warn(`Dropping malformed message on ${channel}`);
      return;
    }
    await this.registry.dispatch(event);
  }

  async close(): Promise<void> {
    this.registry.clear();
    await Promise.all([this.subscriber.quit(), this.publisher.quit()]);
    this.logger.info("Redis bus closed");
  }

  isHealthy(): boolean {
    return this.subscriberReady;
  }

  getStatus() {
    return {
      ready: this.subscriberReady,
      channelPrefix: this.prefix,
      subscribedTopics: this.registry.topics(),
      handlerCount: this.registry.handlerCount(),
      droppedMessages: this.dropped,
    };
  }
}

export function createRedisBus(config: BusConfig, logger?: Logger): RedisBus {
  return new RedisBus(config, logger);
}
