import { createLogger } from "../service/logger";
import { Logger } from "../service/types";
import { HandlerRegistry } from "./registry";
import { BusEvent, BusPort, EventHandler, EventMap, EventType } from "./types";

/**
 * In-memory bus implementation for testing and development
 *
 * Handlers run in-process and are awaited by `publish`, so tests can assert
 * on side effects right after publishing.
 */
export class MemoryBus implements BusPort {
  private registry: HandlerRegistry;
  private publishedEvents: BusEvent[] = [];
  private logger: Logger;

  constructor(serviceName: string = "memory-bus", logger?: Logger) {
    this.logger = (logger ?? createLogger(serviceName)).child("bus");
    this.registry = new HandlerRegistry(this.logger);
  }

  async subscribe<K extends EventType>(
    topic: K,
    handler: EventHandler<EventMap[K]>
  ): Promise<void> {
    if (this.registry.add(topic, handler)) {
      this.logger.debug(`Subscribed to topic: ${topic}`);
    }
  }

  async publish(event: BusEvent): Promise<void> {
    this.logger.debug(`Publishing event: ${event.type} (${event.id})`);
    this.publishedEvents.push(event);
    await this.registry.dispatch(event);
  }

  async close(): Promise<void> {
    this.logger.debug("Closing memory bus (clearing handlers)");
    this.registry.clear();
    this.publishedEvents = [];
  }

  /**
   * Get all published events (useful for testing)
   */
  getPublishedEvents(): BusEvent[] {
    return [...this.publishedEvents];
  }

  clearHistory(): void {
    this.publishedEvents = [];
  }

  getStatus() {
    return {
      subscribedTopics: this.registry.topics(),
      handlerCount: this.registry.handlerCount(),
      publishedEventCount: this.publishedEvents.length,
    };
  }
}

export function createMemoryBus(serviceName?: string, logger?: Logger): MemoryBus {
  return new MemoryBus(serviceName, logger);
}
