import { Logger } from "../service/types";
import {
  BusEvent,
  EVENT_TYPES,
  EventHandler,
  EventMap,
  EventType,
} from "./types";

type HandlerTable = { [K in EventType]: Array<EventHandler<EventMap[K]>> };

/**
 * Topic → handler table shared by the bus implementations.
 * Handler failures are logged and never reach the publisher.
 */
export class HandlerRegistry {
  private handlers: HandlerTable = {
    listings_found: [],
    scrape_cycle_completed: [],
  };

  constructor(private logger: Logger) {}

  /** Returns true when this is the first handler for the topic */
  add<K extends EventType>(topic: K, handler: EventHandler<EventMap[K]>): boolean {
    const list: Array<EventHandler<EventMap[K]>> = this.handlers[topic];
    list.push(handler);
    return list.length === 1;
  }

  async dispatch(event: BusEvent): Promise<void> {
    switch (event.type) {
      case "listings_found":
        return this.run(this.handlers.listings_found, event);
      case "scrape_cycle_completed":
        return this.run(this.handlers.scrape_cycle_completed, event);
    }
  }

  topics(): EventType[] {
    return EVENT_TYPES.filter((topic) => this.handlers[topic].length > 0);
  }

  handlerCount(): number {
    return (
      this.handlers.listings_found.length +
      this.handlers.scrape_cycle_completed.length
    );
  }

  clear(): void {
    this.handlers = { listings_found: [], scrape_cycle_completed: [] };
  }

  private async run<E extends BusEvent>(
    handlers: Array<EventHandler<E>>,
    event: E
  ): Promise<void> {
    await Promise.all(
      handlers.map(async (handler) => {
        try {
          await handler(event);
        } catch (error) {
          this.logger.error(
            `Handler error for ${event.type} (${event.id}):`,
            error
          );
        }
      })
    );
  }
}
