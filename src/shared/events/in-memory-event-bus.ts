import { Injectable, Logger } from '@nestjs/common';
import type { IEventBus, EventHandler } from './event-bus.interface';
import type { DomainEvent } from './domain-event';

/**
 * In-process event bus. Handlers run concurrently; their failures are logged
 * and isolated from the publisher so a broken subscriber cannot stall the
 * candidate evaluation loop.
 */
@Injectable()
export class InMemoryEventBus implements IEventBus {
  private readonly logger = new Logger(InMemoryEventBus.name);
  private readonly handlers = new Map<string, Set<EventHandler>>();

  async publish(event: DomainEvent): Promise<void> {
    const eventHandlers = this.handlers.get(event.eventType);

    if (!eventHandlers || eventHandlers.size === 0) {
      this.logger.debug(`No handlers registered for event: ${event.eventType}`);
      return;
    }

    const results = await Promise.allSettled(
      Array.from(eventHandlers).map(async (handler) => handler(event)),
    );

    for (const result of results) {
      if (result.status === 'rejected') {
        const reason: unknown = result.reason;
        this.logger.error(
          `Handler failed for event ${event.eventType}: ${reason instanceof Error ? reason.message : String(reason)}`,
        );
      }
    }
  }

  subscribe<T = unknown>(
    eventType: string,
    handler: EventHandler<T>,
  ): () => void {
    let eventHandlers = this.handlers.get(eventType);
    if (!eventHandlers) {
      eventHandlers = new Set();
      this.handlers.set(eventType, eventHandlers);
    }
    // Handlers are stored untyped; the event type string keys the payload.
    const stored = handler as EventHandler;
    eventHandlers.add(stored);
    this.logger.debug(`Handler subscribed to: ${eventType}`);

    return () => this.unsubscribe(eventType, stored);
  }

  hasHandlers(eventType: string): boolean {
    const eventHandlers = this.handlers.get(eventType);
    return !!eventHandlers && eventHandlers.size > 0;
  }

  private unsubscribe(eventType: string, handler: EventHandler): void {
    const eventHandlers = this.handlers.get(eventType);
    if (eventHandlers) {
      eventHandlers.delete(handler);
      if (eventHandlers.size === 0) {
        this.handlers.delete(eventType);
      }
    }
  }
}
