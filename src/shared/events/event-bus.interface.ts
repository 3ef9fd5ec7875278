import type { DomainEvent } from './domain-event';

/**
 * Handler function type for processing domain events.
 */
export type EventHandler<T = unknown> = (
  event: DomainEvent<T>,
) => Promise<void> | void;

/**
 * Event Bus interface - the contract for publishing and subscribing to events.
 */
export interface IEventBus {
  /**
   * Publish an event to all registered handlers.
   * Resolves once every handler has settled; a failing handler never rejects
   * the publisher.
   */
  publish(event: DomainEvent): Promise<void>;

  /**
   * Subscribe a handler to a specific event type.
   * Returns a function that removes the subscription.
   */
  subscribe<T = unknown>(
    eventType: string,
    handler: EventHandler<T>,
  ): () => void;

  hasHandlers(eventType: string): boolean;
}

export const EVENT_BUS = Symbol('EVENT_BUS');
