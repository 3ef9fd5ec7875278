/**
 * Base interface for all domain events.
 */
export interface DomainEvent<T = unknown> {
  /** Event type identifier (e.g., 'guard.unlock-granted') */
  readonly eventType: string;

  /** The component that produced this event */
  readonly source: string;

  /** Event payload */
  readonly payload: T;

  /** When the event occurred, as read from the producer's clock */
  readonly occurredAt: Date;
}

/**
 * Abstract base class for domain events.
 * Extend this to create concrete event types with type-safe payloads.
 */
export abstract class BaseDomainEvent<T = unknown> implements DomainEvent<T> {
  abstract readonly eventType: string;
  abstract readonly source: string;

  constructor(
    readonly payload: T,
    readonly occurredAt: Date,
  ) {}

  toJSON(): Record<string, unknown> {
    return {
      eventType: this.eventType,
      source: this.source,
      payload: this.payload,
      occurredAt: this.occurredAt.toISOString(),
    };
  }
}
