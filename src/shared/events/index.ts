export * from './domain-event';
export * from './event-bus.interface';
export * from './in-memory-event-bus';
