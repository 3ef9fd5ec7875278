/**
 * Clock port for time-dependent operations.
 * Allows easy mocking in tests without Date hacks.
 */
export interface Clock {
  /** Wall-clock time. May jump when the system clock is adjusted. */
  now(): Date;

  /** Milliseconds from an arbitrary origin. Never goes backwards. */
  monotonicMs(): number;
}

export const CLOCK = Symbol('CLOCK');
