import type { Clock } from './clock.port';

export type ThrottleDecision =
  | { allowed: true; suppressedSinceLast: number }
  | { allowed: false };

/**
 * Log throttle - lets one entry through per interval and counts the rest.
 *
 * Purely presentational: the trust decision never consults it.
 */
export class LogThrottle {
  private lastAllowedAt: number | null = null;
  private suppressed = 0;

  /**
   * @param intervalMs Minimum spacing between allowed entries; 0 allows every entry
   */
  constructor(
    private readonly intervalMs: number,
    private readonly clock: Pick<Clock, 'monotonicMs'>,
  ) {}

  tryAcquire(): ThrottleDecision {
    const now = this.clock.monotonicMs();
    if (
      this.lastAllowedAt !== null &&
      now - this.lastAllowedAt < this.intervalMs
    ) {
      this.suppressed++;
      return { allowed: false };
    }

    const suppressedSinceLast = this.suppressed;
    this.lastAllowedAt = now;
    this.suppressed = 0;
    return { allowed: true, suppressedSinceLast };
  }
}
