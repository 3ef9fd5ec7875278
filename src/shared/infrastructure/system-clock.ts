import { Injectable } from '@nestjs/common';
import { performance } from 'perf_hooks';
import type { Clock } from '../domain/clock.port';

/**
 * System clock implementation - uses real system time.
 */
@Injectable()
export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }

  monotonicMs(): number {
    return performance.now();
  }
}
