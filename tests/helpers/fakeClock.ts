import { Clock } from '../../src/core/metrics';

export const CLOCK_ORIGIN = Date.UTC(2024, 0, 1);

/**
 * A clock that only moves when told to
 */
export class FakeClock implements Clock {
  private ms = 0;

  now(): Date {
    return new Date(CLOCK_ORIGIN + this.ms);
  }

  monotonic(): number {
    return this.ms;
  }

  advance(ms: number): void {
    this.ms += ms;
  }
}
