import { performance } from 'perf_hooks';
import { ValidationMetricsSnapshot } from '../types';

/**
 * Wall-clock and monotonic time sources
 */
export interface Clock {
  now(): Date;
  /** Milliseconds from an arbitrary origin; never goes backwards */
  monotonic(): number;
}

export const systemClock: Clock = {
  now: () => new Date(),
  monotonic: () => performance.now(),
};

interface MetricsState {
  total: number;
  successful: number;
  failed: number;
  durationMs: number;
  lastValidationTime?: Date;
}

function zeroState(): MetricsState {
  return { total: 0, successful: 0, failed: 0, durationMs: 0 };
}

/**
 * Owns the validation counters. Every method is one synchronous section, so no
 * caller can observe a half-applied update.
 */
export class MetricsRecorder {
  private state: MetricsState = zeroState();

  constructor(private readonly clock: Clock = systemClock) {}

  /**
   * Count a validation as started; returns the start mark for `finish`
   */
  begin(): number {
    this.state.total++;
    return this.clock.monotonic();
  }

  recordSuccess(): void {
    this.state.successful++;
  }

  recordFailure(): void {
    this.state.failed++;
  }

  /**
   * Account the elapsed time of a validation started at `start`
   */
  finish(start: number): void {
    this.state.durationMs += Math.max(0, this.clock.monotonic() - start);
    this.state.lastValidationTime = this.clock.now();
  }

  snapshot(): ValidationMetricsSnapshot {
    const { total, successful, failed, durationMs, lastValidationTime } = this.state;
    return {
      total,
      successful,
      failed,
      successRate: total === 0 ? 0 : (successful / total) * 100,
      averageDurationMs: total === 0 ? 0 : durationMs / total,
      lastValidationTime: lastValidationTime ? new Date(lastValidationTime.getTime()) : undefined,
    };
  }

  reset(): void {
    this.state = zeroState();
  }
}
