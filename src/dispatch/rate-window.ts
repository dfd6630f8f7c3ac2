/**
 * Sliding-window rate limiting
 *
 * A window holds the timestamps of admitted dispatches. An entry counts
 * while `now - t < length`, so any half-open interval of `length` ms contains
 * at most `ceiling` admissions.
 */

import { ConfigurationError } from '../errors.js';

export const MINUTE_MS = 60_000;
export const HOUR_MS = 3_600_000;

export class SlidingWindow {
  private timestamps: number[] = [];

  constructor(
    readonly lengthMs: number,
    readonly ceiling: number
  ) {
    if (!Number.isInteger(ceiling) || ceiling <= 0) {
      throw new ConfigurationError(`Window ceiling must be a positive integer, got ${ceiling}`, 'ceiling');
    }
    if (lengthMs <= 0) {
      throw new ConfigurationError(`Window length must be positive, got ${lengthMs}`, 'lengthMs');
    }
  }

  /** Drop entries that have aged out. Timestamps are recorded in order. */
  purge(now: number): void {
    let expired = 0;
    while (expired < this.timestamps.length && now - this.timestamps[expired] >= this.lengthMs) {
      expired++;
    }
    if (expired > 0) this.timestamps.splice(0, expired);
  }

  record(now: number): void {
    this.timestamps.push(now);
  }

  /** Entries still inside the window at `now`, without mutating state */
  count(now: number): number {
    return this.timestamps.filter((t) => now - t < this.lengthMs).length;
  }

  hasCapacity(now: number): boolean {
    return this.count(now) < this.ceiling;
  }

  /**
   * Milliseconds until a slot frees: 0 with spare capacity, otherwise
   * `length - (now - oldest)` for the oldest entry still counting.
   */
  msUntilSlot(now: number): number {
    const live = this.timestamps.filter((t) => now - t < this.lengthMs);
    if (live.length < this.ceiling) return 0;
    return this.lengthMs - (now - live[0]);
  }
}

export type AdmissionDecision =
  | { admitted: true; at: number }
  | { admitted: false; retryInMs: number; blockedBy: Array<'minute' | 'hour'> };

/**
 * Per-minute and per-hour windows checked together. Only the dispatch
 * consumer calls `tryAdmit`; everything else uses the read-only methods.
 */
export class DualRateLimiter {
  readonly minute: SlidingWindow;
  readonly hour: SlidingWindow;

  constructor(perMinute: number, perHour: number) {
    if (perHour < perMinute) {
      throw new ConfigurationError(
        `Per-hour ceiling (${perHour}) cannot be below the per-minute ceiling (${perMinute})`,
        'perHour'
      );
    }
    this.minute = new SlidingWindow(MINUTE_MS, perMinute);
    this.hour = new SlidingWindow(HOUR_MS, perHour);
  }

  /**
   * Purge, check both windows and, when both have room, record `now` in both
   * before returning. A rejection reports the wait until the nearer blocking
   * window frees a slot.
   */
  tryAdmit(now: number): AdmissionDecision {
    this.minute.purge(now);
    this.hour.purge(now);

    const blockedBy: Array<'minute' | 'hour'> = [];
    if (!this.minute.hasCapacity(now)) blockedBy.push('minute');
    if (!this.hour.hasCapacity(now)) blockedBy.push('hour');

    if (blockedBy.length === 0) {
      this.minute.record(now);
      this.hour.record(now);
      return { admitted: true, at: now };
    }

    const waits = blockedBy.map((name) => this[name].msUntilSlot(now));
    return { admitted: false, retryInMs: Math.max(1, Math.min(...waits)), blockedBy };
  }

  /** Estimated wait before the next admission, for producers */
  estimateWaitMs(now: number): number {
    const minuteWait = this.minute.msUntilSlot(now);
    const hourWait = this.hour.msUntilSlot(now);
    return Math.max(minuteWait, hourWait);
  }

  recentRates(now: number): { minute: number; hour: number } {
    return { minute: this.minute.count(now), hour: this.hour.count(now) };
  }
}
