/**
 * Dispatch Queue Tests
 *
 * Priority draining, dual-window rate limiting, retries and overflow. Timing
 * properties run on fake timers, so an hour of throttling takes milliseconds.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { DispatchQueue } from '../../src/dispatch/queue.js';
import { HOUR_MS, MINUTE_MS } from '../../src/dispatch/rate-window.js';
import { LifecycleMonitor } from '../../src/lifecycle/monitor.js';
import { DeliveryError, TerminalDeliveryError, TransientDeliveryError } from '../../src/errors.js';
import { SeededRandom } from '../../src/utils/random.js';
import { PRIORITIES, createEventId, createReceiptId } from '../../src/types.js';
import type { DeliveryResult, EventDescriptor, Priority, Sender } from '../../src/types.js';

// =============================================================================
// HELPERS
// =============================================================================

function makeEvent(id: string, priority: Priority = 'normal'): EventDescriptor {
  return {
    id: createEventId(id),
    priority,
    category: 'customer_inquiry',
    targetCount: 1,
    simDay: 1,
    simHour: 9,
    theme: 'Monday Morning Rush',
  };
}

/**
 * `fail` sees the 1-based call number and may return a DeliveryError (as a
 * result) or any other Error (thrown).
 */
function createSender(fail?: (call: number, attempt: number) => Error | undefined) {
  const calls: Array<{ eventId: string; attempt: number; at: number }> = [];

  const deliver = vi.fn(async (event: EventDescriptor, attempt: number): Promise<DeliveryResult> => {
    calls.push({ eventId: event.id, attempt, at: Date.now() });
    const failure = fail?.(calls.length, attempt);
    if (failure instanceof DeliveryError) return { ok: false, error: failure };
    if (failure) throw failure;
    return {
      ok: true,
      receipt: { id: createReceiptId(`r-${calls.length}`), eventId: event.id, deliveredAt: new Date(), attempt },
    };
  });

  const sender: Sender = { deliver };
  return { sender, deliver, calls };
}

let queue: DispatchQueue | undefined;

afterEach(async () => {
  await queue?.stop();
  queue = undefined;
  vi.useRealTimers();
});

// =============================================================================
// TESTS
// =============================================================================

describe('DispatchQueue', () => {
  describe('ordering', () => {
    it('should dispatch [low, high, critical, high] as [critical, high, high, low]', async () => {
      const { sender, calls } = createSender();
      queue = new DispatchQueue(sender, { perMinute: 100, perHour: 1000 });

      queue.enqueue(makeEvent('low', 'low'));
      queue.enqueue(makeEvent('high-1', 'high'));
      queue.enqueue(makeEvent('critical', 'critical'));
      queue.enqueue(makeEvent('high-2', 'high'));

      await queue.start();
      await queue.whenIdle();

      expect(calls.map((c) => c.eventId)).toEqual(['critical', 'high-1', 'high-2', 'low']);
      expect(queue.getMetrics().delivered).toBe(4);
    });

    it('should wake an idle consumer on enqueue', async () => {
      const { sender, calls } = createSender();
      queue = new DispatchQueue(sender, { perMinute: 100, perHour: 1000 });
      await queue.start();
      await queue.whenIdle();

      queue.enqueue(makeEvent('late'));
      await queue.whenIdle();

      expect(calls.map((c) => c.eventId)).toEqual(['late']);
    });
  });

  describe('rate limiting', () => {
    it('should hold 40 instant events to 5 per minute and 30 per hour', async () => {
      vi.useFakeTimers();
      const { sender, calls } = createSender();
      queue = new DispatchQueue(sender, { perMinute: 5, perHour: 30 });
      const start = Date.now();

      await queue.start();
      for (let i = 0; i < 40; i++) queue.enqueue(makeEvent(`e-${i}`));

      await vi.advanceTimersByTimeAsync(MINUTE_MS - 1);
      expect(calls).toHaveLength(5);

      await vi.advanceTimersByTimeAsync(1);
      expect(calls).toHaveLength(10);

      await vi.advanceTimersByTimeAsync(HOUR_MS - MINUTE_MS - 1);
      expect(calls).toHaveLength(30);
      expect(queue.depth).toBe(10);

      await vi.advanceTimersByTimeAsync(1);
      expect(calls).toHaveLength(35);

      await vi.advanceTimersByTimeAsync(MINUTE_MS);
      expect(calls).toHaveLength(40);

      // Slots open in bursts at the exact instant the oldest entry ages out
      const offsets = calls.map((c) => c.at - start);
      expect(offsets.slice(0, 5)).toEqual([0, 0, 0, 0, 0]);
      expect(offsets.slice(25, 30)).toEqual([300_000, 300_000, 300_000, 300_000, 300_000]);
      expect(offsets.slice(30, 35)).toEqual([HOUR_MS, HOUR_MS, HOUR_MS, HOUR_MS, HOUR_MS]);
    });

    it('should emit queue:throttled with the computed wait', async () => {
      vi.useFakeTimers();
      const { sender } = createSender();
      queue = new DispatchQueue(sender, { perMinute: 1, perHour: 10 });
      const throttled = vi.fn();
      queue.on('queue:throttled', throttled);

      await queue.start();
      queue.enqueue(makeEvent('a'));
      queue.enqueue(makeEvent('b'));
      await vi.advanceTimersByTimeAsync(0);

      expect(throttled).toHaveBeenCalledWith({ retryInMs: MINUTE_MS, blockedBy: ['minute'] });
      expect(queue.estimateWaitMs()).toBe(MINUTE_MS);
    });

    it('should never exceed either ceiling under random concurrent producers', async () => {
      vi.useFakeTimers();
      const random = new SeededRandom(1234);
      const { sender, calls } = createSender();
      queue = new DispatchQueue(sender, { perMinute: 5, perHour: 30 });
      await queue.start();

      for (let producer = 0; producer < 4; producer++) {
        for (let i = 0; i < 20; i++) {
          const at = Math.floor(random.next() * 2 * HOUR_MS);
          const priority = PRIORITIES[Math.floor(random.next() * PRIORITIES.length)];
          const event = makeEvent(`p${producer}-${i}`, priority);
          setTimeout(() => queue?.enqueue(event), at);
        }
      }

      await vi.advanceTimersByTimeAsync(3 * HOUR_MS);

      const times = calls.map((c) => c.at);
      expect(times.length).toBeGreaterThan(30);
      for (const t of times) {
        expect(times.filter((u) => u >= t && u < t + MINUTE_MS).length).toBeLessThanOrEqual(5);
        expect(times.filter((u) => u >= t && u < t + HOUR_MS).length).toBeLessThanOrEqual(30);
      }
    });
  });

  describe('delivery failures', () => {
    it('should count a terminal error on the 3rd dispatch and keep draining', async () => {
      const monitor = new LifecycleMonitor(['dispatcher']);
      const { sender, deliver } = createSender((call) =>
        call === 3 ? new TerminalDeliveryError('Recipient rejected') : undefined
      );
      queue = new DispatchQueue(sender, { perMinute: 100, perHour: 1000, monitor });
      const failed = vi.fn();
      queue.on('event:failed', failed);

      await queue.start();
      const healthBefore = monitor.healthScore();
      for (let i = 0; i < 6; i++) queue.enqueue(makeEvent(`e-${i}`));
      await queue.whenIdle();

      expect(deliver).toHaveBeenCalledTimes(6);
      expect(queue.getMetrics()).toMatchObject({ delivered: 5, deliveryErrors: 1, retried: 0 });
      expect(monitor.snapshot()[0].errorCount).toBe(1);
      expect(monitor.healthScore()).toBe(healthBefore - 5);
      expect(failed).toHaveBeenCalledWith({ eventId: 'e-2', error: 'Recipient rejected', retryable: false });
    });

    it('should retry transient failures with exponential backoff', async () => {
      vi.useFakeTimers();
      const { sender, calls } = createSender((_call, attempt) =>
        attempt < 3 ? new TransientDeliveryError('Mailbox busy') : undefined
      );
      queue = new DispatchQueue(sender, { perMinute: 100, perHour: 1000, retryBaseDelayMs: 1000 });
      const retries = vi.fn();
      queue.on('event:retry', retries);
      const start = Date.now();

      await queue.start();
      queue.enqueue(makeEvent('flaky'));
      await vi.advanceTimersByTimeAsync(5000);

      expect(calls.map((c) => [c.attempt, c.at - start])).toEqual([
        [1, 0],
        [2, 1000],
        [3, 3000],
      ]);
      expect(retries.mock.calls.map(([payload]) => payload.backoffMs)).toEqual([1000, 2000]);
      expect(queue.getMetrics()).toMatchObject({ delivered: 1, deliveryErrors: 0, retried: 2 });
      // One admission covers all attempts
      expect(queue.getMetrics().recentRateMinute).toBe(1);
    });

    it('should give up after the attempt bound', async () => {
      vi.useFakeTimers();
      const { sender, deliver } = createSender(() => new TransientDeliveryError('Service temporarily unavailable'));
      queue = new DispatchQueue(sender, { perMinute: 100, perHour: 1000, maxAttempts: 3, retryBaseDelayMs: 10 });

      await queue.start();
      queue.enqueue(makeEvent('doomed'));
      queue.enqueue(makeEvent('next'));
      await vi.advanceTimersByTimeAsync(1000);

      expect(deliver).toHaveBeenCalledTimes(6);
      expect(queue.getMetrics()).toMatchObject({ delivered: 0, deliveryErrors: 2, retried: 4 });
    });

    it('should classify thrown errors', async () => {
      vi.useFakeTimers();
      const { sender, calls } = createSender((call) =>
        call === 1 ? new Error('read ECONNRESET') : call === 3 ? new Error('Invalid recipient') : undefined
      );
      queue = new DispatchQueue(sender, { perMinute: 100, perHour: 1000, retryBaseDelayMs: 10 });

      await queue.start();
      queue.enqueue(makeEvent('a'));
      queue.enqueue(makeEvent('b'));
      await vi.advanceTimersByTimeAsync(100);

      expect(calls.map((c) => [c.eventId, c.attempt])).toEqual([
        ['a', 1],
        ['a', 2],
        ['b', 1],
      ]);
      expect(queue.getMetrics()).toMatchObject({ delivered: 1, deliveryErrors: 1, retried: 1 });
    });
  });

  describe('overflow', () => {
    it('should drop the oldest lowest-priority event when full', () => {
      const { sender } = createSender();
      queue = new DispatchQueue(sender, { maxQueueSize: 2 });
      const dropped = vi.fn();
      queue.on('event:dropped', dropped);

      queue.enqueue(makeEvent('low-1', 'low'));
      queue.enqueue(makeEvent('low-2', 'low'));
      queue.enqueue(makeEvent('critical', 'critical'));

      expect(dropped).toHaveBeenCalledWith({ eventId: 'low-1', priority: 'low' });
      expect(queue.getMetrics()).toMatchObject({
        depth: 2,
        depthByPriority: { critical: 1, high: 0, normal: 0, low: 1 },
        dropped: 1,
      });
    });
  });

  describe('lifecycle', () => {
    it('should pass through starting to active and report stopped', async () => {
      const monitor = new LifecycleMonitor(['dispatcher']);
      const states: string[] = [];
      const open = vi.fn(async () => {
        states.push(monitor.snapshot()[0].state);
      });
      const { deliver } = createSender();
      queue = new DispatchQueue({ deliver, open }, { monitor });

      await queue.start();
      states.push(monitor.snapshot()[0].state);
      await queue.stop();
      states.push(monitor.snapshot()[0].state);

      expect(states).toEqual(['starting', 'active', 'stopped']);
      expect(queue.running).toBe(false);
    });

    it('should mark the worker errored when the sender fails to open', async () => {
      const monitor = new LifecycleMonitor(['dispatcher']);
      const { deliver } = createSender();
      const open = vi.fn(async () => {
        throw new Error('database is locked');
      });
      queue = new DispatchQueue({ deliver, open }, { monitor });

      await expect(queue.start()).rejects.toThrow('database is locked');
      expect(monitor.snapshot()[0]).toMatchObject({ state: 'errored', errorCount: 1 });
      expect(queue.running).toBe(false);
    });

    it('should open the sender once and run one consumer when starts overlap', async () => {
      vi.useFakeTimers();
      let opens = 0;
      let inFlight = 0;
      let maxInFlight = 0;
      const sender: Sender = {
        open: async () => {
          opens++;
          await new Promise((resolve) => setTimeout(resolve, 5));
        },
        deliver: async (event, attempt) => {
          inFlight++;
          maxInFlight = Math.max(maxInFlight, inFlight);
          await new Promise((resolve) => setTimeout(resolve, 20));
          inFlight--;
          return {
            ok: true,
            receipt: { id: createReceiptId(`r-${event.id}`), eventId: event.id, deliveredAt: new Date(), attempt },
          };
        },
      };
      queue = new DispatchQueue(sender, { perMinute: 100, perHour: 1000 });
      for (const id of ['a', 'b', 'c', 'd']) queue.enqueue(makeEvent(id));

      const started = Promise.all([queue.start(), queue.start()]);
      await vi.advanceTimersByTimeAsync(5);
      await started;
      await vi.advanceTimersByTimeAsync(200);

      expect(opens).toBe(1);
      expect(maxInFlight).toBe(1);
      expect(queue.getMetrics().delivered).toBe(4);
    });

    it('should wait for an open in progress when stopped', async () => {
      vi.useFakeTimers();
      const { deliver } = createSender();
      const open = vi.fn(() => new Promise<void>((resolve) => setTimeout(resolve, 5)));
      queue = new DispatchQueue({ deliver, open });

      const started = queue.start();
      const stopped = queue.stop();
      await vi.advanceTimersByTimeAsync(5);
      await started;
      await stopped;

      expect(queue.running).toBe(false);
    });

    it('should stop a consumer that is waiting on the rate limit', async () => {
      vi.useFakeTimers();
      const { sender, calls } = createSender();
      queue = new DispatchQueue(sender, { perMinute: 1, perHour: 10 });

      await queue.start();
      queue.enqueue(makeEvent('a'));
      queue.enqueue(makeEvent('b'));
      await vi.advanceTimersByTimeAsync(0);

      await queue.stop();
      await vi.advanceTimersByTimeAsync(2 * MINUTE_MS);

      expect(calls).toHaveLength(1);
      expect(queue.depth).toBe(1);
    });

    it('should discard buffered events on clear', () => {
      const { sender } = createSender();
      queue = new DispatchQueue(sender);
      queue.enqueue(makeEvent('a'));
      queue.enqueue(makeEvent('b'));

      expect(queue.clear()).toBe(2);
      expect(queue.depth).toBe(0);
    });
  });
});
