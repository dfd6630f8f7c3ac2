/**
 * DispatchQueue - Rate-limited delivery of generated events
 *
 * Producers enqueue without blocking. A single consumer drains the buffer in
 * priority order, admits each event against the per-minute and per-hour
 * windows, and hands it to the sender with bounded retries.
 */

import { EventEmitter } from 'events';
import { DualRateLimiter } from './rate-window.js';
import { PriorityBuffer } from './priority-buffer.js';
import { Wakeup, sleep } from '../utils/timing.js';
import { classifyDeliveryError, type DeliveryError } from '../errors.js';
import type { LifecycleMonitor } from '../lifecycle/monitor.js';
import type {
  DeliveryResult,
  DispatchMetrics,
  EventDescriptor,
  EventSink,
  Sender,
  TimeSource,
  WorkerName,
} from '../types.js';

// =============================================================================
// TYPES
// =============================================================================

export interface DispatchQueueOptions {
  perMinute?: number;
  perHour?: number;
  maxQueueSize?: number;
  maxAttempts?: number;
  retryBaseDelayMs?: number;
  timeSource?: TimeSource;
  monitor?: LifecycleMonitor;
  workerName?: WorkerName;
}

type ResolvedOptions = Required<Omit<DispatchQueueOptions, 'monitor'>> & Pick<DispatchQueueOptions, 'monitor'>;

// =============================================================================
// IMPLEMENTATION
// =============================================================================

export class DispatchQueue extends EventEmitter implements EventSink {
  private readonly buffer: PriorityBuffer;
  private readonly limiter: DualRateLimiter;
  private readonly options: ResolvedOptions;

  /** Woken by enqueue and stop */
  private readonly arrivals = new Wakeup();
  /** Woken by stop only; a new arrival cannot free a rate-limit slot */
  private readonly throttle = new Wakeup();
  private idleWaiters: Array<() => void> = [];

  private isRunning = false;
  private inFlight: EventDescriptor | null = null;
  private loop: Promise<void> | null = null;
  private starting: Promise<void> | null = null;

  private metrics = { delivered: 0, deliveryErrors: 0, retried: 0, dropped: 0 };

  constructor(
    private readonly sender: Sender,
    options: DispatchQueueOptions = {}
  ) {
    super();
    this.options = {
      perMinute: options.perMinute ?? 5,
      perHour: options.perHour ?? 30,
      maxQueueSize: options.maxQueueSize ?? 10_000,
      maxAttempts: options.maxAttempts ?? 3,
      retryBaseDelayMs: options.retryBaseDelayMs ?? 1000,
      timeSource: options.timeSource ?? (() => Date.now()),
      workerName: options.workerName ?? 'dispatcher',
      monitor: options.monitor,
    };
    this.limiter = new DualRateLimiter(this.options.perMinute, this.options.perHour);
    this.buffer = new PriorityBuffer(this.options.maxQueueSize);
  }

  /**
   * Add an event. Never blocks; on a full buffer the overflow policy of
   * PriorityBuffer decides what is dropped.
   */
  enqueue(event: EventDescriptor): void {
    const dropped = this.buffer.push(event);

    if (dropped) {
      this.metrics.dropped++;
      this.emit('event:dropped', { eventId: dropped.id, priority: dropped.priority });
    }
    if (dropped !== event) {
      this.emit('event:enqueued', { eventId: event.id, priority: event.priority, depth: this.buffer.length });
    }

    this.arrivals.wake();
  }

  /**
   * Bring the consumer up. The worker passes through `starting` while the
   * sender opens; a failed open leaves it `errored` and rejects.
   */
  start(): Promise<void> {
    if (this.isRunning) return Promise.resolve();
    // Overlapping callers share the open in progress
    if (!this.starting) {
      this.starting = this.open().finally(() => {
        this.starting = null;
      });
    }
    return this.starting;
  }

  private async open(): Promise<void> {
    const { monitor, workerName } = this.options;
    monitor?.reportStarting(workerName);

    try {
      await this.sender.open?.();
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      monitor?.reportError(workerName, err);
      console.error(`[DispatchQueue] Sender failed to open: ${err.message}`);
      throw err;
    }

    monitor?.reportActive(workerName);
    this.isRunning = true;
    this.emit('queue:started');
    this.loop = this.consume();
  }

  /**
   * Ask the consumer to exit at its next suspension point and wait for it.
   * An event already handed to the sender finishes its attempts first.
   */
  async stop(): Promise<void> {
    if (this.starting) {
      // A failed open already rejected to its caller and reached the monitor
      await this.starting.then(
        () => undefined,
        () => undefined
      );
    }
    if (!this.isRunning) return;

    this.isRunning = false;
    this.arrivals.wake();
    this.throttle.wake();

    await this.loop;
    this.loop = null;

    this.options.monitor?.reportStopped(this.options.workerName);
    this.flushIdleWaiters();
    this.emit('queue:stopped');
  }

  /**
   * Resolves once the buffer is empty and nothing is in flight, or the
   * consumer stops.
   */
  whenIdle(): Promise<void> {
    if (this.isIdle() || !this.isRunning) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /** Drop everything still buffered; in-flight delivery is unaffected */
  clear(): number {
    const cleared = this.buffer.length;
    this.buffer.clear();
    if (this.isIdle()) this.flushIdleWaiters();
    return cleared;
  }

  get depth(): number {
    return this.buffer.length;
  }

  get running(): boolean {
    return this.isRunning;
  }

  /** Read-only estimate of how long a new event would wait for a slot */
  estimateWaitMs(): number {
    return this.limiter.estimateWaitMs(this.options.timeSource());
  }

  getMetrics(): DispatchMetrics {
    const rates = this.limiter.recentRates(this.options.timeSource());
    return {
      depth: this.buffer.length,
      depthByPriority: this.buffer.depthByPriority(),
      delivered: this.metrics.delivered,
      deliveryErrors: this.metrics.deliveryErrors,
      retried: this.metrics.retried,
      dropped: this.metrics.dropped,
      recentRateMinute: rates.minute,
      recentRateHour: rates.hour,
    };
  }

  // ===========================================================================
  // PRIVATE METHODS
  // ===========================================================================

  private async consume(): Promise<void> {
    while (this.isRunning) {
      const next = this.buffer.peek();

      if (!next) {
        this.flushIdleWaiters();
        await this.arrivals.wait();
        continue;
      }

      const decision = this.limiter.tryAdmit(this.options.timeSource());
      if (!decision.admitted) {
        this.emit('queue:throttled', { retryInMs: decision.retryInMs, blockedBy: decision.blockedBy });
        await this.throttle.wait(decision.retryInMs);
        continue;
      }

      // Admission is already recorded; the event leaves the buffer in the same turn
      this.buffer.shift();
      this.inFlight = next;
      try {
        await this.deliver(next);
      } catch (error) {
        // deliver() handles sender failures itself; anything here is a consumer bug
        const err = error instanceof Error ? error : new Error(String(error));
        this.options.monitor?.reportError(this.options.workerName, err);
        console.error(`[DispatchQueue] Unexpected error delivering ${next.id}: ${err.message}`);
      } finally {
        this.inFlight = null;
      }
    }
  }

  private async deliver(event: EventDescriptor): Promise<void> {
    const { maxAttempts, retryBaseDelayMs, monitor, workerName } = this.options;
    let lastError: DeliveryError | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const result = await this.attempt(event, attempt);

      if (result.ok) {
        this.metrics.delivered++;
        if (monitor?.isActive(workerName)) monitor.reportActive(workerName);
        this.emit('event:delivered', { eventId: event.id, receiptId: result.receipt.id, attempt });
        return;
      }

      lastError = result.error;
      if (!result.error.retryable) break;

      if (attempt < maxAttempts) {
        const backoff = retryBaseDelayMs * 2 ** (attempt - 1);
        this.metrics.retried++;
        console.warn(
          `[DispatchQueue] Transient failure for ${event.id}, retrying in ${backoff}ms (attempt ${attempt}/${maxAttempts})`
        );
        this.emit('event:retry', { eventId: event.id, attempt, backoffMs: backoff, error: result.error.message });
        await sleep(backoff);
      }
    }

    const error = lastError ?? classifyDeliveryError(new Error('Delivery failed'));
    this.metrics.deliveryErrors++;
    monitor?.reportError(workerName, error);
    console.error(`[DispatchQueue] Dropping ${event.id} (${event.priority}/${event.category}): ${error.message}`);
    this.emit('event:failed', { eventId: event.id, error: error.message, retryable: error.retryable });
  }

  private async attempt(event: EventDescriptor, attempt: number): Promise<DeliveryResult> {
    try {
      return await this.sender.deliver(event, attempt);
    } catch (error) {
      return { ok: false, error: classifyDeliveryError(error) };
    }
  }

  private isIdle(): boolean {
    return this.buffer.length === 0 && this.inFlight === null;
  }

  private flushIdleWaiters(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}

// =============================================================================
// FACTORY
// =============================================================================

export function createDispatchQueue(sender: Sender, options?: DispatchQueueOptions): DispatchQueue {
  return new DispatchQueue(sender, options);
}
