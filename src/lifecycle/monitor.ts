/**
 * Lifecycle Monitor
 *
 * Tracks the state of each long-running worker and folds it into one health
 * score. A worker must pass through `starting` before it can be `active`;
 * skipping the transition is an error, not a silent no-op.
 *
 *   stopped|errored -> starting -> active -> (active: heartbeat)
 *                      starting -> errored          (init failure)
 *                      active   -> errored          (fatal runtime failure)
 *   any             -> stopped
 */

import { LifecycleError } from '../errors.js';
import { WORKER_NAMES } from '../types.js';
import type { TimeSource, WorkerName, WorkerState, WorkerStatus } from '../types.js';

export interface ReportErrorOptions {
  /** A fatal error takes the worker out of service */
  fatal?: boolean;
}

/** Points lost per recorded error */
export const ERROR_PENALTY = 5;

export class LifecycleMonitor {
  private workers: Map<WorkerName, WorkerStatus> = new Map();
  private readonly timeSource: TimeSource;

  constructor(names: readonly WorkerName[] = WORKER_NAMES, timeSource: TimeSource = () => Date.now()) {
    if (names.length === 0) {
      throw new LifecycleError('Monitor needs at least one worker', '*');
    }
    this.timeSource = timeSource;
    for (const name of names) {
      this.workers.set(name, {
        name,
        state: 'stopped',
        lastActivity: new Date(this.timeSource()),
        errorCount: 0,
      });
    }
  }

  reportStarting(name: WorkerName): void {
    const worker = this.get(name);
    if (worker.state === 'starting') return;
    this.expect(worker, ['stopped', 'errored'], 'starting');
    this.update(worker, { state: 'starting' });
  }

  /**
   * Completes startup, or records a heartbeat for a worker already active.
   */
  reportActive(name: WorkerName): void {
    const worker = this.get(name);
    this.expect(worker, ['starting', 'active'], 'active');
    this.update(worker, { state: 'active' });
  }

  reportError(name: WorkerName, error: Error, options: ReportErrorOptions = {}): void {
    const worker = this.get(name);
    const takesDown = worker.state === 'starting' || (options.fatal === true && worker.state === 'active');

    this.update(worker, {
      state: takesDown ? 'errored' : worker.state,
      errorCount: worker.errorCount + 1,
      lastError: error.message,
    });
  }

  reportStopped(name: WorkerName): void {
    const worker = this.get(name);
    if (worker.state === 'stopped') return;
    this.update(worker, { state: 'stopped' });
  }

  isActive(name: WorkerName): boolean {
    return this.get(name).state === 'active';
  }

  /**
   * 100 x share of active workers, minus a fixed penalty per recorded error,
   * clamped to 0..100.
   */
  healthScore(): number {
    const all = Array.from(this.workers.values());
    const active = all.filter((w) => w.state === 'active').length;
    const errors = all.reduce((acc, w) => acc + w.errorCount, 0);

    const raw = (100 * active) / all.length - ERROR_PENALTY * errors;
    const clamped = Math.min(100, Math.max(0, raw));
    return Math.round(clamped * 100) / 100;
  }

  totalErrors(): number {
    return Array.from(this.workers.values()).reduce((acc, w) => acc + w.errorCount, 0);
  }

  snapshot(): readonly WorkerStatus[] {
    return Array.from(this.workers.values()).map((w) =>
      Object.freeze({ ...w, lastActivity: new Date(w.lastActivity.getTime()) })
    );
  }

  // ===========================================================================
  // PRIVATE METHODS
  // ===========================================================================

  private get(name: WorkerName): WorkerStatus {
    const worker = this.workers.get(name);
    if (!worker) {
      throw new LifecycleError(`Unknown worker: ${name}`, name);
    }
    return worker;
  }

  private expect(worker: WorkerStatus, allowed: WorkerState[], target: WorkerState): void {
    if (!allowed.includes(worker.state)) {
      throw new LifecycleError(
        `Worker ${worker.name} cannot go from ${worker.state} to ${target}`,
        worker.name
      );
    }
  }

  private update(worker: WorkerStatus, changes: Partial<Omit<WorkerStatus, 'name'>>): void {
    this.workers.set(worker.name, {
      ...worker,
      ...changes,
      lastActivity: new Date(this.timeSource()),
    });
  }
}
