/**
 * Cycle Orchestrator
 *
 * Runs simulated business weeks back to back. Each cycle starts on day 1 at
 * the configured start hour, ticks once per simulated hour boundary and ends
 * when day 7 is over or its wall-clock budget of unpaused running time is
 * spent. A fixed pause separates cycles.
 *
 *   idle -> running -> stopping -> idle
 */

import { EventEmitter } from 'events';
import { getSpeedLevel } from '../config.js';
import { ConfigurationError, InternalTickError } from '../errors.js';
import { Wakeup } from '../utils/timing.js';
import type { VirtualClock } from './clock.js';
import type { ScenarioGenerator } from './generator.js';
import type { LifecycleMonitor } from '../lifecycle/monitor.js';
import type {
  CycleState,
  EventSink,
  Issue,
  IssueId,
  OrchestratorPhase,
  SpeedLevel,
  TimeSource,
} from '../types.js';

// =============================================================================
// TYPES
// =============================================================================

export interface CycleOrchestratorDeps {
  clock: VirtualClock;
  generator: ScenarioGenerator;
  sink: EventSink;
  monitor?: LifecycleMonitor;
}

export interface CycleOrchestratorOptions {
  defaultLevel?: SpeedLevel;
  cycleDurationMs?: number;
  interCyclePauseMs?: number;
  startHour?: number;
  /** Upper bound on a single drive-loop wait */
  maxTickWaitMs?: number;
  timeSource?: TimeSource;
}

const SIM_HOUR_MS = 3_600_000;
const DAYS_PER_CYCLE = 7;

// =============================================================================
// IMPLEMENTATION
// =============================================================================

export class CycleOrchestrator extends EventEmitter {
  private readonly clock: VirtualClock;
  private readonly generator: ScenarioGenerator;
  private readonly sink: EventSink;
  private readonly monitor?: LifecycleMonitor;
  private readonly options: Required<CycleOrchestratorOptions>;

  private phase: OrchestratorPhase = 'idle';
  private state: CycleState;
  private loop: Promise<void> | null = null;
  private readonly wakeup = new Wakeup();

  private cycleSimStart = 0;
  private hoursTicked = 0;
  private weekComplete = false;
  private betweenCycles = false;
  private resetRequested = false;
  private holdClock = false;

  // Unpaused real time spent in the current cycle
  private accumulatedMs = 0;
  private activeSince: number | null = null;

  private completed = 0;

  constructor(deps: CycleOrchestratorDeps, options: CycleOrchestratorOptions = {}) {
    super();
    this.clock = deps.clock;
    this.generator = deps.generator;
    this.sink = deps.sink;
    this.monitor = deps.monitor;
    this.options = {
      defaultLevel: getSpeedLevel(options.defaultLevel ?? 3).level,
      cycleDurationMs: options.cycleDurationMs ?? 600_000,
      interCyclePauseMs: options.interCyclePauseMs ?? 30_000,
      startHour: options.startHour ?? 9,
      maxTickWaitMs: options.maxTickWaitMs ?? 1000,
      timeSource: options.timeSource ?? (() => Date.now()),
    };
    if (!Number.isInteger(this.options.startHour) || this.options.startHour < 0 || this.options.startHour > 23) {
      throw new ConfigurationError(`Start hour must be 0-23, got ${this.options.startHour}`, 'startHour');
    }
    this.state = this.freshState(1);
  }

  /**
   * Begin cycle 1 and run until stopped. A second call while running is a
   * no-op.
   */
  startContinuous(level: SpeedLevel = this.options.defaultLevel): void {
    if (this.phase !== 'idle') return;

    this.monitor?.reportStarting('clock');
    this.monitor?.reportStarting('orchestrator');

    this.clock.reset();
    this.clock.setLevel(level);
    this.monitor?.reportActive('clock');

    this.phase = 'running';
    this.holdClock = false;
    this.completed = 0;
    this.beginCycle(1);
    this.monitor?.reportActive('orchestrator');

    console.log(`[CycleOrchestrator] Continuous simulation started at level ${level}`);
    this.loop = this.drive().catch((error: unknown) => {
      const err = error instanceof Error ? error : new Error(String(error));
      this.monitor?.reportError('orchestrator', err, { fatal: true });
      console.error(`[CycleOrchestrator] Drive loop crashed: ${err.message}`);
      this.clock.pause();
      this.monitor?.reportStopped('clock');
      this.phase = 'idle';
    });
  }

  /**
   * Ask the loop to exit after the tick in flight and wait for it. The clock
   * is left paused.
   */
  async stop(): Promise<void> {
    if (this.phase !== 'running') {
      await this.loop;
      return;
    }

    this.phase = 'stopping';
    this.wakeup.wake();
    await this.loop;
    this.loop = null;

    this.settleActiveTime();
    this.clock.pause();
    this.phase = 'idle';

    this.monitor?.reportStopped('orchestrator');
    this.monitor?.reportStopped('clock');
    console.log(`[CycleOrchestrator] Stopped after ${this.completed} completed cycle(s)`);
  }

  /** Freeze simulated time; the cycle budget stops counting too */
  pause(): void {
    this.holdClock = true;
    if (!this.clock.isRunning) return;
    this.settleActiveTime();
    this.clock.pause();
  }

  resume(): void {
    this.holdClock = false;
    if (this.phase !== 'running' || this.betweenCycles || this.clock.isRunning) return;
    this.clock.start();
    this.activeSince = this.options.timeSource();
    this.wakeup.wake();
  }

  /**
   * Start the week over. While running the current cycle restarts from day 1
   * with the same number and speed; during the inter-cycle pause the next
   * cycle begins at once. While idle everything returns to its initial state.
   */
  requestReset(): void {
    if (this.phase === 'running') {
      if (this.betweenCycles) {
        this.resetRequested = true;
      } else {
        this.beginCycle(this.state.cycleNumber);
        console.log(`[CycleOrchestrator] Cycle ${this.state.cycleNumber} reset`);
      }
      this.wakeup.wake();
      return;
    }

    this.clock.reset();
    this.state = this.freshState(1);
    this.completed = 0;
    this.accumulatedMs = 0;
    this.activeSince = null;
  }

  /**
   * Resolve an active issue ahead of its random resolution.
   * @returns The resolved issue, or undefined when no active issue has that id
   */
  resolveIssue(id: IssueId): Issue | undefined {
    const issue = this.state.issues.find((i) => i.id === id && i.status === 'active');
    if (!issue) return undefined;

    const resolved = this.generator.resolveIssue(issue, this.state.simDay, this.state.simHour);
    this.state = { ...this.state, issues: this.state.issues.filter((i) => i.id !== id) };
    this.emit('issue:resolved', { issue: resolved, explicit: true });
    return resolved;
  }

  getCycleState(): CycleState {
    return { ...this.state, issues: this.state.issues.map((i) => ({ ...i })) };
  }

  getPhase(): OrchestratorPhase {
    return this.phase;
  }

  get completedCycles(): number {
    return this.completed;
  }

  get isBetweenCycles(): boolean {
    return this.betweenCycles;
  }

  // ===========================================================================
  // DRIVE LOOP
  // ===========================================================================

  private async drive(): Promise<void> {
    while (this.phase === 'running') {
      if (!this.clock.isRunning) {
        // Paused: nothing advances until resume, reset or stop
        await this.wakeup.wait();
        continue;
      }

      this.advance();

      if (this.weekComplete || this.activeElapsed() >= this.options.cycleDurationMs) {
        await this.endCycle();
        continue;
      }

      await this.wakeup.wait(this.nextWaitMs());
    }
  }

  /** Tick every simulated hour boundary reached since the last check */
  private advance(): void {
    const hoursElapsed = Math.floor((this.clock.now() - this.cycleSimStart) / SIM_HOUR_MS);

    while (this.hoursTicked < hoursElapsed) {
      let { simDay, simHour } = this.state;
      simHour++;
      if (simHour > 23) {
        simHour = 0;
        simDay++;
      }
      if (simDay > DAYS_PER_CYCLE) {
        this.weekComplete = true;
        return;
      }

      this.hoursTicked++;
      this.state = { ...this.state, simDay, simHour };
      this.tick();
    }
  }

  private tick(): void {
    const { cycleNumber, simDay, simHour } = this.state;

    try {
      const changes = this.generator.evolveIssues(simDay, simHour, this.state.issues);
      this.state = { ...this.state, issues: changes.issues };
      for (const issue of changes.resolved) this.emit('issue:resolved', { issue, explicit: false });
      for (const issue of changes.created) {
        console.log(`[CycleOrchestrator] Issue raised on day ${simDay} ${pad(simHour)}:00: ${issue.title}`);
        this.emit('issue:created', { issue });
      }

      let events = 0;
      for (const event of this.generator.generate(simDay, simHour, changes.issues)) {
        this.sink.enqueue(event);
        events++;
      }

      this.heartbeat();
      this.emit('tick', { cycleNumber, simDay, simHour, events, activeIssues: changes.issues.length });
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      const tickError = new InternalTickError(
        `Tick failed on day ${simDay} at ${pad(simHour)}:00: ${cause.message}`,
        simDay,
        simHour,
        cause
      );
      this.monitor?.reportError('orchestrator', tickError);
      console.error(`[CycleOrchestrator] ${tickError.message}`);
      this.emit('tick:error', tickError);
    }
  }

  private async endCycle(): Promise<void> {
    this.settleActiveTime();
    this.clock.pause();
    this.completed++;

    const finished = this.getCycleState();
    const reason = this.weekComplete ? 'week complete' : 'duration elapsed';
    console.log(
      `[CycleOrchestrator] Cycle ${finished.cycleNumber} completed (${reason}) on day ${finished.simDay} at ${pad(finished.simHour)}:00`
    );
    this.emit('cycle:completed', { state: finished, reason });

    this.betweenCycles = true;
    if (this.options.interCyclePauseMs > 0 && !this.resetRequested) {
      await this.wakeup.wait(this.options.interCyclePauseMs);
    }
    this.betweenCycles = false;
    this.resetRequested = false;

    if (this.phase !== 'running') return;
    this.beginCycle(finished.cycleNumber + 1);
  }

  private beginCycle(cycleNumber: number): void {
    const level = this.clock.level;
    this.clock.reset();
    this.clock.setLevel(level);

    this.state = this.freshState(cycleNumber);
    this.cycleSimStart = this.clock.now();
    this.hoursTicked = 0;
    this.weekComplete = false;
    this.accumulatedMs = 0;
    this.activeSince = null;

    if (!this.holdClock) {
      this.clock.start();
      this.activeSince = this.options.timeSource();
    }

    this.emit('cycle:started', { state: this.getCycleState() });
    this.tick();
  }

  private nextWaitMs(): number {
    const intoCycle = this.clock.now() - this.cycleSimStart;
    const toNextHour = Math.ceil(((this.hoursTicked + 1) * SIM_HOUR_MS - intoCycle) / this.clock.multiplier);
    const toDeadline = this.options.cycleDurationMs - this.activeElapsed();
    return Math.max(1, Math.min(toNextHour, toDeadline, this.options.maxTickWaitMs));
  }

  private activeElapsed(): number {
    const running = this.activeSince === null ? 0 : this.options.timeSource() - this.activeSince;
    return this.accumulatedMs + Math.max(0, running);
  }

  private settleActiveTime(): void {
    this.accumulatedMs = this.activeElapsed();
    this.activeSince = null;
  }

  private heartbeat(): void {
    if (this.monitor?.isActive('orchestrator')) this.monitor.reportActive('orchestrator');
    if (this.monitor?.isActive('clock')) this.monitor.reportActive('clock');
  }

  private freshState(cycleNumber: number): CycleState {
    return { cycleNumber, simDay: 1, simHour: this.options.startHour, issues: [] };
  }
}

function pad(hour: number): string {
  return String(hour).padStart(2, '0');
}

// =============================================================================
// FACTORY
// =============================================================================

export function createCycleOrchestrator(
  deps: CycleOrchestratorDeps,
  options?: CycleOrchestratorOptions
): CycleOrchestrator {
  return new CycleOrchestrator(deps, options);
}
