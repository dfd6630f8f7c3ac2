/**
 * TimeWarp Engine
 *
 * Wires clock, generator, orchestrator, dispatch queue and lifecycle monitor
 * together and exposes the control surface used by the HTTP layer and tests.
 */

import { ConfigurationError } from './errors.js';
import { SPEED_LEVELS } from './config.js';
import { VirtualClock } from './simulation/clock.js';
import { ScenarioGenerator } from './simulation/generator.js';
import { CycleOrchestrator } from './simulation/cycle.js';
import { DispatchQueue } from './dispatch/queue.js';
import { LifecycleMonitor } from './lifecycle/monitor.js';
import { createIssueId } from './types.js';
import type { SimulationConfig } from './config.js';
import type { RandomSource } from './utils/random.js';
import type {
  DispatchMetrics,
  Issue,
  Sender,
  SimulationStatus,
  SpeedLevel,
  SpeedLevelDefinition,
  TimeSource,
  WorkerStatus,
} from './types.js';

export interface EngineOptions {
  timeSource?: TimeSource;
  /** Overrides the seeded source built from `config.seed` */
  random?: RandomSource;
}

export class TimeWarpEngine {
  readonly monitor: LifecycleMonitor;
  readonly clock: VirtualClock;
  readonly generator: ScenarioGenerator;
  readonly queue: DispatchQueue;
  readonly orchestrator: CycleOrchestrator;

  private level: SpeedLevel;
  private starting: Promise<void> | null = null;

  constructor(
    readonly config: SimulationConfig,
    sender: Sender,
    options: EngineOptions = {}
  ) {
    const { timeSource } = options;
    this.level = config.defaultSpeedLevel;

    this.monitor = new LifecycleMonitor(undefined, timeSource);
    this.clock = new VirtualClock({ timeSource, level: config.defaultSpeedLevel });
    this.generator = new ScenarioGenerator({ seed: config.seed, random: options.random });
    this.queue = new DispatchQueue(sender, {
      perMinute: config.rateLimits.perMinute,
      perHour: config.rateLimits.perHour,
      maxQueueSize: config.maxQueueSize,
      maxAttempts: config.delivery.maxAttempts,
      retryBaseDelayMs: config.delivery.retryBaseDelayMs,
      timeSource,
      monitor: this.monitor,
    });
    this.orchestrator = new CycleOrchestrator(
      { clock: this.clock, generator: this.generator, sink: this.queue, monitor: this.monitor },
      {
        defaultLevel: config.defaultSpeedLevel,
        cycleDurationMs: config.cycleDurationMs,
        interCyclePauseMs: config.interCyclePauseMs,
        startHour: config.startHour,
        maxTickWaitMs: config.maxTickWaitMs,
        timeSource,
      }
    );

    console.log(`[Engine] Scenario seed ${this.generator.seed}`);
  }

  /**
   * Change the acceleration. Returns false, changing nothing, for an unknown
   * level.
   */
  setSpeedLevel(level: number): boolean {
    try {
      this.clock.setLevel(level);
    } catch (error) {
      if (error instanceof ConfigurationError) {
        console.warn(`[Engine] ${error.message}`);
        return false;
      }
      throw error;
    }

    this.level = this.clock.level;
    console.log(`[Engine] Speed set to level ${this.level} (${this.clock.speed.name}, ${this.clock.multiplier}x)`);
    return true;
  }

  /**
   * Open the sender, start the dispatch consumer and begin cycle 1. Rejects
   * when the sender cannot be opened.
   */
  startContinuousSimulation(): Promise<void> {
    if (this.orchestrator.getPhase() !== 'idle') return Promise.resolve();
    if (!this.starting) {
      this.starting = this.bringUp().finally(() => {
        this.starting = null;
      });
    }
    return this.starting;
  }

  private async bringUp(): Promise<void> {
    if (!this.queue.running) {
      await this.queue.start();
    }
    if (this.orchestrator.getPhase() === 'idle') {
      this.orchestrator.startContinuous(this.level);
    }
  }

  pauseClock(): void {
    this.orchestrator.pause();
  }

  resumeClock(): void {
    this.orchestrator.resume();
  }

  /** Restart the week and discard events still waiting for dispatch */
  resetSimulation(): void {
    const cleared = this.queue.clear();
    this.orchestrator.requestReset();
    if (this.orchestrator.getPhase() === 'idle') {
      this.clock.setLevel(this.level);
    }
    console.log(`[Engine] Simulation reset, ${cleared} queued event(s) discarded`);
  }

  async stopContinuousSimulation(): Promise<void> {
    if (this.starting) {
      // A failed start already rejected to its caller
      await this.starting.then(
        () => undefined,
        () => undefined
      );
    }
    await this.orchestrator.stop();
    await this.queue.stop();
  }

  getStatus(): SimulationStatus {
    const cycle = this.orchestrator.getCycleState();
    const metrics = this.queue.getMetrics();
    const speed = this.clock.speed;
    const running = this.orchestrator.getPhase() === 'running';

    return {
      cycleNumber: cycle.cycleNumber,
      simDay: cycle.simDay,
      simHour: cycle.simHour,
      speedLevel: speed.level,
      running,
      activeIssueCount: cycle.issues.filter((i) => i.status === 'active').length,
      queueDepth: metrics.depth,
      recentRateMinute: metrics.recentRateMinute,
      recentRateHour: metrics.recentRateHour,
      healthScore: this.monitor.healthScore(),
      speedName: speed.name,
      multiplier: speed.multiplier,
      paused: running && !this.clock.isRunning,
      simulatedTime: new Date(this.clock.now()).toISOString(),
      completedCycles: this.orchestrator.completedCycles,
      delivered: metrics.delivered,
      deliveryErrors: metrics.deliveryErrors,
      dropped: metrics.dropped,
      theme: this.generator.themeFor(cycle.simDay).name,
    };
  }

  getSpeedLevels(): readonly SpeedLevelDefinition[] {
    return SPEED_LEVELS;
  }

  getIssues(): Issue[] {
    return this.orchestrator.getCycleState().issues;
  }

  resolveIssue(id: string): Issue | undefined {
    return this.orchestrator.resolveIssue(createIssueId(id));
  }

  getWorkers(): readonly WorkerStatus[] {
    return this.monitor.snapshot();
  }

  getMetrics(): DispatchMetrics {
    return this.queue.getMetrics();
  }
}

// Factory function
export function createEngine(config: SimulationConfig, sender: Sender, options?: EngineOptions): TimeWarpEngine {
  return new TimeWarpEngine(config, sender, options);
}
