/**
 * Virtual Clock
 *
 * Maps elapsed real time to simulated time under the selected speed level:
 *
 *   simulated = simulatedEpoch + (real - realAnchor) * multiplier
 *
 * While paused the formula is not applied and `now()` returns the frozen
 * epoch. Every level change or resume re-anchors, so simulated time never
 * jumps.
 */

import { getSpeedLevel } from '../config.js';
import type { ClockState, SpeedLevel, SpeedLevelDefinition, TimeSource } from '../types.js';

export interface VirtualClockOptions {
  timeSource?: TimeSource;
  /** Simulated start instant; defaults to the real time at construction */
  epoch?: number;
  level?: SpeedLevel;
}

export class VirtualClock {
  private readonly timeSource: TimeSource;
  private simulatedEpoch: number;
  private realAnchor: number;
  private currentLevel: SpeedLevelDefinition;
  private running = false;
  /** Highest instant handed out since the last reset */
  private highWater: number;

  constructor(options: VirtualClockOptions = {}) {
    this.timeSource = options.timeSource ?? (() => Date.now());
    const real = this.timeSource();
    this.simulatedEpoch = options.epoch ?? real;
    this.realAnchor = real;
    this.currentLevel = getSpeedLevel(options.level ?? 1);
    this.highWater = this.simulatedEpoch;
  }

  /**
   * Current simulated instant in epoch milliseconds. Never decreases until
   * the next reset.
   */
  now(): number {
    if (!this.running) return this.simulatedEpoch;
    const elapsed = Math.max(0, this.timeSource() - this.realAnchor);
    // Real time stepping backwards holds simulated time where it was
    this.highWater = Math.max(this.highWater, this.simulatedEpoch + elapsed * this.currentLevel.multiplier);
    return this.highWater;
  }

  start(): void {
    if (this.running) return;
    this.realAnchor = this.timeSource();
    this.running = true;
  }

  pause(): void {
    if (!this.running) return;
    this.simulatedEpoch = this.now();
    this.running = false;
  }

  /**
   * Change acceleration. Throws ConfigurationError for an unknown level,
   * leaving the clock untouched.
   */
  setLevel(level: number): void {
    const next = getSpeedLevel(level);
    if (this.running) {
      this.simulatedEpoch = this.now();
      this.realAnchor = this.timeSource();
    }
    this.currentLevel = next;
  }

  reset(): void {
    const real = this.timeSource();
    this.running = false;
    this.currentLevel = getSpeedLevel(1);
    this.simulatedEpoch = real;
    this.realAnchor = real;
    this.highWater = real;
  }

  get level(): SpeedLevel {
    return this.currentLevel.level;
  }

  get multiplier(): number {
    return this.currentLevel.multiplier;
  }

  get speed(): SpeedLevelDefinition {
    return this.currentLevel;
  }

  get isRunning(): boolean {
    return this.running;
  }

  getState(): ClockState {
    return {
      simulatedEpoch: this.simulatedEpoch,
      realAnchor: this.realAnchor,
      level: this.currentLevel.level,
      running: this.running,
    };
  }
}
