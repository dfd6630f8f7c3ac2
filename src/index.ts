/**
 * TimeWarp - Main Entry Points
 */

export * from './types.js';
export * from './errors.js';
export { loadConfig, validateConfig, getSpeedLevel, isSpeedLevel, SPEED_LEVELS, DEFAULT_CONFIG } from './config.js';
export type { SimulationConfig, SimulationConfigOverrides, RateLimitConfig, DeliveryConfig } from './config.js';
export { VirtualClock, type VirtualClockOptions } from './simulation/clock.js';
export { ScenarioGenerator, apportion, type TickPlan, type IssueChanges } from './simulation/generator.js';
export { DAY_THEMES, HOUR_MULTIPLIERS, ISSUE_CATALOGUE, themeForDay } from './simulation/scenarios.js';
export { CycleOrchestrator, createCycleOrchestrator } from './simulation/cycle.js';
export { DispatchQueue, createDispatchQueue } from './dispatch/queue.js';
export { DualRateLimiter, SlidingWindow } from './dispatch/rate-window.js';
export { PriorityBuffer } from './dispatch/priority-buffer.js';
export { MailboxSender, createMailboxSender } from './dispatch/senders.js';
export { LifecycleMonitor } from './lifecycle/monitor.js';
export { SQLiteMailbox, createMailbox, type DeliveryRecord } from './storage/sqlite.js';
export { SeededRandom, type RandomSource } from './utils/random.js';
export { TimeWarpEngine, createEngine } from './engine.js';
export { createApp, startServer } from './api/server.js';
