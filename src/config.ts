/**
 * Simulation configuration
 *
 * Explicit overrides win over environment variables, which win over defaults.
 */

import { ConfigurationError } from './errors.js';
import type { SpeedLevel, SpeedLevelDefinition } from './types.js';

// =============================================================================
// SPEED LEVELS
// =============================================================================

export const SPEED_LEVELS: readonly SpeedLevelDefinition[] = [
  { level: 1, name: 'Real Time', multiplier: 1, description: 'Normal business speed' },
  { level: 2, name: 'Fast Forward', multiplier: 60, description: '1 hour per minute' },
  { level: 3, name: 'Rapid Pace', multiplier: 168, description: '1 work day per minute' },
  { level: 4, name: 'Ultra Speed', multiplier: 504, description: '3 days per minute' },
  { level: 5, name: 'Time Warp', multiplier: 1008, description: '1 week per 10 minutes' },
];

export function isSpeedLevel(value: number): value is SpeedLevel {
  return SPEED_LEVELS.some((def) => def.level === value);
}

export function getSpeedLevel(level: number): SpeedLevelDefinition {
  const def = SPEED_LEVELS.find((d) => d.level === level);
  if (!def) {
    throw new ConfigurationError(
      `Invalid speed level: ${level}. Must be 1-${SPEED_LEVELS.length}.`,
      'level'
    );
  }
  return def;
}

// =============================================================================
// CONFIG SHAPE
// =============================================================================

export interface RateLimitConfig {
  perMinute: number;
  perHour: number;
}

export interface DeliveryConfig {
  maxAttempts: number;
  retryBaseDelayMs: number;
}

export interface SimulationConfig {
  port: number;
  defaultSpeedLevel: SpeedLevel;
  /** Unpaused wall-clock time after which a cycle ends even if the week is not over */
  cycleDurationMs: number;
  interCyclePauseMs: number;
  startHour: number;
  maxTickWaitMs: number;
  rateLimits: RateLimitConfig;
  maxQueueSize: number;
  delivery: DeliveryConfig;
  seed?: number;
  mailboxPath: string;
  /** Share of deliveries the mailbox sender fails transiently, for exercising retries */
  failureRate: number;
  autostart: boolean;
}

export type SimulationConfigOverrides = Partial<
  Omit<SimulationConfig, 'rateLimits' | 'delivery'>
> & {
  rateLimits?: Partial<RateLimitConfig>;
  delivery?: Partial<DeliveryConfig>;
};

export const DEFAULT_CONFIG: SimulationConfig = {
  port: 3000,
  defaultSpeedLevel: 3,
  cycleDurationMs: 600_000,
  interCyclePauseMs: 30_000,
  startHour: 9,
  maxTickWaitMs: 1000,
  rateLimits: { perMinute: 5, perHour: 30 },
  maxQueueSize: 10_000,
  delivery: { maxAttempts: 3, retryBaseDelayMs: 1000 },
  mailboxPath: './timewarp-mailbox.db',
  failureRate: 0,
  autostart: false,
};

// =============================================================================
// FACTORY
// =============================================================================

type Env = Record<string, string | undefined>;

export function loadConfig(
  overrides: SimulationConfigOverrides = {},
  env: Env = process.env
): SimulationConfig {
  const defaultLevel =
    overrides.defaultSpeedLevel ?? readInt(env, 'TIMEWARP_DEFAULT_LEVEL') ?? DEFAULT_CONFIG.defaultSpeedLevel;

  const config: SimulationConfig = {
    port: overrides.port ?? readInt(env, 'PORT') ?? DEFAULT_CONFIG.port,
    defaultSpeedLevel: getSpeedLevel(defaultLevel).level,
    cycleDurationMs:
      overrides.cycleDurationMs ?? readInt(env, 'TIMEWARP_CYCLE_DURATION_MS') ?? DEFAULT_CONFIG.cycleDurationMs,
    interCyclePauseMs:
      overrides.interCyclePauseMs ??
      readInt(env, 'TIMEWARP_INTER_CYCLE_PAUSE_MS') ??
      DEFAULT_CONFIG.interCyclePauseMs,
    startHour: overrides.startHour ?? readInt(env, 'TIMEWARP_START_HOUR') ?? DEFAULT_CONFIG.startHour,
    maxTickWaitMs:
      overrides.maxTickWaitMs ?? readInt(env, 'TIMEWARP_MAX_TICK_WAIT_MS') ?? DEFAULT_CONFIG.maxTickWaitMs,
    rateLimits: {
      perMinute:
        overrides.rateLimits?.perMinute ??
        readInt(env, 'TIMEWARP_RATE_PER_MINUTE') ??
        DEFAULT_CONFIG.rateLimits.perMinute,
      perHour:
        overrides.rateLimits?.perHour ?? readInt(env, 'TIMEWARP_RATE_PER_HOUR') ?? DEFAULT_CONFIG.rateLimits.perHour,
    },
    maxQueueSize: overrides.maxQueueSize ?? readInt(env, 'TIMEWARP_MAX_QUEUE') ?? DEFAULT_CONFIG.maxQueueSize,
    delivery: {
      maxAttempts:
        overrides.delivery?.maxAttempts ?? readInt(env, 'TIMEWARP_MAX_ATTEMPTS') ?? DEFAULT_CONFIG.delivery.maxAttempts,
      retryBaseDelayMs:
        overrides.delivery?.retryBaseDelayMs ??
        readInt(env, 'TIMEWARP_RETRY_BASE_MS') ??
        DEFAULT_CONFIG.delivery.retryBaseDelayMs,
    },
    seed: overrides.seed ?? readInt(env, 'TIMEWARP_SEED'),
    mailboxPath: overrides.mailboxPath ?? env.TIMEWARP_MAILBOX_DB ?? DEFAULT_CONFIG.mailboxPath,
    failureRate: overrides.failureRate ?? readFloat(env, 'TIMEWARP_FAILURE_RATE') ?? DEFAULT_CONFIG.failureRate,
    autostart: overrides.autostart ?? readBool(env, 'TIMEWARP_AUTOSTART') ?? DEFAULT_CONFIG.autostart,
  };

  validateConfig(config);
  return config;
}

export function validateConfig(config: SimulationConfig): void {
  const { perMinute, perHour } = config.rateLimits;

  if (!Number.isInteger(perMinute) || perMinute <= 0) {
    throw new ConfigurationError(`Per-minute rate limit must be a positive integer, got ${perMinute}`, 'rateLimits.perMinute');
  }
  if (!Number.isInteger(perHour) || perHour <= 0) {
    throw new ConfigurationError(`Per-hour rate limit must be a positive integer, got ${perHour}`, 'rateLimits.perHour');
  }
  if (perHour < perMinute) {
    throw new ConfigurationError(
      `Per-hour rate limit (${perHour}) cannot be below the per-minute limit (${perMinute})`,
      'rateLimits.perHour'
    );
  }
  if (!isSpeedLevel(config.defaultSpeedLevel)) {
    throw new ConfigurationError(`Unknown default speed level: ${config.defaultSpeedLevel}`, 'defaultSpeedLevel');
  }
  if (!Number.isInteger(config.startHour) || config.startHour < 0 || config.startHour > 23) {
    throw new ConfigurationError(`Start hour must be 0-23, got ${config.startHour}`, 'startHour');
  }
  if (config.cycleDurationMs <= 0) {
    throw new ConfigurationError('Cycle duration must be positive', 'cycleDurationMs');
  }
  if (config.interCyclePauseMs < 0) {
    throw new ConfigurationError('Inter-cycle pause cannot be negative', 'interCyclePauseMs');
  }
  if (config.maxTickWaitMs <= 0) {
    throw new ConfigurationError('Tick wait must be positive', 'maxTickWaitMs');
  }
  if (!Number.isInteger(config.maxQueueSize) || config.maxQueueSize <= 0) {
    throw new ConfigurationError('Queue size must be a positive integer', 'maxQueueSize');
  }
  if (!Number.isInteger(config.delivery.maxAttempts) || config.delivery.maxAttempts < 1) {
    throw new ConfigurationError('Delivery needs at least one attempt', 'delivery.maxAttempts');
  }
  if (config.delivery.retryBaseDelayMs < 0) {
    throw new ConfigurationError('Retry delay cannot be negative', 'delivery.retryBaseDelayMs');
  }
  if (!(config.failureRate >= 0 && config.failureRate < 1)) {
    throw new ConfigurationError(`Failure rate must be in [0, 1), got ${config.failureRate}`, 'failureRate');
  }
}

// =============================================================================
// ENV PARSING
// =============================================================================

function readInt(env: Env, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigurationError(`${key} must be an integer, got "${raw}"`, key);
  }
  return value;
}

function readFloat(env: Env, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`${key} must be a number, got "${raw}"`, key);
  }
  return value;
}

function readBool(env: Env, key: string): boolean | undefined {
  const raw = env[key]?.trim().toLowerCase();
  if (raw === undefined || raw === '') return undefined;
  return raw === '1' || raw === 'true' || raw === 'yes';
}
