/**
 * Configuration Tests
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, SPEED_LEVELS, getSpeedLevel, isSpeedLevel, loadConfig } from '../src/config.js';
import { ConfigurationError } from '../src/errors.js';

describe('speed levels', () => {
  it('should start at real time and strictly increase', () => {
    expect(SPEED_LEVELS[0].multiplier).toBe(1);
    for (let i = 1; i < SPEED_LEVELS.length; i++) {
      expect(SPEED_LEVELS[i].multiplier).toBeGreaterThan(SPEED_LEVELS[i - 1].multiplier);
    }
    expect(SPEED_LEVELS.map((l) => l.multiplier)).toEqual([1, 60, 168, 504, 1008]);
  });

  it('should look levels up and reject unknown ones', () => {
    expect(getSpeedLevel(5).name).toBe('Time Warp');
    expect(isSpeedLevel(3)).toBe(true);
    expect(isSpeedLevel(0)).toBe(false);
    expect(() => getSpeedLevel(6)).toThrow(ConfigurationError);
  });
});

describe('loadConfig', () => {
  it('should fall back to defaults with an empty environment', () => {
    expect(loadConfig({}, {})).toEqual({ ...DEFAULT_CONFIG, seed: undefined });
  });

  it('should read environment variables', () => {
    const config = loadConfig(
      {},
      {
        PORT: '8080',
        TIMEWARP_DEFAULT_LEVEL: '5',
        TIMEWARP_RATE_PER_MINUTE: '10',
        TIMEWARP_RATE_PER_HOUR: '100',
        TIMEWARP_SEED: '42',
        TIMEWARP_FAILURE_RATE: '0.25',
        TIMEWARP_AUTOSTART: 'true',
        TIMEWARP_MAILBOX_DB: ':memory:',
      }
    );

    expect(config).toMatchObject({
      port: 8080,
      defaultSpeedLevel: 5,
      rateLimits: { perMinute: 10, perHour: 100 },
      seed: 42,
      failureRate: 0.25,
      autostart: true,
      mailboxPath: ':memory:',
    });
  });

  it('should let explicit overrides win over the environment', () => {
    const config = loadConfig(
      { port: 9000, rateLimits: { perMinute: 2 } },
      { PORT: '8080', TIMEWARP_RATE_PER_MINUTE: '10', TIMEWARP_RATE_PER_HOUR: '40' }
    );

    expect(config.port).toBe(9000);
    expect(config.rateLimits).toEqual({ perMinute: 2, perHour: 40 });
  });

  it('should reject malformed numbers', () => {
    expect(() => loadConfig({}, { PORT: 'eighty' })).toThrow('PORT must be an integer, got "eighty"');
    expect(() => loadConfig({}, { TIMEWARP_FAILURE_RATE: 'often' })).toThrow(ConfigurationError);
  });

  it('should reject an unknown default level', () => {
    expect(() => loadConfig({}, { TIMEWARP_DEFAULT_LEVEL: '9' })).toThrow('Invalid speed level: 9. Must be 1-5.');
  });

  it('should reject inconsistent rate limits', () => {
    expect(() => loadConfig({ rateLimits: { perMinute: 0 } }, {})).toThrow(ConfigurationError);
    expect(() => loadConfig({ rateLimits: { perMinute: 10, perHour: 5 } }, {})).toThrow(
      'Per-hour rate limit (5) cannot be below the per-minute limit (10)'
    );
  });

  it('should name the offending field', () => {
    try {
      loadConfig({ startHour: 24 }, {});
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error instanceof ConfigurationError ? error.field : undefined).toBe('startHour');
    }
  });

  it('should reject a failure rate of 1 or more', () => {
    expect(() => loadConfig({ failureRate: 1 }, {})).toThrow('Failure rate must be in [0, 1), got 1');
  });
});
