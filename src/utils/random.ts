/**
 * Seedable Random Source
 *
 * Used for:
 * - Per-tick volume jitter
 * - Issue injection and resolution draws
 * - Simulated sender failures
 *
 * Same seed, same sequence. Production callers leave the seed out and get a
 * time-derived one, so runs differ while staying replayable from the logged seed.
 */

export interface RandomSource {
  /** Uniform in [0, 1) */
  next(): number;
  readonly seed: number;
}

/**
 * Mulberry32: 32-bit state, good enough spread for simulation draws.
 */
export class SeededRandom implements RandomSource {
  private state: number;

  constructor(readonly seed: number = Date.now() >>> 0) {
    this.state = seed >>> 0;
  }

  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }
}

/**
 * Uniform float in [min, max).
 */
export function uniform(random: RandomSource, min: number, max: number): number {
  return min + random.next() * (max - min);
}

/**
 * Pick one element. Throws on an empty list.
 */
export function pick<T>(random: RandomSource, items: readonly T[]): T {
  if (items.length === 0) {
    throw new Error('Cannot pick from an empty list');
  }
  return items[Math.floor(random.next() * items.length)];
}
