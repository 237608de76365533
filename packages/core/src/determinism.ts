/**
 * Determinism Contract
 *
 * Core types for seeded, replayable sampling.
 * Every sampling run must be:
 * - Seeded (same seed → same draws)
 * - Explicit (the RNG is a value passed in, never a process-wide setting)
 * - Replayable (same inputs + seed → identical output)
 */

import { randomInt } from 'node:crypto';

/**
 * Deterministic random number generator interface
 *
 * Replaces Math.random() to ensure seeded, deterministic randomness.
 */
export interface DeterministicRNG {
  /**
   * Generate next random number in [0, 1)
   */
  next(): number;

  /**
   * Get the seed this generator was created from
   */
  getSeed(): number;
}

/**
 * Fold an integer seed (up to 53 bits) into a well-mixed 32-bit state.
 * Uses the murmur3 finalizer so neighbouring seeds start far apart.
 */
function mixSeed(seed: number): number {
  const lo = seed | 0;
  const hi = Math.floor(seed / 0x100000000) | 0;
  let h = (lo ^ Math.imul(hi, 0x9e3779b9)) | 0;
  h ^= h >>> 16;
  h = Math.imul(h, 0x85ebca6b);
  h ^= h >>> 13;
  h = Math.imul(h, 0xc2b2ae35);
  h ^= h >>> 16;
  return h | 0;
}

/**
 * Seeded random number generator using mulberry32
 *
 * 32-bit state, full period of 2^32, output always in [0, 1).
 */
export class SeededRNG implements DeterministicRNG {
  private readonly seed: number;
  private state: number;

  constructor(seed: number) {
    this.seed = seed;
    this.state = mixSeed(seed);
  }

  next(): number {
    this.state = (this.state + 0x6d2b79f5) | 0;
    let t = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 0x100000000;
  }

  getSeed(): number {
    return this.seed;
  }
}

/**
 * Draw a fresh seed from a non-deterministic source.
 *
 * The result fits in 31 bits so it can be echoed back to users and passed to --seed.
 */
export function generateSeed(): number {
  return randomInt(0, 0x7fffffff);
}

/**
 * Create a deterministic RNG from a seed
 *
 * If seed is not provided, one is drawn with generateSeed().
 * The seed actually used is available through getSeed().
 */
export function createDeterministicRNG(seed?: number): DeterministicRNG {
  const actualSeed = seed ?? generateSeed();
  return new SeededRNG(actualSeed);
}
