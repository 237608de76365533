/**
 * Sampler
 *
 * Seeded sampling without replacement. Partial Fisher-Yates over the
 * eligible order: each subset of the requested size is equally likely.
 */

import { createDeterministicRNG } from '@idsampler/core';
import type { DeterministicRNG, IdentifierSet } from '@idsampler/core';
import { InvalidRequestError } from '@idsampler/utils';
import type { SamplingResult } from './types.js';

export function assertValidSampleSize(sampleSize: number): void {
  if (!Number.isInteger(sampleSize)) {
    throw new InvalidRequestError(`Sample size must be an integer, got ${sampleSize}`, {
      sampleSize,
    });
  }
  if (sampleSize <= 0) {
    throw new InvalidRequestError(`Sample size must be positive, got ${sampleSize}`, {
      sampleSize,
    });
  }
}

/**
 * Sample with a caller-supplied RNG.
 *
 * When the pool is not larger than the request every eligible identifier is
 * returned in pool order and no random numbers are consumed.
 */
export function sampleWithRng(
  eligible: IdentifierSet,
  sampleSize: number,
  rng: DeterministicRNG
): SamplingResult {
  assertValidSampleSize(sampleSize);

  const pool = Array.from(eligible);
  let sampledIds: number[];

  if (sampleSize >= pool.length) {
    sampledIds = pool;
  } else {
    for (let i = 0; i < sampleSize; i++) {
      const j = i + Math.floor(rng.next() * (pool.length - i));
      const picked = pool[j];
      pool[j] = pool[i];
      pool[i] = picked;
    }
    sampledIds = pool.slice(0, sampleSize);
  }

  const shortfall = sampleSize - sampledIds.length;
  return {
    sampledIds,
    eligiblePoolSize: eligible.size,
    requested: sampleSize,
    shortfall,
    fullySatisfied: shortfall === 0,
    seed: rng.getSeed(),
  };
}

/**
 * Draw `sampleSize` identifiers from the eligible pool.
 *
 * Without a seed a fresh one is generated; it is returned in the result so
 * the run can be reproduced.
 *
 * @throws InvalidRequestError for a non-positive or non-integer sample size,
 *   or a seed that is not a safe integer
 */
export function sample(eligible: IdentifierSet, sampleSize: number, seed?: number): SamplingResult {
  assertValidSampleSize(sampleSize);
  if (seed !== undefined && !Number.isSafeInteger(seed)) {
    throw new InvalidRequestError(`Seed must be a safe integer, got ${seed}`, { seed });
  }
  return sampleWithRng(eligible, sampleSize, createDeterministicRNG(seed));
}
