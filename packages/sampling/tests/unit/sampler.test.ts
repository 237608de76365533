/**
 * Sampler Tests
 */

import { describe, it, expect } from 'vitest';
import type { DeterministicRNG } from '@idsampler/core';
import { InvalidRequestError } from '@idsampler/utils';
import { sample, sampleWithRng } from '../../src/sampler.js';

/**
 * RNG that always returns the same value
 */
class ConstantRNG implements DeterministicRNG {
  calls = 0;

  constructor(private readonly value: number) {}

  next(): number {
    this.calls++;
    return this.value;
  }

  getSeed(): number {
    return 123;
  }
}

const range = (from: number, to: number) =>
  new Set(Array.from({ length: to - from + 1 }, (_, i) => from + i));

describe('sampleWithRng', () => {
  it('keeps the leading identifiers when every draw is 0', () => {
    const result = sampleWithRng(new Set([10, 20, 30, 40]), 2, new ConstantRNG(0));
    expect(result.sampledIds).toEqual([10, 20]);
  });

  it('swaps from the end of the remaining pool for draws near 1', () => {
    const result = sampleWithRng(new Set([4, 5, 6]), 2, new ConstantRNG(0.99));
    expect(result.sampledIds).toEqual([6, 4]);
  });

  it('consumes one draw per sampled identifier', () => {
    const rng = new ConstantRNG(0.5);
    sampleWithRng(range(1, 10), 4, rng);
    expect(rng.calls).toBe(4);
  });

  it('returns the whole pool without drawing when the request covers it', () => {
    const rng = new ConstantRNG(0.5);
    const result = sampleWithRng(new Set([3, 1, 2]), 5, rng);
    expect(result).toEqual({
      sampledIds: [3, 1, 2],
      eligiblePoolSize: 3,
      requested: 5,
      shortfall: 2,
      fullySatisfied: false,
      seed: 123,
    });
    expect(rng.calls).toBe(0);
  });

  it('is fully satisfied when the request equals the pool size', () => {
    const result = sampleWithRng(new Set([1, 2]), 2, new ConstantRNG(0.5));
    expect(result.shortfall).toBe(0);
    expect(result.fullySatisfied).toBe(true);
  });

  it('does not modify the eligible set', () => {
    const eligible = new Set([1, 2, 3, 4]);
    sampleWithRng(eligible, 2, new ConstantRNG(0.99));
    expect([...eligible]).toEqual([1, 2, 3, 4]);
  });
});

describe('sample', () => {
  it('is reproducible for the same seed', () => {
    const eligible = range(1, 100);
    expect(sample(eligible, 10, 42).sampledIds).toEqual(sample(eligible, 10, 42).sampledIds);
  });

  it('differs across seeds', () => {
    const eligible = range(1, 100);
    expect(sample(eligible, 10, 1).sampledIds).not.toEqual(sample(eligible, 10, 2).sampledIds);
  });

  it('draws distinct identifiers from the eligible pool', () => {
    const eligible = range(1, 50);
    const result = sample(eligible, 20, 7);
    expect(result.sampledIds).toHaveLength(20);
    expect(new Set(result.sampledIds).size).toBe(20);
    expect(result.sampledIds.every((id) => eligible.has(id))).toBe(true);
  });

  it('returns a reproducible 2-subset of {4, 5, 6} for seed 42', () => {
    const result = sample(new Set([4, 5, 6]), 2, 42);
    expect(result.sampledIds).toHaveLength(2);
    expect(result.sampledIds.every((id) => [4, 5, 6].includes(id))).toBe(true);
    expect(result.seed).toBe(42);
    expect(sample(new Set([4, 5, 6]), 2, 42)).toEqual(result);
  });

  it('reports the generated seed when none is given', () => {
    const eligible = range(1, 30);
    const result = sample(eligible, 5);
    expect(Number.isInteger(result.seed)).toBe(true);
    expect(result.seed).toBeGreaterThanOrEqual(0);
    expect(result.seed).toBeLessThan(0x7fffffff);
    expect(sample(eligible, 5, result.seed).sampledIds).toEqual(result.sampledIds);
  });

  it('handles an empty pool as a full shortfall', () => {
    const result = sample(new Set<number>(), 3, 1);
    expect(result.sampledIds).toEqual([]);
    expect(result.shortfall).toBe(3);
    expect(result.fullySatisfied).toBe(false);
  });

  it.each([0, -1, 1.5, NaN])('rejects sample size %s', (size) => {
    expect(() => sample(range(1, 5), size, 1)).toThrow(InvalidRequestError);
  });

  it('names the problem in the error message', () => {
    expect(() => sample(range(1, 5), 0, 1)).toThrow('Sample size must be positive, got 0');
  });

  it('rejects a seed that is not a safe integer', () => {
    expect(() => sample(range(1, 5), 2, 0.5)).toThrow('Seed must be a safe integer, got 0.5');
  });
});
