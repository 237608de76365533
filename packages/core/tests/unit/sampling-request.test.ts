import { describe, it, expect } from 'vitest';
import { RangeFilterSchema, SamplingRequestSchema } from '../../src/schemas/sampling-request.js';

describe('SamplingRequestSchema', () => {
  it('defaults ranges to an empty list', () => {
    expect(SamplingRequestSchema.parse({ sampleSize: 3 })).toEqual({ sampleSize: 3, ranges: [] });
  });

  it('keeps seed and ranges', () => {
    const parsed = SamplingRequestSchema.parse({
      sampleSize: 2,
      seed: 42,
      ranges: [{ min: 1, max: 6 }],
    });
    expect(parsed).toEqual({ sampleSize: 2, seed: 42, ranges: [{ min: 1, max: 6 }] });
  });

  it.each([0, -1, 1.5])('rejects sample size %s', (sampleSize) => {
    expect(SamplingRequestSchema.safeParse({ sampleSize }).success).toBe(false);
  });

  it('rejects a fractional seed', () => {
    expect(SamplingRequestSchema.safeParse({ sampleSize: 1, seed: 4.2 }).success).toBe(false);
  });

  it('rejects a seed beyond the safe integer range', () => {
    expect(SamplingRequestSchema.safeParse({ sampleSize: 1, seed: 2 ** 60 }).success).toBe(false);
  });
});

describe('RangeFilterSchema', () => {
  it('accepts a single-point range', () => {
    expect(RangeFilterSchema.safeParse({ min: 5, max: 5 }).success).toBe(true);
  });

  it('accepts open-ended bounds', () => {
    expect(RangeFilterSchema.safeParse({ min: 10, max: Infinity }).success).toBe(true);
    expect(RangeFilterSchema.safeParse({ min: -Infinity, max: 10 }).success).toBe(true);
  });

  it('rejects min greater than max', () => {
    const result = RangeFilterSchema.safeParse({ min: 9, max: 3 });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe('Range min must not exceed max');
    }
  });

  it('rejects NaN bounds', () => {
    expect(RangeFilterSchema.safeParse({ min: NaN, max: 3 }).success).toBe(false);
  });
});
