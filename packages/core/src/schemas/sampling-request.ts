/**
 * Sampling request schemas
 */

import { z } from 'zod';

/**
 * Inclusive numeric interval [min, max].
 *
 * Bounds may be -Infinity / Infinity for open-ended ranges.
 */
export const RangeFilterSchema = z
  .object({
    min: z.number(),
    max: z.number(),
  })
  .refine((range) => range.min <= range.max, {
    message: 'Range min must not exceed max',
  });

export type RangeFilter = z.infer<typeof RangeFilterSchema>;

export const SamplingRequestSchema = z.object({
  /**
   * Number of new identifiers to draw
   */
  sampleSize: z.number().int('Sample size must be an integer').positive('Sample size must be positive'),

  /**
   * Seed for reproducible sampling. Omit for a fresh random seed.
   */
  seed: z
    .number()
    .int('Seed must be an integer')
    .refine((seed) => Number.isSafeInteger(seed), 'Seed must be a safe integer')
    .optional(),

  /**
   * Optional range filters, combined with OR semantics
   */
  ranges: z.array(RangeFilterSchema).default([]),
});

export type SamplingRequest = z.infer<typeof SamplingRequestSchema>;
export type SamplingRequestInput = z.input<typeof SamplingRequestSchema>;
