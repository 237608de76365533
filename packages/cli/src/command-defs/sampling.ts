import { z } from 'zod';
import { RangeFilterSchema } from '@idsampler/core';

const filePath = (label: string) => z.coerce.string().min(1, `${label} file path is required`);

const columnSchema = z.union([z.string().min(1), z.number().int().nonnegative()]);

const formatSchema = z.enum(['json', 'table', 'csv']);

/**
 * Options shared by every sampling command
 */
const inputFilesSchema = z.object({
  pool: filePath('Full ID Pool'),
  selections: filePath('Current Selections').optional(),
  excluded: filePath('Excluded IDs').optional(),
  column: columnSchema.optional(),
  format: formatSchema.optional(),
});

/**
 * Range options: repeated --range plus the --min-id/--max-id shorthand
 */
const rangeOptionsSchema = z.object({
  range: z.array(RangeFilterSchema).default([]),
  minId: z.number().optional(),
  maxId: z.number().optional(),
});

export const runSamplingSchema = inputFilesSchema.merge(rangeOptionsSchema).extend({
  size: z.number().int('Sample size must be an integer').positive('Sample size must be positive').optional(),
  seed: z.number().int('Seed must be an integer').optional(),
  strict: z.boolean().default(false),
  out: z.coerce.string().min(1).optional(),
  export: z.boolean().default(false),
});

export type RunSamplingArgs = z.infer<typeof runSamplingSchema>;

export const validateInputsSchema = inputFilesSchema;

export type ValidateInputsArgs = z.infer<typeof validateInputsSchema>;

export const listEligibleSchema = inputFilesSchema.merge(rangeOptionsSchema);

export type ListEligibleArgs = z.infer<typeof listEligibleSchema>;

export type InputFileArgs = z.infer<typeof inputFilesSchema>;

export type RangeOptionArgs = z.infer<typeof rangeOptionsSchema>;
