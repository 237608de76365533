/**
 * Sampling Commands
 */

import type { Command } from 'commander';
import type { PackageCommandModule } from '../types/index.js';
import { defineCommand } from '../core/defineCommand.js';
import { commandRegistry } from '../core/command-registry.js';
import { coerceNumber, coerceRanges, collect } from '../core/coerce.js';
import {
  listEligibleSchema,
  runSamplingSchema,
  validateInputsSchema,
} from '../command-defs/sampling.js';
import { runSamplingHandler } from '../handlers/sampling/run-sampling.js';
import { validateInputsHandler } from '../handlers/sampling/validate-inputs.js';
import { listEligibleHandler } from '../handlers/sampling/list-eligible.js';

function addInputOptions(cmd: Command): Command {
  return cmd
    .requiredOption('--pool <path>', 'Full ID pool file (.csv, .tsv, .txt)')
    .option('--selections <path>', 'Current selections file')
    .option('--excluded <path>', 'Excluded IDs file')
    .option('--column <name|index>', 'Identifier column: header name or zero-based index')
    .option('--format <format>', 'Output format: table, json, csv');
}

function addRangeOptions(cmd: Command): Command {
  return cmd
    .option('--range <min:max>', 'Inclusive ID range; repeat for several (OR)', collect, [])
    .option('--min-id <n>', 'Lowest ID to sample')
    .option('--max-id <n>', 'Highest ID to sample');
}

const coerceRangeOptions = (raw: Record<string, unknown>) => ({
  ...raw,
  range: coerceRanges(raw.range, 'range'),
  minId: coerceNumber(raw.minId, 'min-id'),
  maxId: coerceNumber(raw.maxId, 'max-id'),
});

/**
 * Register sampling commands
 */
export function registerSamplingCommands(program: Command): void {
  const samplingCmd = program
    .command('sampling')
    .description('Reproducible ID sampling from a master pool');

  // Run command
  const runCmd = addRangeOptions(
    addInputOptions(samplingCmd.command('run').description('Draw a new sample of IDs'))
  )
    .option('--size <n>', 'Number of new IDs to sample')
    .option('--seed <n>', 'Random seed for reproducible results')
    .option('--strict', 'Fail on validation findings or when the pool is too small')
    .option('--out <path>', 'Write the final dataset CSV to this path')
    .option('--export', 'Write the final dataset CSV to the output directory');

  defineCommand(runCmd, {
    name: 'run',
    packageName: 'sampling',
    coerce: (raw) => ({
      ...coerceRangeOptions(raw),
      size: coerceNumber(raw.size, 'size'),
      seed: coerceNumber(raw.seed, 'seed'),
    }),
  });

  // Validate command
  const validateCmd = addInputOptions(
    samplingCmd.command('validate').description('Check input files for duplicates and conflicts')
  );

  defineCommand(validateCmd, {
    name: 'validate',
    packageName: 'sampling',
  });

  // Eligible command
  const eligibleCmd = addRangeOptions(
    addInputOptions(
      samplingCmd.command('eligible').description('List IDs eligible for sampling')
    )
  );

  defineCommand(eligibleCmd, {
    name: 'eligible',
    packageName: 'sampling',
    coerce: coerceRangeOptions,
  });
}

/**
 * Register as package command module
 */
const samplingModule: PackageCommandModule = {
  packageName: 'sampling',
  description: 'Reproducible ID sampling from a master pool',
  commands: [
    {
      name: 'run',
      description: 'Draw a new sample of IDs',
      schema: runSamplingSchema,
      handler: runSamplingHandler,
      examples: [
        'idsampler sampling run --pool ids.csv --selections current.csv --size 50 --seed 42',
        'idsampler sampling run --pool ids.csv --size 10 --range 1000:1999 --range 5000: --export',
      ],
    },
    {
      name: 'validate',
      description: 'Check input files for duplicates and conflicts',
      schema: validateInputsSchema,
      handler: validateInputsHandler,
      examples: ['idsampler sampling validate --pool ids.csv --selections current.csv'],
    },
    {
      name: 'eligible',
      description: 'List IDs eligible for sampling',
      schema: listEligibleSchema,
      handler: listEligibleHandler,
      examples: ['idsampler sampling eligible --pool ids.csv --min-id 100 --max-id 500 --format csv'],
    },
  ],
};

// Register the module
commandRegistry.registerPackage(samplingModule);
