/**
 * Configuration loading from environment variables
 *
 * Provides typed configuration for the sampling CLI.
 */

import { ConfigurationError } from '../errors.js';
import { loadConfigFromYaml } from './yaml-config.js';

export * from './yaml-config.js';

export type OutputFormat = 'json' | 'table' | 'csv';

const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'table', 'csv'];

export interface SamplerEnvConfig {
  outputDir: string;
  defaultFormat: OutputFormat;
  defaultColumn?: string;
}

/**
 * Effective defaults for a sampling command, after merging config sources
 */
export interface SamplingDefaults {
  sampleSize?: number;
  seed?: number;
  column?: string;
  format: OutputFormat;
  outputDir: string;
  strict: boolean;
}

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Load sampler configuration from environment variables
 */
export function getSamplerConfig(): SamplerEnvConfig {
  const { IDSAMPLER_OUTPUT_DIR, IDSAMPLER_DEFAULT_FORMAT, IDSAMPLER_DEFAULT_COLUMN } = process.env;

  let defaultFormat: OutputFormat = 'table';
  if (IDSAMPLER_DEFAULT_FORMAT) {
    if (!isOutputFormat(IDSAMPLER_DEFAULT_FORMAT)) {
      throw new ConfigurationError(
        `IDSAMPLER_DEFAULT_FORMAT must be one of ${OUTPUT_FORMATS.join(', ')}`,
        'IDSAMPLER_DEFAULT_FORMAT',
        { value: IDSAMPLER_DEFAULT_FORMAT }
      );
    }
    defaultFormat = IDSAMPLER_DEFAULT_FORMAT;
  }

  return {
    outputDir: IDSAMPLER_OUTPUT_DIR || '.',
    defaultFormat,
    defaultColumn: IDSAMPLER_DEFAULT_COLUMN || undefined,
  };
}

/**
 * Resolve sampling defaults
 *
 * Priority: idsampler.yaml > environment variables > built-in defaults.
 * CLI flags are applied on top of the result by the caller.
 */
export function resolveSamplingDefaults(configPath?: string): SamplingDefaults {
  const env = getSamplerConfig();
  const yaml = loadConfigFromYaml(configPath).sampling ?? {};

  return {
    sampleSize: yaml.sampleSize,
    seed: yaml.seed,
    column: yaml.column ?? env.defaultColumn,
    format: yaml.format ?? env.defaultFormat,
    outputDir: yaml.outputDir ?? env.outputDir,
    strict: yaml.strict ?? false,
  };
}
