/**
 * YAML Configuration Loader
 * ==========================
 * Loads configuration from idsampler.yaml with fallback to environment variables
 */

import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { load } from 'js-yaml';
import { z } from 'zod';
import { logger } from '../logger.js';
import { ConfigurationError } from '../errors.js';

export const AppConfigSchema = z.object({
  sampling: z
    .object({
      sampleSize: z.number().int().positive().optional(),
      seed: z.number().int().optional(),
      column: z.union([z.string(), z.number().int().nonnegative()]).transform(String).optional(),
      format: z.enum(['json', 'table', 'csv']).optional(),
      outputDir: z.string().min(1).optional(),
      strict: z.boolean().optional(),
    })
    .optional(),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

let cachedConfig: AppConfig | null = null;

/**
 * Load configuration from idsampler.yaml
 *
 * Lookup order for the file: explicit path, IDSAMPLER_CONFIG, ./idsampler.yaml.
 * A missing or unreadable file yields an empty config; a file that parses but
 * does not match the schema is a ConfigurationError.
 */
export function loadConfigFromYaml(configPath?: string): AppConfig {
  if (cachedConfig !== null) {
    return cachedConfig;
  }

  const defaultPath =
    configPath || process.env.IDSAMPLER_CONFIG || join(process.cwd(), 'idsampler.yaml');

  if (!existsSync(defaultPath)) {
    logger.debug('idsampler.yaml not found, using environment variables only');
    cachedConfig = {};
    return cachedConfig;
  }

  let raw: unknown;
  try {
    raw = load(readFileSync(defaultPath, 'utf-8'));
  } catch (error) {
    logger.warn('Failed to load idsampler.yaml, using environment variables only', {
      path: defaultPath,
      error: error instanceof Error ? error.message : String(error),
    });
    cachedConfig = {};
    return cachedConfig;
  }

  const parsed = AppConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration in ${defaultPath}`, 'sampling', {
      path: defaultPath,
      issues,
    });
  }

  logger.info('Loaded configuration from idsampler.yaml', { path: defaultPath });
  cachedConfig = parsed.data;
  return cachedConfig;
}

/**
 * Clear cached config (useful for testing)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}
