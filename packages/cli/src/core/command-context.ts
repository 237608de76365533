/**
 * Command Context - Lazy service creation
 *
 * This is NOT a framework - just an object that knows how to create services.
 * Removes service instantiation from handlers and lets tests swap them out.
 */

import { resolveSamplingDefaults } from '@idsampler/utils';
import type { SamplingDefaults } from '@idsampler/utils';
import { loadIdentifierFile } from '../loaders/identifier-file-loader.js';
import type { IdentifierLoader } from '../loaders/identifier-file-loader.js';
import { writeDatasetCsv } from '../exporters/dataset-exporter.js';
import type { DatasetExporter } from '../exporters/dataset-exporter.js';
import { SystemClockAdapter } from './clock-adapter.js';
import type { ClockPort } from './clock-adapter.js';

/**
 * Services available in command context
 */
export interface CommandServices {
  identifierLoader(): IdentifierLoader;
  datasetExporter(): DatasetExporter;
  clock(): ClockPort;
  defaults(): SamplingDefaults;
}

/**
 * Options for creating a CommandContext with service overrides
 * Useful for testing
 */
export interface CommandContextOptions {
  identifierLoaderOverride?: IdentifierLoader;
  datasetExporterOverride?: DatasetExporter;
  clockOverride?: ClockPort;
  /**
   * Skip idsampler.yaml / environment lookup
   */
  defaultsOverride?: SamplingDefaults;
}

/**
 * Command context - provides services to handlers
 */
export class CommandContext {
  private _services: CommandServices | null = null;
  private readonly _options: CommandContextOptions;

  constructor(options: CommandContextOptions = {}) {
    this._options = options;
  }

  /**
   * Get services (lazy creation)
   */
  get services(): CommandServices {
    if (!this._services) {
      this._services = this._createServices();
    }
    return this._services;
  }

  /**
   * Create service instances
   * Uses overrides from options if provided, otherwise creates default instances
   */
  private _createServices(): CommandServices {
    let defaults: SamplingDefaults | undefined = this._options.defaultsOverride;
    return {
      identifierLoader: () => this._options.identifierLoaderOverride ?? { load: loadIdentifierFile },
      datasetExporter: () => this._options.datasetExporterOverride ?? { write: writeDatasetCsv },
      clock: () => this._options.clockOverride ?? new SystemClockAdapter(),
      defaults: () => {
        if (!defaults) {
          defaults = resolveSamplingDefaults();
        }
        return defaults;
      },
    };
  }
}

/**
 * Factory function to create CommandContext with optional overrides
 */
export function createCommandContext(options: CommandContextOptions = {}): CommandContext {
  return new CommandContext(options);
}
