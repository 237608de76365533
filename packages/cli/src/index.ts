/**
 * @idsampler/cli
 *
 * Command wiring, file loading and export for the idsampler command line.
 */

export { CommandRegistry, commandRegistry } from './core/command-registry.js';
export { CommandContext, createCommandContext } from './core/command-context.js';
export type { CommandContextOptions, CommandServices } from './core/command-context.js';
export { defineCommand, prepareCommandArgs } from './core/defineCommand.js';
export { executeValidated, runCommand } from './core/execute.js';
export { formatCSV, formatJSON, formatOutput, formatTable } from './core/output-formatter.js';
export type {
  EligibleOutput,
  SamplingRunOutput,
  ValidationOutput,
} from './core/output-formatter.js';
export { formatError, handleError } from './core/error-handler.js';
export {
  detectFileType,
  loadIdentifierFile,
  parseIdentifierText,
} from './loaders/identifier-file-loader.js';
export type {
  IdentifierFileType,
  IdentifierLoader,
  LoadIdentifierOptions,
} from './loaders/identifier-file-loader.js';
export {
  defaultExportFileName,
  renderDatasetCsv,
  writeDatasetCsv,
} from './exporters/dataset-exporter.js';
export type { DatasetExporter } from './exporters/dataset-exporter.js';
export { registerSamplingCommands } from './commands/sampling.js';
export type { CommandDefinition, OutputFormat, PackageCommandModule } from './types/index.js';
