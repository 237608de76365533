#!/usr/bin/env node

/**
 * idsampler CLI Entry Point
 *
 * Command modules register themselves in commandRegistry when imported (side effects).
 * registerXCommands functions add Commander options and wire them to the
 * handlers from the registry.
 */

import 'dotenv/config';
import { program } from 'commander';
import { logger } from '@idsampler/utils';
import { handleError } from '../core/error-handler.js';
import { registerSamplingCommands } from '../commands/sampling.js';

// Set up program
program
  .name('idsampler')
  .description('idsampler CLI - reproducible ID sampling')
  .version('1.0.0');

registerSamplingCommands(program);

program.configureOutput({
  writeErr: (str) => {
    process.stderr.write(str);
  },
});

async function main(): Promise<void> {
  try {
    await program.parseAsync();
  } catch (error) {
    const message = handleError(error);
    console.error(`Error: ${message}`);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  logger.error('Unhandled error in CLI', error);
  process.exit(1);
});

export { program };
