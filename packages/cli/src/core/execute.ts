/**
 * Universal Command Executor
 *
 * Handles all the boring universal stuff:
 * - Create context
 * - Call handler
 * - Format output
 * - Error handling
 */

import { isOutputFormat, logger } from '@idsampler/utils';
import { formatOutput } from './output-formatter.js';
import { handleError } from './error-handler.js';
import { CommandContext } from './command-context.js';
import type { CommandDefinition, OutputFormat } from '../types/index.js';

/**
 * Format is a CLI concern: an explicit --format wins, then configured defaults
 */
function resolveFormat(args: unknown, ctx: CommandContext): OutputFormat {
  if (typeof args === 'object' && args !== null && 'format' in args) {
    const { format } = args;
    if (typeof format === 'string' && isOutputFormat(format)) {
      return format;
    }
  }
  return ctx.services.defaults().format;
}

/**
 * Run a command with validated arguments and return its formatted output.
 * Errors propagate to the caller.
 */
export async function runCommand(
  commandDef: CommandDefinition,
  args: unknown,
  ctx: CommandContext = new CommandContext()
): Promise<string> {
  const format = resolveFormat(args, ctx);
  const startedAt = Date.now();

  const result = await commandDef.handler(args, ctx);

  logger.debug('Command finished', {
    command: commandDef.name,
    executionTime: Date.now() - startedAt,
  });
  return formatOutput(result, format);
}

/**
 * Print a user-facing error and exit
 */
export function failCommand(error: unknown, context?: Record<string, unknown>): never {
  const message = handleError(error, context);
  console.error(`Error: ${message}`);
  process.exit(1);
}

/**
 * Execute a command definition with pre-validated arguments
 */
export async function executeValidated(
  commandDef: CommandDefinition,
  args: unknown,
  ctx?: CommandContext
): Promise<void> {
  try {
    const output = await runCommand(commandDef, args, ctx);
    console.log(output);
  } catch (error) {
    failCommand(error, { command: commandDef.name });
  }
}
