/**
 * Standard Command Wrapper
 *
 * Provides a mechanical pattern for CLI commands:
 * - Commander owns flags & parsing
 * - Wrapper owns: canonical option shape (camelCase), value coercion, schema validation,
 *   error formatting, handler invocation
 *
 * Uses commandDef.schema from the registry as single source of truth for validation.
 *
 * Invariant: Normalization never renames keys. Ever.
 */

import type { Command } from 'commander';
import { NotFoundError } from '@idsampler/utils';
import { executeValidated, failCommand } from './execute.js';
import { commandRegistry } from './command-registry.js';
import { validateAndCoerceArgs } from './validation-pipeline.js';
import type { CommandDefinition } from '../types/index.js';

type RawOptions = Record<string, unknown>;

export type DefineCommandArgs = {
  name: string;
  packageName: string;
  // Takes commander-parsed options and returns *camelCase* options.
  // Use this for value coercion only (numbers/ranges), NOT key renaming.
  coerce?: (raw: RawOptions) => RawOptions;
};

/**
 * Resolve, coerce and validate options for a registered command
 */
export function prepareCommandArgs(
  args: DefineCommandArgs,
  rawOpts: RawOptions
): { commandDef: CommandDefinition; validated: unknown } {
  const commandDef = commandRegistry.getCommand(args.packageName, args.name);
  if (!commandDef) {
    throw new NotFoundError('Command', `${args.packageName}.${args.name}`);
  }

  // Coerce values - but never rename keys
  const coerced = args.coerce ? args.coerce(rawOpts) : rawOpts;
  return { commandDef, validated: validateAndCoerceArgs(commandDef.schema, coerced) };
}

/**
 * Standard command wiring:
 * - Commander parses flags -> camelCase properties
 * - Optional coerce() for value parsing only
 * - Validates using commandDef.schema from registry
 * - Uses executeValidated() which handles context, formatting and errors
 */
export function defineCommand(cmd: Command, args: DefineCommandArgs): Command {
  cmd.name(args.name);

  cmd.action(async () => {
    let prepared: ReturnType<typeof prepareCommandArgs>;
    try {
      prepared = prepareCommandArgs(args, cmd.opts());
    } catch (error) {
      failCommand(error, { command: `${args.packageName}.${args.name}` });
    }

    await executeValidated(prepared.commandDef, prepared.validated);
  });

  return cmd;
}
