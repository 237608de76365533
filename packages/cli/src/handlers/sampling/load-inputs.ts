/**
 * Shared input loading for sampling handlers
 */

import type { RangeFilter } from '@idsampler/core';
import type { SamplingInputs } from '@idsampler/sampling';
import { createLogger } from '@idsampler/utils';
import type { CommandContext } from '../../core/command-context.js';
import type { InputFileArgs, RangeOptionArgs } from '../../command-defs/sampling.js';

const logger = createLogger('cli');

/**
 * Load the three input files; missing optional files become empty collections
 */
export async function loadSamplingInputs(
  args: InputFileArgs,
  ctx: CommandContext
): Promise<SamplingInputs> {
  const loader = ctx.services.identifierLoader();
  const column = args.column ?? ctx.services.defaults().column;

  const [fullPool, currentSelections, excluded] = await Promise.all([
    loader.load(args.pool, { column, source: 'fullPool' }),
    args.selections
      ? loader.load(args.selections, { column, source: 'currentSelections' })
      : Promise.resolve([]),
    args.excluded ? loader.load(args.excluded, { column, source: 'excluded' }) : Promise.resolve([]),
  ]);

  logger.info('Loaded sampling inputs', {
    fullPool: fullPool.length,
    currentSelections: currentSelections.length,
    excluded: excluded.length,
  });

  return { fullPool, currentSelections, excluded };
}

/**
 * --range values, plus one range built from --min-id/--max-id when either is set
 */
export function buildRangeFilters(args: RangeOptionArgs): RangeFilter[] {
  const ranges = [...args.range];
  if (args.minId !== undefined || args.maxId !== undefined) {
    ranges.push({ min: args.minId ?? -Infinity, max: args.maxId ?? Infinity });
  }
  return ranges;
}
