/**
 * List Eligible Handler
 *
 * Shows the eligible pool after exclusions and range filters.
 */

import { sortIdentifiers } from '@idsampler/core';
import { computeEligibleWithStats, normalizeInputs } from '@idsampler/sampling';
import type { CommandContext } from '../../core/command-context.js';
import type { ListEligibleArgs } from '../../command-defs/sampling.js';
import type { EligibleOutput } from '../../core/output-formatter.js';
import { buildRangeFilters, loadSamplingInputs } from './load-inputs.js';

export async function listEligibleHandler(
  args: ListEligibleArgs,
  ctx: CommandContext
): Promise<EligibleOutput> {
  const inputs = await loadSamplingInputs(args, ctx);
  const normalized = normalizeInputs(
    inputs.fullPool,
    inputs.currentSelections ?? [],
    inputs.excluded ?? []
  );

  const { eligible, stats } = computeEligibleWithStats(
    normalized.fullPool.ids,
    normalized.currentSelections.ids,
    normalized.excluded.ids,
    buildRangeFilters(args)
  );

  return { stats, eligible: sortIdentifiers(eligible) };
}
