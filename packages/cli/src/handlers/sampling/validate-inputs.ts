/**
 * Validate Inputs Handler
 *
 * Reports duplicates, cross-set conflicts and identifiers missing from the
 * pool without sampling.
 */

import { describeFindings, normalizeInputs, validateNormalized } from '@idsampler/sampling';
import type { CommandContext } from '../../core/command-context.js';
import type { ValidateInputsArgs } from '../../command-defs/sampling.js';
import type { ValidationOutput } from '../../core/output-formatter.js';
import { loadSamplingInputs } from './load-inputs.js';

export async function validateInputsHandler(
  args: ValidateInputsArgs,
  ctx: CommandContext
): Promise<ValidationOutput> {
  const inputs = await loadSamplingInputs(args, ctx);
  const normalized = normalizeInputs(
    inputs.fullPool,
    inputs.currentSelections ?? [],
    inputs.excluded ?? []
  );
  const validation = validateNormalized(normalized);

  return {
    counts: {
      fullPool: normalized.fullPool.ids.size,
      currentSelections: normalized.currentSelections.ids.size,
      excluded: normalized.excluded.ids.size,
    },
    findings: describeFindings(validation),
    valid: !validation.hasFindings,
  };
}
