/**
 * Run Sampling Handler
 *
 * Loads the input files, runs the sampling pipeline and optionally exports
 * the final dataset.
 */

import path from 'path';
import { runSampling } from '@idsampler/sampling';
import type { SamplingRun } from '@idsampler/sampling';
import { ValidationError } from '@idsampler/utils';
import type { CommandContext } from '../../core/command-context.js';
import type { RunSamplingArgs } from '../../command-defs/sampling.js';
import type { SamplingRunOutput } from '../../core/output-formatter.js';
import { defaultExportFileName } from '../../exporters/dataset-exporter.js';
import { buildRangeFilters, loadSamplingInputs } from './load-inputs.js';

/**
 * Strict mode refuses to hand out a sample built from inconsistent inputs or
 * one smaller than requested
 */
export function enforceStrict(run: SamplingRun): void {
  if (run.validation.hasFindings) {
    const lines = run.report.findings.map((finding) => `  ${finding.message}`);
    throw new ValidationError(`Input validation failed:\n${lines.join('\n')}`, {
      findings: run.report.findings.map(({ kind, source, ids }) => ({ kind, source, ids })),
    });
  }

  if (!run.sampling.fullySatisfied) {
    throw new ValidationError(
      `Requested sample size (${run.sampling.requested}) exceeds available eligible IDs (${run.sampling.eligiblePoolSize})`,
      { requested: run.sampling.requested, eligible: run.sampling.eligiblePoolSize }
    );
  }
}

export async function runSamplingHandler(
  args: RunSamplingArgs,
  ctx: CommandContext
): Promise<SamplingRunOutput> {
  const defaults = ctx.services.defaults();

  const sampleSize = args.size ?? defaults.sampleSize;
  if (sampleSize === undefined) {
    throw new ValidationError(
      'Sample size is required: pass --size or set sampling.sampleSize in idsampler.yaml'
    );
  }

  const inputs = await loadSamplingInputs(args, ctx);
  const run = runSampling(inputs, {
    sampleSize,
    seed: args.seed ?? defaults.seed,
    ranges: buildRangeFilters(args),
  });

  if (args.strict || defaults.strict) {
    enforceStrict(run);
  }

  let exportedTo: string | undefined;
  if (args.out) {
    exportedTo = await ctx.services.datasetExporter().write(run.finalDataset, args.out);
  } else if (args.export) {
    const fileName = defaultExportFileName(ctx.services.clock().now());
    exportedTo = await ctx.services
      .datasetExporter()
      .write(run.finalDataset, path.join(defaults.outputDir, fileName));
  }

  return {
    report: run.report,
    finalDataset: run.finalDataset,
    ...(exportedTo ? { exportedTo } : {}),
  };
}
