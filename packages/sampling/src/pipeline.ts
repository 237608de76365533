/**
 * Sampling pipeline
 *
 * request -> normalize + validate -> filter -> sample -> report.
 * Any error aborts the run; there are no partial results.
 */

import { SamplingRequestSchema } from '@idsampler/core';
import type { SamplingRequest, SamplingRequestInput } from '@idsampler/core';
import { InvalidRequestError, createLogger } from '@idsampler/utils';
import { normalizeInputs, validateNormalized } from './validator.js';
import { computeEligibleWithStats } from './filter-engine.js';
import { sample } from './sampler.js';
import { buildFinalDataset, buildReport } from './report-builder.js';
import type { SamplingInputs, SamplingRun } from './types.js';

const logger = createLogger('sampling');

/**
 * Parse a sampling request.
 *
 * @throws InvalidRequestError listing every schema issue
 */
export function parseSamplingRequest(request: SamplingRequestInput): SamplingRequest {
  const result = SamplingRequestSchema.safeParse(request);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new InvalidRequestError(issues.map((issue) => issue.message).join('; '), { issues });
  }
  return result.data;
}

export function runSampling(inputs: SamplingInputs, request: SamplingRequestInput): SamplingRun {
  const parsedRequest = parseSamplingRequest(request);

  const normalized = normalizeInputs(
    inputs.fullPool,
    inputs.currentSelections ?? [],
    inputs.excluded ?? []
  );
  const validation = validateNormalized(normalized);

  const { eligible, stats: filterStats } = computeEligibleWithStats(
    normalized.fullPool.ids,
    normalized.currentSelections.ids,
    normalized.excluded.ids,
    parsedRequest.ranges
  );

  const sampling = sample(eligible, parsedRequest.sampleSize, parsedRequest.seed);
  const report = buildReport(validation, filterStats, sampling);
  const finalDataset = buildFinalDataset(normalized.currentSelections.ids, sampling.sampledIds);

  logger.info('Sampling run complete', {
    poolSize: filterStats.poolSize,
    eligible: filterStats.eligibleCount,
    requested: sampling.requested,
    sampled: sampling.sampledIds.length,
    seed: sampling.seed,
  });

  return {
    request: parsedRequest,
    validation,
    filterStats,
    eligible,
    sampling,
    report,
    finalDataset,
  };
}
