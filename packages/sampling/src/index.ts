/**
 * @idsampler/sampling
 *
 * Validation, range filtering, seeded sampling and reporting for identifier
 * pools. Pure functions; no file I/O.
 */

export {
  normalizeInputs,
  normalizeSource,
  parseIdentifier,
  validate,
  validateNormalized,
} from './validator.js';
export {
  assertValidRanges,
  computeEligible,
  computeEligibleWithStats,
  isWithinRanges,
} from './filter-engine.js';
export { assertValidSampleSize, sample, sampleWithRng } from './sampler.js';
export {
  buildFinalDataset,
  buildReport,
  describeFindings,
  formatReportText,
  previewIds,
} from './report-builder.js';
export { parseSamplingRequest, runSampling } from './pipeline.js';
export type {
  DatasetRow,
  DatasetSource,
  FilterResult,
  FilterStats,
  FindingKind,
  FindingSource,
  NormalizedInputs,
  NormalizedSource,
  Report,
  ReportFinding,
  ReportSummary,
  SamplingInputs,
  SamplingResult,
  SamplingRun,
  ValidationReport,
} from './types.js';
