/**
 * Sampling engine types
 */

import type {
  Identifier,
  IdentifierSet,
  IdentifierSource,
  SamplingRequest,
  SourceName,
} from '@idsampler/core';

// ============================================================================
// Validation
// ============================================================================

/**
 * One input collection after parsing
 */
export interface NormalizedSource {
  ids: IdentifierSet;
  /** Values that occurred more than once, ascending */
  duplicates: Identifier[];
}

export interface NormalizedInputs {
  fullPool: NormalizedSource;
  currentSelections: NormalizedSource;
  excluded: NormalizedSource;
}

/**
 * Consistency findings for the three input collections.
 *
 * Every list is duplicate-free and sorted ascending.
 */
export interface ValidationReport {
  duplicatesInFullPool: Identifier[];
  duplicatesBySource: Record<SourceName, Identifier[]>;
  /** In both current selections and excluded */
  crossSetConflicts: Identifier[];
  /** Referenced by a secondary collection but absent from the full pool */
  missingFromPool: {
    currentSelections: Identifier[];
    excluded: Identifier[];
  };
  hasFindings: boolean;
}

// ============================================================================
// Filtering
// ============================================================================

export interface FilterStats {
  poolSize: number;
  currentSelectionsSize: number;
  excludedSize: number;
  /** Pool identifiers removed because they are already selected */
  currentSelectionsRemoved: number;
  /** Pool identifiers removed as excluded (not counting ones already removed as selected) */
  excludedRemoved: number;
  afterExclusion: number;
  rangesApplied: number;
  eligibleCount: number;
}

export interface FilterResult {
  eligible: IdentifierSet;
  stats: FilterStats;
}

// ============================================================================
// Sampling
// ============================================================================

export interface SamplingResult {
  /** Draw order; no duplicates */
  sampledIds: Identifier[];
  eligiblePoolSize: number;
  requested: number;
  shortfall: number;
  fullySatisfied: boolean;
  /** Seed actually used, generated when none was supplied */
  seed: number;
}

// ============================================================================
// Reporting
// ============================================================================

export type FindingKind = 'duplicate' | 'cross-set-conflict' | 'missing-from-pool';

export type FindingSource = SourceName | 'currentSelections+excluded';

export interface ReportFinding {
  kind: FindingKind;
  source: FindingSource;
  ids: Identifier[];
  message: string;
}

export interface ReportSummary {
  totalPoolSize: number;
  currentSelectionsCount: number;
  excludedCount: number;
  eligibleCount: number;
  requested: number;
  sampledCount: number;
  shortfall: number;
  fullySatisfied: boolean;
  seed: number;
  rangesApplied: number;
}

export interface Report {
  summary: ReportSummary;
  findings: ReportFinding[];
  /** Sampled identifiers, ascending */
  sampledIds: Identifier[];
}

export type DatasetSource = 'Current' | 'New';

export interface DatasetRow {
  id: Identifier;
  source: DatasetSource;
}

// ============================================================================
// Pipeline
// ============================================================================

export interface SamplingInputs {
  fullPool: IdentifierSource;
  currentSelections?: IdentifierSource;
  excluded?: IdentifierSource;
}

export interface SamplingRun {
  request: SamplingRequest;
  validation: ValidationReport;
  filterStats: FilterStats;
  eligible: IdentifierSet;
  sampling: SamplingResult;
  report: Report;
  finalDataset: DatasetRow[];
}
