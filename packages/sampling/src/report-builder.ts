/**
 * Report Builder
 *
 * Turns validation, filter and sampling results into a report and the final
 * dataset. Nothing is recomputed here.
 */

import { SOURCE_LABELS, SOURCE_NAMES, compareIdentifiers, sortIdentifiers } from '@idsampler/core';
import type { Identifier } from '@idsampler/core';
import type {
  DatasetRow,
  FilterStats,
  Report,
  ReportFinding,
  SamplingResult,
  ValidationReport,
} from './types.js';

const PREVIEW_LIMIT = 5;

/**
 * Render at most five identifiers, e.g. "1, 2, 3, 4, 5... and 3 more"
 */
export function previewIds(ids: readonly Identifier[]): string {
  if (ids.length <= PREVIEW_LIMIT) {
    return ids.join(', ');
  }
  return `${ids.slice(0, PREVIEW_LIMIT).join(', ')}... and ${ids.length - PREVIEW_LIMIT} more`;
}

/**
 * Human-readable findings for a validation report, in a fixed order:
 * duplicates, cross-set conflicts, identifiers missing from the pool
 */
export function describeFindings(validation: ValidationReport): ReportFinding[] {
  const findings: ReportFinding[] = [];

  for (const source of SOURCE_NAMES) {
    const ids = validation.duplicatesBySource[source];
    if (ids.length > 0) {
      findings.push({
        kind: 'duplicate',
        source,
        ids,
        message: `Duplicate IDs in ${SOURCE_LABELS[source]}: ${previewIds(ids)}`,
      });
    }
  }

  if (validation.crossSetConflicts.length > 0) {
    findings.push({
      kind: 'cross-set-conflict',
      source: 'currentSelections+excluded',
      ids: validation.crossSetConflicts,
      message: `IDs in both ${SOURCE_LABELS.currentSelections} and ${SOURCE_LABELS.excluded}: ${previewIds(validation.crossSetConflicts)}`,
    });
  }

  for (const source of ['currentSelections', 'excluded'] as const) {
    const ids = validation.missingFromPool[source];
    if (ids.length > 0) {
      findings.push({
        kind: 'missing-from-pool',
        source,
        ids,
        message: `IDs in ${SOURCE_LABELS[source]} not found in ${SOURCE_LABELS.fullPool}: ${previewIds(ids)}`,
      });
    }
  }

  return findings;
}

export function buildReport(
  validation: ValidationReport,
  filterStats: FilterStats,
  samplingResult: SamplingResult
): Report {
  return {
    summary: {
      totalPoolSize: filterStats.poolSize,
      currentSelectionsCount: filterStats.currentSelectionsSize,
      excludedCount: filterStats.excludedSize,
      eligibleCount: filterStats.eligibleCount,
      requested: samplingResult.requested,
      sampledCount: samplingResult.sampledIds.length,
      shortfall: samplingResult.shortfall,
      fullySatisfied: samplingResult.fullySatisfied,
      seed: samplingResult.seed,
      rangesApplied: filterStats.rangesApplied,
    },
    findings: describeFindings(validation),
    sampledIds: sortIdentifiers(samplingResult.sampledIds),
  };
}

/**
 * Current selections plus the new sample, each labelled with its origin,
 * ascending by id
 */
export function buildFinalDataset(
  currentSelections: Iterable<Identifier>,
  sampledIds: readonly Identifier[]
): DatasetRow[] {
  const rows: DatasetRow[] = [];
  for (const id of currentSelections) {
    rows.push({ id, source: 'Current' });
  }
  for (const id of sampledIds) {
    rows.push({ id, source: 'New' });
  }
  return rows.sort((a, b) => compareIdentifiers(a.id, b.id));
}

/**
 * Plain-text rendering of a report
 */
export function formatReportText(report: Report): string {
  const { summary } = report;
  const lines = [
    'Sampling Report',
    '===============',
    `Total pool size:      ${summary.totalPoolSize}`,
    `Current selections:   ${summary.currentSelectionsCount}`,
    `Excluded IDs:         ${summary.excludedCount}`,
    `Ranges applied:       ${summary.rangesApplied}`,
    `Eligible IDs:         ${summary.eligibleCount}`,
    `Requested:            ${summary.requested}`,
    `Sampled:              ${summary.sampledCount}`,
    `Shortfall:            ${summary.shortfall}`,
    `Seed:                 ${summary.seed}`,
  ];

  if (!summary.fullySatisfied) {
    lines.push(
      '',
      `Warning: requested ${summary.requested} IDs but only ${summary.eligibleCount} eligible IDs were available`
    );
  }

  lines.push('');
  if (report.findings.length === 0) {
    lines.push('Findings: none');
  } else {
    lines.push('Findings:');
    for (const finding of report.findings) {
      lines.push(`  - ${finding.message}`);
    }
  }

  lines.push('', `Sampled IDs: ${report.sampledIds.length > 0 ? previewIds(report.sampledIds) : 'none'}`);
  return lines.join('\n');
}
