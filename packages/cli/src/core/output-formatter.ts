/**
 * Output Formatter - JSON, table, CSV formats
 */

import { formatReportText } from '@idsampler/sampling';
import type { DatasetRow, FilterStats, Report, ReportFinding } from '@idsampler/sampling';
import type { Identifier } from '@idsampler/core';
import type { OutputFormat } from '../types/index.js';

/**
 * Result of `sampling run`
 */
export interface SamplingRunOutput {
  report: Report;
  finalDataset: DatasetRow[];
  exportedTo?: string;
}

/**
 * Result of `sampling validate`
 */
export interface ValidationOutput {
  counts: { fullPool: number; currentSelections: number; excluded: number };
  findings: ReportFinding[];
  valid: boolean;
}

/**
 * Result of `sampling eligible`
 */
export interface EligibleOutput {
  stats: FilterStats;
  eligible: Identifier[];
}

type Row = Record<string, unknown>;

function isRecord(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSamplingRunOutput(data: unknown): data is SamplingRunOutput {
  return isRecord(data) && isRecord(data.report) && Array.isArray(data.finalDataset);
}

function isValidationOutput(data: unknown): data is ValidationOutput {
  return isRecord(data) && isRecord(data.counts) && Array.isArray(data.findings);
}

function isEligibleOutput(data: unknown): data is EligibleOutput {
  return isRecord(data) && isRecord(data.stats) && Array.isArray(data.eligible);
}

/**
 * Format output as JSON
 */
export function formatJSON(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Convert a value to a displayable string, handling nested objects
 */
function valueToString(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

function detectColumns(data: unknown[], columns?: string[]): string[] {
  if (columns) {
    return columns;
  }
  const first = data[0];
  return isRecord(first) ? Object.keys(first) : [];
}

function cell(row: unknown, column: string): unknown {
  return isRecord(row) ? row[column] : undefined;
}

/**
 * Format output as a simple table
 */
export function formatTable(data: unknown[], columns?: string[]): string {
  if (data.length === 0) {
    return 'No data to display';
  }

  const detectedColumns = detectColumns(data, columns);
  if (detectedColumns.length === 0) {
    return formatJSON(data);
  }

  // Calculate column widths
  const widths: Record<string, number> = {};
  for (const col of detectedColumns) {
    widths[col] = Math.max(col.length, ...data.map((row) => valueToString(cell(row, col)).length));
  }

  const lines: string[] = [];

  // Header
  lines.push(detectedColumns.map((col) => col.padEnd(widths[col])).join(' | '));
  lines.push(detectedColumns.map((col) => '-'.repeat(widths[col])).join('-|-'));

  // Rows
  for (const row of data) {
    lines.push(
      detectedColumns.map((col) => valueToString(cell(row, col)).padEnd(widths[col])).join(' | ')
    );
  }

  return lines.join('\n');
}

/**
 * Format output as CSV
 */
export function formatCSV(data: unknown[], columns?: string[]): string {
  if (data.length === 0) {
    return '';
  }

  const detectedColumns = detectColumns(data, columns);
  if (detectedColumns.length === 0) {
    return '';
  }

  const lines: string[] = [];
  lines.push(detectedColumns.join(','));

  for (const row of data) {
    const values = detectedColumns.map((col) => {
      const str = valueToString(cell(row, col));
      // Escape CSV values
      if (str.includes(',') || str.includes('"') || str.includes('\n')) {
        return `"${str.replace(/"/g, '""')}"`;
      }
      return str;
    });
    lines.push(values.join(','));
  }

  return lines.join('\n');
}

function datasetRows(rows: DatasetRow[]): Row[] {
  return rows.map((row) => ({ ID: row.id, Source: row.source }));
}

function findingRows(findings: ReportFinding[]): Row[] {
  return findings.map((finding) => ({
    Kind: finding.kind,
    Source: finding.source,
    Count: finding.ids.length,
    Message: finding.message,
  }));
}

/**
 * Format sampling command results; null when the data is not one of them
 */
function formatSamplingResults(data: unknown, format: OutputFormat): string | null {
  if (format === 'json') {
    return null;
  }

  if (isSamplingRunOutput(data)) {
    if (format === 'csv') {
      return formatCSV(datasetRows(data.finalDataset), ['ID', 'Source']);
    }
    const sections = [formatReportText(data.report)];
    if (data.exportedTo) {
      sections.push(`Final dataset written to ${data.exportedTo}`);
    }
    sections.push(formatTable(datasetRows(data.finalDataset), ['ID', 'Source']));
    return sections.join('\n\n');
  }

  if (isValidationOutput(data)) {
    const rows = findingRows(data.findings);
    if (format === 'csv') {
      return formatCSV(rows, ['Kind', 'Source', 'Count', 'Message']);
    }
    const { counts } = data;
    return [
      `Full ID Pool: ${counts.fullPool} | Current Selections: ${counts.currentSelections} | Excluded IDs: ${counts.excluded}`,
      rows.length > 0 ? formatTable(rows) : 'No validation findings',
    ].join('\n\n');
  }

  if (isEligibleOutput(data)) {
    const rows = data.eligible.map((id) => ({ ID: id }));
    if (format === 'csv') {
      return formatCSV(rows, ['ID']);
    }
    return [formatTable([data.stats]), formatTable(rows, ['ID'])].join('\n\n');
  }

  return null;
}

/**
 * Format output based on format type
 */
export function formatOutput(data: unknown, format: OutputFormat = 'table'): string {
  const samplingFormatted = formatSamplingResults(data, format);
  if (samplingFormatted !== null) {
    return samplingFormatted;
  }

  if (Array.isArray(data)) {
    switch (format) {
      case 'json':
        return formatJSON(data);
      case 'csv':
        return formatCSV(data);
      case 'table':
        return formatTable(data);
    }
  }

  if (isRecord(data)) {
    switch (format) {
      case 'json':
        return formatJSON(data);
      case 'csv':
        return formatCSV([data]);
      case 'table':
        return formatTable([data]);
    }
  }

  return String(data);
}
