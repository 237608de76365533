/**
 * Dataset Exporter
 *
 * Writes the final dataset (current selections + new sample) as CSV.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { stringify } from 'csv-stringify/sync';
import type { DateTime } from 'luxon';
import type { DatasetRow } from '@idsampler/sampling';
import { createLogger } from '@idsampler/utils';

const logger = createLogger('cli');

/**
 * Exporter port used by command handlers
 */
export interface DatasetExporter {
  write(rows: DatasetRow[], filePath: string): Promise<string>;
}

/**
 * e.g. sampled_ids_20240305_140709.csv
 */
export function defaultExportFileName(now: DateTime): string {
  return `sampled_ids_${now.toFormat('yyyyMMdd_HHmmss')}.csv`;
}

export function renderDatasetCsv(rows: DatasetRow[]): string {
  return stringify(rows, {
    header: true,
    columns: [
      { key: 'id', header: 'ID' },
      { key: 'source', header: 'Source' },
    ],
  });
}

/**
 * Write the dataset, creating parent directories. Returns the absolute path written.
 */
export async function writeDatasetCsv(rows: DatasetRow[], filePath: string): Promise<string> {
  const resolved = path.resolve(filePath);
  await fs.mkdir(path.dirname(resolved), { recursive: true });
  await fs.writeFile(resolved, renderDatasetCsv(rows), 'utf-8');
  logger.info('Exported final dataset', { path: resolved, rows: rows.length });
  return resolved;
}
