/**
 * Unit tests for the dataset exporter
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { DateTime } from 'luxon';
import {
  defaultExportFileName,
  renderDatasetCsv,
  writeDatasetCsv,
} from '../../../src/exporters/dataset-exporter.js';

const rows = [
  { id: 1, source: 'Current' as const },
  { id: 4, source: 'New' as const },
];

describe('renderDatasetCsv', () => {
  it('writes an ID,Source header and one row per identifier', () => {
    expect(renderDatasetCsv(rows)).toBe('ID,Source\n1,Current\n4,New\n');
  });
});

describe('defaultExportFileName', () => {
  it('stamps the file name with the local date and time', () => {
    const now = DateTime.fromObject({ year: 2024, month: 3, day: 5, hour: 14, minute: 7, second: 9 });
    expect(defaultExportFileName(now)).toBe('sampled_ids_20240305_140709.csv');
  });
});

describe('writeDatasetCsv', () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'idsampler-export-'));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('creates parent directories and returns the absolute path', async () => {
    const target = join(dir, 'nested', 'out.csv');
    await expect(writeDatasetCsv(rows, target)).resolves.toBe(target);
    expect(readFileSync(target, 'utf-8')).toBe('ID,Source\n1,Current\n4,New\n');
  });
});
