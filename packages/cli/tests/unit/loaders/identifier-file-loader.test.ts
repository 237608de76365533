/**
 * Unit tests for the identifier file loader
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ValidationError } from '@idsampler/utils';
import {
  detectFileType,
  loadIdentifierFile,
  parseIdentifierText,
} from '../../../src/loaders/identifier-file-loader.js';

const csv = (text: string, column?: string | number) =>
  parseIdentifierText(text, { fileType: 'csv', source: 'fullPool', column });

describe('detectFileType', () => {
  it.each([
    ['ids.csv', 'csv'],
    ['IDS.TSV', 'tsv'],
    ['list.txt', 'txt'],
  ])('maps %s to %s', (filePath, expected) => {
    expect(detectFileType(filePath)).toBe(expected);
  });

  it('rejects spreadsheets', () => {
    expect(() => detectFileType('ids.XLSX')).toThrow(
      'Unsupported file type: .xlsx. Supported types: .csv, .tsv, .txt'
    );
  });

  it('rejects files without an extension', () => {
    expect(() => detectFileType('ids')).toThrow('Unsupported file type: (none)');
  });
});

describe('parseIdentifierText', () => {
  it('skips a header row in the first column', () => {
    expect(csv('ID,Name\n1,a\n2,b\n')).toEqual(['1', '2']);
  });

  it('reads headerless files from the first row', () => {
    expect(csv('5\n6\n')).toEqual(['5', '6']);
  });

  it('selects a column by header name', () => {
    expect(csv('Name,ID\nx,10\ny,11', 'ID')).toEqual(['10', '11']);
  });

  it('matches header names case-insensitively', () => {
    expect(csv('Name,ID\nx,10', 'id')).toEqual(['10']);
  });

  it('selects a column by index and detects its header', () => {
    expect(csv('Name,ID\nx,10', 1)).toEqual(['10']);
    expect(csv('x,10\ny,11', 1)).toEqual(['10', '11']);
  });

  it('treats a digit-only column name as an index when no header matches', () => {
    expect(csv('x,10\ny,11', '1')).toEqual(['10', '11']);
  });

  it('rejects unknown column names', () => {
    expect(() => csv('Name,ID\nx,10', 'Code')).toThrow('Column "Code" not found in Full ID Pool');
  });

  it('rejects negative column indexes', () => {
    expect(() => csv('1\n2', -1)).toThrow(ValidationError);
  });

  it('skips blank cells', () => {
    expect(csv('ID,Name\n,a\n4,b\n5')).toEqual(['4', '5']);
  });

  it('keeps non-numeric body cells for the engine to reject', () => {
    expect(csv('ID\n1\nabc')).toEqual(['1', 'abc']);
  });

  it('unquotes quoted cells', () => {
    expect(csv('"ID"\n"12"')).toEqual(['12']);
  });

  it('splits TSV on tabs', () => {
    expect(
      parseIdentifierText('ID\tName\n3\ta,b\n', { fileType: 'tsv', source: 'excluded' })
    ).toEqual(['3']);
  });

  it('finds the header of a plain text file after leading blank lines', () => {
    expect(
      parseIdentifierText('\n  \nID\n5\n\n6\n', { fileType: 'txt', source: 'fullPool' })
    ).toEqual(['5', '6']);
  });

  it('reads plain text one identifier per line', () => {
    expect(
      parseIdentifierText('\uFEFF7\n\n8\r\n 9 \n', { fileType: 'txt', source: 'excluded' })
    ).toEqual(['7', '8', '9']);
  });
});

describe('loadIdentifierFile', () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'idsampler-loader-'));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('loads a CSV file from disk', async () => {
    const filePath = join(dir, 'pool.csv');
    writeFileSync(filePath, 'ID\n100\n200\n');
    await expect(loadIdentifierFile(filePath, { source: 'fullPool' })).resolves.toEqual([
      '100',
      '200',
    ]);
  });

  it('reports a missing file with its source label', async () => {
    const filePath = join(dir, 'missing.csv');
    await expect(loadIdentifierFile(filePath, { source: 'currentSelections' })).rejects.toThrow(
      `Cannot read Current Selections file: ${filePath}`
    );
  });

  it('checks the extension before reading', async () => {
    await expect(loadIdentifierFile(join(dir, 'pool.xls'), { source: 'fullPool' })).rejects.toThrow(
      ValidationError
    );
  });
});
