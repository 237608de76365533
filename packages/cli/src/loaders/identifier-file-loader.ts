/**
 * Identifier File Loader
 *
 * Reads one identifier per record from CSV, TSV or plain-text files.
 * Cells are returned verbatim; parsing them into identifiers is the
 * sampling engine's job, so malformed cells surface as InvalidInputError there.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { parse } from 'csv-parse/sync';
import { SOURCE_LABELS, isNumericLiteral } from '@idsampler/core';
import type { SourceName } from '@idsampler/core';
import { ValidationError, createLogger } from '@idsampler/utils';

const logger = createLogger('cli');

export type IdentifierFileType = 'csv' | 'tsv' | 'txt';

const FILE_TYPES: Record<string, IdentifierFileType> = {
  '.csv': 'csv',
  '.tsv': 'tsv',
  '.txt': 'txt',
};

export interface LoadIdentifierOptions {
  /**
   * Header name or zero-based index. Defaults to the first column.
   */
  column?: string | number;
  source: SourceName;
}

export interface ParseIdentifierTextOptions extends LoadIdentifierOptions {
  fileType: IdentifierFileType;
}

/**
 * Loader port used by command handlers
 */
export interface IdentifierLoader {
  load(filePath: string, options: LoadIdentifierOptions): Promise<string[]>;
}

/**
 * @throws ValidationError for extensions other than .csv, .tsv and .txt
 */
export function detectFileType(filePath: string): IdentifierFileType {
  const extension = path.extname(filePath).toLowerCase();
  const fileType = FILE_TYPES[extension];
  if (!fileType) {
    throw new ValidationError(
      `Unsupported file type: ${extension || '(none)'}. Supported types: .csv, .tsv, .txt`,
      { path: filePath, extension }
    );
  }
  return fileType;
}

function toRows(records: unknown): string[][] {
  if (!Array.isArray(records)) {
    return [];
  }
  return records.map((record) =>
    Array.isArray(record) ? record.map((value) => String(value)) : [String(record)]
  );
}

function readRows(text: string, fileType: IdentifierFileType): string[][] {
  if (fileType === 'txt') {
    return text
      .replace(/^\uFEFF/, '')
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line !== '')
      .map((line) => [line]);
  }

  const records: unknown = parse(text, {
    delimiter: fileType === 'tsv' ? '\t' : ',',
    bom: true,
    trim: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });
  return toRows(records);
}

function isHeaderCell(value: string | undefined): boolean {
  return value !== undefined && value !== '' && !isNumericLiteral(value);
}

/**
 * Work out which column holds the identifiers and whether row 0 is a header
 */
function resolveColumn(
  firstRow: string[] | undefined,
  column: string | number | undefined,
  source: SourceName
): { index: number; hasHeader: boolean } {
  if (column === undefined) {
    return { index: 0, hasHeader: isHeaderCell(firstRow?.[0]) };
  }

  let index: number;
  if (typeof column === 'string') {
    const wanted = column.trim();
    const header = firstRow ?? [];
    const exact = header.indexOf(wanted);
    const headerIndex =
      exact !== -1
        ? exact
        : header.findIndex((name) => name.toLowerCase() === wanted.toLowerCase());
    if (headerIndex !== -1) {
      return { index: headerIndex, hasHeader: true };
    }
    if (!/^\d+$/.test(wanted)) {
      throw new ValidationError(`Column "${wanted}" not found in ${SOURCE_LABELS[source]}`, {
        column: wanted,
        available: header,
      });
    }
    index = Number(wanted);
  } else {
    index = column;
  }

  if (!Number.isInteger(index) || index < 0) {
    throw new ValidationError(`Column index must be a non-negative integer, got ${index}`, {
      column: index,
    });
  }
  return { index, hasHeader: isHeaderCell(firstRow?.[index]) };
}

/**
 * Extract identifier cells from in-memory file content
 */
export function parseIdentifierText(text: string, options: ParseIdentifierTextOptions): string[] {
  const rows = readRows(text, options.fileType);
  const { index, hasHeader } = resolveColumn(rows[0], options.column, options.source);

  const cells: string[] = [];
  rows.forEach((row, rowIndex) => {
    if (rowIndex === 0 && hasHeader) {
      return;
    }
    const value = row[index]?.trim() ?? '';
    if (value !== '') {
      cells.push(value);
    }
  });

  return cells;
}

/**
 * Load identifier cells from a file on disk
 */
export async function loadIdentifierFile(
  filePath: string,
  options: LoadIdentifierOptions
): Promise<string[]> {
  const fileType = detectFileType(filePath);
  const resolved = path.isAbsolute(filePath) ? filePath : path.join(process.cwd(), filePath);

  let content: string;
  try {
    content = await fs.readFile(resolved, 'utf-8');
  } catch (error) {
    throw new ValidationError(
      `Cannot read ${SOURCE_LABELS[options.source]} file: ${filePath}`,
      { path: resolved, cause: error instanceof Error ? error.message : String(error) }
    );
  }

  const cells = parseIdentifierText(content, { ...options, fileType });
  logger.debug('Loaded identifier file', {
    source: options.source,
    path: resolved,
    fileType,
    records: cells.length,
  });
  return cells;
}
