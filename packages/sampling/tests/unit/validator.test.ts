/**
 * Validator Tests
 */

import { describe, it, expect } from 'vitest';
import { InvalidInputError } from '@idsampler/utils';
import {
  normalizeInputs,
  normalizeSource,
  parseIdentifier,
  validate,
  validateNormalized,
} from '../../src/validator.js';

describe('parseIdentifier', () => {
  it.each([
    [42, 42],
    [-3.5, -3.5],
    ['42', 42],
    [' 7 ', 7],
    ['1e3', 1000],
    ['12.0', 12],
    ['-4', -4],
    ['.5', 0.5],
  ])('accepts %j', (value, expected) => {
    expect(parseIdentifier(value, 'fullPool')).toBe(expected);
  });

  it.each([['abc'], [''], ['   '], ['0x1A'], ['Infinity'], ['1e400'], [NaN], [Infinity]])(
    'rejects %j',
    (value) => {
      expect(() => parseIdentifier(value, 'fullPool')).toThrow(InvalidInputError);
    }
  );

  it.each([['9007199254740993'], ['-9007199254740993'], ['1e20'], [2 ** 53]])(
    'rejects %j beyond the safe integer range',
    (value) => {
      expect(() => parseIdentifier(value, 'fullPool')).toThrow(InvalidInputError);
    }
  );

  it('accepts the largest safe integer', () => {
    expect(parseIdentifier('9007199254740991', 'fullPool')).toBe(Number.MAX_SAFE_INTEGER);
  });

  it('names the source and the value in the error', () => {
    expect(() => parseIdentifier('abc', 'excluded')).toThrow(
      'Invalid identifier format in Excluded IDs: "abc"'
    );
  });

  it('attaches the source name to the error context', () => {
    try {
      parseIdentifier('x1', 'currentSelections');
      expect.unreachable('parseIdentifier should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidInputError);
      if (error instanceof InvalidInputError) {
        expect(error.source).toBe('Current Selections');
        expect(error.value).toBe('x1');
        expect(error.context).toEqual({
          source: 'Current Selections',
          value: 'x1',
          sourceName: 'currentSelections',
        });
      }
    }
  });
});

describe('normalizeSource', () => {
  it('keeps first-occurrence order and collects duplicates', () => {
    const result = normalizeSource([3, 1, 3, '1', 2], 'fullPool');
    expect([...result.ids]).toEqual([3, 1, 2]);
    expect(result.duplicates).toEqual([1, 3]);
  });

  it('reports a value repeated many times once', () => {
    expect(normalizeSource([9, 9, 9], 'excluded').duplicates).toEqual([9]);
  });

  it('treats numerically equal strings as the same identifier', () => {
    const result = normalizeSource(['5', '5.0', ' 5'], 'fullPool');
    expect([...result.ids]).toEqual([5]);
    expect(result.duplicates).toEqual([5]);
  });

  it('handles an empty collection', () => {
    const result = normalizeSource([], 'excluded');
    expect(result.ids.size).toBe(0);
    expect(result.duplicates).toEqual([]);
  });
});

describe('validate', () => {
  it('returns no findings for consistent inputs', () => {
    const report = validate([1, 2, 3, 4], [1], [2]);
    expect(report).toEqual({
      duplicatesInFullPool: [],
      duplicatesBySource: { fullPool: [], currentSelections: [], excluded: [] },
      crossSetConflicts: [],
      missingFromPool: { currentSelections: [], excluded: [] },
      hasFindings: false,
    });
  });

  it('reports duplicates in the full pool', () => {
    const report = validate([1, 7, 2, 7], [], []);
    expect(report.duplicatesInFullPool).toEqual([7]);
    expect(report.duplicatesBySource.fullPool).toEqual([7]);
    expect(report.hasFindings).toBe(true);
  });

  it('reports duplicates per secondary source', () => {
    const report = validate([1, 2, 3], [1, 1], [3, 3, 2, 2]);
    expect(report.duplicatesBySource.currentSelections).toEqual([1]);
    expect(report.duplicatesBySource.excluded).toEqual([2, 3]);
  });

  it('reports cross-set conflicts', () => {
    const report = validate([5, 6], [5], [5]);
    expect(report.crossSetConflicts).toEqual([5]);
    expect(report.hasFindings).toBe(true);
  });

  it('reports identifiers missing from the full pool', () => {
    const report = validate([1, 2, 3], [9, 1, 8], [20]);
    expect(report.missingFromPool).toEqual({ currentSelections: [8, 9], excluded: [20] });
    expect(report.hasFindings).toBe(true);
  });

  it('throws for a malformed identifier in any source', () => {
    expect(() => validate([1, 2], [1], ['n/a'])).toThrow(
      'Invalid identifier format in Excluded IDs: "n/a"'
    );
  });

  it('never merges unsafe neighbours into a duplicate', () => {
    expect(() => validate(['9007199254740993', '9007199254740992'], [], [])).toThrow(
      'Invalid identifier format in Full ID Pool: "9007199254740993"'
    );
  });

  it('matches validateNormalized on the same inputs', () => {
    const fullPool = ['1', '2', '2', '3'];
    expect(validate(fullPool, ['3'], ['3'])).toEqual(
      validateNormalized(normalizeInputs(fullPool, ['3'], ['3']))
    );
  });
});
