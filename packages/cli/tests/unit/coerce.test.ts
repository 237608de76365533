/**
 * Unit tests for value coercion helpers
 */

import { describe, it, expect } from 'vitest';
import { ValidationError } from '@idsampler/utils';
import { coerceNumber, coerceRange, coerceRanges, collect } from '../../src/core/coerce.js';

describe('coerceNumber', () => {
  it('passes numbers and undefined through', () => {
    expect(coerceNumber(5, 'size')).toBe(5);
    expect(coerceNumber(undefined, 'size')).toBeUndefined();
  });

  it('parses numeric strings', () => {
    expect(coerceNumber(' 42 ', 'size')).toBe(42);
  });

  it.each(['abc', '', 'Infinity', '0x10', '0b11', '0o7'])('rejects %j', (value) => {
    expect(() => coerceNumber(value, 'size')).toThrow(ValidationError);
  });
});

describe('coerceRange', () => {
  it('parses closed ranges', () => {
    expect(coerceRange('100:200', 'range')).toEqual({ min: 100, max: 200 });
  });

  it('parses open-ended ranges', () => {
    expect(coerceRange('100:', 'range')).toEqual({ min: 100, max: Infinity });
    expect(coerceRange(':200', 'range')).toEqual({ min: -Infinity, max: 200 });
  });

  it('accepts negative bounds', () => {
    expect(coerceRange('-5:-1', 'range')).toEqual({ min: -5, max: -1 });
  });

  it('accepts parsed ranges', () => {
    expect(coerceRange({ min: 1, max: 2 }, 'range')).toEqual({ min: 1, max: 2 });
  });

  it('leaves min > max for the schema to reject', () => {
    expect(coerceRange('9:1', 'range')).toEqual({ min: 9, max: 1 });
  });

  it('rejects values without exactly one separator', () => {
    expect(() => coerceRange('1-5', 'range')).toThrow(
      'Invalid range for range: expected <min:max>, got "1-5"'
    );
    expect(() => coerceRange('1:2:3', 'range')).toThrow(ValidationError);
  });

  it('rejects non-numeric bounds', () => {
    expect(() => coerceRange('a:5', 'range')).toThrow('Invalid number for range');
  });
});

describe('coerceRanges', () => {
  it('maps repeated values', () => {
    expect(coerceRanges(['1:2', '5:'], 'range')).toEqual([
      { min: 1, max: 2 },
      { min: 5, max: Infinity },
    ]);
  });

  it('wraps a single value', () => {
    expect(coerceRanges('3:4', 'range')).toEqual([{ min: 3, max: 4 }]);
  });

  it('returns undefined when absent', () => {
    expect(coerceRanges(undefined, 'range')).toBeUndefined();
  });
});

describe('collect', () => {
  it('appends to previous values', () => {
    expect(collect('b', collect('a'))).toEqual(['a', 'b']);
  });
});
