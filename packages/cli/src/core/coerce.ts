/**
 * Value Coercion Helpers
 *
 * These functions coerce values (numbers/ranges) but NEVER rename keys.
 * Use these in defineCommand's coerce() function.
 */

import { ValidationError } from '@idsampler/utils';
import { isNumericLiteral } from '@idsampler/core';
import type { RangeFilter } from '@idsampler/core';

function isString(x: unknown): x is string {
  return typeof x === 'string';
}

/**
 * Coerce a value to a number
 * Accepts:
 * - Number: returns as-is
 * - Decimal string: '123' -> 123 (hex and binary prefixes are rejected)
 * - undefined/null returns undefined
 */
export function coerceNumber(v: unknown, name: string): number | undefined {
  if (v === null || v === undefined) return undefined;
  if (typeof v === 'number') return v;
  if (isString(v) && isNumericLiteral(v)) {
    const n = Number(v);
    if (!Number.isFinite(n))
      throw new ValidationError(`Invalid number for ${name}`, { name, value: v });
    return n;
  }
  throw new ValidationError(`Invalid number for ${name}`, { name, value: v });
}

/**
 * Coerce "min:max" into a range
 * Accepts:
 * - "100:200"
 * - "100:" or ":200" for open-ended ranges
 * - Already-parsed { min, max }
 */
export function coerceRange(v: unknown, name: string): RangeFilter {
  if (typeof v === 'object' && v !== null && 'min' in v && 'max' in v) {
    const { min, max } = v;
    if (typeof min === 'number' && typeof max === 'number') {
      return { min, max };
    }
  }
  if (!isString(v)) {
    throw new ValidationError(`Invalid range for ${name}`, { name, value: v });
  }

  const parts = v.split(':');
  if (parts.length !== 2) {
    throw new ValidationError(`Invalid range for ${name}: expected <min:max>, got "${v}"`, {
      name,
      value: v,
    });
  }

  const [minText, maxText] = parts;
  const min = minText.trim() === '' ? -Infinity : coerceNumber(minText, name);
  const max = maxText.trim() === '' ? Infinity : coerceNumber(maxText, name);
  if (min === undefined || max === undefined) {
    throw new ValidationError(`Invalid range for ${name}`, { name, value: v });
  }
  return { min, max };
}

/**
 * Coerce a repeated option (or a single value) into a list of ranges
 */
export function coerceRanges(v: unknown, name: string): RangeFilter[] | undefined {
  if (v === null || v === undefined) return undefined;
  const values: unknown[] = Array.isArray(v) ? v : [v];
  return values.map((value) => coerceRange(value, name));
}

/**
 * Commander option parser that accumulates repeated flags
 */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}
