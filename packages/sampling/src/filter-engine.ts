/**
 * Filter Engine
 *
 * Derives the eligible pool: full pool minus current selections and
 * exclusions, restricted to the union of the requested ranges.
 */

import type { Identifier, IdentifierSet, RangeFilter } from '@idsampler/core';
import { InvalidRequestError } from '@idsampler/utils';
import type { FilterResult } from './types.js';

/**
 * @throws InvalidRequestError for a range with a NaN bound or min > max
 */
export function assertValidRanges(ranges: readonly RangeFilter[]): void {
  ranges.forEach((range, index) => {
    if (Number.isNaN(range.min) || Number.isNaN(range.max)) {
      throw new InvalidRequestError(`Range ${index + 1} has a non-numeric bound`, {
        index,
        range,
      });
    }
    if (range.min > range.max) {
      throw new InvalidRequestError(
        `Range ${index + 1} is malformed: min ${range.min} exceeds max ${range.max}`,
        { index, range }
      );
    }
  });
}

/**
 * True when the identifier lies in at least one range, or there are no ranges
 */
export function isWithinRanges(id: Identifier, ranges: readonly RangeFilter[]): boolean {
  if (ranges.length === 0) {
    return true;
  }
  return ranges.some((range) => id >= range.min && id <= range.max);
}

/**
 * Compute the eligible pool together with per-step counts.
 *
 * Eligible identifiers keep their full-pool order. An empty result is valid.
 */
export function computeEligibleWithStats(
  fullPool: IdentifierSet,
  currentSelections: IdentifierSet,
  excluded: IdentifierSet,
  ranges: readonly RangeFilter[] = []
): FilterResult {
  assertValidRanges(ranges);

  const eligible = new Set<Identifier>();
  let currentSelectionsRemoved = 0;
  let excludedRemoved = 0;

  for (const id of fullPool) {
    if (currentSelections.has(id)) {
      currentSelectionsRemoved++;
      continue;
    }
    if (excluded.has(id)) {
      excludedRemoved++;
      continue;
    }
    if (isWithinRanges(id, ranges)) {
      eligible.add(id);
    }
  }

  return {
    eligible,
    stats: {
      poolSize: fullPool.size,
      currentSelectionsSize: currentSelections.size,
      excludedSize: excluded.size,
      currentSelectionsRemoved,
      excludedRemoved,
      afterExclusion: fullPool.size - currentSelectionsRemoved - excludedRemoved,
      rangesApplied: ranges.length,
      eligibleCount: eligible.size,
    },
  };
}

export function computeEligible(
  fullPool: IdentifierSet,
  currentSelections: IdentifierSet,
  excluded: IdentifierSet,
  ranges: readonly RangeFilter[] = []
): IdentifierSet {
  return computeEligibleWithStats(fullPool, currentSelections, excluded, ranges).eligible;
}
