/**
 * Input validation
 *
 * Parses raw identifier collections and reports duplicates, cross-set
 * conflicts and references to identifiers outside the full pool.
 * Conflicts are returned as data; only malformed identifiers throw.
 */

import {
  SOURCE_LABELS,
  isNumericLiteral,
  sortIdentifiers,
} from '@idsampler/core';
import type { Identifier, IdentifierSet, IdentifierSource, SourceName } from '@idsampler/core';
import { InvalidInputError, createLogger } from '@idsampler/utils';
import type { NormalizedInputs, NormalizedSource, ValidationReport } from './types.js';

const logger = createLogger('sampling');

/**
 * Integers beyond 2^53 cannot be told apart from their neighbours
 */
function isRepresentable(value: number): boolean {
  return Number.isFinite(value) && (!Number.isInteger(value) || Number.isSafeInteger(value));
}

/**
 * Parse one raw value into an identifier.
 *
 * @throws InvalidInputError naming the source and the offending value
 */
export function parseIdentifier(value: number | string, source: SourceName): Identifier {
  if (typeof value === 'number') {
    if (!isRepresentable(value)) {
      throw new InvalidInputError(SOURCE_LABELS[source], value, { sourceName: source });
    }
    return value;
  }

  if (!isNumericLiteral(value)) {
    throw new InvalidInputError(SOURCE_LABELS[source], value, { sourceName: source });
  }

  const parsed = Number(value.trim());
  // "1e400" overflows; "9007199254740993" rounds to a different integer
  if (!isRepresentable(parsed)) {
    throw new InvalidInputError(SOURCE_LABELS[source], value, { sourceName: source });
  }
  return parsed;
}

/**
 * Parse a collection into a set (first-occurrence order) plus its duplicates
 */
export function normalizeSource(values: IdentifierSource, source: SourceName): NormalizedSource {
  const ids = new Set<Identifier>();
  const duplicates = new Set<Identifier>();

  for (const value of values) {
    const id = parseIdentifier(value, source);
    if (ids.has(id)) {
      duplicates.add(id);
    } else {
      ids.add(id);
    }
  }

  return { ids, duplicates: sortIdentifiers(duplicates) };
}

export function normalizeInputs(
  fullPool: IdentifierSource,
  currentSelections: IdentifierSource,
  excluded: IdentifierSource
): NormalizedInputs {
  return {
    fullPool: normalizeSource(fullPool, 'fullPool'),
    currentSelections: normalizeSource(currentSelections, 'currentSelections'),
    excluded: normalizeSource(excluded, 'excluded'),
  };
}

function intersect(a: IdentifierSet, b: IdentifierSet): Identifier[] {
  return sortIdentifiers([...a].filter((id) => b.has(id)));
}

function difference(a: IdentifierSet, b: IdentifierSet): Identifier[] {
  return sortIdentifiers([...a].filter((id) => !b.has(id)));
}

/**
 * Run the consistency checks on already-parsed inputs
 */
export function validateNormalized(inputs: NormalizedInputs): ValidationReport {
  const { fullPool, currentSelections, excluded } = inputs;

  const duplicatesBySource: Record<SourceName, Identifier[]> = {
    fullPool: fullPool.duplicates,
    currentSelections: currentSelections.duplicates,
    excluded: excluded.duplicates,
  };
  const crossSetConflicts = intersect(currentSelections.ids, excluded.ids);
  const missingFromPool = {
    currentSelections: difference(currentSelections.ids, fullPool.ids),
    excluded: difference(excluded.ids, fullPool.ids),
  };

  const hasFindings =
    Object.values(duplicatesBySource).some((ids) => ids.length > 0) ||
    crossSetConflicts.length > 0 ||
    missingFromPool.currentSelections.length > 0 ||
    missingFromPool.excluded.length > 0;

  if (hasFindings) {
    logger.debug('Validation produced findings', {
      duplicates: Object.values(duplicatesBySource).reduce((sum, ids) => sum + ids.length, 0),
      crossSetConflicts: crossSetConflicts.length,
      missingFromPool: missingFromPool.currentSelections.length + missingFromPool.excluded.length,
    });
  }

  return {
    duplicatesInFullPool: fullPool.duplicates,
    duplicatesBySource,
    crossSetConflicts,
    missingFromPool,
    hasFindings,
  };
}

/**
 * Validate the three raw input collections.
 *
 * @throws InvalidInputError when any value is not a finite number
 */
export function validate(
  fullPool: IdentifierSource,
  currentSelections: IdentifierSource,
  excluded: IdentifierSource
): ValidationReport {
  return validateNormalized(normalizeInputs(fullPool, currentSelections, excluded));
}
