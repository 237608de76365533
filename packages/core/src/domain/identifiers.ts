/**
 * Identifier domain types
 */

/**
 * Numeric key of a record in the master dataset.
 *
 * Always a finite number. Identity is the only meaning it carries.
 */
export type Identifier = number;

/**
 * Duplicate-free set of identifiers.
 *
 * Iteration order is the order of first occurrence in the source collection,
 * which keeps downstream sampling reproducible.
 */
export type IdentifierSet = ReadonlySet<Identifier>;

/**
 * Raw identifier collection as produced by a loader (may contain duplicates
 * and numeric strings).
 */
export type IdentifierSource = readonly (number | string)[];

/**
 * The three input collections of a sampling run
 */
export type SourceName = 'fullPool' | 'currentSelections' | 'excluded';

export const SOURCE_NAMES: readonly SourceName[] = ['fullPool', 'currentSelections', 'excluded'];

/**
 * Human-readable labels used in reports and error messages
 */
export const SOURCE_LABELS: Record<SourceName, string> = {
  fullPool: 'Full ID Pool',
  currentSelections: 'Current Selections',
  excluded: 'Excluded IDs',
};

const NUMERIC_LITERAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Check whether a string is a plain decimal numeric literal.
 *
 * Rejects hex/binary prefixes, "Infinity", "NaN" and blank strings, all of
 * which Number() would otherwise accept or coerce to 0.
 */
export function isNumericLiteral(value: string): boolean {
  return NUMERIC_LITERAL.test(value.trim());
}

/**
 * Ascending numeric comparator for identifiers
 */
export function compareIdentifiers(a: Identifier, b: Identifier): number {
  return a - b;
}

/**
 * Return the identifiers of an iterable as a new ascending array
 */
export function sortIdentifiers(ids: Iterable<Identifier>): Identifier[] {
  return Array.from(ids).sort(compareIdentifiers);
}
