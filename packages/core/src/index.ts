/**
 * @idsampler/core
 *
 * Foundational, shared types for the idsampler packages.
 * This package has zero dependencies on other @idsampler packages.
 */

// ============================================================================
// Domain Types
// ============================================================================

export {
  SOURCE_LABELS,
  SOURCE_NAMES,
  compareIdentifiers,
  isNumericLiteral,
  sortIdentifiers,
} from './domain/identifiers.js';
export type {
  Identifier,
  IdentifierSet,
  IdentifierSource,
  SourceName,
} from './domain/identifiers.js';

// ============================================================================
// Schemas
// ============================================================================

export { RangeFilterSchema, SamplingRequestSchema } from './schemas/sampling-request.js';
export type {
  RangeFilter,
  SamplingRequest,
  SamplingRequestInput,
} from './schemas/sampling-request.js';

// ============================================================================
// Determinism
// ============================================================================

export {
  SeededRNG,
  createDeterministicRNG,
  generateSeed,
} from './determinism.js';
export type { DeterministicRNG } from './determinism.js';
