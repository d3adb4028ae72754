/**
 * Warming level lookup
 *
 * Central export point for parsing the cmip_warming_levels reference and
 * resolving GWL timeslices from it.
 */

// Resolver
export { GwlResolver } from './GwlResolver.js';
export type { GwlResolverOptions } from './GwlResolver.js';

// Parsing and selection
export { parseReferenceDocument, rewriteNotReachedMarkers } from './ReferenceDocumentParser.js';
export { bucketRecords, knownModels, selectTimeslice, timesliceBounds, toLookupTable } from './timeslice.js';
export { normalizeGwlQuery, validateCmipPhase, validatePathway, validateWarmingLevel } from './queryValidation.js';

// Constants
export {
  BUCKET_PREFIX,
  CMIP_PHASES,
  GWL_LABEL_PREFIX,
  NOT_REACHED_YEAR,
  PATHWAYS,
  TIMESLICE_YEARS,
  WARMING_LEVELS,
  bucketName,
  formatWarmingLevel,
  gwlLabel,
  notReachedMarker,
} from './constants.js';
export type { CmipPhase, Pathway, WarmingLevel } from './constants.js';

// Sources
export { referenceDocumentPath } from './sources/ReferenceSource.js';
export type { ReferenceSource } from './sources/ReferenceSource.js';
export { RemoteReferenceSource } from './sources/RemoteReferenceSource.js';
export type { ReferenceHttpClient, RemoteReferenceSourceOptions } from './sources/RemoteReferenceSource.js';
export { LocalReferenceSource } from './sources/LocalReferenceSource.js';
export type { LocalReferenceSourceOptions } from './sources/LocalReferenceSource.js';
export { FallbackReferenceSource } from './sources/FallbackReferenceSource.js';
export { createReferenceSource } from './sources/createReferenceSource.js';

// Types
export type {
  GwlQuery,
  LookupTableRow,
  NormalizedGwlQuery,
  ReferenceDocument,
  ReferenceRecord,
  TimesliceBounds,
  TimesliceOutcome,
  YearRange,
} from './types.js';
