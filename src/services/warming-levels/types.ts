import type { CmipPhase, Pathway, WarmingLevel } from './constants.js';

/**
 * A lookup as supplied by a caller. Phase and pathway are matched
 * case-insensitively; the warming level may be a numeric string.
 */
export interface GwlQuery {
  cmipPhase: string;
  model: string;
  ensemble: string;
  pathway: string;
  warmingLevel: number | string;
}

/** A query that passed validation, with phase and pathway lower-cased */
export interface NormalizedGwlQuery {
  cmipPhase: CmipPhase;
  model: string;
  ensemble: string;
  pathway: Pathway;
  warmingLevel: WarmingLevel;
}

export interface YearRange {
  startYear: number;
  endYear: number;
}

export type TimesliceOutcome =
  | ({ kind: 'reached' } & YearRange)
  | { kind: 'not_reached' };

/** One simulation's entry within a warming level bucket */
export interface ReferenceRecord {
  model: string;
  ensemble: string;
  /** Pathway / experiment id, e.g. `ssp585` */
  exp: string;
  outcome: TimesliceOutcome;
}

export interface ReferenceDocument {
  cmipPhase: CmipPhase;
  /** Bucket name (`warming_level_15`) to records, in document order */
  buckets: Map<string, ReferenceRecord[]>;
}

/**
 * Flat row of the lookup table. Simulations that never reach the level keep
 * the upstream sentinel year in both year fields.
 */
export interface LookupTableRow {
  model: string;
  ensemble: string;
  exp: string;
  startYear: number;
  endYear: number;
  /** e.g. `gwl15` */
  gwl: string;
}

export interface TimesliceBounds {
  startDate: string;
  endDate: string;
}
