import {
  AmbiguousEntryError,
  NotCalculatedError,
  ThresholdNotReachedError,
  UnknownModelError,
} from '../../types/errors.js';
import { NOT_REACHED_YEAR, bucketName, gwlLabel } from './constants.js';
import type {
  LookupTableRow,
  NormalizedGwlQuery,
  ReferenceDocument,
  ReferenceRecord,
  TimesliceBounds,
  YearRange,
} from './types.js';

/** Sorted distinct model names of a bucket */
export function knownModels(records: readonly ReferenceRecord[]): string[] {
  return [...new Set(records.map((record) => record.model))].sort();
}

/** Records of the bucket for a warming level; a bucket missing from the document is empty */
export function bucketRecords(document: ReferenceDocument, warmingLevel: number): ReferenceRecord[] {
  return document.buckets.get(bucketName(warmingLevel)) ?? [];
}

/**
 * Find the single record matching the query and return its timeslice.
 * Source years are returned as-is; the 20-year window is not re-derived.
 */
export function selectTimeslice(document: ReferenceDocument, query: NormalizedGwlQuery): YearRange {
  const records = bucketRecords(document, query.warmingLevel);

  const models = knownModels(records);
  if (!models.includes(query.model)) {
    throw new UnknownModelError(query, models);
  }

  const matches = records.filter(
    (record) =>
      record.model === query.model && record.ensemble === query.ensemble && record.exp === query.pathway
  );

  if (matches.length === 0) {
    throw new NotCalculatedError(query);
  }
  if (matches.length > 1) {
    throw new AmbiguousEntryError(query, matches.length);
  }

  const { outcome } = matches[0];
  if (outcome.kind === 'not_reached') {
    throw new ThresholdNotReachedError(query);
  }
  return { startYear: outcome.startYear, endYear: outcome.endYear };
}

/**
 * Flatten every bucket into one table, bucket by bucket in document order.
 * The same simulation appears once per bucket it is listed in.
 */
export function toLookupTable(document: ReferenceDocument): LookupTableRow[] {
  const rows: LookupTableRow[] = [];
  for (const [bucket, records] of document.buckets) {
    const gwl = gwlLabel(bucket);
    for (const { model, ensemble, exp, outcome } of records) {
      const years =
        outcome.kind === 'reached'
          ? { startYear: outcome.startYear, endYear: outcome.endYear }
          : { startYear: NOT_REACHED_YEAR, endYear: NOT_REACHED_YEAR };
      rows.push({ model, ensemble, exp, ...years, gwl });
    }
  }
  return rows;
}

function isoYear(year: number): string {
  return String(year).padStart(4, '0');
}

/** Inclusive date bounds: January 1 of the start year to December 31 of the end year */
export function timesliceBounds(range: YearRange): TimesliceBounds {
  return {
    startDate: `${isoYear(range.startYear)}-01-01`,
    endDate: `${isoYear(range.endYear)}-12-31`,
  };
}
