/**
 * Global Warming Level timeslices for CMIP simulations, looked up in the
 * cmip_warming_levels reference (https://github.com/mathause/cmip_warming_levels).
 *
 * The function-style helpers build a resolver over the configured reference
 * source unless one is passed in `options.source`.
 */

import type { TimeIndexedDataset } from './services/dataset/TimeIndexedDataset.js';
import { GwlResolver } from './services/warming-levels/GwlResolver.js';
import { createReferenceSource } from './services/warming-levels/sources/createReferenceSource.js';
import type { ReferenceSource } from './services/warming-levels/sources/ReferenceSource.js';
import type { LookupTableRow, YearRange } from './services/warming-levels/types.js';

export interface LookupOptions {
  source?: ReferenceSource;
}

function resolverFor(options?: LookupOptions): GwlResolver {
  return new GwlResolver({ source: options?.source ?? createReferenceSource() });
}

/**
 * Start and end year of the 20-year GWL timeslice for a simulation, e.g.
 * `resolveYearRange('CMIP6', 'ACCESS-ESM1-5', 'r1i1p1f1', 'ssp585', 2.0)`.
 */
export function resolveYearRange(
  cmipPhase: string,
  model: string,
  ensemble: string,
  pathway: string,
  warmingLevel: number | string,
  options?: LookupOptions
): Promise<YearRange> {
  return resolverFor(options).resolveYearRange({ cmipPhase, model, ensemble, pathway, warmingLevel });
}

/** All warming level records of a CMIP phase as one flat table */
export function buildLookupTable(cmipPhase: string, options?: LookupOptions): Promise<LookupTableRow[]> {
  return resolverFor(options).buildLookupTable(cmipPhase);
}

/** The GWL timeslice of a dataset for a simulation */
export function sliceToTimeslice<TSubset>(
  dataset: TimeIndexedDataset<TSubset>,
  cmipPhase: string,
  model: string,
  ensemble: string,
  pathway: string,
  warmingLevel: number | string,
  options?: LookupOptions
): Promise<TSubset> {
  return resolverFor(options).sliceToTimeslice(dataset, { cmipPhase, model, ensemble, pathway, warmingLevel });
}

export * from './services/warming-levels/index.js';
export { TimeSeries } from './services/dataset/TimeIndexedDataset.js';
export type { TimeIndexedDataset, TimePoint } from './services/dataset/TimeIndexedDataset.js';
export {
  AmbiguousEntryError,
  AppError,
  ErrorCode,
  InvalidArgumentError,
  LocalReferenceMissingError,
  NotCalculatedError,
  ReferenceParseError,
  SourceUnavailableError,
  ThresholdNotReachedError,
  UnknownModelError,
  isAppError,
  isOperationalError,
} from './types/errors.js';
export { getEnv, loadEnv } from './config/env.js';
export type { Env, ReferenceSourceMode } from './config/env.js';
export { logger, createChildLogger } from './utils/logger.js';
