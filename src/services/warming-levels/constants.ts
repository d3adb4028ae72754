/**
 * Supported CMIP phases, pathways and warming levels, plus the naming rules
 * the reference document uses for its warming level buckets.
 */

export const CMIP_PHASES = ['cmip5', 'cmip6'] as const;
export type CmipPhase = (typeof CMIP_PHASES)[number];

export const PATHWAYS = ['rcp26', 'rcp45', 'rcp85', 'ssp126', 'ssp245', 'ssp370', 'ssp585'] as const;
export type Pathway = (typeof PATHWAYS)[number];

/** Warming levels in °C above 1850-1900 */
export const WARMING_LEVELS = [1.0, 1.2, 1.5, 2.0, 3.0, 4.0] as const;
export type WarmingLevel = (typeof WARMING_LEVELS)[number];

/** Year written into both year fields of a simulation that never reaches a level */
export const NOT_REACHED_YEAR = 9999;

export const BUCKET_PREFIX = 'warming_level_';
export const GWL_LABEL_PREFIX = 'gwl';

/** Length of a GWL timeslice in years */
export const TIMESLICE_YEARS = 20;

export function formatWarmingLevel(level: number): string {
  return level.toFixed(1);
}

/**
 * Bucket holding the records for a warming level, e.g. 1.5 -> `warming_level_15`.
 * Levels carry one decimal, so rounding ten times the level is exact.
 */
export function bucketName(level: number): string {
  return `${BUCKET_PREFIX}${Math.round(level * 10)}`;
}

/** `warming_level_20` -> `gwl20` */
export function gwlLabel(bucket: string): string {
  return bucket.startsWith(BUCKET_PREFIX)
    ? `${GWL_LABEL_PREFIX}${bucket.slice(BUCKET_PREFIX.length)}`
    : bucket;
}

/** Trailing annotation the reference uses for a simulation that stays below `level` */
export function notReachedMarker(level: number): string {
  return `} -- did not reach ${formatWarmingLevel(level)}°C`;
}
