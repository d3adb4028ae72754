/**
 * Environment Variable Parsing
 *
 * Centralized parsing of the environment variables that control where the
 * warming level reference is read from and how it is fetched.
 */

import { logger } from '../utils/logger.js';

export const DEFAULT_REFERENCE_BASE_URL =
  'https://raw.githubusercontent.com/mathause/cmip_warming_levels/main';

export const DEFAULT_REFERENCE_LOCAL_DIR = './cmip_warming_levels';

export const NODE_ENVS = ['development', 'production', 'test'] as const;
export type NodeEnv = (typeof NODE_ENVS)[number];

/** `auto` tries the remote copy first and falls back to the local checkout. */
export const REFERENCE_SOURCE_MODES = ['remote', 'local', 'auto'] as const;
export type ReferenceSourceMode = (typeof REFERENCE_SOURCE_MODES)[number];

/**
 * Helper function to safely parse a number from string with default
 */
function parseNumericEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  return isNaN(num) || num < 0 ? defaultValue : num;
}

function parseEnumEnv<T extends string>(
  name: string,
  value: string | undefined,
  allowed: readonly T[],
  defaultValue: T
): T {
  if (!value) return defaultValue;
  const normalized = value.trim().toLowerCase();
  const match = allowed.find((candidate) => candidate === normalized);
  if (match === undefined) {
    logger.warn(
      { variable: name, value, allowed, fallback: defaultValue },
      `Ignoring invalid ${name}, using default`
    );
    return defaultValue;
  }
  return match;
}

/**
 * Environment configuration type
 */
export interface Env {
  NODE_ENV: NodeEnv;

  // Reference document location
  GWL_REFERENCE_SOURCE: ReferenceSourceMode;
  GWL_REFERENCE_BASE_URL: string;
  GWL_REFERENCE_LOCAL_DIR: string;

  // Remote fetch behaviour
  GWL_HTTP_TIMEOUT_MS: number;
  GWL_FETCH_MAX_RETRIES: number;
  GWL_FETCH_RETRY_DELAY_MS: number;
}

/**
 * Parse an environment map into a typed configuration. Unset or invalid values
 * fall back to their defaults.
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return {
    NODE_ENV: parseEnumEnv('NODE_ENV', source.NODE_ENV, NODE_ENVS, 'development'),
    GWL_REFERENCE_SOURCE: parseEnumEnv(
      'GWL_REFERENCE_SOURCE',
      source.GWL_REFERENCE_SOURCE,
      REFERENCE_SOURCE_MODES,
      'auto'
    ),
    GWL_REFERENCE_BASE_URL: source.GWL_REFERENCE_BASE_URL || DEFAULT_REFERENCE_BASE_URL,
    GWL_REFERENCE_LOCAL_DIR: source.GWL_REFERENCE_LOCAL_DIR || DEFAULT_REFERENCE_LOCAL_DIR,
    GWL_HTTP_TIMEOUT_MS: parseNumericEnv(source.GWL_HTTP_TIMEOUT_MS, 30000),
    GWL_FETCH_MAX_RETRIES: parseNumericEnv(source.GWL_FETCH_MAX_RETRIES, 2),
    GWL_FETCH_RETRY_DELAY_MS: parseNumericEnv(source.GWL_FETCH_RETRY_DELAY_MS, 500),
  };
}

let cachedEnv: Env | undefined;

/**
 * Get the process configuration, parsed once on first use
 */
export function getEnv(): Env {
  if (!cachedEnv) {
    cachedEnv = loadEnv();
  }
  return cachedEnv;
}
