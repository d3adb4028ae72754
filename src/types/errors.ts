/**
 * Centralized error type definitions
 * Provides a consistent error hierarchy and error codes
 */

import { formatWarmingLevel } from '../services/warming-levels/constants.js';
import type { NormalizedGwlQuery } from '../services/warming-levels/types.js';

/**
 * Error code enumeration for consistent error handling
 */
export enum ErrorCode {
  // Caller errors
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',

  // Reference document
  SOURCE_UNAVAILABLE = 'SOURCE_UNAVAILABLE',
  LOCAL_REFERENCE_MISSING = 'LOCAL_REFERENCE_MISSING',
  PARSE_ERROR = 'PARSE_ERROR',

  // Lookup misses
  UNKNOWN_MODEL = 'UNKNOWN_MODEL',
  NOT_CALCULATED = 'NOT_CALCULATED',
  AMBIGUOUS_ENTRY = 'AMBIGUOUS_ENTRY',
  THRESHOLD_NOT_REACHED = 'THRESHOLD_NOT_REACHED',
}

/**
 * Base error class for all application errors
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    isOperational: boolean = true,
    context?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }
}

/** `CMIP6 ACCESS-ESM1-5 r1i1p1f1 ssp585` */
function describeSimulation(query: NormalizedGwlQuery): string {
  return `${query.cmipPhase.toUpperCase()} ${query.model} ${query.ensemble} ${query.pathway}`;
}

export class InvalidArgumentError extends AppError {
  /**
   * @param allowed - the accepted values, or a description of what is accepted
   */
  constructor(field: string, value: unknown, allowed: readonly (string | number)[] | string) {
    const expected = typeof allowed === 'string' ? allowed : `one of: ${allowed.join(', ')}`;
    super(
      `Invalid ${field} ${JSON.stringify(value)}; expected ${expected}`,
      ErrorCode.INVALID_ARGUMENT,
      400,
      true,
      { field, value, allowed }
    );
  }
}

/**
 * The reference document could not be obtained. Retryable once the
 * source is reachable again.
 */
export class SourceUnavailableError extends AppError {
  constructor(
    message: string,
    context?: Record<string, unknown>,
    cause?: unknown,
    code: string = ErrorCode.SOURCE_UNAVAILABLE
  ) {
    super(message, code, 503, true, context, cause);
  }
}

/**
 * The local checkout of the reference repository does not contain the
 * requested document. Fixed by cloning the repository, not by retrying.
 */
export class LocalReferenceMissingError extends SourceUnavailableError {
  constructor(cmipPhase: string, location: string, localDir: string, cause?: unknown) {
    super(
      `Local copy of the ${cmipPhase.toUpperCase()} warming level reference not found at ${location}. ` +
        `Clone https://github.com/mathause/cmip_warming_levels into ${localDir} ` +
        'or set GWL_REFERENCE_LOCAL_DIR to an existing checkout.',
      { cmipPhase, location, localDir },
      cause,
      ErrorCode.LOCAL_REFERENCE_MISSING
    );
  }
}

/**
 * The reference text does not have the expected structure, which usually
 * means the upstream format changed.
 */
export class ReferenceParseError extends AppError {
  constructor(cmipPhase: string, issues: string[], cause?: unknown) {
    super(
      `Could not parse the ${cmipPhase.toUpperCase()} warming level reference: ${issues.join('; ')}`,
      ErrorCode.PARSE_ERROR,
      502,
      false,
      { cmipPhase, issues },
      cause
    );
  }
}

export class UnknownModelError extends AppError {
  constructor(query: NormalizedGwlQuery, knownModels: string[]) {
    super(
      `Model '${query.model}' not recognised for ${query.cmipPhase.toUpperCase()} at GWL ` +
        `${formatWarmingLevel(query.warmingLevel)}°C. GWLs available for the following models: ` +
        (knownModels.length > 0 ? knownModels.join(', ') : '(none)'),
      ErrorCode.UNKNOWN_MODEL,
      404,
      true,
      { query, knownModels }
    );
  }
}

export class NotCalculatedError extends AppError {
  constructor(query: NormalizedGwlQuery) {
    super(
      `GWL ${formatWarmingLevel(query.warmingLevel)}°C not calculated for ${describeSimulation(query)}`,
      ErrorCode.NOT_CALCULATED,
      404,
      true,
      { query }
    );
  }
}

/**
 * More than one record for the same simulation in one bucket. This is a
 * defect in the reference data, so it is reported as non-operational.
 */
export class AmbiguousEntryError extends AppError {
  constructor(query: NormalizedGwlQuery, matches: number) {
    super(
      `Multiple entries (${matches}) for ${describeSimulation(query)} at GWL ` +
        `${formatWarmingLevel(query.warmingLevel)}°C. Check source file.`,
      ErrorCode.AMBIGUOUS_ENTRY,
      409,
      false,
      { query, matches }
    );
  }
}

export class ThresholdNotReachedError extends AppError {
  constructor(query: NormalizedGwlQuery) {
    super(
      `${describeSimulation(query)} did not reach GWL ${formatWarmingLevel(query.warmingLevel)}°C`,
      ErrorCode.THRESHOLD_NOT_REACHED,
      422,
      true,
      { query }
    );
  }
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Type guard to check if error is an operational error
 */
export function isOperationalError(error: unknown): boolean {
  return isAppError(error) && error.isOperational;
}
