/**
 * Query validation
 *
 * Normalizes caller input at the boundary: phase and pathway are lower-cased
 * here and nowhere else, and every rejected field is reported with the
 * values it accepts.
 */

import { z } from 'zod';
import type { ZodType, ZodTypeDef } from 'zod';
import { InvalidArgumentError } from '../../types/errors.js';
import {
  CMIP_PHASES,
  PATHWAYS,
  WARMING_LEVELS,
  formatWarmingLevel,
  type CmipPhase,
  type Pathway,
  type WarmingLevel,
} from './constants.js';
import type { GwlQuery, NormalizedGwlQuery } from './types.js';

const lowerCase = (value: unknown): unknown => (typeof value === 'string' ? value.toLowerCase() : value);

const numeric = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() !== '' ? Number(value) : value;

const cmipPhaseSchema = z.preprocess(lowerCase, z.enum(CMIP_PHASES));

const pathwaySchema = z.preprocess(lowerCase, z.enum(PATHWAYS));

const warmingLevelSchema = z.preprocess(
  numeric,
  z.number().refine((value): value is WarmingLevel => WARMING_LEVELS.some((level) => level === value))
);

function parseField<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  field: string,
  value: unknown,
  allowed: readonly (string | number)[] | string
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError(field, value, allowed);
  }
  return result.data;
}

export function validateCmipPhase(value: unknown): CmipPhase {
  return parseField(cmipPhaseSchema, 'cmipPhase', value, CMIP_PHASES);
}

export function validatePathway(value: unknown): Pathway {
  return parseField(pathwaySchema, 'pathway', value, PATHWAYS);
}

export function validateWarmingLevel(value: unknown): WarmingLevel {
  return parseField(warmingLevelSchema, 'warmingLevel', value, WARMING_LEVELS.map(formatWarmingLevel));
}

/**
 * Validate the enumerated fields of a query and return its normalized form.
 * Model and ensemble are passed through untouched; whether they exist is a
 * question for the reference document.
 *
 * @throws InvalidArgumentError naming the first offending field
 */
export function normalizeGwlQuery(query: GwlQuery): NormalizedGwlQuery {
  return {
    cmipPhase: validateCmipPhase(query.cmipPhase),
    model: query.model,
    ensemble: query.ensemble,
    pathway: validatePathway(query.pathway),
    warmingLevel: validateWarmingLevel(query.warmingLevel),
  };
}
